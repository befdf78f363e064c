import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { reduceContext, TRUNCATION_MARKER } from "../../src/qa/context-reducer.js";

describe("reduceContext", () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns content shorter than the limit unchanged", () => {
    expect(reduceContext("short text", 100)).toBe("short text");
  });

  it("returns content exactly at the limit unchanged", () => {
    expect(reduceContext("abcde", 5)).toBe("abcde");
  });

  it("keeps content within the limit for a range of lengths", () => {
    for (const length of [0, 1, 9, 10]) {
      const content = "x".repeat(length);
      expect(reduceContext(content, 10)).toBe(content);
    }
  });

  it("cuts oversized content and appends the marker after a blank line", () => {
    const content = `${"a".repeat(30)}${"b".repeat(20)}`;

    const reduced = reduceContext(content, 30);

    expect(reduced).toBe(`${"a".repeat(30)}\n\n[... Document truncated for processing ...]`);
    expect(reduced).not.toContain("b");
  });

  it("produces limit + marker characters for any oversized input", () => {
    for (const [length, limit] of [[11, 10], [100, 10], [5000, 1234]] as const) {
      const content = "y".repeat(length);
      const reduced = reduceContext(content, limit);
      expect(reduced).toHaveLength(limit + TRUNCATION_MARKER.length);
      expect(reduced.startsWith(content.slice(0, limit))).toBe(true);
      expect(reduced.endsWith(TRUNCATION_MARKER)).toBe(true);
    }
  });

  it("measures the limit in code points, not UTF-16 units", () => {
    const content = "\u{1F600}".repeat(3);
    expect(reduceContext(content, 3)).toBe(content);
  });

  it("keeps an emoji at the cut boundary whole", () => {
    const content = "abcd\u{1F600}tail";

    expect(reduceContext(content, 5)).toBe(`abcd\u{1F600}${TRUNCATION_MARKER}`);
    expect(reduceContext(content, 4)).toBe(`abcd${TRUNCATION_MARKER}`);
  });

  it("logs the original and reduced lengths when truncating", () => {
    reduceContext("z".repeat(50), 20);

    expect(logSpy).toHaveBeenCalledTimes(1);
    const line = String(logSpy.mock.calls[0]?.[0]);
    expect(line).toContain("Document truncated");
    expect(line).toContain("originalChars=\x1b[0m50");
    expect(line).toContain(`reducedChars=\x1b[0m${20 + TRUNCATION_MARKER.length}`);
  });

  it("does not log when nothing is cut", () => {
    reduceContext("fits", 20);
    expect(logSpy).not.toHaveBeenCalled();
  });
});
