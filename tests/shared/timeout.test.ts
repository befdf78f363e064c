import { describe, it, expect } from "vitest";
import { withTimeout } from "../../src/shared/timeout.js";
import { ProcessingFailureError } from "../../src/shared/errors.js";

describe("withTimeout", () => {
  it("resolves with the task result when it finishes in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 1000, "Quick task")).resolves.toBe("done");
  });

  it("passes task failures through unchanged", async () => {
    const failure = new Error("boom");
    await expect(withTimeout(Promise.reject(failure), 1000, "Failing task")).rejects.toBe(failure);
  });

  it("rejects with a processing failure when the timer wins", async () => {
    const never = new Promise<string>(() => undefined);

    const result = withTimeout(never, 10, "Slow task");

    await expect(result).rejects.toBeInstanceOf(ProcessingFailureError);
    await expect(result).rejects.toThrow("Slow task timed out after 10ms");
  });
});
