import { describe, it, expect } from "vitest";
import { DEFAULT_SETTINGS } from "../../src/config/settings.js";
import { createRequestSchemas, parseBody } from "../../src/server/validation.js";
import { ValidationError } from "../../src/shared/errors.js";

const schemas = createRequestSchemas({ maxDocumentLength: 20, maxQuestionLength: 8 });

function issuesOf(run: () => unknown): ValidationError["issues"] {
  try {
    run();
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  throw new Error("expected a validation error");
}

describe("createDocument schema", () => {
  it("fills in the default title", () => {
    expect(parseBody(schemas.createDocument, { content: "Long enough content" })).toEqual({
      content: "Long enough content",
      title: "Untitled Document",
    });
  });

  it("counts emoji as single characters for the minimum", () => {
    const issues = issuesOf(() =>
      parseBody(schemas.createDocument, { content: "\u{1F600}".repeat(6) }),
    );

    expect(issues).toEqual([{ path: "content", message: "content must be at least 10 characters" }]);
  });

  it("counts emoji as single characters for the maximum", () => {
    const content = "\u{1F600}".repeat(20);

    expect(parseBody(schemas.createDocument, { content }).content).toBe(content);
    expect(issuesOf(() => parseBody(schemas.createDocument, { content: `${content}!` }))).toEqual([
      { path: "content", message: "content must be at most 20 characters" },
    ]);
  });

  it("reports a missing content field", () => {
    expect(issuesOf(() => parseBody(schemas.createDocument, {}))).toEqual([
      { path: "content", message: "content is required" },
    ]);
  });

  it("limits the title to 200 characters", () => {
    const title = "\u{1F4C4}".repeat(200);

    expect(parseBody(schemas.createDocument, { title, content: "Long enough content" }).title).toBe(title);
  });

  it("reports a body that is not an object against the body path", () => {
    const issues = issuesOf(() => parseBody(schemas.createDocument, "plain text"));

    expect(issues).toHaveLength(1);
    expect(issues[0]?.path).toBe("body");
  });
});

describe("askQuestion schema", () => {
  it("accepts a question of emoji within the bounds", () => {
    const question = "\u{1F914}".repeat(5);
    expect(parseBody(schemas.askQuestion, { question })).toEqual({ question });
  });

  it("rejects a question shorter than five characters", () => {
    expect(issuesOf(() => parseBody(schemas.askQuestion, { question: "\u{1F914}".repeat(4) }))).toEqual([
      { path: "question", message: "question must be at least 5 characters" },
    ]);
  });

  it("uses the configured maximum question length", () => {
    const defaults = createRequestSchemas(DEFAULT_SETTINGS);

    expect(issuesOf(() => parseBody(schemas.askQuestion, { question: "q".repeat(9) }))).toEqual([
      { path: "question", message: "question must be at most 8 characters" },
    ]);
    expect(parseBody(defaults.askQuestion, { question: "q".repeat(9) }).question).toBe("q".repeat(9));
  });
});
