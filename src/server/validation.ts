import { z } from "zod";
import {
  DEFAULT_DOCUMENT_TITLE,
  MAX_TITLE_LENGTH,
  MIN_DOCUMENT_LENGTH,
  MIN_QUESTION_LENGTH,
  type AppSettings,
} from "../config/settings.js";
import { ValidationError } from "../shared/errors.js";
import { codePointLength } from "../shared/text.js";

// Bounds count code points, so an emoji is one character.
function boundedText(field: string, min: number, max: number) {
  return z
    .string({ required_error: `${field} is required` })
    .refine((value) => codePointLength(value) >= min, `${field} must be at least ${min} characters`)
    .refine((value) => codePointLength(value) <= max, `${field} must be at most ${max} characters`);
}

export function createRequestSchemas(settings: Pick<AppSettings, "maxDocumentLength" | "maxQuestionLength">) {
  return {
    createDocument: z.object({
      content: boundedText("content", MIN_DOCUMENT_LENGTH, settings.maxDocumentLength),
      title: z
        .string()
        .refine(
          (value) => codePointLength(value) <= MAX_TITLE_LENGTH,
          `title must be at most ${MAX_TITLE_LENGTH} characters`,
        )
        .default(DEFAULT_DOCUMENT_TITLE),
    }),
    askQuestion: z.object({
      question: boundedText("question", MIN_QUESTION_LENGTH, settings.maxQuestionLength),
    }),
  };
}

export type RequestSchemas = ReturnType<typeof createRequestSchemas>;

/**
 * Parses a request body against `schema`. Failures become a ValidationError
 * carrying one issue per offending field.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join(".") || "body",
      message: issue.message,
    }));
    throw new ValidationError("Validation failed", issues);
  }
  return result.data;
}
