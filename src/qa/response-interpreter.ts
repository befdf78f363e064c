import { z } from "zod";
import { MalformedResponseError, describeError } from "../shared/errors.js";
import { NOT_FOUND_ANSWER } from "../prompt/system-instruction.js";
import { logNotFoundNormalized } from "./qa-logger.js";
import { CONFIDENCE_LEVELS, type InterpretedAnswer } from "./types.js";

export const FALLBACK_ANSWER = "Unable to generate answer";

// Each field falls back on its own; only a non-object reply fails the whole parse.
const modelAnswerSchema = z.object({
  answer: z
    .string()
    .refine((value) => value.trim().length > 0)
    .catch(FALLBACK_ANSWER),
  confidence: z.enum(CONFIDENCE_LEVELS).catch("low"),
  relevant_quotes: z.array(z.string()).catch([]),
  not_found: z.boolean().catch(false),
});

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenceMatch = trimmed.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```$/);
  return fenceMatch?.[1] !== undefined ? fenceMatch[1].trim() : trimmed;
}

function decodeJson(raw: string): unknown {
  try {
    return JSON.parse(stripCodeFence(raw));
  } catch (err) {
    throw new MalformedResponseError(describeError(err), raw);
  }
}

/**
 * A `not_found` reply always carries the fixed statement and no quotes,
 * whatever else the model put next to the flag.
 */
function normalizeNotFound(answer: InterpretedAnswer): InterpretedAnswer {
  if (!answer.not_found) return answer;

  if (answer.relevant_quotes.length > 0) {
    logNotFoundNormalized(answer.relevant_quotes.length);
  }
  return {
    answer: NOT_FOUND_ANSWER,
    confidence: answer.confidence,
    relevant_quotes: [],
    not_found: true,
  };
}

export function interpretModelOutput(raw: string): InterpretedAnswer {
  const decoded = decodeJson(raw);

  const parsed = modelAnswerSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedResponseError("expected a JSON object", raw);
  }

  return normalizeNotFound(parsed.data);
}
