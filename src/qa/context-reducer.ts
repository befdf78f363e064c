import { codePointLength, sliceCodePoints } from "../shared/text.js";
import { logContextTruncated } from "./qa-logger.js";

export const TRUNCATION_MARKER = "\n\n[... Document truncated for processing ...]";

/**
 * Cuts `content` to its first `limit` code points and appends the marker.
 * Purely positional: anything past the budget never reaches the model, even
 * when the answer lives there.
 */
export function reduceContext(content: string, limit: number): string {
  const length = codePointLength(content);
  if (length <= limit) return content;

  const reduced = `${sliceCodePoints(content, limit)}${TRUNCATION_MARKER}`;
  logContextTruncated(length, reduced);
  return reduced;
}
