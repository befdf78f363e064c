import type { LlmMessage } from "../core/contracts/llm-protocol.js";

const BYTES_PER_TOKEN = 4;
const REQUEST_OVERHEAD_TOKENS = 3;
const MESSAGE_OVERHEAD_TOKENS = 4;

export function estimateTextTokens(text: string): number {
  if (!text || text.trim().length === 0) return 0;
  return Math.max(1, Math.ceil(Buffer.byteLength(text, "utf8") / BYTES_PER_TOKEN));
}

/** Rough input size of a request, for logging only; providers do their own counting. */
export function estimateMessagesTokens(messages: LlmMessage[]): number {
  const messageTokens = messages.reduce(
    (sum, msg) => sum + MESSAGE_OVERHEAD_TOKENS + estimateTextTokens(msg.content),
    0,
  );
  return REQUEST_OVERHEAD_TOKENS + messageTokens;
}
