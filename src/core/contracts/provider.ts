import type { LlmStructuredInput, LlmStructuredOutput } from "./llm-protocol.js";

export interface LlmProvider {
  name: string;
  version: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  /** Single attempt; failures propagate to the caller untouched. */
  generateStructured(input: LlmStructuredInput): Promise<LlmStructuredOutput>;
}
