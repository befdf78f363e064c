export interface LlmMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LlmSamplingParams {
  temperature: number;
  maxOutputTokens: number;
}

export type LlmResponseFormat = "json" | "text";

export interface LlmStructuredInput {
  messages: LlmMessage[];
  sampling: LlmSamplingParams;
  responseFormat?: LlmResponseFormat;
}

export interface LlmStructuredOutput {
  /** Raw text of the model reply, not yet parsed. */
  content: string;
  model: string;
}
