import OpenAI from "openai";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type {
  LlmMessage,
  LlmStructuredInput,
  LlmStructuredOutput,
} from "../../core/contracts/llm-protocol.js";

const DEFAULT_MODEL = "gpt-4o-mini";

let client: OpenAI | null = null;

function toOpenAiMessages(messages: LlmMessage[]): OpenAI.ChatCompletionMessageParam[] {
  const out: OpenAI.ChatCompletionMessageParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.push({ role: "system", content: msg.content });
        break;
      case "user":
        out.push({ role: "user", content: msg.content });
        break;
      case "assistant":
        out.push({ role: "assistant", content: msg.content });
        break;
      default:
        break;
    }
  }

  return out;
}

const provider: LlmProvider = {
  name: "openai",
  version: "1.0.0",

  start() {
    const apiKey = process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing OPENAI_API_KEY environment variable.");
    }
    client = new OpenAI({ apiKey });
  },

  stop() {
    client = null;
  },

  async generateStructured(input: LlmStructuredInput): Promise<LlmStructuredOutput> {
    if (!client) {
      throw new Error("OpenAI provider not started.");
    }

    const model = process.env["OPENAI_MODEL"] ?? DEFAULT_MODEL;

    const response = await client.chat.completions.create({
      model,
      messages: toOpenAiMessages(input.messages),
      temperature: input.sampling.temperature,
      max_tokens: input.sampling.maxOutputTokens,
      ...(input.responseFormat === "json"
        ? { response_format: { type: "json_object" as const } }
        : {}),
    });

    // An empty reply is passed on; the interpreter reports it as malformed.
    const reply = response.choices[0]?.message?.content ?? "";

    return {
      content: reply,
      model: response.model ?? model,
    };
  },
};

export default provider;
