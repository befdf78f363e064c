import Anthropic from "@anthropic-ai/sdk";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type {
  LlmMessage,
  LlmStructuredInput,
  LlmStructuredOutput,
} from "../../core/contracts/llm-protocol.js";

const DEFAULT_MODEL = "claude-3-5-haiku-latest";

// Anthropic has no JSON mode; pre-filling the assistant turn pins the first character.
const JSON_PREFILL = "{";

let client: Anthropic | null = null;

interface AnthropicMessageBuild {
  system?: string;
  messages: Anthropic.MessageParam[];
}

function toAnthropicPayload(messages: LlmMessage[]): AnthropicMessageBuild {
  const out: AnthropicMessageBuild = {
    messages: [],
  };

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.system = out.system ? `${out.system}\n\n${msg.content}` : msg.content;
        break;
      case "user":
      case "assistant":
        out.messages.push({
          role: msg.role,
          content: msg.content,
        });
        break;
      default:
        break;
    }
  }

  return out;
}

const provider: LlmProvider = {
  name: "anthropic",
  version: "1.0.0",

  start() {
    const apiKey = process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing ANTHROPIC_API_KEY environment variable.");
    }
    client = new Anthropic({ apiKey });
  },

  stop() {
    client = null;
  },

  async generateStructured(input: LlmStructuredInput): Promise<LlmStructuredOutput> {
    if (!client) {
      throw new Error("Anthropic provider not started.");
    }

    const model = process.env["ANTHROPIC_MODEL"] ?? DEFAULT_MODEL;
    const payload = toAnthropicPayload(input.messages);
    const prefill = input.responseFormat === "json" ? JSON_PREFILL : "";
    const messages: Anthropic.MessageParam[] = prefill
      ? [...payload.messages, { role: "assistant", content: prefill }]
      : payload.messages;

    const response = await client.messages.create({
      model,
      max_tokens: input.sampling.maxOutputTokens,
      temperature: input.sampling.temperature,
      ...(payload.system ? { system: payload.system } : {}),
      messages,
    });

    const textParts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        textParts.push(block.text);
      }
    }

    const reply = textParts.join("\n").trim();

    return {
      content: `${prefill}${reply}`,
      model: response.model ?? model,
    };
  },
};

export default provider;
