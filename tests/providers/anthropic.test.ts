import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("@anthropic-ai/sdk", () => {
  const MockAnthropic = vi.fn();
  return { default: MockAnthropic };
});

import Anthropic from "@anthropic-ai/sdk";
import type { LlmProvider } from "../../src/core/contracts/provider.js";
import type { LlmStructuredInput } from "../../src/core/contracts/llm-protocol.js";

async function getProvider(): Promise<LlmProvider> {
  const mod = await import("../../src/providers/anthropic/index.js");
  return mod.default;
}

function mockAnthropicConstructor(mockCreate: ReturnType<typeof vi.fn>): void {
  vi.mocked(Anthropic).mockImplementation(function (this: unknown) {
    return { messages: { create: mockCreate } } as unknown as Anthropic;
  } as never);
}

const JSON_INPUT: LlmStructuredInput = {
  messages: [
    { role: "system", content: "System" },
    { role: "user", content: "Question prompt" },
  ],
  sampling: { temperature: 0.1, maxOutputTokens: 1500 },
  responseFormat: "json",
};

describe("Anthropic provider", () => {
  const originalEnv = { ...process.env };
  let provider: LlmProvider;

  beforeEach(async () => {
    vi.clearAllMocks();
    provider = await getProvider();
    provider.stop();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should throw when ANTHROPIC_API_KEY is missing", () => {
    delete process.env["ANTHROPIC_API_KEY"];
    expect(() => provider.start()).toThrow("Missing ANTHROPIC_API_KEY environment variable.");
  });

  it("should initialize when API key is present", () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";
    expect(() => provider.start()).not.toThrow();
    expect(Anthropic).toHaveBeenCalledWith({ apiKey: "test-key" });
  });

  it("should pre-fill the assistant turn for JSON and restore the brace", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";
    process.env["ANTHROPIC_MODEL"] = "claude-test-model";

    const mockCreate = vi.fn().mockResolvedValue({
      model: "claude-test-model-20250101",
      content: [{ type: "text", text: '"answer":"x","not_found":false}' }],
    });
    mockAnthropicConstructor(mockCreate);

    provider.start();
    const out = await provider.generateStructured(JSON_INPUT);

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-test-model",
      max_tokens: 1500,
      temperature: 0.1,
      system: "System",
      messages: [
        { role: "user", content: "Question prompt" },
        { role: "assistant", content: "{" },
      ],
    });
    expect(out).toEqual({
      content: '{"answer":"x","not_found":false}',
      model: "claude-test-model-20250101",
    });
  });

  it("should send plain text requests without a pre-fill or system prompt", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";
    delete process.env["ANTHROPIC_MODEL"];

    const mockCreate = vi.fn().mockResolvedValue({
      content: [{ type: "text", text: "Hello from Claude" }],
    });
    mockAnthropicConstructor(mockCreate);

    provider.start();
    const out = await provider.generateStructured({
      messages: [{ role: "user", content: "Hi" }],
      sampling: { temperature: 0.1, maxOutputTokens: 200 },
      responseFormat: "text",
    });

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-3-5-haiku-latest",
      max_tokens: 200,
      temperature: 0.1,
      messages: [{ role: "user", content: "Hi" }],
    });
    expect(out).toEqual({ content: "Hello from Claude", model: "claude-3-5-haiku-latest" });
  });

  it("should merge several system messages into one system prompt", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    const mockCreate = vi.fn().mockResolvedValue({
      content: [{ type: "text", text: "ok" }],
    });
    mockAnthropicConstructor(mockCreate);

    provider.start();
    await provider.generateStructured({
      messages: [
        { role: "system", content: "First" },
        { role: "system", content: "Second" },
        { role: "user", content: "Hi" },
      ],
      sampling: { temperature: 0, maxOutputTokens: 100 },
    });

    expect(mockCreate.mock.calls[0]?.[0]).toMatchObject({ system: "First\n\nSecond" });
  });

  it("should return only the prefill for an empty response", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    const mockCreate = vi.fn().mockResolvedValue({
      model: "claude-test-model",
      content: [],
    });
    mockAnthropicConstructor(mockCreate);

    provider.start();
    await expect(provider.generateStructured(JSON_INPUT)).resolves.toEqual({
      content: "{",
      model: "claude-test-model",
    });
  });

  it("should ignore non-text blocks", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    const mockCreate = vi.fn().mockResolvedValue({
      model: "claude-test-model",
      content: [
        { type: "tool_use", id: "toolu_1", name: "lookup", input: {} },
        { type: "text", text: '"answer":"x"}' },
      ],
    });
    mockAnthropicConstructor(mockCreate);

    provider.start();
    const out = await provider.generateStructured(JSON_INPUT);
    expect(out.content).toBe('{"answer":"x"}');
  });

  it("should throw when calling generateStructured before start", async () => {
    await expect(provider.generateStructured(JSON_INPUT)).rejects.toThrow("Anthropic provider not started.");
  });

  it("should clean up on stop", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-key";

    mockAnthropicConstructor(vi.fn());

    provider.start();
    provider.stop();
    await expect(provider.generateStructured(JSON_INPUT)).rejects.toThrow("Anthropic provider not started.");
  });
});
