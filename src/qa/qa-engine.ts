import type { LlmProvider } from "../core/contracts/provider.js";
import type { LlmStructuredOutput } from "../core/contracts/llm-protocol.js";
import { buildPromptMessages } from "../prompt/builder.js";
import { estimateMessagesTokens } from "../prompt/token-estimator.js";
import { ProcessingFailureError } from "../shared/errors.js";
import { reduceContext } from "./context-reducer.js";
import {
  logAnswerGenerated,
  logModelRequest,
  logQuestionReceived,
} from "./qa-logger.js";
import { interpretModelOutput } from "./response-interpreter.js";
import type { Answer, AskInput } from "./types.js";

// Factual extraction: favour reproducible output over variety.
export const DEFAULT_TEMPERATURE = 0.1;

export interface GroundedQaEngineOptions {
  provider: LlmProvider;
  contextMaxChars: number;
  maxOutputTokens: number;
  temperature?: number;
  now?: () => number;
}

/**
 * Answers one question about one document. Holds no per-request state, so a
 * single instance serves concurrent requests.
 */
export class GroundedQaEngine {
  private readonly provider: LlmProvider;
  private readonly contextMaxChars: number;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly now: () => number;

  constructor(options: GroundedQaEngineOptions) {
    this.provider = options.provider;
    this.contextMaxChars = options.contextMaxChars;
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.now = options.now ?? (() => performance.now());
  }

  async answer(input: AskInput): Promise<Answer> {
    const startedAt = this.now();
    logQuestionReceived(input.title, input.question);

    const context = reduceContext(input.content, this.contextMaxChars);
    const messages = buildPromptMessages(input.title, context, input.question);
    logModelRequest(this.provider.name, estimateMessagesTokens(messages));

    let output: LlmStructuredOutput;
    try {
      output = await this.provider.generateStructured({
        messages,
        sampling: {
          temperature: this.temperature,
          maxOutputTokens: this.maxOutputTokens,
        },
        responseFormat: "json",
      });
    } catch (err) {
      // Logged once, by the HTTP error handler.
      throw new ProcessingFailureError("Model call failed", err, { provider: this.provider.name });
    }

    // MalformedResponseError propagates as-is: it is reported differently from a failed call.
    const interpreted = interpretModelOutput(output.content);
    const elapsedMs = Math.round((this.now() - startedAt) * 100) / 100;

    logAnswerGenerated(
      interpreted.confidence,
      interpreted.not_found,
      interpreted.relevant_quotes.length,
      elapsedMs,
    );

    return {
      ...interpreted,
      document_title: input.title,
      question: input.question,
      model_used: output.model,
      processing_time_ms: elapsedMs,
    };
  }
}
