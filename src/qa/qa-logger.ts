import { estimateTextTokens } from "../prompt/token-estimator.js";
import { createLogger } from "../shared/logger.js";
import { codePointLength } from "../shared/text.js";

const log = createLogger("qa");

function preview(text: string, max = 80): string {
  const singleLine = text.replace(/\s+/g, " ").trim();
  if (singleLine.length <= max) return singleLine;
  return `${singleLine.slice(0, max - 3)}...`;
}

export function logQuestionReceived(title: string, question: string): void {
  log.info("Answering question", { title, question: preview(question) });
}

export function logContextTruncated(originalLength: number, reduced: string): void {
  log.warn("Document truncated", {
    originalChars: originalLength,
    reducedChars: codePointLength(reduced),
    approxTokens: estimateTextTokens(reduced),
  });
}

export function logModelRequest(provider: string, approxInputTokens: number): void {
  log.debug("Calling model", { provider, approxInputTokens });
}

export function logAnswerGenerated(
  confidence: string,
  notFound: boolean,
  quoteCount: number,
  elapsedMs: number,
): void {
  log.info("Answer generated", { confidence, notFound, quotes: quoteCount, elapsedMs });
}

export function logNotFoundNormalized(droppedQuotes: number): void {
  log.debug("not_found answer normalized", { droppedQuotes });
}
