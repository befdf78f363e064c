import type { LlmMessage } from "../core/contracts/llm-protocol.js";
import { QA_SYSTEM_PROMPT } from "./system-instruction.js";

export const DOCUMENT_END_MARKER = "=== END OF DOCUMENT ===";
export const QUESTION_START_MARKER = "=== QUESTION ===";
export const QUESTION_END_MARKER = "=== END OF QUESTION ===";
export const GROUNDING_INSTRUCTION = "Answer the question using ONLY the document above.";

/**
 * Lays the title, document body and question out between fixed markers so the
 * model can tell them apart.
 *
 * Marker-like text inside the title, content or question is passed through
 * as-is; a document that contains "=== END OF DOCUMENT ===" can still blur
 * the boundary.
 */
export function buildQuestionPrompt(title: string, content: string, question: string): string {
  return [
    `=== DOCUMENT TITLE: ${title} ===`,
    "",
    content,
    "",
    DOCUMENT_END_MARKER,
    "",
    QUESTION_START_MARKER,
    question,
    QUESTION_END_MARKER,
    "",
    GROUNDING_INSTRUCTION,
  ].join("\n");
}

export function buildPromptMessages(title: string, content: string, question: string): LlmMessage[] {
  return [
    { role: "system", content: QA_SYSTEM_PROMPT },
    { role: "user", content: buildQuestionPrompt(title, content, question) },
  ];
}
