import { parseLogLevel, type LogLevel } from "../shared/logger.js";

export interface AppSettings {
  appName: string;
  appVersion: string;
  port: number;
  logLevel: LogLevel;
  llmProvider: string;
  maxOutputTokens: number;
  maxDocumentLength: number;
  maxDocuments: number;
  maxQuestionLength: number;
  /** Documents longer than this are truncated before they reach the model. */
  contextMaxChars: number;
  askTimeoutMs: number;
}

// ── Fixed input bounds ────────────────────────────────────────────

export const MIN_DOCUMENT_LENGTH = 10;
export const MAX_TITLE_LENGTH = 200;
export const MIN_QUESTION_LENGTH = 5;
export const DEFAULT_DOCUMENT_TITLE = "Untitled Document";

// ── Defaults ──────────────────────────────────────────────────────

export const DEFAULT_SETTINGS: AppSettings = {
  appName: "Document Q&A API",
  appVersion: "1.0.0",
  port: 8000,
  logLevel: "info",
  llmProvider: "openai",
  maxOutputTokens: 1500,
  maxDocumentLength: 50_000,
  maxDocuments: 100,
  maxQuestionLength: 1000,
  contextMaxChars: 15_000,
  askTimeoutMs: 60_000,
};

// ── Env-var parsing helpers ───────────────────────────────────────

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function readString(raw: string | undefined, fallback: string): string {
  const value = raw?.trim();
  return value && value.length > 0 ? value : fallback;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  return {
    appName: readString(env["APP_NAME"], DEFAULT_SETTINGS.appName),
    appVersion: readString(env["APP_VERSION"], DEFAULT_SETTINGS.appVersion),
    port: readPositiveInt(env["PORT"], DEFAULT_SETTINGS.port),
    logLevel: parseLogLevel(env["LOG_LEVEL"], DEFAULT_SETTINGS.logLevel),
    llmProvider: readString(env["LLM_PROVIDER"], DEFAULT_SETTINGS.llmProvider).toLowerCase(),
    maxOutputTokens: readPositiveInt(env["MAX_OUTPUT_TOKENS"], DEFAULT_SETTINGS.maxOutputTokens),
    maxDocumentLength: readPositiveInt(env["MAX_DOCUMENT_LENGTH"], DEFAULT_SETTINGS.maxDocumentLength),
    maxDocuments: readPositiveInt(env["MAX_DOCUMENTS"], DEFAULT_SETTINGS.maxDocuments),
    maxQuestionLength: readPositiveInt(env["MAX_QUESTION_LENGTH"], DEFAULT_SETTINGS.maxQuestionLength),
    contextMaxChars: readPositiveInt(env["CONTEXT_MAX_CHARS"], DEFAULT_SETTINGS.contextMaxChars),
    askTimeoutMs: readPositiveInt(env["ASK_TIMEOUT_MS"], DEFAULT_SETTINGS.askTimeoutMs),
  };
}
