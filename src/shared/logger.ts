/**
 * Color-coded leveled console logger.
 *
 * Lines look like:
 *
 *   [DOCQA] 14:03:07.512 INFO  [repository] Document stored  id="3f9a1c2e" chars=512
 *
 * so a single scope can be filtered with `grep "\[repository\]"`.
 * The threshold comes from LOG_LEVEL and is set once at startup.
 */

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const WHITE = "\x1b[37m";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogDetail = Record<string, unknown>;

export interface Logger {
  debug(message: string, detail?: LogDetail): void;
  info(message: string, detail?: LogDetail): void;
  warn(message: string, detail?: LogDetail): void;
  error(message: string, detail?: LogDetail): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: WHITE,
  info: CYAN,
  warn: YELLOW,
  error: RED,
};

const PREFIX = `${BLUE}${BOLD}[DOCQA]${RESET}`;

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

function ts(): string {
  return new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return `${DIM}null${RESET}`;
  if (typeof v === "string") {
    if (v.length > 80) return `"${v.slice(0, 77)}..."`;
    return `"${v}"`;
  }
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (v instanceof Error) return `"${v.message}"`;
  return JSON.stringify(v);
}

function emit(level: LogLevel, scope: string, message: string, detail?: LogDetail): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const tag = `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET}`;
  let line = `${PREFIX} ${DIM}${ts()}${RESET} ${tag} [${scope}] ${message}`;

  if (detail) {
    const parts = Object.entries(detail)
      .map(([k, v]) => `${DIM}${k}=${RESET}${formatValue(v)}`)
      .join(" ");
    if (parts.length > 0) line = `${line}  ${parts}`;
  }

  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, detail) => emit("debug", scope, message, detail),
    info: (message, detail) => emit("info", scope, message, detail),
    warn: (message, detail) => emit("warn", scope, message, detail),
    error: (message, detail) => emit("error", scope, message, detail),
  };
}
