export { createLogger, setLogLevel, getLogLevel, parseLogLevel } from "./logger.js";
export type { Logger, LogLevel, LogDetail } from "./logger.js";
export {
  AppError,
  ValidationError,
  NotFoundError,
  DocumentLimitError,
  MalformedResponseError,
  ProcessingFailureError,
  describeError,
} from "./errors.js";
export type { ValidationIssue } from "./errors.js";
export { withTimeout } from "./timeout.js";
export { codePointLength, sliceCodePoints } from "./text.js";
