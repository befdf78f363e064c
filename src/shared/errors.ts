/**
 * Application error hierarchy.
 *
 * Every error the HTTP layer is expected to render carries a stable `code`
 * and the status it maps to. Anything that is not an AppError is treated as
 * an internal failure.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Caller input outside the declared bounds. */
export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, "VALIDATION_ERROR", 422, { issues });
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string, message?: string) {
    super(
      message ?? `${resource} not found: ${identifier}`,
      "NOT_FOUND",
      404,
      { resource, identifier },
    );
  }
}

/** The document store is already holding the configured maximum. */
export class DocumentLimitError extends AppError {
  constructor(limit: number) {
    super(
      `Maximum number of documents (${limit}) reached. Please delete some documents first.`,
      "DOCUMENT_LIMIT_REACHED",
      400,
      { limit },
    );
  }
}

/** The model's reply could not be decoded as a JSON object at all. */
export class MalformedResponseError extends AppError {
  public readonly rawOutput: string;

  constructor(reason: string, rawOutput: string) {
    super(`Model response is not valid structured data: ${reason}`, "MALFORMED_RESPONSE", 422);
    this.rawOutput = rawOutput;
  }
}

/** Any other failure while producing an answer: network, quota, timeout. */
export class ProcessingFailureError extends AppError {
  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super(message, "PROCESSING_FAILURE", 500, context, { cause });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
