import type { NextFunction, Request, Response } from "express";
import {
  AppError,
  MalformedResponseError,
  NotFoundError,
  ProcessingFailureError,
  ValidationError,
  describeError,
} from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";

const log = createLogger("http");

export const MALFORMED_RESPONSE_DETAIL =
  "The model returned a response that could not be processed. Please try again.";
export const PROCESSING_FAILURE_DETAIL =
  "An error occurred while processing your question. Please try again.";
export const INTERNAL_ERROR_DETAIL = "An unexpected error occurred.";

export interface ErrorBody {
  detail: string;
  error_code: string;
  issues?: Array<{ path: string; message: string }>;
}

interface BodyParserError {
  type: string;
  status?: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    err.type.startsWith("entity.")
  );
}

function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) return err;
  if (isBodyParserError(err)) {
    if (err.type === "entity.parse.failed") {
      return new ValidationError("Request body is not valid JSON");
    }
    if (err.type === "entity.too.large") {
      return new AppError("Request body is too large", "PAYLOAD_TOO_LARGE", 413);
    }
  }
  return null;
}

function toErrorBody(err: AppError): ErrorBody {
  // Model failures are described server-side only.
  if (err instanceof MalformedResponseError) {
    return { detail: MALFORMED_RESPONSE_DETAIL, error_code: err.code };
  }
  if (err instanceof ProcessingFailureError) {
    return { detail: PROCESSING_FAILURE_DETAIL, error_code: err.code };
  }
  if (err instanceof ValidationError && err.issues.length > 0) {
    return { detail: err.message, error_code: err.code, issues: err.issues };
  }
  return { detail: err.message, error_code: err.code };
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError("Route", `${req.method} ${req.path}`));
}

/** Registered last; every route error ends up here. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const appError = toAppError(err);

  if (!appError) {
    log.error("Unhandled error", {
      method: req.method,
      path: req.path,
      error: describeError(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    const body: ErrorBody = { detail: INTERNAL_ERROR_DETAIL, error_code: "INTERNAL_ERROR" };
    res.status(500).json(body);
    return;
  }

  if (appError instanceof MalformedResponseError) {
    log.error("Malformed model response", {
      path: req.path,
      reason: appError.message,
      raw: appError.rawOutput,
    });
  } else if (appError instanceof ProcessingFailureError) {
    log.error("Question processing failed", {
      path: req.path,
      reason: appError.message,
      ...appError.context,
      cause: describeError(appError.cause),
      stack: appError.cause instanceof Error ? appError.cause.stack : undefined,
    });
  } else if (appError.statusCode >= 500) {
    log.error("Request failed", { path: req.path, code: appError.code, error: appError.message });
  } else {
    log.debug("Request rejected", {
      method: req.method,
      path: req.path,
      status: appError.statusCode,
      code: appError.code,
    });
  }

  res.status(appError.statusCode).json(toErrorBody(appError));
}
