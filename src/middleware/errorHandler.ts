/**
 * Global error handling middleware.
 *
 * Terminal Express error handler turning any thrown value into
 * `{ error: { code, message, details? } }`:
 * - AppError keeps its code, message, details and status
 * - body-parser failures (malformed JSON, oversized body) become INVALID_REQUEST
 * - anything else becomes 500 INTERNAL_ERROR with a generic message
 *
 * Causes and stacks go to the log only, never to the client.
 */
import type { ErrorRequestHandler } from "express";

import type { LoggerPort } from "@infrastructure/logging/Logger";
import {
  AppError,
  ErrorCode,
  isAppError,
  ValidationError,
} from "@typesLocal/AppError";

export interface ErrorBody {
  error: {
    code: ErrorCode;
    message: string;
    details?: string;
  };
}

function clientHttpStatus(err: unknown): number | undefined {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }

  return undefined;
}

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const status = clientHttpStatus(err);
  if (status !== undefined && err instanceof Error) {
    const parseFailed = "type" in err && err.type === "entity.parse.failed";

    return new ValidationError(
      parseFailed ? "Invalid JSON format" : "Invalid request",
      { code: ErrorCode.INVALID_REQUEST, details: err.message, statusCode: status, cause: err }
    );
  }

  return new AppError(ErrorCode.INTERNAL_ERROR, "An internal error occurred", {
    cause: err,
  });
}

export function toErrorBody(error: AppError): ErrorBody {
  return {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    },
  };
}

export function createErrorHandler(logger: LoggerPort): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const appError = toAppError(err);
    const cause = appError.cause ?? (appError === err ? undefined : err);

    logger.log(appError.statusCode >= 500 ? "error" : "warn", "Request failed", {
      requestId: res.locals.requestId,
      method: req.method,
      path: req.originalUrl,
      type: appError.type,
      code: appError.code,
      statusCode: appError.statusCode,
      message: appError.message,
      details: appError.details,
      metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });

    if (res.headersSent) {
      return;
    }

    res.status(appError.statusCode).json(toErrorBody(appError));
  };
}
