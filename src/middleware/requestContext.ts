/**
 * Per-request abort signal.
 *
 * `res.locals.signal` aborts when the client goes away before the response is
 * finished, or when the request outlives `timeoutMs`; in the latter case a
 * 408 TIMEOUT error body is sent if nothing was written yet. Handlers pass the
 * signal to every backend call.
 */
import type { RequestHandler } from "express";

import { ErrorCode, InfrastructureError } from "@typesLocal/AppError";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Locals {
      signal: AbortSignal;
      requestId: string;
    }
  }
}

export interface RequestContextOptions {
  timeoutMs: number;
}

export function requestContext(options: RequestContextOptions): RequestHandler {
  return (_req, res, next) => {
    const controller = new AbortController();
    res.locals.signal = controller.signal;

    const timer = setTimeout(() => {
      const timeout = new InfrastructureError(ErrorCode.TIMEOUT, "Request timed out");
      controller.abort(timeout);

      if (!res.headersSent) {
        res.status(timeout.statusCode).json({
          error: { code: timeout.code, message: timeout.message },
        });
      }
    }, options.timeoutMs);

    res.on("close", () => {
      clearTimeout(timer);

      if (!res.writableFinished) {
        controller.abort();
      }
    });

    next();
  };
}
