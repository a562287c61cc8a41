import type { RequestHandler } from "express";

import { AppError, ErrorCode } from "@typesLocal/AppError";

/** Catch-all after the routers: unknown paths get the JSON error body. */
export function notFound(): RequestHandler {
  return (req, _res, next) => {
    next(
      new AppError(
        ErrorCode.ROUTE_NOT_FOUND,
        `Route not found: ${req.method} ${req.path}`
      )
    );
  };
}
