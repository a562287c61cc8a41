import type { RequestHandler } from "express";

import type { LoggerPort } from "@infrastructure/logging/Logger";

/** Logs one entry per finished request: method, path, status, duration and request id. */
export function requestLogger(logger: LoggerPort): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;

      logger.log(res.statusCode >= 500 ? "error" : "info", "HTTP request", {
        requestId: res.locals.requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 100) / 100,
      });
    });

    next();
  };
}
