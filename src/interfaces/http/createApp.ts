/**
 * Express application factory.
 *
 * Middleware order: request id → security headers → CORS → request logging →
 * abort signal/timeout → JSON body parsing → routes → not found → error handler.
 * Kept free of `listen` so tests can mount the app on an ephemeral port.
 */
import cors from "cors";
import express, { type Express } from "express";

import type { AppConfig } from "@config/index";
import type { LoggerPort } from "@infrastructure/logging/Logger";
import { createErrorHandler } from "@middleware/errorHandler";
import { notFound } from "@middleware/notFound";
import { requestContext } from "@middleware/requestContext";
import { REQUEST_ID_HEADER, requestId } from "@middleware/requestId";
import { requestLogger } from "@middleware/requestLogger";
import { securityHeaders } from "@middleware/securityHeaders";
import { registerRoutes, type Controllers } from "@routes/index";

export interface CreateAppOptions {
  http: AppConfig["http"];
  logger: LoggerPort;
  controllers: Controllers;
}

export function createApp({ http, logger, controllers }: CreateAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(requestId());
  app.use(securityHeaders());
  app.use(
    cors({
      origin: http.corsOrigin,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", REQUEST_ID_HEADER],
      exposedHeaders: [REQUEST_ID_HEADER],
      maxAge: 86400,
    })
  );
  app.use(requestLogger(logger));
  app.use(requestContext({ timeoutMs: http.requestTimeoutMs }));
  app.use(express.json({ limit: http.bodyLimit }));

  registerRoutes(app, controllers);

  app.use(notFound());

  app.use(createErrorHandler(logger));

  return app;
}
