/**
 * Centralized configuration management for the search gateway.
 *
 * Provides type-safe access to environment variables and application settings:
 * - Elasticsearch connection parameters (node URL, credentials, retries, timeouts)
 * - HTTP settings (port, request timeout, body limit, CORS origin)
 * - Logging settings (level, log file)
 *
 * `loadConfig` is pure over the given environment; `config` is the instance
 * built from `process.env` at startup.
 */
import dotenv from "dotenv";

import type { LogLevel } from "@infrastructure/logging/Logger";

dotenv.config();

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function numberFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric configuration value: "${value}"`);
  }

  return parsed;
}

function logLevelFrom(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? "info";
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

export function loadConfig(env: Env) {
  return {
    env: env.NODE_ENV || "development",

    service: {
      name: "search-gateway",
      version: env.SERVICE_VERSION || "1.0.0",
    },

    port: numberFrom(env.PORT, 8080),

    elasticsearch: {
      node: env.ELASTICSEARCH_URL || "http://localhost:9200",
      username: optional(env.ELASTICSEARCH_USERNAME),
      password: optional(env.ELASTICSEARCH_PASSWORD),
      apiKey: optional(env.ELASTICSEARCH_API_KEY),
      maxRetries: numberFrom(env.ELASTICSEARCH_MAX_RETRIES, 3),
      requestTimeoutMs: numberFrom(env.ELASTICSEARCH_REQUEST_TIMEOUT_MS, 30000),
    },

    http: {
      requestTimeoutMs: numberFrom(env.REQUEST_TIMEOUT_MS, 30000),
      bodyLimit: env.BODY_LIMIT || "10mb",
      corsOrigin: env.CORS_ORIGIN || "*",
    },

    observability: {
      logLevel: logLevelFrom(env.LOG_LEVEL),
      // An explicitly empty LOG_FILE turns file output off.
      logFile: env.LOG_FILE === undefined ? "logs/app.log" : optional(env.LOG_FILE),
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig(process.env);
