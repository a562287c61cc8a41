import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Log file path, relative to the working directory. Omit to log to the console only. */
  filePath?: string | undefined;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function writeEntry(entry: Record<string, unknown>, logFile?: string): void {
  const line = JSON.stringify(entry);

  console.log(line);

  if (!logFile) {
    return;
  }

  try {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, line + "\n", { encoding: "utf-8" });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

/**
 * JSON-line logger implementing the LoggerPort.
 *
 * - Uses ISO timestamps.
 * - Drops entries below the configured level.
 * - event() keeps the { timestamp, type, ...payload } shape and is always
 *   written at info level.
 */
export function createLogger(options: LoggerOptions): LoggerPort {
  const threshold = LEVEL_RANK[options.level];
  const logFile = options.filePath
    ? path.resolve(process.cwd(), options.filePath)
    : undefined;

  return {
    log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
      if (LEVEL_RANK[level] < threshold) {
        return;
      }

      writeEntry(
        {
          timestamp: new Date().toISOString(),
          level,
          message,
          ...(meta || {}),
        },
        logFile
      );
    },

    event(type: string, payload: Record<string, unknown>): void {
      if (LEVEL_RANK.info < threshold) {
        return;
      }

      writeEntry(
        {
          timestamp: new Date().toISOString(),
          type,
          ...payload,
        },
        logFile
      );
    },
  };
}

/**
 * Event-style logging through any LoggerPort, falling back to an info entry
 * for ports that do not implement event().
 */
export function logEvent(
  logger: LoggerPort,
  type: string,
  payload: Record<string, unknown>
): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
