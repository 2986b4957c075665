/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Append JSON lines to this file instead of stderr (default: LOG_FILE) */
  file?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default.
 * Test runs stay silent unless LOG_LEVEL asks otherwise.
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

function getLogFile(): string | undefined {
  const file = process.env.LOG_FILE?.trim();
  return file ? file : undefined;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "cache-store", "gemini")
 *
 * @example
 * ```typescript
 * const logger = createLogger("cache-store");
 * logger.debug({ callType }, "Cache hit");
 * logger.error({ err }, "Cache write failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel(), file = getLogFile() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (file) {
    ensureLogDir(file);
    const destination = pino.destination({
      dest: file,
      sync: false,
    });

    return pino(baseOptions, destination);
  }

  if (isDevelopment()) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });
    } catch {
      // pino-pretty missing: plain JSON is still usable
      return pino(baseOptions, pino.destination(2));
    }
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
