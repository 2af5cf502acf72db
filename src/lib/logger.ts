/**
 * Structured Logger
 *
 * Provides a consistent logging interface that outputs structured JSON in production
 * and human-readable logs in development.
 *
 * Usage:
 * ```typescript
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Article extracted", { url: "https://example.com/post", words: 1200 });
 * logger.error("Failed to save progress", { articleId: "456", error: error.message });
 * ```
 */

import * as Sentry from "@sentry/node";

/**
 * Log levels in order of severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Context data that can be attached to log entries.
 */
export type LogContext = Record<string, unknown>;

/**
 * A structured log entry.
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger configuration options.
 */
interface LoggerConfig {
  /** Minimum log level to output (default: LOG_LEVEL, else "info" in production, "debug" otherwise) */
  minLevel?: LogLevel;
  /** Whether to output JSON format (default: true in production, false in development) */
  json?: boolean;
  /** Service name for structured logs */
  service?: string;
}

/**
 * The methods every logger (and child logger) exposes.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(additionalContext: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isProduction = process.env.NODE_ENV === "production";

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function defaultMinLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return isProduction ? "info" : "debug";
}

/**
 * Creates a logger instance with the given configuration.
 */
function createLogger(config: LoggerConfig = {}): Logger {
  const { minLevel = defaultMinLevel(), json = isProduction, service = "quickread" } = config;

  const minLevelPriority = LOG_LEVEL_PRIORITY[minLevel];

  /**
   * Formats a log entry for output.
   */
  function formatEntry(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({
        ...entry,
        service,
        ...(entry.context && { ...entry.context }),
      });
    }

    // Human-readable format for development
    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelColor = levelColors[entry.level];
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);

    let output = `${levelColor}${levelStr}${reset} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    return output;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    const formatted = formatEntry(entry);

    switch (level) {
      case "debug":
      case "info":
        console.log(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        if (isProduction) {
          Sentry.addBreadcrumb({
            category: "log",
            message,
            level: "error",
            data: context,
          });
        }
        break;
    }
  }

  function bind(baseContext: LogContext | undefined): Logger {
    const merge = (context?: LogContext): LogContext | undefined =>
      baseContext ? { ...baseContext, ...context } : context;

    return {
      debug: (message, context) => log("debug", message, merge(context)),
      info: (message, context) => log("info", message, merge(context)),
      warn: (message, context) => log("warn", message, merge(context)),
      error: (message, context) => log("error", message, merge(context)),
      /**
       * Creates a child logger with additional context.
       * Useful for tagging every line of a reading session with its article.
       */
      child: (additionalContext) => bind({ ...baseContext, ...additionalContext }),
    };
  }

  return bind(undefined);
}

/**
 * Default logger instance.
 */
export const logger = createLogger();

/**
 * Creates a session-scoped logger for a reading session.
 */
export function createSessionLogger(context: { articleId: string; mode: "rsvp" | "tts" }): Logger {
  return logger.child(context);
}

/**
 * Formats an unknown thrown value for a log context.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { createLogger };
