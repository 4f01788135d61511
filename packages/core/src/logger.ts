// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in consumers.
 *
 * Allows applications to integrate their own logging solutions (Winston, Pino,
 * structured logging services) instead of console output.
 *
 * @example
 * ```typescript
 * import { createConsumer } from "@switchboard/zod";
 * import type { LoggerAdapter } from "@switchboard/core";
 *
 * class MyLogger implements LoggerAdapter {
 *   debug(context: string, message: string, data?: unknown) {
 *     console.debug(`[${context}] ${message}`, data);
 *   }
 *   info(context: string, message: string, data?: unknown) {
 *     console.log(`[${context}] ${message}`, data);
 *   }
 *   warn(context: string, message: string, data?: unknown) {
 *     console.warn(`[${context}] ${message}`, data);
 *   }
 *   error(context: string, message: string, data?: unknown) {
 *     console.error(`[${context}] ${message}`, data);
 *   }
 * }
 *
 * const consumer = createConsumer({
 *   layer: memoryChannelLayer(),
 *   config: { logger: new MyLogger() },
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "connection", "broadcast")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  /**
   * Log an info-level message
   */
  info(context: string, message: string, data?: unknown): void;

  /**
   * Log a warning-level message
   */
  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Default logger adapter that uses console methods
 *
 * @internal
 */
export class DefaultLoggerAdapter implements LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void {
    console.debug(`[${context}] ${message}`, data);
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data);
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data);
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data);
  }
}

export interface LoggerOptions {
  /**
   * Custom log function. When omitted, entries go to the console.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

/**
 * Create a logger adapter with custom configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: "info",
 *   log: (level, context, message, data) => {
 *     logService.log({ level, context, message, data, timestamp: new Date() });
 *   },
 * });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];
  const fallback = new DefaultLoggerAdapter();

  const write = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
    } else {
      fallback[level](context, message, data);
    }
  };

  return {
    debug: (context, message, data) => write("debug", context, message, data),
    info: (context, message, data) => write("info", context, message, data),
    warn: (context, message, data) => write("warn", context, message, data),
    error: (context, message, data) => write("error", context, message, data),
  };
}

/**
 * Wrap a logger so every entry carries the given bindings.
 *
 * Object data is merged with the bindings; any other data value is kept
 * under a `data` key.
 */
export function bindLogger(
  logger: LoggerAdapter,
  bindings: Record<string, unknown>,
): LoggerAdapter {
  const merge = (data: unknown): Record<string, unknown> => {
    if (data === undefined) return { ...bindings };
    if (typeof data === "object" && data !== null && !Array.isArray(data)) {
      return { ...bindings, ...data };
    }
    return { ...bindings, data };
  };

  return {
    debug: (context, message, data) => logger.debug(context, message, merge(data)),
    info: (context, message, data) => logger.info(context, message, merge(data)),
    warn: (context, message, data) => logger.warn(context, message, merge(data)),
    error: (context, message, data) => logger.error(context, message, merge(data)),
  };
}

/**
 * Log context constants used by the consumer
 *
 * Applications can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  MESSAGE: "message",
  EVENT: "event",
  BROADCAST: "broadcast",
  AUTH: "auth",
  VALIDATION: "validation",
  TRANSPORT: "transport",
  ERROR: "error",
} as const;
