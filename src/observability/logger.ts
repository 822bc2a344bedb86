// src/observability/logger.ts
// Structured JSON logging
//
// Configures Pino with:
// - Environment-based log levels
// - JSON output by default, pretty printing on request
// - Module-scoped child loggers
//
// Records are written to stderr; stdout belongs to CLI result output.

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/* ---------- Configuration ---------- */

/**
 * Get the configured log level from environment.
 * Defaults to 'info'; under Vitest defaults to 'silent'.
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.VITEST ? "silent" : "info";
}

/**
 * Check if pretty printing is enabled (for development)
 */
export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "people-search",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });
    } else {
      rootLogger = pino(options, pino.destination(2));
    }
  }

  return rootLogger;
}

/**
 * Create a logger instance, optionally scoped to a module
 *
 * @example
 * const log = createLogger('search/engine');
 * log.info({ query }, 'Search started');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

/**
 * Create a child logger with additional context
 *
 * @example
 * const qLog = createChildLogger(log, { searchId: 'abc123' });
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

export type { Logger };

/**
 * Default logger instance for quick usage
 * Prefer createLogger() for module-scoped loggers
 */
export const logger = createLogger();
