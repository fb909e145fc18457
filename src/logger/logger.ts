/**
 * Project logger
 *
 * One line per call: ISO timestamp, level, message, then meta as JSON.
 * Level filtered by LOG_LEVEL, read once at module load.
 */

import type { Logger, LogLevel, LogMeta } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve LOG_LEVEL, falling back to the default for unset or unknown values
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const candidate = (raw ?? "").trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : DEFAULT_LOG_LEVEL;
}

const currentLevelValue = LOG_LEVELS[resolveLogLevel(process.env.LOG_LEVEL)];

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Every level goes to stderr; stdout is reserved for command output
 */
function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }
  const timestamp = new Date().toISOString();
  console.error(
    `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`,
  );
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}

/**
 * Message and stack of an unknown thrown value, for log meta
 */
export function errorMeta(err: unknown): LogMeta {
  return {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  };
}
