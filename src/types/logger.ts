/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured fields attached to a log line, serialized as JSON
 */
export type LogMeta = Record<string, unknown>;

/**
 * Component-bound logger, as returned by withContext().
 * Components accept one so tests can pass a silent stub.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
