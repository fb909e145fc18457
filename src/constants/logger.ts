/**
 * Log level ordering: a line is printed when its level ranks at or above
 * the configured LOG_LEVEL.
 */

import type { LogLevel } from "@/types";

export const LOG_LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Used when LOG_LEVEL is unset or not one of LOG_LEVELS
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
