/**
 * Application configuration from environment variables
 *
 * Entrypoints import "dotenv/config" first, so .env values are visible here.
 * DB_PATH and LOG_LEVEL are read directly by the db connection and logger.
 */

import type { AppConfig, CatalogSource } from "@/types";
import {
  CATALOG_PATH,
  EVALUATION_SET_PATH,
  URL_FETCH_MAX_ATTEMPTS,
  URL_FETCH_TIMEOUT_MS,
} from "@/constants";

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

function readCatalogSource(raw: string | undefined): CatalogSource {
  const value = (raw ?? "file").trim().toLowerCase();
  if (value === "file" || value === "db") {
    return value;
  }
  throw new ConfigError(`CATALOG_SOURCE must be "file" or "db", got "${raw}"`);
}

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readPath(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: string,
): string {
  const raw = env[key];
  return raw && raw.trim() !== "" ? raw.trim() : fallback;
}

/**
 * @throws {ConfigError} On an unknown catalog source or a non-positive number
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    catalogSource: readCatalogSource(env.CATALOG_SOURCE),
    catalogPath: readPath(env, "CATALOG_PATH", CATALOG_PATH),
    evaluationSetPath: readPath(env, "EVALUATION_SET_PATH", EVALUATION_SET_PATH),
    urlFetch: {
      timeoutMs: readPositiveInt(env, "URL_FETCH_TIMEOUT_MS", URL_FETCH_TIMEOUT_MS),
      maxAttempts: readPositiveInt(
        env,
        "URL_FETCH_MAX_ATTEMPTS",
        URL_FETCH_MAX_ATTEMPTS,
      ),
    },
  };
}
