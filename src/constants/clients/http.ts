/**
 * HTTP client defaults
 */

import type { RetryPolicy } from "@/types";

export const DEFAULT_HTTP_TIMEOUT_MS = 15_000;

/**
 * Error bodies are cut to this many characters in HttpError messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Backoff: ~0.5s then ~1s (jittered), never more than 8s
 */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  maxRetryAfterMs: 30_000,
};

/**
 * Only idempotent methods are retried
 */
export const RETRYABLE_HTTP_METHODS: ReadonlySet<string> = new Set(["GET", "HEAD"]);

/**
 * 408 Request Timeout, 429 Too Many Requests, and transient 5xx
 */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  408, 429, 500, 502, 503, 504,
]);
