/**
 * HTTP text client on native fetch
 *
 * Each attempt is bounded by an AbortController timeout. Failed attempts of
 * idempotent methods are retried with jittered exponential backoff when the
 * failure is transient: a network error, a timeout, or a status listed in
 * RETRYABLE_STATUS_CODES. A Retry-After header on 429/503 replaces the
 * computed backoff, capped by maxRetryAfterMs.
 */

import type { HttpRequest, HttpTextResponse, RetryPolicy } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";

function resolveRetryPolicy(req: HttpRequest): RetryPolicy {
  const retry = req.retry ?? {};
  return {
    maxAttempts: retry.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: retry.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: retry.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    maxRetryAfterMs:
      retry.maxRetryAfterMs ?? DEFAULT_RETRY_POLICY.maxRetryAfterMs,
  };
}

async function readBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? `${text.slice(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
      : text;
  } catch (err) {
    logger.debug("Could not read error response body", logger.errorMeta(err));
    return undefined;
  }
}

function isTransient(error: unknown): boolean {
  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.has(error.status);
  }
  // AbortError: our timeout fired. TypeError: fetch could not connect.
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TypeError")
  );
}

/**
 * Retry-After as milliseconds: delay-seconds or an HTTP-date in the future
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }

  const at = Date.parse(value);
  if (Number.isNaN(at)) {
    return null;
  }
  return at > now ? at - now : null;
}

/**
 * min(maxDelay, baseDelay * 2^(attempt-1)), scaled by a jitter in [0.5, 1)
 */
function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(Math.min(exponential, policy.maxDelayMs) * jitter);
}

function retryDelay(error: unknown, attempt: number, policy: RetryPolicy): number {
  if (error instanceof HttpError && (error.status === 429 || error.status === 503)) {
    const requested = parseRetryAfter(error.retryAfter);
    if (requested !== null) {
      return Math.min(requested, policy.maxRetryAfterMs);
    }
  }
  return backoffDelay(attempt, policy);
}

function describeFailure(error: unknown): string {
  if (error instanceof HttpError) {
    return `status ${error.status}`;
  }
  return error instanceof Error ? error.name : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One attempt. The body read shares the attempt's timeout.
 */
async function attemptRequest(
  req: HttpRequest,
  timeoutMs: number,
): Promise<HttpTextResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(req.url, {
      method: req.method,
      headers: { ...req.headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet: await readBodySnippet(response),
        retryAfter: response.headers.get("retry-after"),
      });
    }

    return {
      status: response.status,
      contentType: response.headers.get("content-type"),
      body: req.method === "HEAD" ? "" : await response.text(),
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Perform a request and return its body as text.
 *
 * @throws {HttpError} On a non-2xx status once retries are exhausted
 * @throws {Error} On a network error or timeout once retries are exhausted
 */
export async function httpRequest(req: HttpRequest): Promise<HttpTextResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const policy = resolveRetryPolicy(req);
  const retryable = RETRYABLE_HTTP_METHODS.has(req.method);

  for (let attempt = 1; ; attempt++) {
    try {
      return await attemptRequest(req, timeoutMs);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !retryable || !isTransient(error)) {
        throw error;
      }

      const delayMs = retryDelay(error, attempt, policy);
      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason: describeFailure(error),
      });
      await sleep(delayMs);
    }
  }
}
