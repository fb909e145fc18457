/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "HEAD";

/**
 * Retry tunables; unset fields fall back to DEFAULT_RETRY_POLICY
 */
export type HttpRetryConfig = Partial<RetryPolicy>;

export type RetryPolicy = {
  /** Attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound on a server-requested Retry-After wait */
  maxRetryAfterMs: number;
};

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

/**
 * Successful response with its body read as text
 */
export interface HttpTextResponse {
  status: number;
  contentType: string | null;
  body: string;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  retryAfter?: string | null;
}

/**
 * Signature of httpRequest, injectable into clients for tests
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpTextResponse>;
