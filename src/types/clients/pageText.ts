/**
 * Page-text fetcher type definitions
 */

import type { HttpRequestFn } from "./http";

/**
 * Returns the plain text of a page, or null when it is unavailable
 */
export type PageTextFetcher = (url: string) => Promise<string | null>;

export type PageTextFetcherOptions = {
  timeoutMs?: number;
  maxAttempts?: number;
  /** Defaults to the project HTTP client */
  request?: HttpRequestFn;
};
