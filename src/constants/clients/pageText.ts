/**
 * Page-text fetcher defaults
 */

/**
 * Hard bound on a single page fetch
 */
export const URL_FETCH_TIMEOUT_MS = 10_000;

/**
 * One attempt; a failed fetch just means no extra query text
 */
export const URL_FETCH_MAX_ATTEMPTS = 1;

export const PAGE_TEXT_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8",
  "User-Agent": "assessment-recommender/0.1 (+page-text)",
};
