/**
 * Page-text fetcher
 *
 * Turns a URL into plain text for query augmentation. Every failure
 * (network, timeout, non-2xx, empty page) is reported as null: extra
 * page text is optional input, never a reason to fail a request.
 */

import type { PageTextFetcher, PageTextFetcherOptions } from "@/types";
import { httpRequest } from "@/clients/http";
import {
  PAGE_TEXT_HEADERS,
  URL_FETCH_MAX_ATTEMPTS,
  URL_FETCH_TIMEOUT_MS,
} from "@/constants";
import { htmlToText } from "@/utils/text/htmlText";
import * as logger from "@/logger";

const log = logger.withContext({ component: "pageText" });

/**
 * Creates a fetcher bound to the given timeout, attempt count and transport.
 *
 * @example
 * const fetchPageText = createPageTextFetcher({ timeoutMs: 5_000 });
 * const text = await fetchPageText("https://jobs.example.com/123");
 */
export function createPageTextFetcher(
  options: PageTextFetcherOptions = {},
): PageTextFetcher {
  const request = options.request ?? httpRequest;
  const timeoutMs = options.timeoutMs ?? URL_FETCH_TIMEOUT_MS;
  const maxAttempts = options.maxAttempts ?? URL_FETCH_MAX_ATTEMPTS;

  return async (url: string): Promise<string | null> => {
    try {
      const response = await request({
        method: "GET",
        url,
        headers: PAGE_TEXT_HEADERS,
        timeoutMs,
        retry: { maxAttempts },
      });

      const text = htmlToText(response.body);
      if (text.length === 0) {
        log.debug("Fetched page has no text", { url });
        return null;
      }

      log.debug("Fetched page text", {
        url,
        contentType: response.contentType,
        chars: text.length,
      });
      return text;
    } catch (err) {
      log.warn("Page fetch failed, continuing without page text", {
        url,
        ...logger.errorMeta(err),
      });
      return null;
    }
  };
}
