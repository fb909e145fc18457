/**
 * Error for a response that arrived with a non-2xx status
 */

import type { HttpErrorDetails } from "@/types";

export class HttpError extends Error {
  public readonly status: number;
  public readonly url: string;
  public readonly bodySnippet?: string;
  /** Raw Retry-After header, when the server sent one */
  public readonly retryAfter: string | null;

  constructor(details: HttpErrorDetails) {
    const statusLine = `${details.status} ${details.statusText}`.trim();
    const suffix = details.bodySnippet ? `: ${details.bodySnippet}` : "";
    super(`Request to ${details.url} failed with ${statusLine}${suffix}`);
    this.name = "HttpError";
    this.status = details.status;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.retryAfter = details.retryAfter ?? null;
  }
}
