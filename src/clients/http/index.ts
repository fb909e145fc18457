/**
 * HTTP client public API
 */

export { httpRequest, parseRetryAfter } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  RetryPolicy,
  HttpTextResponse,
  HttpRequestFn,
} from "@/types";
