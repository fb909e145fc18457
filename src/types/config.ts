/**
 * Application configuration type definitions
 */

import type { CatalogSource } from "./catalog";

export type UrlFetchConfig = {
  timeoutMs: number;
  maxAttempts: number;
};

export type AppConfig = {
  catalogSource: CatalogSource;
  /** JSON catalog path, relative to the working directory */
  catalogPath: string;
  /** Labeled evaluation set path, relative to the working directory */
  evaluationSetPath: string;
  urlFetch: UrlFetchConfig;
};
