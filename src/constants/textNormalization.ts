/**
 * Text normalization constants
 *
 * These parameters control the deterministic tokenization shared by
 * index fitting and query projection.
 */

import { join } from "path";

/**
 * A token is a maximal run of at least two letters, digits or underscores.
 * Single characters ("c" in "c++") never become tokens.
 */
export const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * English stop-word list shipped with the project
 */
export const STOP_WORDS_PATH = join(
  __dirname,
  "..",
  "..",
  "data",
  "english_stop_words.json",
);

/**
 * Separator used when joining tokens into an n-gram term
 */
export const NGRAM_SEPARATOR = " ";

/**
 * Pattern for HTML tags stripped from fetched pages (non-greedy, single line)
 */
export const HTML_TAG_PATTERN = /<.*?>/g;

export const WHITESPACE_RUN_PATTERN = /\s+/g;
