/**
 * Text normalization and tokenization utilities
 *
 * Deterministic text processing shared by index fitting and query
 * projection. Both sides must run exactly the same steps, otherwise
 * query terms would never meet catalog terms.
 */

import {
  NGRAM_SEPARATOR,
  TOKEN_PATTERN,
  WHITESPACE_RUN_PATTERN,
} from "@/constants/textNormalization";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

/**
 * Splits text into lowercase word tokens.
 *
 * Steps:
 * 1. Lowercase
 * 2. Remove diacritics (é → e)
 * 3. Keep maximal runs of 2+ letters/digits/underscores
 *
 * @example
 * tokenize("Core Java (Entry Level)") // ["core", "java", "entry", "level"]
 * tokenize("C++ / Node.js")           // ["node", "js"]
 */
export function tokenize(text: string): string[] {
  const normalized = removeDiacritics(text.toLowerCase());
  return normalized.match(TOKEN_PATTERN) ?? [];
}

/**
 * Builds index terms from text: tokens minus stop words, expanded into
 * word n-grams over the remaining tokens.
 *
 * Stop words are removed before n-grams are formed, so "java for developers"
 * yields the bigram "java developers".
 *
 * @example
 * buildTerms("Java developer", new Set(), [1, 2])
 * // ["java", "developer", "java developer"]
 */
export function buildTerms(
  text: string,
  stopWords: ReadonlySet<string>,
  ngramRange: readonly [number, number],
): string[] {
  const tokens = tokenize(text).filter((token) => !stopWords.has(token));
  const [minN, maxN] = ngramRange;
  const terms: string[] = [];

  for (let n = minN; n <= maxN; n++) {
    for (let start = 0; start + n <= tokens.length; start++) {
      terms.push(tokens.slice(start, start + n).join(NGRAM_SEPARATOR));
    }
  }

  return terms;
}

/**
 * Query preprocessing: lowercase, collapse whitespace, trim
 */
export function preprocessQuery(query: string): string {
  return query.toLowerCase().replace(WHITESPACE_RUN_PATTERN, " ").trim();
}
