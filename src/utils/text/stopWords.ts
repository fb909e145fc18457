/**
 * English stop-word list, read once from data/english_stop_words.json
 */

import { readFileSync } from "fs";
import { STOP_WORDS_PATH } from "@/constants/textNormalization";

let cached: ReadonlySet<string> | null = null;

function parseStopWords(json: string): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new Error(`Stop-word file must hold a JSON array: ${STOP_WORDS_PATH}`);
  }
  const words = new Set<string>();
  for (const word of parsed) {
    if (typeof word !== "string") {
      throw new Error(`Stop-word file holds a non-string entry: ${String(word)}`);
    }
    words.add(word.toLowerCase());
  }
  return words;
}

export function getEnglishStopWords(): ReadonlySet<string> {
  if (!cached) {
    cached = parseStopWords(readFileSync(STOP_WORDS_PATH, "utf-8"));
  }
  return cached;
}
