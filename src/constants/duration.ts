/**
 * Duration extraction rules
 *
 * Evaluated in order; the first rule that matches anywhere in the text wins.
 * Minutes are checked before hours, so "1 hour 20 minutes" yields 20.
 * Fractions of an hour are checked before the single hour phrase.
 */

import type { DurationRule } from "@/types";

export const DURATION_RULES: readonly DurationRule[] = [
  {
    id: "minutes",
    pattern: /(\d+)\s*(?:minutes|minute|mins|min)\b/,
    minutesPerUnit: 1,
  },
  {
    id: "hours",
    pattern: /(\d+)\s*(?:hours|hour|hrs|hr)\b/,
    minutesPerUnit: 60,
  },
  {
    id: "half_hour",
    pattern: /\b(?:half\s+an\s+|a\s+half[\s-])(?:hour|hr)\b/,
    fixedMinutes: 30,
  },
  {
    id: "three_quarter_hour",
    pattern: /\bthree\s+quarters\s+of\s+an\s+(?:hour|hr)\b/,
    fixedMinutes: 45,
  },
  {
    id: "quarter_hour",
    pattern: /\b(?:quarter\s+of\s+an\s+|a\s+quarter[\s-])(?:hour|hr)\b/,
    fixedMinutes: 15,
  },
  {
    // "an hour" inside a fraction phrase is not a full hour
    id: "single_hour",
    pattern: /(?<!\b(?:half|quarters?)(?:\s+of)?\s+)\b(?:an|a|one)\s+(?:hour|hr)\b/,
    fixedMinutes: 60,
  },
];

/**
 * First integer inside a catalog item's duration field
 */
export const ITEM_DURATION_PATTERN = /(\d+)/;
