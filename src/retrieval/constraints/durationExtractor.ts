/**
 * Duration constraint extraction
 *
 * Reads a maximum duration, in minutes, out of free text by walking
 * DURATION_RULES in order. Rule order is the policy: a minute phrase
 * anywhere in the text beats an hour phrase, even one written earlier.
 */

import type { DurationConstraint, DurationRule } from "@/types";
import { DURATION_RULES, ITEM_DURATION_PATTERN } from "@/constants/duration";

function applyRule(rule: DurationRule, text: string): DurationConstraint {
  const match = rule.pattern.exec(text);
  if (!match) {
    return null;
  }
  if ("fixedMinutes" in rule) {
    return rule.fixedMinutes;
  }
  return parseInt(match[1], 10) * rule.minutesPerUnit;
}

/**
 * A stated limit of 0 ("0 minutes") is returned as 0, not null, and the
 * engine filters on it like any other limit; only items whose duration
 * parses to 0 pass. Treating 0 as "no limit" was the older behavior.
 *
 * @example
 * extractDuration("complete in 40 minutes") // 40
 * extractDuration("about an hour")          // 60
 * extractDuration("half an hour")           // 30
 * extractDuration("1 hour 20 minutes")      // 20
 * extractDuration("no time limit")          // null
 */
export function extractDuration(
  text: string,
  rules: readonly DurationRule[] = DURATION_RULES,
): DurationConstraint {
  const lowered = text.toLowerCase();
  for (const rule of rules) {
    const minutes = applyRule(rule, lowered);
    if (minutes !== null) {
      return minutes;
    }
  }
  return null;
}

/**
 * First integer in a catalog item's duration field; 0 when there is none
 * ("Untimed", "Variable"), which passes any limit.
 */
export function parseItemDuration(duration: string | undefined): number {
  const match = ITEM_DURATION_PATTERN.exec(duration ?? "");
  return match ? parseInt(match[1], 10) : 0;
}
