/**
 * Duration constraint type definitions
 */

/**
 * Maximum duration in minutes, or null when the text states none
 */
export type DurationConstraint = number | null;

/**
 * One pattern in the ordered duration rule list.
 * The first rule producing a match wins.
 *
 * A counted rule captures an integer in group 1 and multiplies it;
 * a fixed rule captures nothing and yields the same minutes on every match.
 */
export type DurationRule =
  | { id: string; pattern: RegExp; minutesPerUnit: number }
  | { id: string; pattern: RegExp; fixedMinutes: number };
