/**
 * Combining marks left behind by NFD decomposition
 */
const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Folds accented letters onto their base letter, so "résumé" and "resume"
 * index as the same token.
 *
 * @example
 * removeDiacritics("Café") // "Cafe"
 */
export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(COMBINING_MARKS, "");
}
