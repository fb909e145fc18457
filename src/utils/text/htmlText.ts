/**
 * Plain-text extraction from fetched pages
 */

import {
  HTML_TAG_PATTERN,
  WHITESPACE_RUN_PATTERN,
} from "@/constants/textNormalization";

/**
 * Replaces every tag with a space and collapses whitespace.
 *
 * This is a lexical strip, not an HTML parser: script and style bodies
 * survive as text, and a tag spanning several lines is left in place.
 *
 * @example
 * htmlToText("<h1>Java</h1>\n<p>Developer</p>") // "Java Developer"
 */
export function htmlToText(html: string): string {
  return html
    .replace(HTML_TAG_PATTERN, " ")
    .replace(WHITESPACE_RUN_PATTERN, " ")
    .trim();
}
