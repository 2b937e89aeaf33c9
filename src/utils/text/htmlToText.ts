/**
 * HTML fragment to plain text
 */

import * as cheerio from "cheerio";
import { collapseSpaces } from "./textNormalization";

const BLOCK_SELECTOR = "p, div, li, ul, ol, h1, h2, h3, h4, h5, h6, tr";

/**
 * Convert an HTML fragment to readable text.
 *
 * Steps:
 * 1. Source newlines become spaces (they are formatting, not content)
 * 2. `<br>` becomes a newline; block elements end with a newline
 * 3. Entities are decoded and tags dropped by cheerio
 * 4. Lines are space-collapsed; blank lines are removed
 *
 * @example
 * htmlToText("<p>We build <b>payments</b></p><p>Remote&nbsp;only</p>")
 * // "We build payments\nRemote only"
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html.replace(/\r?\n/g, " "), null, false);

  $("br").replaceWith("\n");
  $(BLOCK_SELECTOR).append("\n");

  return $.root()
    .text()
    .split("\n")
    .map(collapseSpaces)
    .filter((line) => line.length > 0)
    .join("\n");
}
