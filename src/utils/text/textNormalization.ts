/**
 * Text cleanup helpers for extracted values
 *
 * Values coming out of the extractors are normalized the same way:
 * markdown emphasis removed, whitespace collapsed, ends trimmed.
 * An empty result means "unresolved" and is reported as undefined.
 */

import { MARKUP_PATTERN, QUOTE_CHARS } from "@/constants/parsing";

/**
 * Remove markdown emphasis characters (`*`, `_`, backtick)
 */
export function stripMarkup(text: string): string {
  return text.replace(MARKUP_PATTERN, "");
}

/**
 * Collapse runs of spaces/tabs into one space and trim
 */
export function collapseSpaces(text: string): string {
  return text.replace(/[ \t\u00a0]+/g, " ").trim();
}

/**
 * Strip markup, collapse spaces, and trim the given edge characters.
 *
 * @param text - Raw extracted value
 * @param trimChars - Extra characters to strip from both ends
 * @returns Cleaned value, or undefined when nothing is left
 *
 * @example
 * cleanValue("**Python Developer** ") // "Python Developer"
 * cleanValue(" , ", ",")               // undefined
 */
export function cleanValue(
  text: string | undefined,
  trimChars = "",
): string | undefined {
  if (text === undefined) {
    return undefined;
  }

  let cleaned = collapseSpaces(stripMarkup(text));

  if (trimChars.length > 0) {
    const edge = `[${escapeRegExp(trimChars)}\\s]+`;
    cleaned = cleaned.replace(new RegExp(`^${edge}|${edge}$`, "g"), "");
  }

  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Clean a subscription name: markup and surrounding quotes removed
 */
export function cleanQuoted(text: string | undefined): string | undefined {
  return cleanValue(text, QUOTE_CHARS);
}

/**
 * Escape a literal string for use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

/**
 * Split text into trimmed, non-empty lines
 */
export function toLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
