/**
 * Numeric token conversion
 */

/**
 * Convert a numeric token to a number.
 *
 * Decimal commas are read as dots. Returns null when the token is not a
 * finite number; a malformed value is unresolved, never zero.
 *
 * @example
 * toNumeric("2500")  // 2500
 * toNumeric("12,5")  // 12.5
 * toNumeric("3.0")   // 3
 * toNumeric("n/a")   // null
 */
export function toNumeric(token: string | undefined): number | null {
  if (token === undefined) {
    return null;
  }

  const normalized = token.trim().replace(",", ".");
  if (!/^[-+]?\d+(?:\.\d+)?$/.test(normalized)) {
    return null;
  }

  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}
