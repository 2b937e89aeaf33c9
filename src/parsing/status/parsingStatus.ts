/**
 * Parsing status evaluation
 */

import type { ParsingStatus } from "@/types";

export interface ParsingStatusResult<K extends string> {
  status: ParsingStatus;
  /** Tracked fields left unresolved, in tracked order */
  missing: K[];
}

function isResolved(value: unknown): boolean {
  return value !== null && value !== undefined && value !== "";
}

/**
 * Evaluate a record against its tracked fields.
 *
 * - ok: every tracked field resolved
 * - failed: none resolved
 * - partial: anything in between
 *
 * @example
 * evaluateParsingStatus({ a: 1, b: null }, ["a", "b"])
 * // { status: "partial", missing: ["b"] }
 */
export function evaluateParsingStatus<T extends object, K extends keyof T & string>(
  record: T,
  trackedFields: readonly K[],
): ParsingStatusResult<K> {
  const missing = trackedFields.filter((field) => !isResolved(record[field]));

  let status: ParsingStatus;
  if (missing.length === 0) {
    status = "ok";
  } else if (missing.length === trackedFields.length) {
    status = "failed";
  } else {
    status = "partial";
  }

  return { status, missing };
}

/**
 * Serialize missing field names for storage (null when nothing is missing)
 */
export function serializeMissingFields(missing: readonly string[]): string | null {
  return missing.length > 0 ? JSON.stringify(missing) : null;
}
