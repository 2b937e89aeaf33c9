/**
 * Salary parsing
 *
 * Reads the trailing monetary expression of a text as a single value
 * ("$2500") or a range ("$2000-3000"). The grammar comes from the sign
 * registry's pattern templates.
 */

import type { SalaryGrammar, SalaryRange } from "@/types";
import { toNumeric } from "@/utils/numeric";

/**
 * Order two bounds so that min <= max
 */
export function normalizeSalaryRange(a: number, b: number): SalaryRange {
  return a <= b ? { min: a, max: b } : { min: b, max: a };
}

/**
 * Parse the salary at the end of a text.
 *
 * The range pattern is tried first, then the single-value pattern; a
 * single value yields min = max. Decimal commas are read as dots.
 *
 * @param text - Salary segment (e.g. the tail of the location line)
 * @param grammar - Compiled salary grammar
 * @returns Bounds, or null when no salary could be read (never zero)
 *
 * @example
 * parseSalary("$2000-3000", grammar) // { min: 2000, max: 3000 }
 * parseSalary("$3000-2000", grammar) // { min: 2000, max: 3000 }
 * parseSalary("до $4500", grammar)   // { min: 4500, max: 4500 }
 * parseSalary("договірна", grammar)  // null
 */
export function parseSalary(
  text: string | undefined,
  grammar: SalaryGrammar,
): SalaryRange | null {
  const trimmed = (text ?? "").trim();
  if (trimmed.length === 0) {
    return null;
  }

  const range = grammar.range.exec(trimmed);
  if (range) {
    const min = toNumeric(range[range.length - 2]);
    const max = toNumeric(range[range.length - 1]);
    if (min !== null && max !== null) {
      return normalizeSalaryRange(min, max);
    }
  }

  const single = grammar.single.exec(trimmed);
  if (single) {
    const value = toNumeric(single[single.length - 1]);
    if (value !== null) {
      return { min: value, max: value };
    }
  }

  return null;
}
