/**
 * Statistic message text extraction
 *
 * Statistic digests are label/value lines:
 *
 *   Вакансий за 30 дней: 120
 *   Вилка по зарплате: $1500-3500
 *
 * Each field is a labeled numeric value; the salary fork is a labeled range.
 */

import type {
  SignRegistry,
  SignSet,
  StatisticSignField,
  StatisticTextFields,
} from "@/types";
import { toNumeric } from "@/utils/numeric";
import { normalizeSalaryRange } from "../salary/salaryParser";

type NumericStatisticField = Exclude<StatisticSignField, "salary">;

const NUMERIC_FIELDS: readonly NumericStatisticField[] = [
  "vacanciesIn30d",
  "candidatesOnline",
  "responsesToVacancies",
  "vacanciesPerWeek",
  "candidatesPerWeek",
];

/**
 * Build `(?:(label1|label2):? +)<value>` from a sign set
 */
function labeledPattern(signs: SignSet, valueSource: string): RegExp {
  const labels = signs.map((sign) => sign.source).join("|");
  return new RegExp(`(?:(${labels}):? +)${valueSource}`);
}

/**
 * Value following any label of the set, or undefined
 */
export function extractLabeledNumber(
  text: string,
  signs: SignSet,
  registry: SignRegistry,
): number | undefined {
  const match = labeledPattern(signs, `(${registry.salary.numericSource})`).exec(
    text,
  );
  if (!match) {
    return undefined;
  }
  return toNumeric(match[match.length - 1]) ?? undefined;
}

/**
 * Salary fork following a salary label: a range, or a single value
 */
function extractLabeledSalary(
  text: string,
  registry: SignRegistry,
): Pick<StatisticTextFields, "minSalary" | "maxSalary"> {
  const signs = registry.statisticText.salary;

  const range = labeledPattern(signs, registry.salary.rangeSource).exec(text);
  if (range) {
    const min = toNumeric(range[range.length - 2]);
    const max = toNumeric(range[range.length - 1]);
    if (min !== null && max !== null) {
      const normalized = normalizeSalaryRange(min, max);
      return { minSalary: normalized.min, maxSalary: normalized.max };
    }
  }

  const single = labeledPattern(signs, registry.salary.singleSource).exec(text);
  if (single) {
    const value = toNumeric(single[single.length - 1]);
    if (value !== null) {
      return { minSalary: value, maxSalary: value };
    }
  }

  return {};
}

/**
 * Extract every numeric field of a statistic message
 */
export function extractStatisticText(
  text: string,
  registry: SignRegistry,
): StatisticTextFields {
  const fields: StatisticTextFields = {};

  for (const field of NUMERIC_FIELDS) {
    const value = extractLabeledNumber(
      text,
      registry.statisticText[field],
      registry,
    );
    if (value !== undefined) {
      fields[field] = value;
    }
  }

  return { ...fields, ...extractLabeledSalary(text, registry) };
}
