/**
 * Parsing constants: classification order, markup, and status tracking
 */

import type { StructuredCategory } from "@/types";

/**
 * Classification priority. A message matching signs of several
 * categories takes the first one in this list.
 */
export const CATEGORY_PRIORITY: readonly StructuredCategory[] = [
  "vacancy",
  "statistic",
  "service",
];

/**
 * Markdown emphasis characters stripped from extracted values
 */
export const MARKUP_PATTERN = /[*_`]+/g;

/**
 * Quotes trimmed from subscription names
 */
export const QUOTE_CHARS = "\"'«»“”„";

/**
 * Currency marker; salary fields are tracked only when it is present
 */
export const CURRENCY_MARKER = "$";

/**
 * Error pages are detected in the first N characters of a body
 */
export const ERROR_PAGE_SCAN_LENGTH = 500;

export const ERROR_PAGE_PATTERN = /Error (\d{3})/;

export const IP_BLOCKED_PATTERN = /Your IP address .* has been blocked/;

/**
 * Tracked vacancy fields taken from the message text
 */
export const VACANCY_TEXT_TRACKED_FIELDS = [
  "text_position",
  "company",
  "location",
  "text_experience",
  "url",
  "subscription",
] as const;

/**
 * Tracked vacancy fields taken from the fetched page
 */
export const VACANCY_HTML_TRACKED_FIELDS = [
  "html_position",
  "description",
  "html_experience",
  "work_type",
  "candidate_locations",
  "main_tech",
  "tech_stack",
  "domain",
  "company_type",
] as const;

/**
 * Tracked only when the page card lists a language requirement
 */
export const VACANCY_LINGVO_TRACKED_FIELDS = ["lingvo"] as const;

export const VACANCY_SALARY_TRACKED_FIELDS = ["min_salary", "max_salary"] as const;

export const STATISTIC_TRACKED_FIELDS = [
  "vacancies_in_30d",
  "candidates_online",
  "min_salary",
  "max_salary",
  "responses_to_vacancies",
  "vacancies_per_week",
  "candidates_per_week",
] as const;
