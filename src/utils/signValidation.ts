/**
 * Sign configuration validation
 *
 * Validates the raw sign configuration (data/signs.json) and the
 * technology token list. Every sign set the extractors rely on must be
 * present and non-empty.
 *
 * Validation is fail-fast: throws on the first error, naming the field path.
 */

import type {
  SignConfigRaw,
  ExperienceSignGroupRaw,
  HtmlFieldSignsRaw,
  HtmlSignField,
  HtmlSelectors,
  PatternTemplatesRaw,
  StatisticSignField,
  StructuredCategory,
} from "@/types";
import { CATEGORY_PRIORITY } from "@/constants/parsing";

/**
 * Error thrown when sign configuration validation fails.
 */
export class SignRegistryValidationError extends Error {
  constructor(message: string) {
    super(`Sign registry validation failed: ${message}`);
    this.name = "SignRegistryValidationError";
  }
}

const STATISTIC_SIGN_FIELDS: readonly StatisticSignField[] = [
  "vacanciesIn30d",
  "candidatesOnline",
  "salary",
  "responsesToVacancies",
  "vacanciesPerWeek",
  "candidatesPerWeek",
];

const HTML_SIGN_FIELDS: readonly HtmlSignField[] = [
  "lingvo",
  "experience",
  "work_type",
  "domain",
  "company_type",
  "offices",
];

const SELECTOR_KEYS: readonly (keyof HtmlSelectors)[] = [
  "position",
  "description",
  "card",
  "list",
  "item",
];

const PATTERN_KEYS: readonly (keyof PatternTemplatesRaw)[] = [
  "url",
  "numeric",
  "salary",
  "salary_range",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHtmlSignField(value: string): value is HtmlSignField {
  return HTML_SIGN_FIELDS.some((field) => field === value);
}

/**
 * Validates that a value is an object and returns it.
 */
function requireObject(
  value: unknown,
  fieldPath: string,
): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new SignRegistryValidationError(`${fieldPath} must be an object`);
  }
  return value;
}

/**
 * Validates that a value is a non-empty string.
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new SignRegistryValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new SignRegistryValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

/**
 * Validates a sign set: a non-empty array of non-blank strings.
 *
 * Signs keep their surrounding whitespace (" в " is a valid separator).
 */
function requireSignSet(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new SignRegistryValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
  if (value.length === 0) {
    throw new SignRegistryValidationError(`${fieldPath} cannot be empty`);
  }

  const signs: string[] = [];
  value.forEach((sign: unknown, index: number) => {
    validateNonEmptyString(sign, `${fieldPath}[${index}]`);
    signs.push(sign);
  });
  return signs;
}

function validateExperienceGroup(
  value: unknown,
  index: number,
): ExperienceSignGroupRaw {
  const prefix = `vacancyText.experience[${index}]`;
  const group = requireObject(value, prefix);
  const signs = requireSignSet(group.signs, `${prefix}.signs`);

  if (group.years === undefined) {
    return { signs };
  }
  if (typeof group.years !== "number" || group.years < 0) {
    throw new SignRegistryValidationError(
      `${prefix}.years must be a non-negative number`,
    );
  }
  return { years: group.years, signs };
}

function validateHtmlField(value: unknown, index: number): HtmlFieldSignsRaw {
  const prefix = `html.fields[${index}]`;
  const entry = requireObject(value, prefix);

  validateNonEmptyString(entry.field, `${prefix}.field`);
  const field = entry.field;
  if (!isHtmlSignField(field)) {
    throw new SignRegistryValidationError(
      `${prefix}.field must be one of ${HTML_SIGN_FIELDS.join(", ")}, got "${field}"`,
    );
  }

  if (entry.stripSign !== undefined && typeof entry.stripSign !== "boolean") {
    throw new SignRegistryValidationError(`${prefix}.stripSign must be a boolean`);
  }

  return {
    field,
    signs: requireSignSet(entry.signs, `${prefix}.signs`),
    stripSign: entry.stripSign === true,
  };
}

function validateHtml(value: unknown): SignConfigRaw["html"] {
  const html = requireObject(value, "html");
  const selectorsRaw = requireObject(html.selectors, "html.selectors");

  const selectors: HtmlSelectors = {
    position: "",
    description: "",
    card: "",
    list: "",
    item: "",
  };
  for (const key of SELECTOR_KEYS) {
    const selector = selectorsRaw[key];
    validateNonEmptyString(selector, `html.selectors.${key}`);
    selectors[key] = selector;
  }

  if (!Array.isArray(html.fields) || html.fields.length === 0) {
    throw new SignRegistryValidationError("html.fields must be a non-empty array");
  }
  const fields = html.fields.map((entry: unknown, index: number) =>
    validateHtmlField(entry, index),
  );

  const seen = new Set<HtmlSignField>();
  for (const entry of fields) {
    if (seen.has(entry.field)) {
      throw new SignRegistryValidationError(
        `html.fields has duplicate field "${entry.field}"`,
      );
    }
    seen.add(entry.field);
  }

  return {
    selectors,
    candidateLocations: requireSignSet(
      html.candidateLocations,
      "html.candidateLocations",
    ),
    fields,
  };
}

function validatePatterns(value: unknown): PatternTemplatesRaw {
  const patterns = requireObject(value, "patterns");
  const validated: PatternTemplatesRaw = {
    url: "",
    numeric: "",
    salary: "",
    salary_range: "",
  };
  for (const key of PATTERN_KEYS) {
    const pattern = patterns[key];
    validateNonEmptyString(pattern, `patterns.${key}`);
    validated[key] = pattern;
  }
  return validated;
}

/**
 * Validates raw sign configuration structure.
 *
 * Checks:
 * - messageSigns has a non-empty sign set for every structured category
 * - vacancyText splitter, separators, experience groups and subscription signs
 * - statisticText has every numeric field's sign set
 * - html selectors, candidate-location markers and field sign sets
 * - the four pattern templates
 *
 * @param raw - Parsed JSON value
 * @returns Validated configuration
 * @throws {SignRegistryValidationError} On the first invalid field
 */
export function validateSignConfigRaw(raw: unknown): SignConfigRaw {
  const config = requireObject(raw, "sign configuration");

  validateNonEmptyString(config.version, "version");
  validateNonEmptyString(config.techTokensPath, "techTokensPath");

  const messageSignsRaw = requireObject(config.messageSigns, "messageSigns");
  const messageSigns: Record<StructuredCategory, string[]> = {
    vacancy: [],
    statistic: [],
    service: [],
  };
  for (const category of CATEGORY_PRIORITY) {
    messageSigns[category] = requireSignSet(
      messageSignsRaw[category],
      `messageSigns.${category}`,
    );
  }

  const vacancyText = requireObject(config.vacancyText, "vacancyText");
  if (!Array.isArray(vacancyText.experience) || vacancyText.experience.length === 0) {
    throw new SignRegistryValidationError(
      "vacancyText.experience must be a non-empty array",
    );
  }

  const statisticRaw = requireObject(config.statisticText, "statisticText");
  const statisticText: Record<StatisticSignField, string[]> = {
    vacanciesIn30d: [],
    candidatesOnline: [],
    salary: [],
    responsesToVacancies: [],
    vacanciesPerWeek: [],
    candidatesPerWeek: [],
  };
  for (const field of STATISTIC_SIGN_FIELDS) {
    statisticText[field] = requireSignSet(
      statisticRaw[field],
      `statisticText.${field}`,
    );
  }

  return {
    version: config.version,
    messageSigns,
    vacancyText: {
      splitter: requireSignSet(vacancyText.splitter, "vacancyText.splitter"),
      positionCompany: requireSignSet(
        vacancyText.positionCompany,
        "vacancyText.positionCompany",
      ),
      experience: vacancyText.experience.map((group: unknown, index: number) =>
        validateExperienceGroup(group, index),
      ),
      subscription: requireSignSet(
        vacancyText.subscription,
        "vacancyText.subscription",
      ),
    },
    statisticText,
    html: validateHtml(config.html),
    techTokensPath: config.techTokensPath,
    patterns: validatePatterns(config.patterns),
  };
}

/**
 * Validates the technology token list: non-empty strings, no duplicates.
 *
 * @throws {SignRegistryValidationError} If the list is invalid
 */
export function validateTechTokens(raw: unknown): string[] {
  const tokens = requireSignSet(raw, "techTokens");

  const seen = new Set<string>();
  for (const token of tokens) {
    if (seen.has(token)) {
      throw new SignRegistryValidationError(
        `techTokens has duplicate token "${token}"`,
      );
    }
    seen.add(token);
  }
  return tokens;
}
