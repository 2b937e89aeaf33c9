/**
 * Sign registry loading and compilation
 *
 * Loads the sign configuration JSON and the technology token list,
 * validates them, and compiles every sign into a RegExp. The result is
 * frozen and shared by reference; nothing mutates it after load.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  CompiledSign,
  SignConfigRaw,
  SignRegistry,
  SignSet,
  SalaryGrammar,
  StatisticSignField,
  TechToken,
} from "@/types";
import {
  validateSignConfigRaw,
  validateTechTokens,
} from "@/utils/signValidation";
import { escapeRegExp } from "@/utils/text/textNormalization";
import {
  SIGNS_PATH,
  NUMERIC_PATTERN_PLACEHOLDER,
  REGEX_SIGN_DELIMITER,
} from "@/constants/signs";
import * as logger from "@/logger";

/**
 * Error thrown when a sign or pattern does not compile.
 */
export class SignRegistryCompilationError extends Error {
  constructor(message: string) {
    super(`Sign registry compilation failed: ${message}`);
    this.name = "SignRegistryCompilationError";
  }
}

function compilePattern(source: string, fieldPath: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new SignRegistryCompilationError(
      `${fieldPath} is not a valid pattern (${source}): ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
  }
}

function isRegexSign(raw: string): boolean {
  return (
    raw.length > 2 &&
    raw.startsWith(REGEX_SIGN_DELIMITER) &&
    raw.endsWith(REGEX_SIGN_DELIMITER)
  );
}

/**
 * Compile one sign. `/.../` is a regex fragment, anything else a literal.
 */
function compileSign(raw: string, fieldPath: string): CompiledSign {
  const source = isRegexSign(raw) ? raw.slice(1, -1) : escapeRegExp(raw);
  return Object.freeze({
    raw,
    source,
    pattern: compilePattern(source, fieldPath),
  });
}

function compileSignSet(signs: string[], fieldPath: string): SignSet {
  return Object.freeze(
    signs.map((sign, index) => compileSign(sign, `${fieldPath}[${index}]`)),
  );
}

/**
 * Compile the salary grammar from the pattern templates.
 *
 * The {numeric_pattern} placeholder is substituted, then both patterns
 * are anchored at the end of the text. The numeric bounds are the last
 * one (single) or two (range) capture groups.
 */
function compileSalaryGrammar(
  patterns: SignConfigRaw["patterns"],
): SalaryGrammar {
  const numericSource = patterns.numeric;
  const trailingNumeric = compilePattern(
    `(${numericSource})$`,
    "patterns.numeric",
  );

  const singleSource = patterns.salary
    .split(NUMERIC_PATTERN_PLACEHOLDER)
    .join(numericSource);
  const rangeSource = patterns.salary_range
    .split(NUMERIC_PATTERN_PLACEHOLDER)
    .join(numericSource);

  const single = compilePattern(`${singleSource}$`, "patterns.salary");
  const range = compilePattern(`${rangeSource}$`, "patterns.salary_range");

  if (countCaptureGroups(range) < 2) {
    throw new SignRegistryCompilationError(
      "patterns.salary_range must capture both bounds",
    );
  }
  if (countCaptureGroups(single) < 1) {
    throw new SignRegistryCompilationError(
      "patterns.salary must capture the value",
    );
  }

  return Object.freeze({
    numericSource,
    trailingNumeric,
    single,
    range,
    singleSource,
    rangeSource,
  });
}

function countCaptureGroups(pattern: RegExp): number {
  // An alternation with the empty pattern always matches; its length is 1 + groups
  const match = new RegExp(`${pattern.source}|`).exec("");
  return match ? match.length - 1 : 0;
}

/**
 * Technology tokens are word-bounded, so "Java" does not match "JavaScript"
 * and "SQL" does not match "PostgreSQL".
 */
function compileTechTokens(tokens: string[]): readonly TechToken[] {
  return Object.freeze(
    tokens.map((name, order) =>
      Object.freeze({
        name,
        order,
        pattern: compilePattern(
          `(?<![\\w.+#])${escapeRegExp(name)}(?![\\w+#])`,
          `techTokens[${order}]`,
        ),
      }),
    ),
  );
}

/**
 * Compiles a validated configuration into the runtime registry.
 *
 * Compilation steps:
 * 1. Compile every message, vacancy, statistic and html sign set
 * 2. Compile the url pattern and the salary grammar
 * 3. Compile technology tokens with word boundaries
 * 4. Freeze the result
 *
 * @throws {SignRegistryCompilationError} If a sign or pattern does not compile
 */
export function createSignRegistry(
  config: SignConfigRaw,
  techTokens: string[],
): SignRegistry {
  const statisticText: Record<StatisticSignField, SignSet> = {
    vacanciesIn30d: compileSignSet(
      config.statisticText.vacanciesIn30d,
      "statisticText.vacanciesIn30d",
    ),
    candidatesOnline: compileSignSet(
      config.statisticText.candidatesOnline,
      "statisticText.candidatesOnline",
    ),
    salary: compileSignSet(config.statisticText.salary, "statisticText.salary"),
    responsesToVacancies: compileSignSet(
      config.statisticText.responsesToVacancies,
      "statisticText.responsesToVacancies",
    ),
    vacanciesPerWeek: compileSignSet(
      config.statisticText.vacanciesPerWeek,
      "statisticText.vacanciesPerWeek",
    ),
    candidatesPerWeek: compileSignSet(
      config.statisticText.candidatesPerWeek,
      "statisticText.candidatesPerWeek",
    ),
  };

  const registry: SignRegistry = {
    version: config.version,
    messageSigns: Object.freeze({
      vacancy: compileSignSet(config.messageSigns.vacancy, "messageSigns.vacancy"),
      statistic: compileSignSet(
        config.messageSigns.statistic,
        "messageSigns.statistic",
      ),
      service: compileSignSet(config.messageSigns.service, "messageSigns.service"),
    }),
    vacancyText: Object.freeze({
      splitter: compileSignSet(config.vacancyText.splitter, "vacancyText.splitter"),
      positionCompany: compileSignSet(
        config.vacancyText.positionCompany,
        "vacancyText.positionCompany",
      ),
      experience: Object.freeze(
        config.vacancyText.experience.map((group, index) =>
          Object.freeze({
            years: group.years ?? null,
            signs: compileSignSet(
              group.signs,
              `vacancyText.experience[${index}].signs`,
            ),
          }),
        ),
      ),
      subscription: compileSignSet(
        config.vacancyText.subscription,
        "vacancyText.subscription",
      ),
    }),
    statisticText: Object.freeze(statisticText),
    html: Object.freeze({
      selectors: Object.freeze({ ...config.html.selectors }),
      candidateLocations: compileSignSet(
        config.html.candidateLocations,
        "html.candidateLocations",
      ),
      fields: Object.freeze(
        config.html.fields.map((entry, index) =>
          Object.freeze({
            field: entry.field,
            signs: compileSignSet(entry.signs, `html.fields[${index}].signs`),
            stripSign: entry.stripSign === true,
          }),
        ),
      ),
    }),
    techTokens: compileTechTokens(techTokens),
    url: compilePattern(config.patterns.url, "patterns.url"),
    salary: compileSalaryGrammar(config.patterns),
  };

  return Object.freeze(registry);
}

function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Loads and compiles the sign registry.
 *
 * This is the main entry point for sign loading. It is fail-fast: any
 * validation or compilation error throws, so a process never runs on a
 * partial registry.
 *
 * Steps:
 * 1. Read and parse the sign configuration JSON
 * 2. Validate structure and required sign sets
 * 3. Read and validate the technology token list
 * 4. Compile to the runtime registry
 *
 * @param signsPath - Config path relative to cwd (defaults to SIGNS_PATH env, then data/signs.json)
 * @returns Frozen registry ready to pass to the classifier and extractors
 * @throws {Error} If a file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {SignRegistryValidationError} If validation fails
 * @throws {SignRegistryCompilationError} If compilation fails
 */
export function loadSignRegistry(
  signsPath: string = process.env.SIGNS_PATH || SIGNS_PATH,
): SignRegistry {
  const configPath = path.resolve(process.cwd(), signsPath);
  const config = validateSignConfigRaw(readJson(configPath));

  const tokensPath = path.resolve(process.cwd(), config.techTokensPath);
  const techTokens = validateTechTokens(readJson(tokensPath));

  const registry = createSignRegistry(config, techTokens);

  logger.debug("Sign registry loaded", {
    version: registry.version,
    path: configPath,
    techTokens: registry.techTokens.length,
  });

  return registry;
}
