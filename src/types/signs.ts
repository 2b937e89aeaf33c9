/**
 * Sign registry type definitions
 *
 * Raw types mirror data/signs.json; runtime types are the compiled,
 * read-only form shared by the classifier and the extractors.
 */

import type { StructuredCategory } from "./messages";

// ============================================================================
// Raw (JSON) shapes
// ============================================================================

export type StatisticSignField =
  | "vacanciesIn30d"
  | "candidatesOnline"
  | "salary"
  | "responsesToVacancies"
  | "vacanciesPerWeek"
  | "candidatesPerWeek";

export type HtmlSignField =
  | "lingvo"
  | "experience"
  | "work_type"
  | "domain"
  | "company_type"
  | "offices";

export interface ExperienceSignGroupRaw {
  /** Fixed experience value when no number precedes the sign */
  years?: number;
  signs: string[];
}

export interface HtmlFieldSignsRaw {
  field: HtmlSignField;
  signs: string[];
  /** Remove the matched sign from the item text */
  stripSign?: boolean;
}

export interface HtmlSelectors {
  position: string;
  description: string;
  card: string;
  list: string;
  item: string;
}

export interface PatternTemplatesRaw {
  url: string;
  numeric: string;
  /** May contain the {numeric_pattern} placeholder */
  salary: string;
  /** May contain the {numeric_pattern} placeholder */
  salary_range: string;
}

export interface SignConfigRaw {
  version: string;
  messageSigns: Record<StructuredCategory, string[]>;
  vacancyText: {
    splitter: string[];
    positionCompany: string[];
    experience: ExperienceSignGroupRaw[];
    subscription: string[];
  };
  statisticText: Record<StatisticSignField, string[]>;
  html: {
    selectors: HtmlSelectors;
    candidateLocations: string[];
    fields: HtmlFieldSignsRaw[];
  };
  /** Path (relative to cwd) of the technology token list */
  techTokensPath: string;
  patterns: PatternTemplatesRaw;
}

// ============================================================================
// Runtime shapes
// ============================================================================

/**
 * A single compiled sign.
 *
 * `source` is the regex fragment (escaped for literal signs) so that
 * sign sets can be joined into larger patterns.
 */
export interface CompiledSign {
  readonly raw: string;
  readonly source: string;
  readonly pattern: RegExp;
}

/** Ordered sign list; earlier signs take priority */
export type SignSet = readonly CompiledSign[];

export interface ExperienceSignGroup {
  readonly years: number | null;
  readonly signs: SignSet;
}

export interface HtmlFieldSigns {
  readonly field: HtmlSignField;
  readonly signs: SignSet;
  readonly stripSign: boolean;
}

export interface TechToken {
  readonly name: string;
  /** Configuration order, used for tie-breaks */
  readonly order: number;
  readonly pattern: RegExp;
}

/**
 * Salary grammar compiled from the pattern templates
 */
export interface SalaryGrammar {
  /** Numeric token pattern source (no anchors) */
  readonly numericSource: string;
  /** Numeric token at the end of text */
  readonly trailingNumeric: RegExp;
  /** Single value, anchored at end of text */
  readonly single: RegExp;
  /** Min-max range, anchored at end of text */
  readonly range: RegExp;
  /** Unanchored sources, for embedding in labeled patterns */
  readonly singleSource: string;
  readonly rangeSource: string;
}

export interface SignRegistry {
  readonly version: string;
  readonly messageSigns: Readonly<Record<StructuredCategory, SignSet>>;
  readonly vacancyText: {
    readonly splitter: SignSet;
    readonly positionCompany: SignSet;
    readonly experience: readonly ExperienceSignGroup[];
    readonly subscription: SignSet;
  };
  readonly statisticText: Readonly<Record<StatisticSignField, SignSet>>;
  readonly html: {
    readonly selectors: Readonly<HtmlSelectors>;
    readonly candidateLocations: SignSet;
    readonly fields: readonly HtmlFieldSigns[];
  };
  readonly techTokens: readonly TechToken[];
  readonly url: RegExp;
  readonly salary: SalaryGrammar;
}
