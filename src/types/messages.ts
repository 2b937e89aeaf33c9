/**
 * Message and extraction type definitions
 */

/** Categories that produce a structured record */
export type StructuredCategory = "vacancy" | "statistic" | "service";

export type MessageCategory = StructuredCategory | "unclassified";

/**
 * Inbound message tuple as harvested from the channel
 */
export interface RawMessage {
  messageId: number;
  /** ISO-8601 timestamp */
  timestamp: string;
  text: string;
}

interface ClassifiedMessageBase {
  readonly messageId: number;
  readonly timestamp: string;
  readonly rawText: string;
}

export interface VacancyMessage extends ClassifiedMessageBase {
  readonly kind: "vacancy";
}

export interface StatisticMessage extends ClassifiedMessageBase {
  readonly kind: "statistic";
}

export interface ServiceMessage extends ClassifiedMessageBase {
  readonly kind: "service";
}

export interface UnclassifiedMessage extends ClassifiedMessageBase {
  readonly kind: "unclassified";
}

/**
 * Message with its category fixed at classification time
 */
export type ClassifiedMessage =
  | VacancyMessage
  | StatisticMessage
  | ServiceMessage
  | UnclassifiedMessage;

/**
 * Inclusive salary bounds (min <= max)
 */
export interface SalaryRange {
  min: number;
  max: number;
}

/**
 * Fields read from a vacancy message body.
 * Unresolved fields are absent, never empty strings.
 */
export interface VacancyTextFields {
  position?: string;
  company?: string;
  location?: string;
  textExperience?: string;
  experienceYears?: number;
  url?: string;
  subscription?: string;
  /** Remainder of the location line, where the salary lives */
  salaryText?: string;
}

export interface StatisticTextFields {
  vacanciesIn30d?: number;
  candidatesOnline?: number;
  minSalary?: number;
  maxSalary?: number;
  responsesToVacancies?: number;
  vacanciesPerWeek?: number;
  candidatesPerWeek?: number;
}

/**
 * Fields read from a fetched vacancy page
 */
export interface HtmlFields {
  htmlPosition?: string;
  description?: string;
  lingvo?: string;
  htmlExperience?: string;
  workType?: string;
  candidateLocations?: string;
  mainTech?: string;
  techStack?: string[];
  domain?: string;
  companyType?: string;
  offices?: string;
  /** Card items that matched no field */
  notes?: string[];
}

/**
 * Extraction output, tagged by message category
 */
export type ExtractedFields =
  | { kind: "vacancy"; fields: VacancyTextFields }
  | { kind: "statistic"; fields: StatisticTextFields }
  | { kind: "service"; text: string }
  | { kind: "unclassified" };
