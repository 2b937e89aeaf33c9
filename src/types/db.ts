/**
 * Database type definitions
 *
 * Types for database entities and repository inputs.
 * Aligned with schema in migrations/0001_init.sql and 0002_vacancy_web_backup.sql
 */

import type { MessageCategory } from "./messages";

/**
 * Parsing outcome of a structured record
 *
 * - ok: every tracked field resolved
 * - partial: some tracked fields resolved
 * - failed: none resolved
 */
export type ParsingStatus = "ok" | "partial" | "failed";

/**
 * Raw ingest log row (source_messages table)
 */
export type SourceRecord = {
  message_id: number;
  date: string;
  message_type: MessageCategory;
  text: string;
  ingested_at: string;
};

export type SourceRecordInput = Omit<SourceRecord, "ingested_at">;

/**
 * Vacancy upsert input (vacancies table, without timestamps)
 */
export type VacancyRecordInput = {
  message_id: number;
  text_position: string | null;
  company: string | null;
  location: string | null;
  text_experience: string | null;
  experience_years: number | null;
  min_salary: number | null;
  max_salary: number | null;
  url: string | null;
  subscription: string | null;
  html_position: string | null;
  description: string | null;
  lingvo: string | null;
  html_experience: string | null;
  work_type: string | null;
  candidate_locations: string | null;
  main_tech: string | null;
  /** Comma-separated, in order of first occurrence */
  tech_stack: string | null;
  domain: string | null;
  company_type: string | null;
  offices: string | null;
  /** Newline-separated card items that matched no field */
  notes: string | null;
  parsing_status: ParsingStatus;
  /** JSON array of unresolved tracked field names */
  missing_fields: string | null;
};

export type VacancyRecord = VacancyRecordInput & {
  created_at: string;
  updated_at: string;
};

export type StatisticRecordInput = {
  message_id: number;
  vacancies_in_30d: number | null;
  candidates_online: number | null;
  min_salary: number | null;
  max_salary: number | null;
  responses_to_vacancies: number | null;
  vacancies_per_week: number | null;
  candidates_per_week: number | null;
  parsing_status: ParsingStatus;
  missing_fields: string | null;
};

export type StatisticRecord = StatisticRecordInput & {
  created_at: string;
  updated_at: string;
};

export type ServiceRecord = {
  message_id: number;
  text: string;
};

/**
 * Fetched vacancy page (vacancy_web table)
 */
export type VacancyWebRecord = {
  id: number;
  url: string;
  raw_html: string | null;
  status_code: number | null;
  last_check: string | null;
};

export type VacancyWebInput = Omit<VacancyWebRecord, "id">;

/**
 * Snapshot row (vacancy_web_backup table)
 */
export type VacancyWebBackupRecord = VacancyWebInput;
