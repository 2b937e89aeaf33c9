/**
 * Per-message pipeline
 *
 * Received → Classified → TextExtracted → (vacancy: LinkFollowed) →
 * FieldsResolved. The result is an assembled record ready for
 * persistence; nothing here touches the database.
 */

import type {
  FetchResult,
  HtmlFields,
  ProcessMessageDeps,
  ProcessedMessage,
  RawMessage,
  SalaryRange,
  SourceRecordInput,
  StatisticRecordInput,
  StatisticTextFields,
  VacancyRecordInput,
  VacancyTextFields,
} from "@/types";
import { classify } from "@/parsing/classifier";
import { extractFields } from "@/parsing/text";
import { extractHtmlFields } from "@/parsing/html";
import { parseSalary } from "@/parsing/salary";
import {
  evaluateParsingStatus,
  serializeMissingFields,
} from "@/parsing/status";
import {
  CURRENCY_MARKER,
  STATISTIC_TRACKED_FIELDS,
  VACANCY_HTML_TRACKED_FIELDS,
  VACANCY_LINGVO_TRACKED_FIELDS,
  VACANCY_SALARY_TRACKED_FIELDS,
  VACANCY_TEXT_TRACKED_FIELDS,
} from "@/constants/parsing";
import * as logger from "@/logger";

type VacancyTrackedField =
  | (typeof VACANCY_TEXT_TRACKED_FIELDS)[number]
  | (typeof VACANCY_HTML_TRACKED_FIELDS)[number]
  | (typeof VACANCY_LINGVO_TRACKED_FIELDS)[number]
  | (typeof VACANCY_SALARY_TRACKED_FIELDS)[number];

/**
 * Tracked vacancy fields. Salary counts only when the salary text
 * carries a currency marker, and lingvo only when the page named a
 * language requirement.
 */
function vacancyTrackedFields(
  text: VacancyTextFields,
  html: HtmlFields,
): VacancyTrackedField[] {
  const salaryTracked = (text.salaryText ?? "").includes(CURRENCY_MARKER);
  const lingvoTracked = html.lingvo !== undefined;
  return [
    ...VACANCY_TEXT_TRACKED_FIELDS,
    ...VACANCY_HTML_TRACKED_FIELDS,
    ...(lingvoTracked ? VACANCY_LINGVO_TRACKED_FIELDS : []),
    ...(salaryTracked ? VACANCY_SALARY_TRACKED_FIELDS : []),
  ];
}

/**
 * Assemble a vacancy record from text fields, page fields and salary
 */
export function buildVacancyRecord(
  messageId: number,
  text: VacancyTextFields,
  html: HtmlFields,
  salary: SalaryRange | null,
): VacancyRecordInput {
  const record: VacancyRecordInput = {
    message_id: messageId,
    text_position: text.position ?? null,
    company: text.company ?? null,
    location: text.location ?? null,
    text_experience: text.textExperience ?? null,
    experience_years: text.experienceYears ?? null,
    min_salary: salary?.min ?? null,
    max_salary: salary?.max ?? null,
    url: text.url ?? null,
    subscription: text.subscription ?? null,
    html_position: html.htmlPosition ?? null,
    description: html.description ?? null,
    lingvo: html.lingvo ?? null,
    html_experience: html.htmlExperience ?? null,
    work_type: html.workType ?? null,
    candidate_locations: html.candidateLocations ?? null,
    main_tech: html.mainTech ?? null,
    tech_stack: html.techStack ? html.techStack.join(", ") : null,
    domain: html.domain ?? null,
    company_type: html.companyType ?? null,
    offices: html.offices ?? null,
    notes: html.notes ? html.notes.join("\n") : null,
    parsing_status: "failed",
    missing_fields: null,
  };

  const { status, missing } = evaluateParsingStatus(
    record,
    vacancyTrackedFields(text, html),
  );
  return {
    ...record,
    parsing_status: status,
    missing_fields: serializeMissingFields(missing),
  };
}

/**
 * Assemble a statistic record from its numeric fields
 */
export function buildStatisticRecord(
  messageId: number,
  fields: StatisticTextFields,
): StatisticRecordInput {
  const record: StatisticRecordInput = {
    message_id: messageId,
    vacancies_in_30d: fields.vacanciesIn30d ?? null,
    candidates_online: fields.candidatesOnline ?? null,
    min_salary: fields.minSalary ?? null,
    max_salary: fields.maxSalary ?? null,
    responses_to_vacancies: fields.responsesToVacancies ?? null,
    vacancies_per_week: fields.vacanciesPerWeek ?? null,
    candidates_per_week: fields.candidatesPerWeek ?? null,
    parsing_status: "failed",
    missing_fields: null,
  };

  const { status, missing } = evaluateParsingStatus(
    record,
    STATISTIC_TRACKED_FIELDS,
  );
  return {
    ...record,
    parsing_status: status,
    missing_fields: serializeMissingFields(missing),
  };
}

/**
 * Run one message through classification, extraction, link-follow
 * and record assembly.
 *
 * Extraction failures never throw: unresolved fields stay null and
 * show up in parsing_status. A failed fetch leaves every page field
 * null. Unclassified messages produce only the ingest log row.
 *
 * @param message - Inbound message
 * @param deps - Sign registry and page fetcher
 * @returns Assembled records, tagged by category
 */
export async function processMessage(
  message: RawMessage,
  deps: ProcessMessageDeps,
): Promise<ProcessedMessage> {
  const log = logger.withContext({ messageId: message.messageId });

  const classified = classify(message, deps.registry);
  const source: SourceRecordInput = {
    message_id: message.messageId,
    date: message.timestamp,
    message_type: classified.kind,
    text: message.text,
  };

  const extracted = extractFields(classified, deps.registry);

  switch (extracted.kind) {
    case "unclassified":
      log.info("Message matched no category", {
        preview: message.text.slice(0, 80),
      });
      return { kind: "unclassified", source };

    case "service":
      return {
        kind: "service",
        source,
        record: { message_id: message.messageId, text: extracted.text },
      };

    case "statistic":
      return {
        kind: "statistic",
        source,
        record: buildStatisticRecord(message.messageId, extracted.fields),
      };

    case "vacancy": {
      const text = extracted.fields;

      let fetch: FetchResult | null = null;
      if (text.url !== undefined) {
        fetch = await deps.fetchPage(text.url);
        if (!fetch.ok) {
          log.debug("Vacancy page unavailable", {
            url: text.url,
            status: fetch.status,
          });
        }
      } else {
        log.debug("Vacancy message has no URL");
      }

      const html = extractHtmlFields(fetch, deps.registry);
      const salary = parseSalary(text.salaryText, deps.registry.salary);

      return {
        kind: "vacancy",
        source,
        record: buildVacancyRecord(message.messageId, text, html, salary),
        fetch,
      };
    }
  }
}
