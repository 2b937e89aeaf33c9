/**
 * Vacancies repository
 *
 * Data access layer for vacancies table.
 */

import type { VacancyRecord, VacancyRecordInput } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Upsert a vacancy by message_id
 */
export function upsertVacancy(input: VacancyRecordInput): void {
  getDb()
    .prepare(
      `
    INSERT INTO vacancies (
      message_id, text_position, company, location, text_experience,
      experience_years, min_salary, max_salary, url, subscription,
      html_position, description, lingvo, html_experience, work_type,
      candidate_locations, main_tech, tech_stack, domain, company_type,
      offices, notes, parsing_status, missing_fields
    )
    VALUES (
      @message_id, @text_position, @company, @location, @text_experience,
      @experience_years, @min_salary, @max_salary, @url, @subscription,
      @html_position, @description, @lingvo, @html_experience, @work_type,
      @candidate_locations, @main_tech, @tech_stack, @domain, @company_type,
      @offices, @notes, @parsing_status, @missing_fields
    )
    ON CONFLICT(message_id) DO UPDATE SET
      text_position = excluded.text_position,
      company = excluded.company,
      location = excluded.location,
      text_experience = excluded.text_experience,
      experience_years = excluded.experience_years,
      min_salary = excluded.min_salary,
      max_salary = excluded.max_salary,
      url = excluded.url,
      subscription = excluded.subscription,
      html_position = excluded.html_position,
      description = excluded.description,
      lingvo = excluded.lingvo,
      html_experience = excluded.html_experience,
      work_type = excluded.work_type,
      candidate_locations = excluded.candidate_locations,
      main_tech = excluded.main_tech,
      tech_stack = excluded.tech_stack,
      domain = excluded.domain,
      company_type = excluded.company_type,
      offices = excluded.offices,
      notes = excluded.notes,
      parsing_status = excluded.parsing_status,
      missing_fields = excluded.missing_fields,
      updated_at = datetime('now')
  `,
    )
    .run(input);
}

export function getVacancy(messageId: number): VacancyRecord | undefined {
  return getDb()
    .prepare("SELECT * FROM vacancies WHERE message_id = ?")
    .get(messageId) as VacancyRecord | undefined;
}

export function listVacancies(): VacancyRecord[] {
  return getDb()
    .prepare("SELECT * FROM vacancies ORDER BY message_id")
    .all() as VacancyRecord[];
}

export function deleteVacancy(messageId: number): void {
  getDb().prepare("DELETE FROM vacancies WHERE message_id = ?").run(messageId);
}
