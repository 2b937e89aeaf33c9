/**
 * Statistics repository
 *
 * Data access layer for statistics table.
 */

import type { StatisticRecord, StatisticRecordInput } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Upsert a statistic digest by message_id
 */
export function upsertStatistic(input: StatisticRecordInput): void {
  getDb()
    .prepare(
      `
    INSERT INTO statistics (
      message_id, vacancies_in_30d, candidates_online, min_salary, max_salary,
      responses_to_vacancies, vacancies_per_week, candidates_per_week,
      parsing_status, missing_fields
    )
    VALUES (
      @message_id, @vacancies_in_30d, @candidates_online, @min_salary, @max_salary,
      @responses_to_vacancies, @vacancies_per_week, @candidates_per_week,
      @parsing_status, @missing_fields
    )
    ON CONFLICT(message_id) DO UPDATE SET
      vacancies_in_30d = excluded.vacancies_in_30d,
      candidates_online = excluded.candidates_online,
      min_salary = excluded.min_salary,
      max_salary = excluded.max_salary,
      responses_to_vacancies = excluded.responses_to_vacancies,
      vacancies_per_week = excluded.vacancies_per_week,
      candidates_per_week = excluded.candidates_per_week,
      parsing_status = excluded.parsing_status,
      missing_fields = excluded.missing_fields,
      updated_at = datetime('now')
  `,
    )
    .run(input);
}

export function getStatistic(messageId: number): StatisticRecord | undefined {
  return getDb()
    .prepare("SELECT * FROM statistics WHERE message_id = ?")
    .get(messageId) as StatisticRecord | undefined;
}

/**
 * Statistic rows with their message date, oldest first
 */
export function listStatisticsWithDate(): (StatisticRecord & { date: string })[] {
  return getDb()
    .prepare(
      `
    SELECT s.*, m.date
    FROM statistics s
    JOIN source_messages m ON m.message_id = s.message_id
    ORDER BY m.date, s.message_id
  `,
    )
    .all() as (StatisticRecord & { date: string })[];
}

export function deleteStatistic(messageId: number): void {
  getDb().prepare("DELETE FROM statistics WHERE message_id = ?").run(messageId);
}
