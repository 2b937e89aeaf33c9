/**
 * Vacancy web repository
 *
 * Data access layer for fetched vacancy pages (vacancy_web) and their
 * backup snapshot (vacancy_web_backup).
 */

import type {
  ReconcileResult,
  VacancyWebBackupRecord,
  VacancyWebInput,
  VacancyWebRecord,
} from "@/types";
import { getDb } from "@/db/connection";

export function getVacancyWebByUrl(url: string): VacancyWebRecord | undefined {
  return getDb()
    .prepare("SELECT * FROM vacancy_web WHERE url = ?")
    .get(url) as VacancyWebRecord | undefined;
}

/**
 * Store a fetch outcome for a URL; last_check is set to now
 */
export function upsertVacancyWebPage(
  input: Omit<VacancyWebInput, "last_check">,
): void {
  getDb()
    .prepare(
      `
    INSERT INTO vacancy_web (url, raw_html, status_code, last_check)
    VALUES (?, ?, ?, datetime('now'))
    ON CONFLICT(url) DO UPDATE SET
      raw_html = excluded.raw_html,
      status_code = excluded.status_code,
      last_check = excluded.last_check
  `,
    )
    .run(input.url, input.raw_html, input.status_code);
}

/**
 * Insert a page row as-is (imports and fixtures)
 */
export function insertVacancyWeb(input: VacancyWebInput): void {
  getDb()
    .prepare(
      "INSERT INTO vacancy_web (url, raw_html, status_code, last_check) VALUES (?, ?, ?, ?)",
    )
    .run(input.url, input.raw_html, input.status_code, input.last_check);
}

export function countVacancyWeb(): number {
  const row = getDb()
    .prepare("SELECT COUNT(*) AS count FROM vacancy_web")
    .get() as { count: number };
  return row.count;
}

/**
 * Load a snapshot into vacancy_web_backup, replacing rows with the same URL
 *
 * @returns Number of rows written
 */
export function importVacancyWebBackup(rows: VacancyWebBackupRecord[]): number {
  const db = getDb();
  const insert = db.prepare(
    `
    INSERT INTO vacancy_web_backup (url, raw_html, status_code, last_check)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(url) DO UPDATE SET
      raw_html = excluded.raw_html,
      status_code = excluded.status_code,
      last_check = excluded.last_check
  `,
  );

  const importAll = db.transaction((batch: VacancyWebBackupRecord[]) => {
    for (const row of batch) {
      insert.run(row.url, row.raw_html, row.status_code, row.last_check);
    }
    return batch.length;
  });

  return importAll(rows);
}

/**
 * Overwrite raw_html, status_code and last_check of every vacancy_web row
 * whose URL is present in the backup. last_check is normalized through
 * SQLite datetime(). Rows are never inserted or deleted.
 *
 * Must run inside the caller's transaction to be atomic with the count.
 */
export function reconcileVacancyWebFromBackup(): ReconcileResult {
  const db = getDb();

  const matchedRow = db
    .prepare(
      `
    SELECT COUNT(*) AS count
    FROM vacancy_web
    WHERE url IN (SELECT url FROM vacancy_web_backup)
  `,
    )
    .get() as { count: number };

  const result = db
    .prepare(
      `
    UPDATE vacancy_web
    SET (raw_html, status_code, last_check) = (
      SELECT raw_html, status_code, datetime(last_check)
      FROM vacancy_web_backup
      WHERE vacancy_web_backup.url = vacancy_web.url
    )
    WHERE url IN (SELECT url FROM vacancy_web_backup)
  `,
    )
    .run();

  return { matched: matchedRow.count, updated: result.changes };
}
