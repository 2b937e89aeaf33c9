/**
 * vacancy_web snapshot files
 *
 * A snapshot is a JSON array of `{ url, raw_html, status_code, last_check }`.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import type { VacancyWebBackupRecord } from "@/types";

export class BackupSnapshotError extends Error {
  constructor(message: string) {
    super(`Backup snapshot error: ${message}`);
    this.name = "BackupSnapshotError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string, index: number): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    throw new BackupSnapshotError(`row ${index}: ${field} must be a string`);
  }
  return value;
}

/**
 * Validate snapshot rows
 *
 * @throws {BackupSnapshotError} On the first malformed row
 */
export function parseBackupRows(raw: unknown): VacancyWebBackupRecord[] {
  if (!Array.isArray(raw)) {
    throw new BackupSnapshotError("expected an array of rows");
  }

  return raw.map((row, index) => {
    if (!isRecord(row)) {
      throw new BackupSnapshotError(`row ${index}: expected an object`);
    }
    if (typeof row.url !== "string" || row.url.length === 0) {
      throw new BackupSnapshotError(`row ${index}: url is required`);
    }

    const status = row.status_code;
    if (status !== undefined && status !== null && !Number.isInteger(status)) {
      throw new BackupSnapshotError(`row ${index}: status_code must be an integer`);
    }

    return {
      url: row.url,
      raw_html: optionalString(row.raw_html, "raw_html", index),
      status_code: typeof status === "number" ? status : null,
      last_check: optionalString(row.last_check, "last_check", index),
    };
  });
}

/**
 * Read a snapshot file (path relative to cwd)
 */
export function loadBackupRows(path: string): VacancyWebBackupRecord[] {
  const fullPath = resolve(process.cwd(), path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new BackupSnapshotError(
      `cannot load ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseBackupRows(raw);
}
