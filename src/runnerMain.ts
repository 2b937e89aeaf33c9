/**
 * Runner entrypoint
 *
 * Modes:
 * - ingest: read messages from INPUT_PATH, classify, extract, follow
 *   vacancy links and persist
 * - reconcile: optionally import BACKUP_PATH into vacancy_web_backup,
 *   then repair vacancy_web from it
 * - export: write the four sheets to EXPORT_PATH as JSON
 *
 * Usage:
 *   npm run build && node dist/src/runnerMain.js
 *   RUN_MODE=reconcile BACKUP_PATH=data/backup.json node dist/src/runnerMain.js
 *
 * Environment variables:
 *   - RUN_MODE: ingest | reconcile | export (defaults to ingest)
 *   - INPUT_PATH: messages JSON (defaults to data/messages.json)
 *   - SIGNS_PATH: sign configuration (defaults to data/signs.json)
 *   - FETCH_CONCURRENCY, FETCH_TIMEOUT_MS: link-follow tuning
 *   - BACKUP_PATH: vacancy_web snapshot (optional)
 *   - EXPORT_PATH: export output (defaults to data/export.json)
 *   - DB_PATH: SQLite database file (defaults to data/app.db)
 *   - LOG_LEVEL: debug | info | warn | error
 */

import "dotenv/config";
import type { RunMode, RunnerConfig } from "./types";
import { openDb, closeDb, applyPendingMigrations, importVacancyWebBackup } from "./db";
import { loadSignRegistry } from "./signs";
import { ingestMessages, loadMessagesFromFile } from "./ingestion";
import { runReconciliation, loadBackupRows } from "./maintenance";
import { writeExportFile } from "./export";
import {
  BACKUP_PATH_ENV,
  DEFAULT_EXPORT_PATH,
  DEFAULT_INPUT_PATH,
  DEFAULT_RUN_MODE,
  EXPORT_PATH_ENV,
  FETCH_CONCURRENCY_ENV,
  FETCH_TIMEOUT_MS_ENV,
  INPUT_PATH_ENV,
  RUN_MODE_ENV,
  SIGNS_PATH_ENV,
  VALID_RUN_MODES,
} from "./constants/runner";
import { SIGNS_PATH } from "./constants/signs";
import {
  DEFAULT_FETCH_CONCURRENCY,
  DEFAULT_FETCH_TIMEOUT_MS,
} from "./constants/ingestion";
import * as logger from "./logger";

function isRunMode(value: string): value is RunMode {
  return VALID_RUN_MODES.some((mode) => mode === value);
}

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve runner configuration from the environment
 *
 * @throws {Error} On an unknown RUN_MODE or a malformed number
 */
export function readRunnerConfig(): RunnerConfig {
  const mode = (process.env[RUN_MODE_ENV] || DEFAULT_RUN_MODE).toLowerCase();
  if (!isRunMode(mode)) {
    throw new Error(
      `${RUN_MODE_ENV} must be one of ${VALID_RUN_MODES.join(", ")}, got "${mode}"`,
    );
  }

  return {
    mode,
    inputPath: process.env[INPUT_PATH_ENV] || DEFAULT_INPUT_PATH,
    signsPath: process.env[SIGNS_PATH_ENV] || SIGNS_PATH,
    concurrency: readPositiveInt(FETCH_CONCURRENCY_ENV, DEFAULT_FETCH_CONCURRENCY),
    fetchTimeoutMs: readPositiveInt(FETCH_TIMEOUT_MS_ENV, DEFAULT_FETCH_TIMEOUT_MS),
    backupPath: process.env[BACKUP_PATH_ENV] || null,
    exportPath: process.env[EXPORT_PATH_ENV] || DEFAULT_EXPORT_PATH,
  };
}

/**
 * Execute one run
 *
 * @returns Process exit code
 */
async function run(config: RunnerConfig): Promise<number> {
  switch (config.mode) {
    case "ingest": {
      const registry = loadSignRegistry(config.signsPath);
      const messages = loadMessagesFromFile(config.inputPath);
      const result = await ingestMessages(messages, {
        registry,
        concurrency: config.concurrency,
        fetchTimeoutMs: config.fetchTimeoutMs,
      });
      return result.failed > 0 ? 1 : 0;
    }

    case "reconcile": {
      if (config.backupPath !== null) {
        const imported = importVacancyWebBackup(loadBackupRows(config.backupPath));
        logger.info("Backup snapshot imported", { rows: imported });
      }
      runReconciliation();
      return 0;
    }

    case "export":
      writeExportFile(config.exportPath);
      return 0;
  }
}

async function main(): Promise<void> {
  let exitCode = 1;

  try {
    const config = readRunnerConfig();
    logger.info("Starting runner", { mode: config.mode });

    const db = openDb();
    const applied = applyPendingMigrations(db);
    if (applied.length > 0) {
      logger.info("Migrations applied", { migrations: applied });
    }

    exitCode = await run(config);
    logger.info("Runner finished", { mode: config.mode, exitCode });
  } catch (error) {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  } finally {
    closeDb();
  }

  process.exit(exitCode);
}

if (require.main === module) {
  void main();
}
