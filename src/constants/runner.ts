/**
 * Runner constants: environment variable names and defaults
 */

import type { RunMode } from "@/types";

export const RUN_MODE_ENV = "RUN_MODE";
export const INPUT_PATH_ENV = "INPUT_PATH";
export const SIGNS_PATH_ENV = "SIGNS_PATH";
export const FETCH_CONCURRENCY_ENV = "FETCH_CONCURRENCY";
export const FETCH_TIMEOUT_MS_ENV = "FETCH_TIMEOUT_MS";
export const BACKUP_PATH_ENV = "BACKUP_PATH";
export const EXPORT_PATH_ENV = "EXPORT_PATH";

export const DEFAULT_RUN_MODE: RunMode = "ingest";

export const VALID_RUN_MODES: readonly RunMode[] = ["ingest", "reconcile", "export"];

export const DEFAULT_INPUT_PATH = "data/messages.json";

export const DEFAULT_EXPORT_PATH = "data/export.json";
