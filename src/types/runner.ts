/**
 * Runner type definitions
 */

export type RunMode = "ingest" | "reconcile" | "export";

export interface RunnerConfig {
  mode: RunMode;
  inputPath: string;
  signsPath: string;
  concurrency: number;
  fetchTimeoutMs: number;
  /** Snapshot imported before reconciliation, when set */
  backupPath: string | null;
  exportPath: string;
}
