/**
 * Unit tests for runner configuration from the environment
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { readRunnerConfig } from "@/runnerMain";

describe("readRunnerConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should apply defaults when nothing is set", () => {
    vi.stubEnv("RUN_MODE", "");
    vi.stubEnv("INPUT_PATH", "");
    vi.stubEnv("SIGNS_PATH", "");
    vi.stubEnv("FETCH_CONCURRENCY", "");
    vi.stubEnv("FETCH_TIMEOUT_MS", "");
    vi.stubEnv("BACKUP_PATH", "");
    vi.stubEnv("EXPORT_PATH", "");

    expect(readRunnerConfig()).toEqual({
      mode: "ingest",
      inputPath: "data/messages.json",
      signsPath: "data/signs.json",
      concurrency: 10,
      fetchTimeoutMs: 10_000,
      backupPath: null,
      exportPath: "data/export.json",
    });
  });

  it("should read every setting from the environment", () => {
    vi.stubEnv("RUN_MODE", "Reconcile");
    vi.stubEnv("INPUT_PATH", "in.json");
    vi.stubEnv("SIGNS_PATH", "signs.json");
    vi.stubEnv("FETCH_CONCURRENCY", "4");
    vi.stubEnv("FETCH_TIMEOUT_MS", "2500");
    vi.stubEnv("BACKUP_PATH", "backup.json");
    vi.stubEnv("EXPORT_PATH", "out.json");

    expect(readRunnerConfig()).toEqual({
      mode: "reconcile",
      inputPath: "in.json",
      signsPath: "signs.json",
      concurrency: 4,
      fetchTimeoutMs: 2500,
      backupPath: "backup.json",
      exportPath: "out.json",
    });
  });

  it("should reject an unknown run mode", () => {
    vi.stubEnv("RUN_MODE", "forever");

    expect(() => readRunnerConfig()).toThrow(
      'RUN_MODE must be one of ingest, reconcile, export, got "forever"',
    );
  });

  it("should reject a non-positive concurrency", () => {
    vi.stubEnv("RUN_MODE", "ingest");
    vi.stubEnv("FETCH_CONCURRENCY", "0");

    expect(() => readRunnerConfig()).toThrow(
      'FETCH_CONCURRENCY must be a positive integer, got "0"',
    );
  });
});
