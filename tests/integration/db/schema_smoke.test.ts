/**
 * Integration Test: Schema smoke
 *
 * Applies the real migrations to a temp database and checks the tables
 * and constraints the repositories rely on.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { applyPendingMigrations } from "@/db";

describe("Schema smoke", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should create every table", () => {
    harness = createTestDbSync();

    const tables = harness.db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all() as { name: string }[];

    expect(tables.map((t) => t.name)).toEqual([
      "schema_migrations",
      "service_messages",
      "source_messages",
      "statistics",
      "vacancies",
      "vacancy_web",
      "vacancy_web_backup",
    ]);
  });

  it("should record applied migrations and not reapply them", () => {
    harness = createTestDbSync();

    const versions = harness.db
      .prepare("SELECT version FROM schema_migrations ORDER BY version")
      .all() as { version: string }[];

    expect(versions.map((v) => v.version)).toEqual([
      "0001_init.sql",
      "0002_vacancy_web_backup.sql",
    ]);
    expect(applyPendingMigrations(harness.db)).toEqual([]);
  });

  it("should reject an unknown message type", () => {
    harness = createTestDbSync();
    const db = harness.db;

    expect(() =>
      db
        .prepare(
          "INSERT INTO source_messages (message_id, date, message_type, text) VALUES (1, '2024-01-01', 'spam', 'x')",
        )
        .run(),
    ).toThrow(/CHECK constraint failed/);
  });

  it("should reject a structured record without its ingest log row", () => {
    harness = createTestDbSync();
    const db = harness.db;

    expect(() =>
      db
        .prepare("INSERT INTO service_messages (message_id, text) VALUES (99, '/list')")
        .run(),
    ).toThrow(/FOREIGN KEY constraint failed/);
  });
});
