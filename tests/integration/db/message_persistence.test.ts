/**
 * Integration Test: Message persistence
 *
 * Processes messages with an in-process page fetcher and persists them
 * to a temp database with real migrations.
 *
 * Verifies:
 * 1. Each category lands in its own table, plus the ingest log
 * 2. A re-ingested message keeps exactly one structured record
 * 3. Unclassified messages appear only in the ingest log
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { createMockFetcher, loadFixtureText } from "../../helpers/mockFetcher";
import { loadSignRegistry } from "@/signs";
import { persistProcessedMessage, processMessage } from "@/ingestion";
import {
  countSourceMessages,
  getServiceMessage,
  getSourceMessage,
  getStatistic,
  getVacancy,
} from "@/db";
import type { RawMessage } from "@/types";

const registry = loadSignRegistry("data/signs.json");
const PAGE_URL = "https://jobs.example.test/jobs/101-senior-python-developer/";

const VACANCY: RawMessage = {
  messageId: 101,
  timestamp: "2024-03-01T09:15:00",
  text: [
    "**Senior Python Developer** в Fintech Labs",
    "Remote, 3 роки досвіду, $3000-4500",
    PAGE_URL,
    "",
    '__Підписка:__ "Python"',
  ].join("\n"),
};

const STATISTIC: RawMessage = {
  messageId: 102,
  timestamp: "2024-03-01T10:00:00",
  text: "Statistics on Djinni for the query Python\nJob ads for 30 days: 120\nCandidates online: 340",
};

function count(harness: TestDbHarness, table: string): number {
  const row = harness.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as {
    count: number;
  };
  return row.count;
}

describe("Message persistence", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should persist a fully resolved vacancy", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();
    mock.onPage(PAGE_URL, loadFixtureText("html/vacancy_page.html"));

    const processed = await processMessage(VACANCY, {
      registry,
      fetchPage: mock.fetchPage,
    });
    persistProcessedMessage(processed);

    expect(getSourceMessage(101)).toMatchObject({
      message_id: 101,
      date: "2024-03-01T09:15:00",
      message_type: "vacancy",
      text: VACANCY.text,
    });
    expect(getVacancy(101)).toMatchObject({
      text_position: "Senior Python Developer",
      company: "Fintech Labs",
      location: "Remote",
      text_experience: "3 роки досвіду",
      experience_years: 3,
      min_salary: 3000,
      max_salary: 4500,
      url: PAGE_URL,
      subscription: "Python",
      html_position: "Senior Python Developer",
      lingvo: "English: Upper-Intermediate",
      work_type: "Remote",
      candidate_locations: "Ukraine, Poland",
      main_tech: "Python",
      tech_stack: "Python, Django, PostgreSQL, Redis, Docker, AWS",
      domain: "Fintech",
      company_type: "Product",
      offices: "Kyiv",
      notes: "Part-time possible",
      parsing_status: "ok",
      missing_fields: null,
    });
  });

  it("should persist a statistic digest with its missing fields", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();

    persistProcessedMessage(
      await processMessage(STATISTIC, { registry, fetchPage: mock.fetchPage }),
    );

    expect(getStatistic(102)).toMatchObject({
      vacancies_in_30d: 120,
      candidates_online: 340,
      min_salary: null,
      parsing_status: "partial",
      missing_fields:
        '["min_salary","max_salary","responses_to_vacancies","vacancies_per_week","candidates_per_week"]',
    });
    expect(mock.getRequestedUrls()).toEqual([]);
  });

  it("should keep one structured record when a message is reclassified", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();
    const deps = { registry, fetchPage: mock.fetchPage };

    persistProcessedMessage(await processMessage(STATISTIC, deps));
    persistProcessedMessage(
      await processMessage({ ...STATISTIC, text: "/help" }, deps),
    );

    expect(getStatistic(102)).toBeUndefined();
    expect(getServiceMessage(102)).toEqual({ message_id: 102, text: "/help" });
    expect(getSourceMessage(102)?.message_type).toBe("service");
    expect(count(harness, "statistics")).toBe(0);
    expect(count(harness, "service_messages")).toBe(1);
  });

  it("should write an unclassified message only to the ingest log", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();

    persistProcessedMessage(
      await processMessage(
        {
          messageId: 103,
          timestamp: "2024-03-01T11:00:00",
          text: "Weekly reminder: update your profile today",
        },
        { registry, fetchPage: mock.fetchPage },
      ),
    );

    expect(getSourceMessage(103)?.message_type).toBe("unclassified");
    expect(countSourceMessages()).toBe(1);
    expect(count(harness, "vacancies")).toBe(0);
    expect(count(harness, "statistics")).toBe(0);
    expect(count(harness, "service_messages")).toBe(0);
  });

  it("should keep a short single-word message out of the service table", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();

    persistProcessedMessage(
      await processMessage(
        { messageId: 104, timestamp: "2024-03-01T11:30:00", text: "Hello" },
        { registry, fetchPage: mock.fetchPage },
      ),
    );

    expect(getSourceMessage(104)?.message_type).toBe("unclassified");
    expect(getServiceMessage(104)).toBeUndefined();
    expect(count(harness, "service_messages")).toBe(0);
  });

  it("should be idempotent for the same message", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();
    mock.onPage(PAGE_URL, loadFixtureText("html/vacancy_page.html"));
    const deps = { registry, fetchPage: mock.fetchPage };

    persistProcessedMessage(await processMessage(VACANCY, deps));
    persistProcessedMessage(await processMessage(VACANCY, deps));

    expect(count(harness, "source_messages")).toBe(1);
    expect(count(harness, "vacancies")).toBe(1);
  });
});
