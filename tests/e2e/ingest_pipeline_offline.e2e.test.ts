/**
 * E2E Test: Ingestion pipeline (offline)
 *
 * Runs a mixed batch through ingestMessages with a temp database and
 * an in-process page fetcher. No network.
 *
 * Verifies:
 * 1. Every category is routed to its table
 * 2. A vacancy whose page returns 404 keeps its text fields and is partial
 * 3. A message that fails mid-pipeline is rejected without stopping the batch
 * 4. A second run serves stored pages from vacancy_web
 * 5. Salary is read from the line under the heading without an experience phrase
 * 6. A page without a language requirement can still resolve fully
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../helpers/testDb";
import { createMockFetcher, loadFixtureText } from "../helpers/mockFetcher";
import { loadSignRegistry } from "@/signs";
import { ingestMessages } from "@/ingestion";
import {
  getServiceMessage,
  getSourceMessage,
  getStatistic,
  getVacancy,
  getVacancyWebByUrl,
  listSourceMessages,
} from "@/db";
import type { RawMessage } from "@/types";

const registry = loadSignRegistry("data/signs.json");

const PAGE_OK = "https://jobs.example.test/jobs/101-senior-python-developer/";
const PAGE_GONE = "https://jobs.example.test/jobs/404-go";
const PAGE_UNMOCKED = "https://jobs.example.test/jobs/unmocked";
const PAGE_NO_LANGUAGE = "https://jobs.example.test/jobs/303-python-developer/";

const BATCH: RawMessage[] = [
  {
    messageId: 1,
    timestamp: "2024-03-01T09:15:00",
    text: [
      "**Senior Python Developer** в Fintech Labs",
      "Remote, 3 роки досвіду, $3000-4500",
      PAGE_OK,
      "",
      '__Підписка:__ "Python"',
    ].join("\n"),
  },
  {
    messageId: 2,
    timestamp: "2024-03-01T09:30:00",
    text: [
      "Go Engineer at Cloud Works",
      "Berlin, 5 years of experience",
      PAGE_GONE,
      "",
      "Subscription: Go",
    ].join("\n"),
  },
  {
    messageId: 3,
    timestamp: "2024-03-01T10:00:00",
    text: [
      "Статистика на Джинне по запросу Python",
      "Вакансий за 30 дней: 120",
      "Кандидаты онлайн: 340",
      "Вилка по зарплате: $1500-3500",
      "Откликов на одну вакансию: 12,5",
      "Вакансий: 35",
      "Кандидатов: 80",
    ].join("\n"),
  },
  { messageId: 4, timestamp: "2024-03-01T10:05:00", text: "/list" },
  {
    messageId: 5,
    timestamp: "2024-03-01T10:10:00",
    text: "Weekly reminder: update your profile today",
  },
];

const FAILING: RawMessage = {
  messageId: 6,
  timestamp: "2024-03-01T10:15:00",
  text: `Rust Developer at Ferrous\n${PAGE_UNMOCKED}\n\nSubscription: Rust`,
};

function setupFetcher() {
  const mock = createMockFetcher();
  mock.onPage(PAGE_OK, loadFixtureText("html/vacancy_page.html"));
  mock.onStatus(PAGE_GONE, 404);
  return mock;
}

describe("Ingestion pipeline (offline)", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should route a mixed batch and report counters", async () => {
    harness = createTestDbSync();
    const mock = setupFetcher();

    const result = await ingestMessages([...BATCH, FAILING], {
      registry,
      fetchPage: mock.fetchPage,
      concurrency: 2,
    });

    expect(result).toEqual({
      processed: 5,
      persisted: 5,
      vacancies: 2,
      statistics: 1,
      services: 1,
      unclassified: 1,
      failed: 1,
      pagesFetched: 2,
      pagesCached: 0,
    });
    expect(listSourceMessages().map((row) => [row.message_id, row.message_type])).toEqual([
      [1, "vacancy"],
      [2, "vacancy"],
      [3, "statistic"],
      [4, "service"],
      [5, "unclassified"],
    ]);
  });

  it("should persist a fully resolved vacancy and statistic", async () => {
    harness = createTestDbSync();

    await ingestMessages(BATCH, { registry, fetchPage: setupFetcher().fetchPage });

    expect(getVacancy(1)?.parsing_status).toBe("ok");
    expect(getStatistic(3)).toMatchObject({
      vacancies_in_30d: 120,
      candidates_online: 340,
      min_salary: 1500,
      max_salary: 3500,
      responses_to_vacancies: 12.5,
      vacancies_per_week: 35,
      candidates_per_week: 80,
      parsing_status: "ok",
    });
    expect(getServiceMessage(4)).toEqual({ message_id: 4, text: "/list" });
  });

  it("should keep text fields and leave page fields empty when the page is gone", async () => {
    harness = createTestDbSync();

    await ingestMessages(BATCH, { registry, fetchPage: setupFetcher().fetchPage });

    expect(getVacancy(2)).toMatchObject({
      text_position: "Go Engineer",
      company: "Cloud Works",
      location: "Berlin",
      text_experience: "5 years of experience",
      experience_years: 5,
      url: PAGE_GONE,
      subscription: "Go",
      min_salary: null,
      max_salary: null,
      html_position: null,
      description: null,
      lingvo: null,
      html_experience: null,
      work_type: null,
      candidate_locations: null,
      main_tech: null,
      tech_stack: null,
      domain: null,
      company_type: null,
      offices: null,
      notes: null,
      parsing_status: "partial",
      missing_fields: JSON.stringify([
        "html_position",
        "description",
        "html_experience",
        "work_type",
        "candidate_locations",
        "main_tech",
        "tech_stack",
        "domain",
        "company_type",
      ]),
    });
    expect(getVacancyWebByUrl(PAGE_GONE)).toMatchObject({
      raw_html: null,
      status_code: 404,
    });
  });

  it("should leave no trace of a rejected message", async () => {
    harness = createTestDbSync();

    await ingestMessages([FAILING], { registry, fetchPage: setupFetcher().fetchPage });

    expect(getSourceMessage(6)).toBeUndefined();
    expect(getVacancy(6)).toBeUndefined();
  });

  it("should serve stored pages on a second run", async () => {
    harness = createTestDbSync();
    const mock = setupFetcher();

    await ingestMessages(BATCH, { registry, fetchPage: mock.fetchPage });
    const second = await ingestMessages(BATCH, { registry, fetchPage: mock.fetchPage });

    expect(second.pagesFetched).toBe(0);
    expect(second.pagesCached).toBe(2);
    expect(mock.getRequestedUrls()).toEqual(
      expect.arrayContaining([PAGE_OK, PAGE_GONE]),
    );
    expect(mock.getRequestedUrls()).toHaveLength(2);
    expect(getVacancy(1)?.parsing_status).toBe("ok");
    expect(getVacancy(2)?.parsing_status).toBe("partial");
  });

  it("should read the salary of a location line without an experience phrase", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();
    mock.onPage(PAGE_NO_LANGUAGE, loadFixtureText("html/vacancy_page_no_language.html"));

    await ingestMessages(
      [
        {
          messageId: 7,
          timestamp: "2024-03-01T10:20:00",
          text: [
            "Python Developer в Acme",
            "Remote, $2500",
            PAGE_NO_LANGUAGE,
            "__Подписка:__ Python",
          ].join("\n"),
        },
      ],
      { registry, fetchPage: mock.fetchPage },
    );

    expect(getVacancy(7)).toMatchObject({
      text_position: "Python Developer",
      company: "Acme",
      location: null,
      text_experience: null,
      min_salary: 2500,
      max_salary: 2500,
      subscription: "Python",
      parsing_status: "partial",
      missing_fields: JSON.stringify(["location", "text_experience"]),
    });
  });

  it("should resolve fully when the page names no language requirement", async () => {
    harness = createTestDbSync();
    const mock = createMockFetcher();
    mock.onPage(PAGE_NO_LANGUAGE, loadFixtureText("html/vacancy_page_no_language.html"));

    await ingestMessages(
      [
        {
          messageId: 8,
          timestamp: "2024-03-01T10:25:00",
          text: [
            "Python Developer в Acme",
            "Remote, 3 роки досвіду, $3000-4500",
            PAGE_NO_LANGUAGE,
            "__Подписка:__ Python",
          ].join("\n"),
        },
      ],
      { registry, fetchPage: mock.fetchPage },
    );

    expect(getVacancy(8)).toMatchObject({
      lingvo: null,
      min_salary: 3000,
      max_salary: 4500,
      parsing_status: "ok",
      missing_fields: null,
    });
  });
});
