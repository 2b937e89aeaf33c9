/**
 * Integration Test: Export projection
 *
 * Builds the four sheets from persisted records.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import {
  getVacancy,
  upsertServiceMessage,
  upsertSourceMessage,
  upsertStatistic,
  upsertVacancy,
} from "@/db";
import { buildExportSheets, mapVacancyToExportRow, projectRow } from "@/export";
import { buildStatisticRecord, buildVacancyRecord } from "@/ingestion";

describe("Export projection", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should project columns in order with empty cells for nulls", () => {
    expect(
      projectRow({ a: 1, b: null, c: "x" }, [
        { id: "c", header: "C" },
        { id: "b", header: "B" },
        { id: "a", header: "A" },
      ]),
    ).toEqual(["x", "", 1]);
  });

  it("should build all sheets with headers and rows", () => {
    harness = createTestDbSync();

    upsertSourceMessage({ message_id: 1, date: "2024-03-01T09:00:00", message_type: "vacancy", text: "v" });
    upsertVacancy(
      buildVacancyRecord(
        1,
        { position: "Go Engineer", company: "Cloud Works", url: "https://jobs.example.test/9" },
        {},
        null,
      ),
    );
    upsertSourceMessage({ message_id: 2, date: "2024-03-02T09:00:00", message_type: "statistic", text: "s" });
    upsertStatistic(buildStatisticRecord(2, { vacanciesIn30d: 48, minSalary: 1000, maxSalary: 2000 }));
    upsertSourceMessage({ message_id: 3, date: "2024-03-03T09:00:00", message_type: "service", text: "/list" });
    upsertServiceMessage({ message_id: 3, text: "/list" });

    const [messages, vacancies, statistic, service] = buildExportSheets();

    expect(messages.name).toBe("Messages");
    expect(messages.header).toEqual(["Date/Time", "Message ID", "Type", "Text"]);
    expect(messages.rows).toEqual([
      ["2024-03-01T09:00:00", 1, "vacancy", "v"],
      ["2024-03-02T09:00:00", 2, "statistic", "s"],
      ["2024-03-03T09:00:00", 3, "service", "/list"],
    ]);

    expect(vacancies.header).toHaveLength(23);
    expect(vacancies.rows).toHaveLength(1);
    expect(vacancies.rows[0].slice(0, 3)).toEqual([1, "Go Engineer", "Cloud Works"]);
    expect(vacancies.rows[0][8]).toBe("https://jobs.example.test/9");
    expect(vacancies.rows[0][22]).toBe("partial");

    expect(statistic.header[0]).toBe("Дата");
    expect(statistic.rows).toEqual([
      ["2024-03-02T09:00:00", 2, 48, "", 1000, 2000, "", "", ""],
    ]);

    expect(service).toEqual({
      name: "Service",
      header: ["Message ID", "Command"],
      rows: [[3, "/list"]],
    });
  });

  it("should render a vacancy without any resolved field as empty cells", () => {
    harness = createTestDbSync();
    upsertSourceMessage({ message_id: 5, date: "2024-03-05T09:00:00", message_type: "vacancy", text: "x" });
    upsertVacancy(buildVacancyRecord(5, {}, {}, null));

    const [row] = buildExportSheets()[1].rows;

    expect(row[0]).toBe(5);
    expect(row.slice(1, 22).every((cell) => cell === "")).toBe(true);
    expect(row[22]).toBe("failed");

    const stored = getVacancy(5);
    expect(stored && mapVacancyToExportRow(stored)).toEqual(row);
  });
});
