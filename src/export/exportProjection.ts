/**
 * Tabular export projection
 *
 * Maps stored records to sheet rows. Column order and headers come
 * from the column definitions; absent values become empty cells.
 */

import type {
  ExportCell,
  ExportColumn,
  ExportRow,
  ExportSheet,
  ServiceRecord,
  SourceRecord,
  StatisticRecord,
  VacancyRecord,
} from "@/types";
import {
  EMPTY_CELL,
  MESSAGES_SHEET_NAME,
  MESSAGE_COLUMNS,
  SERVICE_COLUMNS,
  SERVICE_SHEET_NAME,
  STATISTIC_COLUMNS,
  STATISTIC_SHEET_NAME,
  VACANCIES_SHEET_NAME,
  VACANCY_COLUMNS,
} from "@/constants/export";
import {
  listServiceMessages,
  listSourceMessages,
  listStatisticsWithDate,
  listVacancies,
} from "@/db";

/**
 * Project a record onto columns, in column order
 */
export function projectRow<Id extends string>(
  record: { [K in Id]: ExportCell | null },
  columns: readonly ExportColumn<Id>[],
): ExportRow {
  return columns.map((column) => record[column.id] ?? EMPTY_CELL);
}

function headerOf(columns: readonly ExportColumn[]): string[] {
  return columns.map((column) => column.header);
}

export function mapSourceToExportRow(record: SourceRecord): ExportRow {
  return projectRow(record, MESSAGE_COLUMNS);
}

export function mapVacancyToExportRow(record: VacancyRecord): ExportRow {
  return projectRow(record, VACANCY_COLUMNS);
}

export function mapStatisticToExportRow(
  record: StatisticRecord & { date: string },
): ExportRow {
  return projectRow(record, STATISTIC_COLUMNS);
}

export function mapServiceToExportRow(record: ServiceRecord): ExportRow {
  return projectRow(record, SERVICE_COLUMNS);
}

/**
 * Build every sheet from the current database contents
 */
export function buildExportSheets(): ExportSheet[] {
  return [
    {
      name: MESSAGES_SHEET_NAME,
      header: headerOf(MESSAGE_COLUMNS),
      rows: listSourceMessages().map(mapSourceToExportRow),
    },
    {
      name: VACANCIES_SHEET_NAME,
      header: headerOf(VACANCY_COLUMNS),
      rows: listVacancies().map(mapVacancyToExportRow),
    },
    {
      name: STATISTIC_SHEET_NAME,
      header: headerOf(STATISTIC_COLUMNS),
      rows: listStatisticsWithDate().map(mapStatisticToExportRow),
    },
    {
      name: SERVICE_SHEET_NAME,
      header: headerOf(SERVICE_COLUMNS),
      rows: listServiceMessages().map(mapServiceToExportRow),
    },
  ];
}
