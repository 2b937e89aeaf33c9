/**
 * Export file writer
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import type { ExportSheet } from "@/types";
import { buildExportSheets } from "./exportProjection";
import * as logger from "@/logger";

/**
 * Write sheets as JSON (path relative to cwd)
 *
 * @returns Absolute path written
 */
export function writeExportFile(
  path: string,
  sheets: ExportSheet[] = buildExportSheets(),
): string {
  const fullPath = resolve(process.cwd(), path);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, JSON.stringify({ sheets }, null, 2) + "\n", "utf-8");

  logger.info("Export written", {
    path: fullPath,
    sheets: sheets.map((sheet) => `${sheet.name}:${sheet.rows.length}`),
  });

  return fullPath;
}
