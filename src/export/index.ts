/**
 * Export module barrel exports
 */

export {
  projectRow,
  mapSourceToExportRow,
  mapVacancyToExportRow,
  mapStatisticToExportRow,
  mapServiceToExportRow,
  buildExportSheets,
} from "./exportProjection";

export { writeExportFile } from "./writeExport";
