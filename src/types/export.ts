/**
 * Export projection type definitions
 */

export type ExportCell = string | number;

export type ExportRow = ExportCell[];

export interface ExportColumn<Id extends string = string> {
  id: Id;
  header: string;
}

export interface ExportSheet {
  name: string;
  header: string[];
  rows: ExportRow[];
}
