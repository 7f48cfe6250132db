/**
 * Small CSV table helpers on top of papaparse. Cells come back trimmed;
 * row numbers count the header as row 1.
 */
import * as Papa from 'papaparse';
import { StructuralInputError, type ErrorDetail } from '../errors.js';

export type CsvRow = Record<string, string | undefined>;

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
  file?: string;
}

export function parseCsv(text: string, file?: string): CsvTable {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (h: string) => h.trim(),
  });
  // Short or long rows are tolerated (missing cells read as blank); broken quoting is not.
  const fatal = parsed.errors.find(e => e.type === 'Quotes');
  if (fatal) {
    const row = typeof fatal.row === 'number' ? fatal.row + 2 : undefined;
    throw new StructuralInputError(`Malformed CSV: ${fatal.message}`, 'malformed-csv', { file, row });
  }
  return { columns: parsed.meta.fields ?? [], rows: parsed.data, file };
}

export function hasColumn(table: CsvTable, column: string): boolean {
  return table.columns.includes(column);
}

export function requireColumns(table: CsvTable, columns: readonly string[], what: string): void {
  for (const column of columns) {
    if (!hasColumn(table, column)) {
      throw new StructuralInputError(`${what} CSV must have a '${column}' column`, 'missing-column', { file: table.file, column });
    }
  }
}

export function cell(row: CsvRow, column: string): string {
  return (row[column] ?? '').trim();
}

export function rowNumber(index: number): number {
  return index + 2;
}

export function parsePositiveInteger(value: string, detail: ErrorDetail): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    const where = detail.column ? ` in column '${detail.column}'` : '';
    const row = typeof detail.row === 'number' ? ` at row ${detail.row}` : '';
    throw new StructuralInputError(`Expected a positive integer${where}${row}, got '${value}'`, 'invalid-number', detail);
  }
  return Number(value);
}

/** Whitespace-separated list of positive integers; a blank cell is an empty list. */
export function parseIntegerList(value: string, detail: ErrorDetail): number[] {
  return value.split(/\s+/).filter(Boolean).map(v => parsePositiveInteger(v, detail));
}

export default { parseCsv, hasColumn, requireColumns, cell, rowNumber, parsePositiveInteger, parseIntegerList };
