/**
 * Treadling CSV reader.
 *
 * Two layouts are accepted, told apart by the presence of a `type` column:
 *
 * - sectioned: `type,name,treadles,ref_name,repeat`. `section` rows add a
 *   leaf pick (when `treadles` is filled) or a reference to `ref_name`
 *   repeated `repeat` times; `main` rows append `name` x `repeat` to the main
 *   sequence. A section row with neither only declares the section.
 * - flat: a single `treadles` column, one pick per row.
 */
import { readFileSync } from 'fs';
import { StructuralInputError } from '../errors.js';
import type { FlatTreadling, LeafPick, SectionEntry, SectionedTreadling, SequenceRef, Treadling } from '../treadling/model.js';
import { createLogger } from '../util/logger.js';
import { cell, hasColumn, parseCsv, parseIntegerList, requireColumns, rowNumber, type CsvRow, type CsvTable } from './csv.js';

const log = createLogger('import');

function parseRepeat(row: CsvRow, rowNo: number, file: string | undefined, section: string): number {
  const raw = cell(row, 'repeat');
  if (raw === '') return 1;
  // Spreadsheets commonly export whole numbers as "2.0".
  const normalized = /^\d+\.0+$/.test(raw) ? raw.replace(/\.0+$/, '') : raw;
  if (!/^-?\d+$/.test(normalized) || Number(normalized) < 1) {
    throw new StructuralInputError(
      `Invalid repeat count '${raw}' at row ${rowNo}; must be an integer >= 1`,
      'invalid-repeat',
      { file, row: rowNo, column: 'repeat', section },
    );
  }
  return Number(normalized);
}

function readSectioned(table: CsvTable): SectionedTreadling {
  requireColumns(table, ['type', 'name', 'treadles', 'repeat'], 'Sectioned treadling');
  const file = table.file;
  const hasRefColumn = hasColumn(table, 'ref_name');
  const sections = new Map<string, SectionEntry[]>();
  const mainSequence: SequenceRef[] = [];

  table.rows.forEach((row, i) => {
    const rowNo = rowNumber(i);
    const rowType = cell(row, 'type').toLowerCase();
    const name = cell(row, 'name');

    if (rowType === 'section') {
      if (!name) {
        throw new StructuralInputError(`Section row ${rowNo} is missing a name`, 'missing-name', { file, row: rowNo, column: 'name' });
      }
      let entries = sections.get(name);
      if (!entries) {
        entries = [];
        sections.set(name, entries);
      }
      const treadles = cell(row, 'treadles');
      const refName = hasRefColumn ? cell(row, 'ref_name') : '';
      if (treadles) {
        entries.push({ type: 'pick', treadles: parseIntegerList(treadles, { file, row: rowNo, column: 'treadles', section: name }) });
      } else if (refName) {
        entries.push({ type: 'ref', name: refName, repeat: parseRepeat(row, rowNo, file, refName) });
      }
    } else if (rowType === 'main') {
      if (!name) {
        throw new StructuralInputError(`Main sequence row ${rowNo} is missing a section name`, 'missing-name', { file, row: rowNo, column: 'name' });
      }
      mainSequence.push({ name, repeat: parseRepeat(row, rowNo, file, name) });
    } else {
      throw new StructuralInputError(
        `Unknown row type '${cell(row, 'type')}' at row ${rowNo}; expected 'section' or 'main'`,
        'unknown-row-type',
        { file, row: rowNo, column: 'type' },
      );
    }
  });

  log.debug(`Sectioned treadling loaded: ${sections.size} sections, ${mainSequence.length} main entries`);
  return { format: 'sectioned', sections, mainSequence };
}

function readFlat(table: CsvTable): FlatTreadling {
  requireColumns(table, ['treadles'], 'Treadling');
  const picks: LeafPick[] = table.rows.map((row, i) =>
    parseIntegerList(cell(row, 'treadles'), { file: table.file, row: rowNumber(i), column: 'treadles' }),
  );
  log.debug(`Flat treadling loaded: ${picks.length} picks`);
  return { format: 'flat', picks };
}

export function parseTreadlingCsv(text: string, file?: string): Treadling {
  const table = parseCsv(text, file);
  return hasColumn(table, 'type') ? readSectioned(table) : readFlat(table);
}

export function readTreadlingFile(path: string): Treadling {
  return parseTreadlingCsv(readFileSync(path, 'utf8'), path);
}

export default { parseTreadlingCsv, readTreadlingFile };
