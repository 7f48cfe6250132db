/**
 * Tie-up readers. CSV tables carry `treadle` and `shafts` columns, shafts
 * separated by whitespace; JSON files map treadle numbers to shaft arrays.
 */
import { readFileSync } from 'fs';
import { extname } from 'path';
import { StructuralInputError } from '../errors.js';
import type { Shaft, TieUp, Treadle } from '../treadling/model.js';
import { createTieUp } from '../treadling/tieup.js';
import { createLogger } from '../util/logger.js';
import { cell, parseCsv, parseIntegerList, parsePositiveInteger, requireColumns, rowNumber } from './csv.js';

const log = createLogger('import');

export function parseTieUpCsv(text: string, file?: string): TieUp {
  const table = parseCsv(text, file);
  requireColumns(table, ['treadle', 'shafts'], 'Tie-up');

  const seen = new Map<Treadle, number>();
  const entries: [Treadle, Shaft[]][] = [];
  table.rows.forEach((row, i) => {
    const rowNo = rowNumber(i);
    const treadle = parsePositiveInteger(cell(row, 'treadle'), { file, row: rowNo, column: 'treadle' });
    const firstRow = seen.get(treadle);
    if (firstRow !== undefined) {
      throw new StructuralInputError(
        `Duplicate treadle ${treadle} in tie-up at row ${rowNo} (first defined at row ${firstRow})`,
        'duplicate-treadle',
        { file, row: rowNo, treadle },
      );
    }
    seen.set(treadle, rowNo);
    entries.push([treadle, parseIntegerList(cell(row, 'shafts'), { file, row: rowNo, column: 'shafts', treadle })]);
  });

  log.debug(`Tie-up loaded: ${entries.length} treadles`);
  return createTieUp(entries);
}

export function parseTieUpJson(text: string, file?: string): TieUp {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StructuralInputError(`Tie-up JSON could not be parsed: ${msg}`, 'invalid-tieup', { file });
  }
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new StructuralInputError('Tie-up JSON must be an object mapping treadle numbers to shaft arrays', 'invalid-tieup', { file });
  }

  // JSON.parse already collapses repeated keys, so duplicates cannot be detected here.
  const entries: [Treadle, Shaft[]][] = [];
  for (const [key, value] of Object.entries(data)) {
    const treadle = parsePositiveInteger(key.trim(), { file, column: 'treadle' });
    if (!Array.isArray(value)) {
      throw new StructuralInputError(`Tie-up entry for treadle ${treadle} must be an array of shafts`, 'invalid-tieup', { file, treadle });
    }
    const shafts = value.map((s: unknown) => {
      if (typeof s !== 'number' || !Number.isInteger(s) || s < 1) {
        throw new StructuralInputError(`Treadle ${treadle} has invalid shaft ${JSON.stringify(s)}; shafts must be positive integers`, 'invalid-shaft', { file, treadle });
      }
      return s;
    });
    entries.push([treadle, shafts]);
  }

  log.debug(`Tie-up loaded: ${entries.length} treadles`);
  return createTieUp(entries);
}

/** Read a tie-up from disk. `.json` files are read as JSON, everything else as CSV. */
export function readTieUpFile(path: string): TieUp {
  const text = readFileSync(path, 'utf8');
  return extname(path).toLowerCase() === '.json' ? parseTieUpJson(text, path) : parseTieUpCsv(text, path);
}

export default { parseTieUpCsv, parseTieUpJson, readTieUpFile };
