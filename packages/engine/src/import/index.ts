/**
 * Input readers for tie-up and treadling tables.
 */

export {
  parseCsv,
  requireColumns,
  type CsvRow,
  type CsvTable,
} from './csv.js';

export {
  parseTieUpCsv,
  parseTieUpJson,
  readTieUpFile,
} from './tieupReader.js';

export {
  parseTreadlingCsv,
  readTreadlingFile,
} from './treadlingReader.js';
