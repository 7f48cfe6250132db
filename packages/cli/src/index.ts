// Re-export the engine entrypoints alongside the program factory so scripts
// can drive the CLI or the engine from a single package.
export { createProgram, inferFormat, type OutputFormat } from './cli.js';
export { buildLiftPlan, readTieUpFile, readTreadlingFile, exportCSV, exportJSON, exportPDF, renderText } from '@liftplan/engine';
