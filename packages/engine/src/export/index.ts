/**
 * Lift plan exporters.
 */

export { exportJSON, validateLiftPlan, withExtension, type ExportOptions } from './jsonExport.js';
export { exportCSV, liftPlanToCsv, CSV_COLUMNS } from './csvExport.js';
export { exportPDF, type PdfExportOptions } from './pdfExport.js';
