/**
 * PDF export of a lift plan grid.
 *
 * Page: US Letter, 50pt margins. One column per shaft plus a pick-number
 * gutter; divider rows span the grid, shaded and labelled. Rows that do not
 * fit continue on a new page with the shaft header repeated.
 */
import { createWriteStream } from 'fs';
import PDFDocument from 'pdfkit';
import type { LiftPlan } from '../plan/planModel.js';
import { layoutLiftPlan, type GridRow, type LayoutOptions } from '../render/layout.js';
import { createLogger } from '../util/logger.js';
import { validateLiftPlan, withExtension, type ExportOptions } from './jsonExport.js';

const log = createLogger('export');

const MARGIN = 50;
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const CELL_WIDTH = 25;
const ROW_HEIGHT = 18;
const GUTTER = 30;
const THIN = 0.25;
const HEAVY = 1.5;

export interface PdfExportOptions extends ExportOptions, LayoutOptions {
  title?: string;
}

function drawHeader(doc: PDFKit.PDFDocument, shaftCount: number, y: number): void {
  doc.font('Helvetica-Bold').fontSize(7).fillColor('#000000');
  for (let s = 0; s < shaftCount; s++) {
    doc.text(String(s + 1), MARGIN + GUTTER + s * CELL_WIDTH, y + 6, { width: CELL_WIDTH, align: 'center' });
  }
}

function drawRow(doc: PDFKit.PDFDocument, row: GridRow, shaftCount: number, y: number): void {
  const gridX = MARGIN + GUTTER;
  const gridWidth = shaftCount * CELL_WIDTH;

  if (row.type === 'divider') {
    doc.rect(gridX, y, gridWidth, ROW_HEIGHT).fillAndStroke('#D3D3D3', '#000000');
    doc.font('Helvetica').fontSize(7).fillColor('#000000')
      .text(row.label, gridX, y + 6, { width: gridWidth, align: 'center', lineBreak: false });
    return;
  }

  doc.font('Helvetica').fontSize(7).fillColor('#000000')
    .text(String(row.pickNumber), MARGIN, y + 6, { width: GUTTER - 4, align: 'right' });
  for (let s = 0; s < shaftCount; s++) {
    const x = gridX + s * CELL_WIDTH;
    doc.lineWidth(THIN).rect(x, y, CELL_WIDTH, ROW_HEIGHT).stroke('#000000');
    if (row.cells[s]) {
      doc.rect(x + 4, y + 3, CELL_WIDTH - 8, ROW_HEIGHT - 6).fill('#000000');
    }
  }

  // Heavy rules mark section run boundaries: the edge facing away from the run.
  const startEdgeY = row.heavyStart ? y + ROW_HEIGHT : null;
  const endEdgeY = row.heavyEnd ? y : null;
  for (const edge of [startEdgeY, endEdgeY]) {
    if (edge === null) continue;
    doc.lineWidth(HEAVY).moveTo(gridX, edge).lineTo(gridX + gridWidth, edge).stroke('#000000');
  }
}

/**
 * Render the plan to a PDF file. Resolves to the written path once the file
 * stream has finished.
 */
export async function exportPDF(plan: LiftPlan, outPath: string, opts: PdfExportOptions = {}): Promise<string> {
  const target = withExtension(outPath, '.pdf');
  validateLiftPlan(plan);
  const layout = layoutLiftPlan(plan, { order: opts.order, strict: opts.strict });

  // With top-down order the start edge of a run is its top; swap so the
  // heavy rule always lands on the outside of the run.
  const rows: GridRow[] = layout.order === 'top-down'
    ? layout.rows.map(r => (r.type === 'pick' ? { ...r, heavyStart: r.heavyEnd, heavyEnd: r.heavyStart } : r))
    : layout.rows;

  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: 'LETTER', margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN } });
    const stream = createWriteStream(target);
    stream.on('finish', () => {
      if (opts.verbose) log.info(`Wrote PDF lift plan: ${target}`);
      if (opts.debug) log.debug('PDF grid rows drawn:', rows.length);
      resolve(target);
    });
    stream.on('error', reject);
    doc.on('error', reject);
    doc.pipe(stream);

    doc.font('Helvetica-Bold').fontSize(12).text(opts.title ?? 'Lift plan', MARGIN, MARGIN);
    let y = MARGIN + 20;
    drawHeader(doc, layout.shaftCount, y);
    y += ROW_HEIGHT;

    for (const row of rows) {
      if (y + ROW_HEIGHT > PAGE_HEIGHT - MARGIN) {
        doc.addPage();
        y = MARGIN;
        drawHeader(doc, layout.shaftCount, y);
        y += ROW_HEIGHT;
      }
      drawRow(doc, row, layout.shaftCount, y);
      y += ROW_HEIGHT;
    }

    if (layout.shaftCount * CELL_WIDTH + GUTTER > PAGE_WIDTH - 2 * MARGIN) {
      log.warn(`${layout.shaftCount} shafts do not fit the page width; the grid is clipped`);
    }
    doc.end();
  });
}

export default exportPDF;
