/*
 * CSV export: one row per plan entry with columns pick, shafts, section, label.
 * Annotation rows leave `pick` and `shafts` blank.
 */
import { writeFileSync } from 'fs';
import * as Papa from 'papaparse';
import type { LiftPlan } from '../plan/planModel.js';
import { createLogger } from '../util/logger.js';
import { validateLiftPlan, withExtension, type ExportOptions } from './jsonExport.js';

const log = createLogger('export');

export const CSV_COLUMNS = ['pick', 'shafts', 'section', 'label'] as const;

export function liftPlanToCsv(plan: LiftPlan): string {
	const rows = plan.entries.map(entry =>
		entry.kind === 'pick'
			? [String(entry.pickNumber), entry.shafts.join(' '), entry.sectionLabel ?? '', '']
			: ['', '', entry.section, entry.label],
	);
	return Papa.unparse({ fields: [...CSV_COLUMNS], data: rows }, { newline: '\n' });
}

export async function exportCSV(plan: LiftPlan, outPath: string, opts: ExportOptions = {}): Promise<string> {
	const target = withExtension(outPath, '.csv');
	validateLiftPlan(plan);
	writeFileSync(target, liftPlanToCsv(plan) + '\n', 'utf8');
	if (opts.verbose) log.info(`Wrote CSV lift plan: ${target}`);
	if (opts.debug) log.debug('CSV rows written:', plan.entries.length);
	return target;
}

export default exportCSV;
