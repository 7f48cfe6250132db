/*
 * JSON export for a derived lift plan.
 */
import { writeFileSync } from 'fs';
import { isPositiveInteger } from '../config.js';
import type { LiftPlan } from '../plan/planModel.js';
import { error } from '../util/diag.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('export');

export interface ExportOptions {
	debug?: boolean;
	verbose?: boolean;
}

/**
 * Check the lift plan contract before it leaves the engine: dense pick
 * numbers and ascending, distinct shafts.
 * Throws an Error listing every problem found.
 */
export function validateLiftPlan(plan: LiftPlan): void {
	const errors: string[] = [];
	if (!isPositiveInteger(plan.shaftCount)) errors.push(`shaftCount must be a positive integer, got ${plan.shaftCount}`);

	let expected = 1;
	for (const entry of plan.entries) {
		if (entry.kind === 'annotation') {
			if (!entry.label) errors.push(`annotation for section '${entry.section}' has no label`);
			continue;
		}
		if (entry.pickNumber !== expected) errors.push(`pick ${expected} is numbered ${entry.pickNumber}`);
		for (let i = 0; i < entry.shafts.length; i++) {
			const s = entry.shafts[i];
			if (!isPositiveInteger(s)) errors.push(`pick ${entry.pickNumber} has invalid shaft ${s}`);
			else if (i > 0 && s <= entry.shafts[i - 1]) errors.push(`pick ${entry.pickNumber} shafts are not ascending and distinct`);
		}
		expected++;
	}

	if (errors.length > 0) throw new Error('Lift plan validation failed:\n' + errors.map(e => ` - ${e}`).join('\n'));
}

export function withExtension(outPath: string, ext: string): string {
	return outPath.toLowerCase().endsWith(ext) ? outPath : `${outPath}${ext}`;
}

/** Write the plan as pretty-printed JSON. Resolves to the path actually written. */
export async function exportJSON(plan: LiftPlan, outPath: string, opts: ExportOptions = {}): Promise<string> {
	const target = withExtension(outPath, '.json');
	try {
		validateLiftPlan(plan);
	} catch (err) {
		error('export', 'Validation error: ' + (err instanceof Error ? err.message : String(err)));
		throw err;
	}

	const picks = plan.entries.filter(e => e.kind === 'pick').length;
	const outObj = {
		version: 1,
		shaftCount: plan.shaftCount,
		picks,
		entries: plan.entries,
	};

	if (opts.verbose) log.info(`Exporting ${picks} picks to JSON: ${target}`);
	writeFileSync(target, JSON.stringify(outObj, null, 2), 'utf8');
	if (opts.debug) log.debug('Wrote JSON to', target);
	return target;
}

export default exportJSON;
