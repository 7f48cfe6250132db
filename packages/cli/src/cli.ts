#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { extname } from 'path';
import {
  buildLiftPlan,
  DEFAULT_OUTPUT,
  DEFAULT_SHAFT_COUNT,
  errorTag,
  expandTreadling,
  exportCSV,
  exportJSON,
  exportPDF,
  findUnknownTreadles,
  isPositiveInteger,
  layoutLiftPlan,
  readTieUpFile,
  readTreadlingFile,
  renderText,
  type LayoutOptions,
  type LiftPlan,
  type RowOrder,
  type TieUp,
  type Treadling,
} from '@liftplan/engine';
import { configureLogging, createLogger, loadLoggingFromEnv } from '@liftplan/engine/util/logger';

const log = createLogger('cli');

export type OutputFormat = 'csv' | 'json' | 'pdf';

type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
};

type PlanOptions = {
  shafts: number;
  order?: RowOrder;
  strict?: boolean;
};

type GenerateOptions = PlanOptions & {
  output: string;
  format?: OutputFormat;
};

function parseShaftCount(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !isPositiveInteger(n)) {
    throw new InvalidArgumentError('Shaft count must be a positive integer.');
  }
  return n;
}

function parseOrder(value: string): RowOrder {
  if (value === 'bottom-up' || value === 'top-down') return value;
  throw new InvalidArgumentError("Order must be 'bottom-up' or 'top-down'.");
}

function parseFormat(value: string): OutputFormat {
  const v = value.toLowerCase();
  if (v === 'csv' || v === 'json' || v === 'pdf') return v;
  throw new InvalidArgumentError('Format must be one of: csv, json, pdf.');
}

/** Format from the output extension, pdf when it says nothing. */
export function inferFormat(outPath: string): OutputFormat {
  const ext = extname(outPath).toLowerCase().slice(1);
  return ext === 'csv' || ext === 'json' ? ext : 'pdf';
}

function loadInputs(treadlingPath: string, tieUpPath: string): { treadling: Treadling; tieUp: TieUp } {
  const treadling = readTreadlingFile(treadlingPath);
  const tieUp = readTieUpFile(tieUpPath);
  return { treadling, tieUp };
}

function warnUnknownTreadles(treadling: Treadling, tieUp: TieUp): void {
  const unknown = findUnknownTreadles(expandTreadling(treadling), tieUp);
  if (unknown.length > 0) {
    console.warn(`Warning: treadles not in the tie-up raise no shafts: ${unknown.join(', ')}`);
  }
}

/**
 * Lay the plan out once so strict mode applies to every output format, and
 * report shafts beyond the loom's count whatever the log level.
 */
function checkShaftRange(plan: LiftPlan, options: LayoutOptions): void {
  const { outOfRange } = layoutLiftPlan(plan, options);
  if (outOfRange.length > 0) {
    const picks = outOfRange.map(o => `pick ${o.pickNumber} shaft ${o.shaft}`).join(', ');
    console.warn(`Warning: shafts beyond the ${plan.shaftCount} configured shafts: ${picks}`);
  }
}

function reportFailure(err: unknown, globalOpts: GlobalOptions): void {
  if (err instanceof Error) {
    console.error(`Error [${errorTag(err)}]: ${err.message}`);
    if (globalOpts.debug && err.stack) console.error(err.stack);
  } else {
    console.error('Error:', String(err));
  }
  process.exitCode = 2;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('liftplan')
    .description('Convert a floor-loom tie-up and treadling into a table-loom lift plan')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)');

  program.hook('preAction', () => {
    loadLoggingFromEnv();
    const globalOpts = program.opts<GlobalOptions>();
    if (globalOpts.debug) configureLogging({ level: 'debug' });
    else if (globalOpts.verbose) configureLogging({ level: 'info' });
  });

  const buildPlan = (treadlingPath: string, tieUpPath: string, shafts: number): LiftPlan => {
    const { treadling, tieUp } = loadInputs(treadlingPath, tieUpPath);
    if (program.opts<GlobalOptions>().verbose) warnUnknownTreadles(treadling, tieUp);
    const plan = buildLiftPlan(treadling, tieUp, shafts);
    log.debug(`Derived ${plan.entries.length} plan entries`);
    return plan;
  };

  program
    .command('generate')
    .description('Generate a lift plan file (PDF, CSV or JSON)')
    .argument('<treadling>', 'Path to the treadling CSV (sectioned or flat)')
    .argument('<tieup>', 'Path to the tie-up CSV or JSON')
    .option('--shafts <n>', 'Number of shafts on the loom', parseShaftCount, DEFAULT_SHAFT_COUNT)
    .option('-o, --output <path>', 'Output file path', DEFAULT_OUTPUT)
    .option('-f, --format <format>', 'Output format: csv | json | pdf (default: from output extension)', parseFormat)
    .option('--order <order>', 'PDF row order: bottom-up (pick 1 at the bottom) or top-down', parseOrder)
    .option('--strict', 'Fail when a pick raises a shaft beyond --shafts')
    .action(async (treadlingPath: string, tieUpPath: string, options: GenerateOptions, command: Command) => {
      const globalOpts = program.opts<GlobalOptions>();
      const format = options.format ?? inferFormat(options.output);
      if (options.order && format !== 'pdf') {
        command.error(`error: --order applies to PDF output only, not ${format}`, { exitCode: 2, code: 'liftplan.orderNotPdf' });
      }
      try {
        const plan = buildPlan(treadlingPath, tieUpPath, options.shafts);
        checkShaftRange(plan, { order: options.order, strict: options.strict });
        const exportOpts = { verbose: globalOpts.verbose === true, debug: globalOpts.debug === true };
        let written: string;
        if (format === 'csv') written = await exportCSV(plan, options.output, exportOpts);
        else if (format === 'json') written = await exportJSON(plan, options.output, exportOpts);
        else written = await exportPDF(plan, options.output, { ...exportOpts, order: options.order, strict: options.strict });
        console.log(`[OK] Lift plan written to ${written}`);
      } catch (err) {
        reportFailure(err, globalOpts);
      }
    });

  program
    .command('verify')
    .description('Load, expand and derive a lift plan; exit 0 if valid, non-zero if invalid')
    .argument('<treadling>', 'Path to the treadling CSV (sectioned or flat)')
    .argument('<tieup>', 'Path to the tie-up CSV or JSON')
    .option('--shafts <n>', 'Number of shafts on the loom', parseShaftCount, DEFAULT_SHAFT_COUNT)
    .action((treadlingPath: string, tieUpPath: string, options: PlanOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      try {
        const plan = buildPlan(treadlingPath, tieUpPath, options.shafts);
        const picks = plan.entries.filter(e => e.kind === 'pick').length;
        console.log(`OK: ${picks} picks`);
        process.exitCode = 0;
      } catch (err) {
        reportFailure(err, globalOpts);
      }
    });

  program
    .command('show')
    .description('Print the lift plan as a text grid')
    .argument('<treadling>', 'Path to the treadling CSV (sectioned or flat)')
    .argument('<tieup>', 'Path to the tie-up CSV or JSON')
    .option('--shafts <n>', 'Number of shafts on the loom', parseShaftCount, DEFAULT_SHAFT_COUNT)
    .option('--order <order>', 'Row order: bottom-up (pick 1 at the bottom) or top-down', parseOrder)
    .option('--strict', 'Fail when a pick raises a shaft beyond --shafts')
    .action((treadlingPath: string, tieUpPath: string, options: PlanOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      try {
        const plan = buildPlan(treadlingPath, tieUpPath, options.shafts);
        checkShaftRange(plan, { order: options.order, strict: options.strict });
        console.log(renderText(plan, { order: options.order, strict: options.strict }));
      } catch (err) {
        reportFailure(err, globalOpts);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}

export default createProgram;
