/**
 * Lay out a lift plan as grid rows for the exporters.
 *
 * - one pick row per lift pick, one cell per shaft 1..shaftCount
 * - one full-width divider row per annotation
 * - heavy rules at the first and last pick of every contiguous section run
 *
 * Shafts beyond the declared shaft count cannot be drawn. They are listed in
 * `outOfRange` and reported, or rejected in strict mode.
 */
import { DEFAULT_ORDER, type RowOrder } from '../config.js';
import { StructuralInputError } from '../errors.js';
import { isLiftPick, type LiftPick, type LiftPlan } from '../plan/planModel.js';
import { warn } from '../util/diag.js';

export interface PickRow {
  type: 'pick';
  pickNumber: number;
  cells: boolean[]; // cells[i] -> shaft i + 1
  sectionLabel: string | null;
  heavyStart: boolean; // first pick of a section run
  heavyEnd: boolean; // last pick of a section run
}

export interface DividerRow {
  type: 'divider';
  label: string;
}

export type GridRow = PickRow | DividerRow;

export interface OutOfRangeShaft {
  pickNumber: number;
  shaft: number;
}

export interface GridLayout {
  shaftCount: number;
  order: RowOrder;
  rows: GridRow[]; // in drawing order, top row first
  outOfRange: OutOfRangeShaft[];
}

export interface LayoutOptions {
  order?: RowOrder;
  strict?: boolean;
}

function runBoundaries(picks: readonly LiftPick[]): Map<number, { start: boolean; end: boolean }> {
  const out = new Map<number, { start: boolean; end: boolean }>();
  picks.forEach((p, i) => {
    const prev = picks[i - 1];
    const next = picks[i + 1];
    out.set(p.pickNumber, {
      start: !prev || prev.sectionLabel !== p.sectionLabel,
      end: !next || next.sectionLabel !== p.sectionLabel,
    });
  });
  return out;
}

export function layoutLiftPlan(plan: LiftPlan, options: LayoutOptions = {}): GridLayout {
  const order = options.order ?? DEFAULT_ORDER;
  const { shaftCount } = plan;
  const picks = plan.entries.filter(isLiftPick);
  const bounds = runBoundaries(picks);
  const outOfRange: OutOfRangeShaft[] = [];

  const rows: GridRow[] = plan.entries.map((entry): GridRow => {
    if (entry.kind === 'annotation') return { type: 'divider', label: entry.label };
    const cells = new Array<boolean>(shaftCount).fill(false);
    for (const s of entry.shafts) {
      if (s > shaftCount) outOfRange.push({ pickNumber: entry.pickNumber, shaft: s });
      else cells[s - 1] = true;
    }
    const b = bounds.get(entry.pickNumber);
    return {
      type: 'pick',
      pickNumber: entry.pickNumber,
      cells,
      sectionLabel: entry.sectionLabel,
      heavyStart: b?.start ?? false,
      heavyEnd: b?.end ?? false,
    };
  });

  if (outOfRange.length > 0) {
    const first = outOfRange[0];
    if (options.strict) {
      throw new StructuralInputError(
        `Pick ${first.pickNumber} raises shaft ${first.shaft} but the loom has ${shaftCount} shafts`,
        'shaft-out-of-range',
        { shaft: first.shaft },
      );
    }
    for (const o of outOfRange) {
      warn('render', `Pick ${o.pickNumber} raises shaft ${o.shaft} beyond the ${shaftCount} configured shafts; it is not drawn`, { shaft: o.shaft });
    }
  }

  // Pick 1 drawn last puts it at the bottom edge.
  if (order === 'bottom-up') rows.reverse();
  return { shaftCount, order, rows, outOfRange };
}

export default layoutLiftPlan;
