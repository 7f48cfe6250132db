import type { LiftPlan } from '../plan/planModel.js';
import { layoutLiftPlan, type LayoutOptions } from './layout.js';

export const RAISED = '■';
export const LOWERED = '.';

/**
 * Plain-text grid for terminals. Each pick row reads
 * `<pick> | <cells> |`; dividers read `-- <label> --`.
 */
export function renderText(plan: LiftPlan, options: LayoutOptions = {}): string {
  const layout = layoutLiftPlan(plan, options);
  const lastPick = plan.entries.reduce((n, e) => (e.kind === 'pick' ? e.pickNumber : n), 0);
  const width = String(lastPick).length;
  const header = `${' '.repeat(width)} | ${Array.from({ length: layout.shaftCount }, (_, i) => String((i + 1) % 10)).join(' ')} |`;

  const lines = layout.rows.map(row => {
    if (row.type === 'divider') return `-- ${row.label} --`;
    const cells = row.cells.map(on => (on ? RAISED : LOWERED)).join(' ');
    return `${String(row.pickNumber).padStart(width)} | ${cells} |`;
  });

  return [header, ...lines].join('\n');
}

export default renderText;
