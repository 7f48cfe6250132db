/**
 * Defaults shared by the engine and the CLI.
 */

export type RowOrder = 'bottom-up' | 'top-down';

export const DEFAULT_SHAFT_COUNT = 8;

/** Circuit breaker against runaway or circular section definitions. */
export const MAX_NESTING_DEPTH = 20;

/** Pick 1 sits at the bottom of the printed plan, read upwards like a draft. */
export const DEFAULT_ORDER: RowOrder = 'bottom-up';

export const DEFAULT_OUTPUT = 'lift_plan_annotated.pdf';

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}
