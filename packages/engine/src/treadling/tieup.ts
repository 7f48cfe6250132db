import { isPositiveInteger } from '../config.js';
import { StructuralInputError } from '../errors.js';
import type { Shaft, TieUp, Treadle } from './model.js';

/**
 * Build an immutable tie-up. Duplicate treadles are rejected rather than
 * overwritten. Shafts are only checked for being positive integers; the
 * declared shaft count is enforced at render time.
 */
export function createTieUp(entries: Iterable<readonly [Treadle, Iterable<Shaft>]>): TieUp {
  const out = new Map<Treadle, readonly Shaft[]>();
  for (const [treadle, shafts] of entries) {
    if (!isPositiveInteger(treadle)) {
      throw new StructuralInputError(`Treadle must be a positive integer, got ${treadle}`, 'invalid-number', { column: 'treadle' });
    }
    if (out.has(treadle)) {
      throw new StructuralInputError(`Duplicate treadle ${treadle} in tie-up`, 'duplicate-treadle', { treadle });
    }
    const set = new Set<Shaft>();
    for (const s of shafts) {
      if (!isPositiveInteger(s)) {
        throw new StructuralInputError(`Treadle ${treadle} has invalid shaft ${s}; shafts must be positive integers`, 'invalid-shaft', { treadle });
      }
      set.add(s);
    }
    out.set(treadle, Object.freeze([...set].sort((a, b) => a - b)));
  }
  return out;
}

/** Shafts tied to a treadle; an unknown treadle raises nothing. */
export function shaftsForTreadle(tieUp: TieUp, treadle: Treadle): readonly Shaft[] {
  return tieUp.get(treadle) ?? [];
}

export default { createTieUp, shaftsForTreadle };
