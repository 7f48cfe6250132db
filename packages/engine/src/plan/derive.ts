import { isPositiveInteger } from '../config.js';
import { StructuralInputError } from '../errors.js';
import { expandFlatTreadling, expandSequence } from '../sequences/expand.js';
import { shaftsForTreadle } from '../treadling/tieup.js';
import type { Shaft, TieUp, Treadle, Treadling } from '../treadling/model.js';
import type { ExpandedPick, LiftPlan, LiftPlanEntry } from './planModel.js';

/**
 * Derive the lift plan from an expanded pick sequence.
 *
 * Pure and order-preserving. Pick numbers are dense over leaf picks;
 * annotations pass through without a number. A treadle missing from the
 * tie-up contributes no shafts. Shafts above `shaftCount` are kept so the
 * renderer can report them.
 */
export function deriveLiftPlan(sequence: readonly ExpandedPick[], tieUp: TieUp, shaftCount: number): LiftPlanEntry[] {
  if (!isPositiveInteger(shaftCount)) {
    throw new StructuralInputError(`Shaft count must be a positive integer, got ${shaftCount}`, 'invalid-shaft-count');
  }

  const out: LiftPlanEntry[] = [];
  let pickNumber = 0;
  for (const entry of sequence) {
    switch (entry.kind) {
      case 'annotation':
        out.push({ kind: 'annotation', marker: entry.marker, section: entry.section, label: entry.label });
        break;
      case 'pick': {
        const shafts = new Set<Shaft>();
        for (const t of entry.treadles) {
          for (const s of shaftsForTreadle(tieUp, t)) shafts.add(s);
        }
        pickNumber++;
        out.push({
          kind: 'pick',
          pickNumber,
          shafts: [...shafts].sort((a, b) => a - b),
          sectionLabel: entry.section,
        });
        break;
      }
    }
  }
  return out;
}

/** Distinct treadles pressed somewhere in the sequence but absent from the tie-up, ascending. */
export function findUnknownTreadles(sequence: readonly ExpandedPick[], tieUp: TieUp): Treadle[] {
  const unknown = new Set<Treadle>();
  for (const entry of sequence) {
    if (entry.kind !== 'pick') continue;
    for (const t of entry.treadles) {
      if (!tieUp.has(t)) unknown.add(t);
    }
  }
  return [...unknown].sort((a, b) => a - b);
}

export function expandTreadling(treadling: Treadling): ExpandedPick[] {
  return treadling.format === 'flat'
    ? expandFlatTreadling(treadling.picks)
    : expandSequence(treadling.mainSequence, treadling.sections);
}

/** Expand and derive in one step. */
export function buildLiftPlan(treadling: Treadling, tieUp: TieUp, shaftCount: number): LiftPlan {
  const entries = deriveLiftPlan(expandTreadling(treadling), tieUp, shaftCount);
  return { shaftCount, entries };
}

export default { deriveLiftPlan, findUnknownTreadles, expandTreadling, buildLiftPlan };
