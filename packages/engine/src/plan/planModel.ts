/**
 * Expanded pick sequence and derived lift plan types.
 */
import type { LeafPick, Shaft } from '../treadling/model.js';

export type AnnotationMarker = 'begin' | 'end';

export interface ExpandedLeaf {
  kind: 'pick';
  treadles: LeafPick;
  section: string | null; // innermost enclosing section, null for flat treadling
}

export interface ExpandedAnnotation {
  kind: 'annotation';
  marker: AnnotationMarker;
  section: string;
  repeat: number; // 1-based iteration index
  label: string;
}

export type ExpandedPick = ExpandedLeaf | ExpandedAnnotation;

export interface LiftPick {
  kind: 'pick';
  pickNumber: number;
  shafts: readonly Shaft[];
  sectionLabel: string | null;
}

/** Structural divider carried through from expansion; not a weaving row. */
export interface LiftAnnotation {
  kind: 'annotation';
  marker: AnnotationMarker;
  section: string;
  label: string;
}

export type LiftPlanEntry = LiftPick | LiftAnnotation;

export interface LiftPlan {
  shaftCount: number;
  entries: readonly LiftPlanEntry[];
}

export function isLiftPick(entry: LiftPlanEntry): entry is LiftPick {
  return entry.kind === 'pick';
}
