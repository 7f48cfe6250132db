/**
 * Input model for a floor-loom treadling: tie-up, sections and the main
 * sequence that strings sections together.
 */

export type Treadle = number;
export type Shaft = number;

/** Treadles pressed together on one pick. Order is irrelevant; may be empty. */
export type LeafPick = readonly Treadle[];

export interface PickEntry {
  type: 'pick';
  treadles: LeafPick;
}

export interface RefEntry {
  type: 'ref';
  name: string;
  repeat: number;
}

export type SectionEntry = PickEntry | RefEntry;

export type SectionMap = ReadonlyMap<string, readonly SectionEntry[]>;

export interface SequenceRef {
  name: string;
  repeat: number;
}

export type MainSequence = readonly SequenceRef[];

/** Treadle -> shafts it raises. Shafts are ascending and distinct. */
export type TieUp = ReadonlyMap<Treadle, readonly Shaft[]>;

export interface SectionedTreadling {
  format: 'sectioned';
  sections: SectionMap;
  mainSequence: MainSequence;
}

export interface FlatTreadling {
  format: 'flat';
  picks: readonly LeafPick[];
}

export type Treadling = SectionedTreadling | FlatTreadling;

export function pick(treadles: LeafPick): PickEntry {
  return { type: 'pick', treadles };
}

export function ref(name: string, repeat = 1): RefEntry {
  return { type: 'ref', name, repeat };
}
