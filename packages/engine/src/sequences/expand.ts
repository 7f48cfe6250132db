import { MAX_NESTING_DEPTH, isPositiveInteger } from '../config.js';
import { CircularReferenceError, NestingDepthError, StructuralInputError } from '../errors.js';
import type { ExpandedPick } from '../plan/planModel.js';
import type { LeafPick, MainSequence, SectionEntry, SectionMap } from '../treadling/model.js';

/**
 * Expand a main sequence of section references into the flat weaving order.
 *
 * Each iteration of a referenced section is wrapped in a begin/end annotation
 * pair; leaf picks are emitted in place. Sections are resolved lazily, so an
 * undefined name only fails when expansion reaches it.
 */

export function formatBeginLabel(name: string, repeat: number): string {
  return `Begin section ${name} (repeat ${repeat})`;
}

export function formatEndLabel(name: string): string {
  return `End section ${name}`;
}

export function getSection(sections: SectionMap, name: string, referencedFrom: string | null): readonly SectionEntry[] {
  const entries = sections.get(name);
  if (!entries) {
    const where = referencedFrom === null ? 'main sequence' : `section '${referencedFrom}'`;
    throw new StructuralInputError(`Undefined section name: ${name} (referenced from ${where})`, 'undefined-section', { section: name });
  }
  return entries;
}

function checkRepeat(name: string, repeat: number, referencedFrom: string | null): void {
  if (!isPositiveInteger(repeat)) {
    const where = referencedFrom === null ? 'main sequence' : `section '${referencedFrom}'`;
    throw new StructuralInputError(`Invalid repeat count ${repeat} for section '${name}' in ${where}; must be an integer >= 1`, 'invalid-repeat', { section: name });
  }
}

// `visited` holds the names on the current path only. It is never mutated:
// each descent gets its own copy, so sibling iterations start from the same
// ancestor set.
function expandSection(
  name: string,
  sections: SectionMap,
  depth: number,
  visited: ReadonlySet<string>,
  referencedFrom: string | null,
  out: ExpandedPick[],
): void {
  if (depth > MAX_NESTING_DEPTH) throw new NestingDepthError(name, depth, MAX_NESTING_DEPTH);
  const entries = getSection(sections, name, referencedFrom);
  if (visited.has(name)) throw new CircularReferenceError(name, [...visited]);

  const path = new Set(visited).add(name);
  for (const entry of entries) {
    if (entry.type === 'pick') {
      out.push({ kind: 'pick', treadles: entry.treadles, section: name });
      continue;
    }
    checkRepeat(entry.name, entry.repeat, name);
    for (let i = 1; i <= entry.repeat; i++) {
      out.push({ kind: 'annotation', marker: 'begin', section: entry.name, repeat: i, label: formatBeginLabel(entry.name, i) });
      expandSection(entry.name, sections, depth + 1, path, name, out);
      out.push({ kind: 'annotation', marker: 'end', section: entry.name, repeat: i, label: formatEndLabel(entry.name) });
    }
  }
}

export function expandSequence(mainSequence: MainSequence, sections: SectionMap): ExpandedPick[] {
  const out: ExpandedPick[] = [];
  for (const { name, repeat } of mainSequence) {
    checkRepeat(name, repeat, null);
    for (let i = 1; i <= repeat; i++) {
      out.push({ kind: 'annotation', marker: 'begin', section: name, repeat: i, label: formatBeginLabel(name, i) });
      expandSection(name, sections, 0, new Set<string>(), null, out);
      out.push({ kind: 'annotation', marker: 'end', section: name, repeat: i, label: formatEndLabel(name) });
    }
  }
  return out;
}

/** A treadling without sections: one leaf per pick, no annotations. */
export function expandFlatTreadling(picks: readonly LeafPick[]): ExpandedPick[] {
  return picks.map((treadles): ExpandedPick => ({ kind: 'pick', treadles, section: null }));
}

export default { expandSequence, expandFlatTreadling };
