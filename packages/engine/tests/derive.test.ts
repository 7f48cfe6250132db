import { describe, expect, test } from '@jest/globals';
import { buildLiftPlan, deriveLiftPlan, findUnknownTreadles } from '../src/plan/derive';
import { expandSequence } from '../src/sequences/expand';
import { createTieUp } from '../src/treadling/tieup';
import { pick, ref } from '../src/treadling/model';
import { StructuralInputError } from '../src/errors';
import type { ExpandedPick, LiftPick } from '../src/plan/planModel';

const leaf = (treadles: number[], section: string | null = null): ExpandedPick => ({ kind: 'pick', treadles, section });

const picksOf = (entries: readonly { kind: string }[]) =>
  entries.filter((e): e is LiftPick => e.kind === 'pick');

describe('plan.derive', () => {
  const tieUp = createTieUp([[1, [1, 2]], [2, [3, 4]]]);

  test('shafts are the sorted union of every pressed treadle', () => {
    const plan = deriveLiftPlan([leaf([2, 1])], tieUp, 4);
    expect(plan).toEqual([{ kind: 'pick', pickNumber: 1, shafts: [1, 2, 3, 4], sectionLabel: null }]);
  });

  test('overlapping tie-ups collapse to distinct shafts', () => {
    const overlapping = createTieUp([[1, [2, 1]], [2, [2, 3]]]);
    expect(deriveLiftPlan([leaf([1, 2, 1])], overlapping, 4)[0]).toMatchObject({ shafts: [1, 2, 3] });
  });

  test('empty pick raises nothing', () => {
    expect(deriveLiftPlan([leaf([])], tieUp, 4)[0]).toMatchObject({ pickNumber: 1, shafts: [] });
  });

  test('unknown treadles contribute no shafts and do not throw', () => {
    expect(deriveLiftPlan([leaf([99]), leaf([1, 99])], tieUp, 4)).toEqual([
      { kind: 'pick', pickNumber: 1, shafts: [], sectionLabel: null },
      { kind: 'pick', pickNumber: 2, shafts: [1, 2], sectionLabel: null },
    ]);
  });

  test('shafts beyond the shaft count are kept, not truncated', () => {
    const wide = createTieUp([[1, [2, 12]]]);
    expect(deriveLiftPlan([leaf([1])], wide, 8)[0]).toMatchObject({ shafts: [2, 12] });
  });

  test('annotations pass through without pick numbers', () => {
    const seq: ExpandedPick[] = [
      { kind: 'annotation', marker: 'begin', section: 's', repeat: 1, label: 'Begin section s (repeat 1)' },
      leaf([1], 's'),
      { kind: 'annotation', marker: 'end', section: 's', repeat: 1, label: 'End section s' },
      leaf([2], 's'),
    ];
    expect(deriveLiftPlan(seq, tieUp, 4)).toEqual([
      { kind: 'annotation', marker: 'begin', section: 's', label: 'Begin section s (repeat 1)' },
      { kind: 'pick', pickNumber: 1, shafts: [1, 2], sectionLabel: 's' },
      { kind: 'annotation', marker: 'end', section: 's', label: 'End section s' },
      { kind: 'pick', pickNumber: 2, shafts: [3, 4], sectionLabel: 's' },
    ]);
  });

  test('rejects a non-positive shaft count', () => {
    expect(() => deriveLiftPlan([], tieUp, 0)).toThrow(StructuralInputError);
    expect(() => deriveLiftPlan([], tieUp, 2.5)).toThrow('Shaft count must be a positive integer, got 2.5');
  });

  test('findUnknownTreadles lists distinct missing treadles ascending', () => {
    const seq = [leaf([7, 1]), leaf([3, 7]), leaf([2])];
    expect(findUnknownTreadles(seq, tieUp)).toEqual([3, 7]);
  });
});

describe('buildLiftPlan', () => {
  test('hem repeated twice yields four picks labelled hem', () => {
    const sections = new Map([['hem', [pick([1]), pick([2])]]]);
    const tieUp = createTieUp([[1, [1]], [2, [2]]]);
    const expanded = expandSequence([{ name: 'hem', repeat: 2 }], sections);
    expect(expanded.filter(e => e.kind === 'annotation').map(e => e.kind === 'annotation' && e.marker)).toEqual([
      'begin', 'end', 'begin', 'end',
    ]);

    const plan = buildLiftPlan({ format: 'sectioned', sections, mainSequence: [{ name: 'hem', repeat: 2 }] }, tieUp, 2);
    expect(plan.shaftCount).toBe(2);
    expect(picksOf(plan.entries)).toEqual([
      { kind: 'pick', pickNumber: 1, shafts: [1], sectionLabel: 'hem' },
      { kind: 'pick', pickNumber: 2, shafts: [2], sectionLabel: 'hem' },
      { kind: 'pick', pickNumber: 3, shafts: [1], sectionLabel: 'hem' },
      { kind: 'pick', pickNumber: 4, shafts: [2], sectionLabel: 'hem' },
    ]);
    expect(plan.entries).toHaveLength(8);
  });

  test('pick numbers are dense across nested sections', () => {
    const sections = new Map([
      ['body', [pick([1]), ref('border', 3), pick([2])]],
      ['border', [pick([1, 2])]],
    ]);
    const tieUp = createTieUp([[1, [1]], [2, [2]]]);
    const plan = buildLiftPlan({ format: 'sectioned', sections, mainSequence: [{ name: 'body', repeat: 2 }] }, tieUp, 2);
    const numbers = picksOf(plan.entries).map(p => p.pickNumber);
    expect(numbers).toEqual(Array.from({ length: 10 }, (_, i) => i + 1));
  });

  test('repeated runs are deterministic', () => {
    const sections = new Map([['a', [pick([1]), ref('b', 2)]], ['b', [pick([2, 3])]]]);
    const tieUp = createTieUp([[1, [1, 3]], [2, [2]], [3, [4]]]);
    const treadling = { format: 'sectioned' as const, sections, mainSequence: [{ name: 'a', repeat: 3 }] };
    const first = JSON.stringify(buildLiftPlan(treadling, tieUp, 4));
    const second = JSON.stringify(buildLiftPlan(treadling, tieUp, 4));
    expect(second).toBe(first);
  });

  test('flat treadling has no section labels', () => {
    const tieUp = createTieUp([[1, [1]]]);
    const plan = buildLiftPlan({ format: 'flat', picks: [[1], [1]] }, tieUp, 1);
    expect(plan.entries).toEqual([
      { kind: 'pick', pickNumber: 1, shafts: [1], sectionLabel: null },
      { kind: 'pick', pickNumber: 2, shafts: [1], sectionLabel: null },
    ]);
  });

  test('a cycle produces no plan', () => {
    const sections = new Map([['a', [ref('a')]]]);
    expect(() => buildLiftPlan({ format: 'sectioned', sections, mainSequence: [{ name: 'a', repeat: 1 }] }, createTieUp([]), 2))
      .toThrow('Circular reference detected: a');
  });
});
