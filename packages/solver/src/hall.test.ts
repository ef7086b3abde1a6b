import { describe, it, expect } from 'vitest';
import { ClearingError, ClearingErrorCode } from '@clearprice/types';
import { nonEmptySubsets, checkHallCondition, findHallViolation, MAX_SUBSET_BUYERS } from './hall';
import { buildPreferenceGraph } from './preference';

// ---------------------------------------------------------------------------
// buildPreferenceGraph
// ---------------------------------------------------------------------------
describe('buildPreferenceGraph', () => {
  it('collects every product tied for the row maximum', () => {
    expect(buildPreferenceGraph([[6, 5, 2], [7, 7, 3], [6, 7, 7]])).toEqual([[0], [0, 1], [1, 2]]);
  });

  it('finds the maximum of an all-negative row', () => {
    expect(buildPreferenceGraph([[-3, -1], [-2, -2]])).toEqual([[1], [0, 1]]);
  });

  it('never leaves a buyer without a preferred product', () => {
    const graph = buildPreferenceGraph([[0, 0, 0], [-5, -9, -5], [1, 2, 3]]);
    for (const products of graph) {
      expect(products.length).toBeGreaterThan(0);
    }
  });
});

// ---------------------------------------------------------------------------
// nonEmptySubsets
// ---------------------------------------------------------------------------
describe('nonEmptySubsets', () => {
  it('enumerates in ascending bitmask order', () => {
    expect([...nonEmptySubsets(3)]).toEqual([[0], [1], [0, 1], [2], [0, 2], [1, 2], [0, 1, 2]]);
  });

  it('yields 2^n - 1 distinct subsets', () => {
    const seen = new Set([...nonEmptySubsets(5)].map((s) => s.join(',')));
    expect(seen.size).toBe(31);
  });

  it('yields nothing for n = 0', () => {
    expect([...nonEmptySubsets(0)]).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// findHallViolation: subsets
// ---------------------------------------------------------------------------
describe('findHallViolation (subsets)', () => {
  it('reports two buyers competing for one product', () => {
    const violation = findHallViolation([[0], [0]]);
    expect(violation).toEqual({ buyers: [0, 1], products: [0] });
    expect(violation?.products.length).toBeLessThan(2);
  });

  it('reports nothing when a perfect matching exists', () => {
    expect(findHallViolation([[0, 1], [0, 1], [1, 2]])).toBeUndefined();
  });

  it('reports the first violation in enumeration order', () => {
    // {0,2} precedes {1,2} and {0,1,2}
    expect(findHallViolation([[0], [1], [0]])).toEqual({ buyers: [0, 2], products: [0] });
  });

  it('detects a violation only visible on the full set', () => {
    expect(findHallViolation([[0, 1], [0, 1], [0, 1]])).toEqual({ buyers: [0, 1, 2], products: [0, 1] });
  });

  it('counts the subsets it examined', () => {
    expect(checkHallCondition([[0, 1], [0, 1], [1, 2]]).subsetsExamined).toBe(7);
    expect(checkHallCondition([[0], [0], [1]]).subsetsExamined).toBe(3);
  });

  it('treats a buyer with no preferred product as a violation', () => {
    expect(findHallViolation([[], [1]])).toEqual({ buyers: [0], products: [] });
  });

  it('refuses markets above the subset limit', () => {
    const graph = Array.from({ length: MAX_SUBSET_BUYERS + 1 }, (_, i) => [i]);
    try {
      findHallViolation(graph);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ClearingError);
      if (e instanceof ClearingError) {
        expect(e.code).toBe(ClearingErrorCode.HALL_CHECK_TOO_LARGE);
        expect(e.hint).toBe("Use hallCheck: 'matching' for larger markets");
      }
    }
  });
});

// ---------------------------------------------------------------------------
// findHallViolation: matching
// ---------------------------------------------------------------------------
describe('findHallViolation (matching)', () => {
  it('reports two buyers competing for one product', () => {
    expect(findHallViolation([[0], [0]], 'matching')).toEqual({ buyers: [0, 1], products: [0] });
  });

  it('agrees with the subset strategy on whether a violation exists', () => {
    const graphs = [
      [[0, 1], [0, 1], [1, 2]],
      [[0], [1], [0]],
      [[0, 1], [0, 1], [0, 1]],
      [[2], [1], [0]],
    ];
    for (const graph of graphs) {
      expect(findHallViolation(graph, 'matching') === undefined).toBe(findHallViolation(graph) === undefined);
    }
  });

  it('always reports fewer products than buyers', () => {
    const violation = findHallViolation([[0, 1], [0, 1], [1], [2, 3]], 'matching');
    expect(violation).toEqual({ buyers: [0, 1, 2], products: [0, 1] });
  });

  it('handles markets beyond the subset limit', () => {
    const graph = Array.from({ length: 30 }, (_, i) => [i]);
    expect(checkHallCondition(graph, 'matching')).toEqual({ violation: undefined, subsetsExamined: 0 });
  });
});
