import { ClearingError, ClearingErrorCode } from '@clearprice/types';
import { findHallViolationByMatching } from './matching';
import type { HallCheck, HallCheckStrategy, HallViolation, PreferenceGraph } from './types';

/**
 * Largest buyer count the subset strategy accepts. Each check walks
 * `2^n - 1` subsets, so beyond this the matching strategy is the only
 * practical choice.
 */
export const MAX_SUBSET_BUYERS = 20;

/**
 * Every non-empty subset of `{0, ..., n-1}`, each exactly once, in
 * ascending bitmask order: `{0}, {1}, {0,1}, {2}, {0,2}, {1,2}, ...`.
 * Masks are 32-bit, so `n` must stay below 31.
 */
export function* nonEmptySubsets(n: number): Generator<number[]> {
  const total = 1 << n;
  for (let mask = 1; mask < total; mask++) {
    const subset: number[] = [];
    for (let i = 0; i < n; i++) {
      if ((mask >>> i) & 1) {
        subset.push(i);
      }
    }
    yield subset;
  }
}

function scanSubsets(graph: PreferenceGraph): HallCheck {
  const n = graph.length;
  if (n > MAX_SUBSET_BUYERS) {
    throw new ClearingError(
      ClearingErrorCode.HALL_CHECK_TOO_LARGE,
      `Cannot enumerate the subsets of ${n} buyers (limit ${MAX_SUBSET_BUYERS})`,
      { hint: "Use hallCheck: 'matching' for larger markets", context: { buyers: n } },
    );
  }

  let width = 0;
  for (const products of graph) {
    for (const p of products) {
      if (p + 1 > width) width = p + 1;
    }
  }
  // stamp[p] === round marks product p as already counted for this subset
  const stamp = new Int32Array(width);
  let round = 0;
  let subsetsExamined = 0;

  for (const buyers of nonEmptySubsets(n)) {
    round++;
    subsetsExamined++;
    const products: number[] = [];
    for (const buyer of buyers) {
      for (const p of graph[buyer]) {
        if (stamp[p] !== round) {
          stamp[p] = round;
          products.push(p);
        }
      }
    }
    if (products.length < buyers.length) {
      return { violation: { buyers, products: products.sort((a, b) => a - b) }, subsetsExamined };
    }
  }
  return { violation: undefined, subsetsExamined };
}

/**
 * Check Hall's condition, `|N(S)| >= |S|` for every non-empty buyer
 * subset `S`, and report the first violation found.
 *
 * Which violation is reported depends on the strategy and is not part of
 * the contract; only that it is a genuine violation.
 *
 * @throws {ClearingError} `HALL_CHECK_TOO_LARGE` for the subset strategy on
 *   more than {@link MAX_SUBSET_BUYERS} buyers.
 */
export function checkHallCondition(graph: PreferenceGraph, strategy: HallCheckStrategy = 'subsets'): HallCheck {
  if (strategy === 'matching') {
    return { violation: findHallViolationByMatching(graph), subsetsExamined: 0 };
  }
  return scanSubsets(graph);
}

/** The violating neighbourhood of {@link checkHallCondition}, if any. */
export function findHallViolation(
  graph: PreferenceGraph,
  strategy: HallCheckStrategy = 'subsets',
): HallViolation | undefined {
  return checkHallCondition(graph, strategy).violation;
}
