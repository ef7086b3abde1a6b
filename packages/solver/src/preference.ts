import type { ValuationMatrix } from '@clearprice/valuation';

/**
 * Build the preferred-products graph of an adjusted matrix.
 *
 * Each row is scanned twice: once for its maximum, once to collect every
 * column equal to it. A non-empty row always yields a non-empty set.
 */
export function buildPreferenceGraph(adjusted: ValuationMatrix): number[][] {
  return adjusted.map((row) => {
    let max = -Infinity;
    for (const value of row) {
      if (value > max) {
        max = value;
      }
    }
    const preferred: number[] = [];
    row.forEach((value, j) => {
      if (value === max) {
        preferred.push(j);
      }
    });
    return preferred;
  });
}
