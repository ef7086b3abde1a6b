import type { Logger, MetricsRegistry } from '@clearprice/types';

/**
 * `graph[i]` lists, in ascending order, the products tied for buyer `i`'s
 * maximum adjusted value.
 */
export type PreferenceGraph = readonly (readonly number[])[];

/** A buyer subset whose preferred products are fewer than its buyers. */
export interface HallViolation {
  /** The violating buyer subset `S`, ascending. */
  buyers: number[];
  /** Its neighbourhood `N(S)`, ascending; `products.length < buyers.length`. */
  products: number[];
}

/**
 * How Hall's condition is checked:
 * - `subsets`: enumerate every non-empty buyer subset (exponential in n).
 * - `matching`: derive a violator from a maximum matching (polynomial).
 */
export type HallCheckStrategy = 'subsets' | 'matching';

/** Outcome of one Hall check. */
export interface HallCheck {
  violation: HallViolation | undefined;
  /** Buyer subsets inspected; 0 for the matching strategy. */
  subsetsExamined: number;
}

export type SolverState = 'adjusting' | 'converged';

export interface SolverOptions {
  /** Defaults to `'subsets'`. */
  hallCheck?: HallCheckStrategy;
  /**
   * Maximum number of price-raising rounds per `solve()`. Defaults to the
   * market's price potential, which no run can exceed.
   */
  maxIterations?: number;
  /** Parent logger; the solver logs under its `solver` child. */
  logger?: Logger;
  /** Registry receiving `solver.*` metrics. Defaults to a private one. */
  metrics?: MetricsRegistry;
}

export interface SolverStats {
  /** Rounds taken by the most recent `solve()`. */
  lastSolveRounds: number;
  totalRounds: number;
  hallChecks: number;
  subsetsExamined: number;
}

/** Everything {@link clearMarket} learns about a market. */
export interface ClearingOutcome {
  prices: number[];
  /** `assignment[i]` is the product buyer `i` receives. */
  assignment: number[];
  adjustedMatrix: number[][];
  preferenceGraph: number[][];
  iterations: number;
}
