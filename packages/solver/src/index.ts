export type {
  PreferenceGraph,
  HallViolation,
  HallCheck,
  HallCheckStrategy,
  SolverState,
  SolverOptions,
  SolverStats,
  ClearingOutcome,
} from './types';
export type { Matching } from './matching';

export { buildPreferenceGraph } from './preference';
export { nonEmptySubsets, checkHallCondition, findHallViolation, MAX_SUBSET_BUYERS } from './hall';
export { maximumMatching, findPerfectMatching, findHallViolationByMatching } from './matching';
export { ClearingSolver, pricePotential } from './solver';

import { ClearingError, ClearingErrorCode } from '@clearprice/types';
import type { ValuationMatrix } from '@clearprice/valuation';
import { ClearingSolver } from './solver';
import type { ClearingOutcome, SolverOptions } from './types';

/**
 * Solve the market described by `matrix` and return the clearing prices
 * together with the assignment they support.
 *
 * @example
 * ```typescript
 * const { prices, assignment } = clearMarket([[6, 5, 2], [7, 6, 3], [6, 7, 6]]);
 * ```
 */
export function clearMarket(matrix: ValuationMatrix, options?: SolverOptions): ClearingOutcome {
  const solver = ClearingSolver.fromMatrix(matrix, options);
  const prices = solver.solve();
  const assignment = solver.getAssignment();
  if (!assignment) {
    // Hall's condition held on this graph, so a perfect matching exists.
    throw new ClearingError(
      ClearingErrorCode.CONVERGENCE_FAILED,
      'Clearing prices found but no perfect matching exists',
      { context: { prices } },
    );
  }
  return {
    prices,
    assignment,
    adjustedMatrix: solver.getAdjustedMatrix(),
    preferenceGraph: solver.getPreferenceGraph(),
    iterations: solver.getStats().lastSolveRounds,
  };
}
