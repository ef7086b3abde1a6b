import {
  ConvergenceError,
  InvalidPriceVectorLengthError,
  Logger,
  LogLevel,
  ValidationError,
  createDebugLogger,
  createMetricsRegistry,
  logLevelFromEnv,
  validateInteger,
} from '@clearprice/types';
import type { MetricsRegistry } from '@clearprice/types';
import { ValuationModel } from '@clearprice/valuation';
import type { PriceVector, ValuationMatrix } from '@clearprice/valuation';
import { checkHallCondition } from './hall';
import { findPerfectMatching } from './matching';
import { buildPreferenceGraph } from './preference';
import type {
  HallCheckStrategy,
  HallViolation,
  SolverOptions,
  SolverState,
  SolverStats,
} from './types';

const dbg = createDebugLogger('clearing:solver');

/** Histogram boundaries for rounds per solve. */
const ROUND_BUCKETS = [0, 1, 2, 5, 10, 20, 50, 100, 500];

/**
 * The price potential `Σ p[j] + Σ_i max_j (V[i][j] - p[j])`.
 *
 * It is unchanged by normalization, never negative once prices are
 * normalized, and drops by at least `|S| - |N(S)|` on every price-raising
 * round, so it bounds the number of rounds a solve can take.
 */
export function pricePotential(original: ValuationMatrix, prices: PriceVector): number {
  let total = 0;
  for (const p of prices) {
    total += p;
  }
  for (const row of original) {
    let best = -Infinity;
    row.forEach((value, j) => {
      const surplus = value - prices[j];
      if (surplus > best) best = surplus;
    });
    total += best;
  }
  return total;
}

/**
 * Drives a {@link ValuationModel} to a market-clearing price vector.
 *
 * Each round recomputes the adjusted matrix, rebuilds the preference graph
 * and checks Hall's condition; a violation raises the price of every
 * product in its neighbourhood by one and renormalizes. The solver is
 * `converged` after a Hall check passes on the installed prices and back
 * to `adjusting` whenever prices change.
 *
 * ```ts
 * const solver = new ClearingSolver(new ValuationModel(matrix));
 * const prices = solver.solve();
 * solver.getAssignment(); // buyer -> product
 * ```
 */
export class ClearingSolver {
  private readonly model: ValuationModel;
  private readonly hallCheck: HallCheckStrategy;
  private readonly maxIterations: number | undefined;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private graph: number[][];
  private state: SolverState = 'adjusting';
  private stats: SolverStats = { lastSolveRounds: 0, totalRounds: 0, hallChecks: 0, subsetsExamined: 0 };

  constructor(model: ValuationModel, options: SolverOptions = {}) {
    if (options.maxIterations !== undefined) {
      validateInteger(options.maxIterations, 'maxIterations');
      if (options.maxIterations < 0) {
        throw new ValidationError(`maxIterations must be >= 0 (got ${options.maxIterations})`, 'maxIterations');
      }
    }
    this.model = model;
    this.hallCheck = options.hallCheck ?? 'subsets';
    this.maxIterations = options.maxIterations;
    this.log = options.logger
      ? options.logger.child('solver')
      : new Logger({ level: logLevelFromEnv(LogLevel.WARN), component: 'solver' });
    this.metrics = options.metrics ?? createMetricsRegistry();

    this.model.recomputeAdjustedMatrix();
    this.graph = buildPreferenceGraph(this.model.getAdjustedMatrix());
  }

  /** Solver over a fresh model of `matrix`. */
  static fromMatrix(matrix: ValuationMatrix, options?: SolverOptions): ClearingSolver {
    return new ClearingSolver(new ValuationModel(matrix), options);
  }

  get size(): number {
    return this.model.size;
  }

  // ── Algorithm steps ─────────────────────────────────────────────────────────

  /** Rebuild the preference graph from the cached adjusted matrix. */
  buildPreferenceGraph(): number[][] {
    this.graph = buildPreferenceGraph(this.model.getAdjustedMatrix());
    return this.getPreferenceGraph();
  }

  /** Check Hall's condition on the current preference graph. */
  findHallViolation(): HallViolation | undefined {
    const { violation, subsetsExamined } = checkHallCondition(this.graph, this.hallCheck);
    this.stats.hallChecks++;
    this.stats.subsetsExamined += subsetsExamined;
    this.metrics.counter('solver.hall_checks').increment();
    this.metrics.counter('solver.subsets_examined').increment(subsetsExamined);
    if (!violation) {
      this.setState('converged');
    }
    return violation;
  }

  /**
   * Raise the price of each listed product by one, then normalize.
   *
   * @param products - The neighbourhood of a Hall violation.
   */
  resolveViolation(products: readonly number[]): void {
    for (const product of products) {
      this.model.incrementPrice(product);
    }
    this.model.normalizePrices();
    this.metrics.counter('solver.price_increments').increment(products.length);
    this.setState('adjusting');
  }

  /**
   * Run rounds until the preference graph satisfies Hall's condition.
   *
   * @returns A copy of the clearing price vector.
   * @throws {ConvergenceError} When more than `maxIterations` rounds would
   *   be needed.
   */
  solve(): number[] {
    const bound = this.maxIterations ?? pricePotential(this.model.getOriginalMatrix(), this.model.getPriceVector());
    const stop = dbg.time('solve');
    let rounds = 0;

    for (;;) {
      this.refresh();
      const violation = this.findHallViolation();
      if (!violation) break;
      if (rounds >= bound) {
        stop();
        this.recordSolve(rounds);
        throw new ConvergenceError(rounds, {
          hint: 'Raise maxIterations or leave it unset',
          context: { size: this.size, prices: this.model.getPriceVector() },
        });
      }
      this.log.debug('raising prices', {
        round: rounds + 1,
        buyers: violation.buyers,
        products: violation.products,
      });
      this.resolveViolation(violation.products);
      rounds++;
      this.metrics.counter('solver.rounds').increment();
    }

    stop();
    this.recordSolve(rounds);
    const prices = this.model.getPriceVector();
    this.log.info('market cleared', { size: this.size, rounds, prices });
    return prices;
  }

  // ── Validation ──────────────────────────────────────────────────────────────

  /**
   * Install `candidate` as the live price vector and report whether it
   * clears the market. A wrong length returns `false` without touching
   * state; otherwise the candidate stays installed, so
   * {@link getPriceVector} returns it afterwards. Use {@link checkClears}
   * for a query that leaves the solver alone.
   *
   * @throws {ValidationError} When an entry is not a safe integer; nothing
   *   is installed in that case.
   */
  isValidPriceVector(candidate: PriceVector): boolean {
    if (candidate.length !== this.size) {
      this.log.debug('price vector rejected', { expected: this.size, actual: candidate.length });
      return false;
    }
    this.model.setPriceVector(candidate);
    this.setState('adjusting');
    this.refresh();
    return this.findHallViolation() === undefined;
  }

  /**
   * Whether `candidate` clears the market; solver state is untouched.
   *
   * @throws {ValidationError} When an entry is not a safe integer.
   */
  checkClears(candidate: PriceVector): boolean {
    if (candidate.length !== this.size) {
      return false;
    }
    const scratch = new ValuationModel(this.model.getOriginalMatrix());
    scratch.setPriceVector(candidate);
    scratch.recomputeAdjustedMatrix();
    const graph = buildPreferenceGraph(scratch.getAdjustedMatrix());
    return checkHallCondition(graph, this.hallCheck).violation === undefined;
  }

  /**
   * Install `candidate` as the live price vector and rebuild the graph.
   *
   * @throws {InvalidPriceVectorLengthError} When the length is wrong.
   */
  adoptPriceVector(candidate: PriceVector): void {
    if (candidate.length !== this.size) {
      throw new InvalidPriceVectorLengthError(this.size, candidate.length);
    }
    this.model.setPriceVector(candidate);
    this.setState('adjusting');
    this.refresh();
  }

  // ── Reads ───────────────────────────────────────────────────────────────────

  getPriceVector(): number[] {
    return this.model.getPriceVector();
  }

  getOriginalMatrix(): number[][] {
    return this.model.getOriginalMatrix();
  }

  getAdjustedMatrix(): number[][] {
    return this.model.getAdjustedMatrix();
  }

  getPreferenceGraph(): number[][] {
    return this.graph.map((products) => [...products]);
  }

  /** A buyer-to-product perfect matching of the current graph, if one exists. */
  getAssignment(): number[] | undefined {
    return findPerfectMatching(this.graph);
  }

  getState(): SolverState {
    return this.state;
  }

  getStats(): SolverStats {
    return { ...this.stats };
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private refresh(): void {
    this.model.recomputeAdjustedMatrix();
    this.graph = buildPreferenceGraph(this.model.getAdjustedMatrix());
  }

  private setState(state: SolverState): void {
    this.state = state;
    this.metrics.gauge('solver.converged').set(state === 'converged' ? 1 : 0);
  }

  private recordSolve(rounds: number): void {
    this.stats.lastSolveRounds = rounds;
    this.stats.totalRounds += rounds;
    this.metrics.histogram('solver.rounds_per_solve', ROUND_BUCKETS).observe(rounds);
  }
}
