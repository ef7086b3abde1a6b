export type { ValuationMatrix, PriceVector, RandomSource } from './types';
export { mulberry32, randomInt } from './random';

import {
  InvalidShapeError,
  ValidationError,
  createDebugLogger,
  validateIndex,
  validateInteger,
} from '@clearprice/types';
import { randomInt } from './random';
import type { PriceVector, RandomSource, ValuationMatrix } from './types';

const dbg = createDebugLogger('clearing:valuation');

/**
 * Assert that `value` is a non-empty square matrix of non-negative safe
 * integers. Accepts `unknown` so parsed JSON can be checked directly.
 *
 * @param expectedBuyers - When given, the dimension must equal it.
 * @throws {InvalidShapeError} When the matrix is empty, ragged or not square.
 * @throws {ValidationError} When an entry is not a non-negative safe integer.
 */
export function validateValuationMatrix(
  value: unknown,
  expectedBuyers?: number,
): asserts value is ValuationMatrix {
  if (!Array.isArray(value) || value.length === 0) {
    throw new InvalidShapeError('Valuation matrix must be a non-empty array of rows');
  }
  const n = value.length;
  if (expectedBuyers !== undefined && n !== expectedBuyers) {
    throw new InvalidShapeError(`Valuation matrix has ${n} rows, expected ${expectedBuyers} buyers`, {
      context: { rows: n, expectedBuyers },
    });
  }
  value.forEach((row: unknown, i) => {
    if (!Array.isArray(row)) {
      throw new InvalidShapeError(`Valuation matrix row ${i} is not an array`, { context: { row: i } });
    }
    if (row.length !== n) {
      throw new InvalidShapeError(`Valuation matrix must be square: row ${i} has ${row.length} entries, expected ${n}`, {
        context: { row: i, size: n },
      });
    }
    row.forEach((entry: unknown, j) => {
      const name = `matrix[${i}][${j}]`;
      if (typeof entry !== 'number') {
        throw new ValidationError(`${name} must be a number`, name);
      }
      validateInteger(entry, name);
      if (entry < 0) {
        throw new ValidationError(`${name} must be >= 0 (got ${entry})`, name);
      }
    });
  });
}

/**
 * The market's data: an immutable valuation matrix, a mutable price vector
 * and the adjusted matrix `original[i][j] - price[j]` derived from both.
 *
 * The adjusted matrix is a cache rebuilt by {@link recomputeAdjustedMatrix};
 * {@link adjustedValue} always computes from the current prices.
 */
export class ValuationModel {
  readonly size: number;
  private readonly original: number[][];
  private readonly adjusted: number[][];
  private prices: number[];

  /**
   * @param matrix - Square matrix of non-negative integers, copied.
   * @param expectedBuyers - Optional dimension check.
   */
  constructor(matrix: ValuationMatrix, expectedBuyers?: number) {
    validateValuationMatrix(matrix, expectedBuyers);
    this.size = matrix.length;
    this.original = matrix.map((row) => [...row]);
    this.adjusted = matrix.map((row) => [...row]);
    this.prices = new Array<number>(this.size).fill(0);
  }

  /**
   * Build a model whose valuations are independent uniform integers in
   * `[0, maxValuation]`.
   *
   * @param random - Defaults to `Math.random`; pass `mulberry32(seed)` for
   *   reproducible markets.
   */
  static random(numberOfBuyers: number, maxValuation: number, random: RandomSource = Math.random): ValuationModel {
    validateInteger(numberOfBuyers, 'numberOfBuyers');
    validateInteger(maxValuation, 'maxValuation');
    if (numberOfBuyers < 1) {
      throw new ValidationError(`numberOfBuyers must be >= 1 (got ${numberOfBuyers})`, 'numberOfBuyers');
    }
    if (maxValuation < 0) {
      throw new ValidationError(`maxValuation must be >= 0 (got ${maxValuation})`, 'maxValuation');
    }

    const matrix: number[][] = [];
    for (let i = 0; i < numberOfBuyers; i++) {
      const row: number[] = [];
      for (let j = 0; j < numberOfBuyers; j++) {
        row.push(randomInt(random, 0, maxValuation));
      }
      matrix.push(row);
    }
    dbg.log('random valuation matrix', { numberOfBuyers, maxValuation });
    return new ValuationModel(matrix);
  }

  originalValue(buyer: number, product: number): number {
    this.checkCell(buyer, product);
    return this.original[buyer][product];
  }

  /** `original[buyer][product] - price[product]` at the current prices. */
  adjustedValue(buyer: number, product: number): number {
    this.checkCell(buyer, product);
    return this.original[buyer][product] - this.prices[product];
  }

  /** Overwrite the cached adjusted matrix from the current prices. */
  recomputeAdjustedMatrix(): void {
    for (let i = 0; i < this.size; i++) {
      const row = this.adjusted[i];
      const source = this.original[i];
      for (let j = 0; j < this.size; j++) {
        row[j] = source[j] - this.prices[j];
      }
    }
  }

  /** Raise the price of `product` by one. */
  incrementPrice(product: number): void {
    validateIndex(product, this.size, 'product');
    this.prices[product] += 1;
  }

  /**
   * Shift every price down by the minimum price so the cheapest product
   * costs 0. Price differences, and with them every buyer's set of
   * row-maximal products, are unchanged.
   */
  normalizePrices(): void {
    const lowest = Math.min(...this.prices);
    if (lowest === 0) return;
    this.prices = this.prices.map((p) => p - lowest);
  }

  /** Copy of the current prices. */
  getPriceVector(): number[] {
    return [...this.prices];
  }

  /**
   * Install `prices` (copied). Does not touch the adjusted matrix.
   *
   * @throws {InvalidShapeError} When the length differs from {@link size}.
   * @throws {ValidationError} When an entry is not a safe integer.
   */
  setPriceVector(prices: PriceVector): void {
    if (prices.length !== this.size) {
      throw new InvalidShapeError(`Price vector must have ${this.size} entries (got ${prices.length})`, {
        context: { expected: this.size, actual: prices.length },
      });
    }
    prices.forEach((p, j) => validateInteger(p, `prices[${j}]`));
    this.prices = [...prices];
  }

  getOriginalMatrix(): number[][] {
    return this.original.map((row) => [...row]);
  }

  /** Copy of the adjusted matrix as of the last {@link recomputeAdjustedMatrix}. */
  getAdjustedMatrix(): number[][] {
    return this.adjusted.map((row) => [...row]);
  }

  private checkCell(buyer: number, product: number): void {
    validateIndex(buyer, this.size, 'buyer');
    validateIndex(product, this.size, 'product');
  }
}
