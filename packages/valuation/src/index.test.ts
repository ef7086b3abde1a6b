import { describe, it, expect } from 'vitest';
import { InvalidShapeError, OutOfRangeError, ValidationError } from '@clearprice/types';
import { ValuationModel, validateValuationMatrix, mulberry32, randomInt } from './index';

const SAMPLE = [
  [6, 5, 2],
  [7, 6, 3],
  [6, 7, 6],
];

// ---------------------------------------------------------------------------
// validateValuationMatrix
// ---------------------------------------------------------------------------
describe('validateValuationMatrix', () => {
  it('accepts a square matrix of non-negative integers', () => {
    expect(() => validateValuationMatrix(SAMPLE)).not.toThrow();
    expect(() => validateValuationMatrix([[0]])).not.toThrow();
  });

  it('rejects an empty matrix', () => {
    expect(() => validateValuationMatrix([])).toThrow(InvalidShapeError);
    expect(() => validateValuationMatrix('nope')).toThrow(InvalidShapeError);
  });

  it('rejects ragged and non-square matrices', () => {
    expect(() => validateValuationMatrix([[1, 2], [3]])).toThrow(
      'Valuation matrix must be square: row 1 has 1 entries, expected 2',
    );
    expect(() => validateValuationMatrix([[1, 2, 3], [4, 5, 6]])).toThrow(InvalidShapeError);
    expect(() => validateValuationMatrix([[1, 2], 3])).toThrow('Valuation matrix row 1 is not an array');
  });

  it('checks the expected buyer count', () => {
    expect(() => validateValuationMatrix(SAMPLE, 4)).toThrow(
      'Valuation matrix has 3 rows, expected 4 buyers',
    );
    expect(() => validateValuationMatrix(SAMPLE, 3)).not.toThrow();
  });

  it('rejects negative, fractional and non-numeric entries', () => {
    expect(() => validateValuationMatrix([[1, -1], [0, 0]])).toThrow('matrix[0][1] must be >= 0 (got -1)');
    expect(() => validateValuationMatrix([[1, 0.5], [0, 0]])).toThrow(ValidationError);
    expect(() => validateValuationMatrix([[1, '2'], [0, 0]])).toThrow('matrix[0][1] must be a number');
  });
});

// ---------------------------------------------------------------------------
// ValuationModel construction
// ---------------------------------------------------------------------------
describe('ValuationModel construction', () => {
  it('starts with zero prices and the adjusted matrix equal to the original', () => {
    const model = new ValuationModel(SAMPLE);
    expect(model.size).toBe(3);
    expect(model.getPriceVector()).toEqual([0, 0, 0]);
    expect(model.getOriginalMatrix()).toEqual(SAMPLE);
    expect(model.getAdjustedMatrix()).toEqual(SAMPLE);
  });

  it('copies the supplied matrix', () => {
    const source = [[1, 2], [3, 4]];
    const model = new ValuationModel(source);
    source[0][0] = 99;
    expect(model.originalValue(0, 0)).toBe(1);
  });

  it('hands out copies from its accessors', () => {
    const model = new ValuationModel(SAMPLE);
    model.getOriginalMatrix()[0][0] = 99;
    model.getPriceVector()[0] = 99;
    expect(model.originalValue(0, 0)).toBe(6);
    expect(model.getPriceVector()).toEqual([0, 0, 0]);
  });

  it('fails on a non-square matrix', () => {
    expect(() => new ValuationModel([[1, 2]])).toThrow(InvalidShapeError);
  });

  it('fails when the dimension differs from the expected buyers', () => {
    expect(() => new ValuationModel(SAMPLE, 2)).toThrow(InvalidShapeError);
  });
});

// ---------------------------------------------------------------------------
// ValuationModel.random
// ---------------------------------------------------------------------------
describe('ValuationModel.random', () => {
  it('fills the matrix from the random source', () => {
    const low = ValuationModel.random(3, 8, () => 0);
    expect(low.getOriginalMatrix()).toEqual([[0, 0, 0], [0, 0, 0], [0, 0, 0]]);
    const high = ValuationModel.random(2, 8, () => 0.9999);
    expect(high.getOriginalMatrix()).toEqual([[8, 8], [8, 8]]);
  });

  it('is reproducible with a seeded source', () => {
    const a = ValuationModel.random(5, 10, mulberry32(42));
    const b = ValuationModel.random(5, 10, mulberry32(42));
    expect(a.getOriginalMatrix()).toEqual(b.getOriginalMatrix());
  });

  it('stays within [0, maxValuation]', () => {
    const model = ValuationModel.random(8, 4, mulberry32(7));
    for (const row of model.getOriginalMatrix()) {
      for (const v of row) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(4);
      }
    }
  });

  it('validates its arguments', () => {
    expect(() => ValuationModel.random(0, 5)).toThrow('numberOfBuyers must be >= 1 (got 0)');
    expect(() => ValuationModel.random(2, -1)).toThrow('maxValuation must be >= 0 (got -1)');
    expect(() => ValuationModel.random(2.5, 3)).toThrow(ValidationError);
  });

  it('uses Math.random by default', () => {
    expect(ValuationModel.random(2, 0).getOriginalMatrix()).toEqual([[0, 0], [0, 0]]);
  });
});

// ---------------------------------------------------------------------------
// Prices and adjusted values
// ---------------------------------------------------------------------------
describe('ValuationModel prices', () => {
  it('adjustedValue subtracts the product price', () => {
    const model = new ValuationModel(SAMPLE);
    model.incrementPrice(1);
    model.incrementPrice(1);
    expect(model.adjustedValue(2, 1)).toBe(5);
    expect(model.adjustedValue(2, 0)).toBe(6);
  });

  it('adjustedValue and originalValue check their indices', () => {
    const model = new ValuationModel(SAMPLE);
    expect(() => model.adjustedValue(3, 0)).toThrow(OutOfRangeError);
    expect(() => model.adjustedValue(0, -1)).toThrow('product index -1 is out of range [0, 3)');
    expect(() => model.originalValue(-1, 0)).toThrow('buyer index -1 is out of range [0, 3)');
  });

  it('recomputeAdjustedMatrix refreshes the cached matrix', () => {
    const model = new ValuationModel(SAMPLE);
    model.setPriceVector([1, 2, 0]);
    expect(model.getAdjustedMatrix()).toEqual(SAMPLE);
    model.recomputeAdjustedMatrix();
    expect(model.getAdjustedMatrix()).toEqual([
      [5, 3, 2],
      [6, 4, 3],
      [5, 5, 6],
    ]);
  });

  it('incrementPrice rejects a bad index', () => {
    const model = new ValuationModel(SAMPLE);
    expect(() => model.incrementPrice(3)).toThrow(OutOfRangeError);
  });

  it('normalizePrices shifts the minimum to zero', () => {
    const model = new ValuationModel(SAMPLE);
    model.setPriceVector([3, 5, 2]);
    model.normalizePrices();
    expect(model.getPriceVector()).toEqual([1, 3, 0]);
  });

  it('normalizePrices lifts negative prices', () => {
    const model = new ValuationModel(SAMPLE);
    model.setPriceVector([-2, 0, 1]);
    model.normalizePrices();
    expect(model.getPriceVector()).toEqual([0, 2, 3]);
  });

  it('normalizePrices keeps every buyer row-maximum in place', () => {
    const model = new ValuationModel(SAMPLE);
    model.setPriceVector([4, 3, 1]);
    model.recomputeAdjustedMatrix();
    const before = model.getAdjustedMatrix();
    model.normalizePrices();
    model.recomputeAdjustedMatrix();
    const after = model.getAdjustedMatrix();
    for (let i = 0; i < 3; i++) {
      for (let j = 0; j < 3; j++) {
        expect(after[i][j] - before[i][j]).toBe(1);
      }
    }
  });

  it('setPriceVector checks length and entries', () => {
    const model = new ValuationModel(SAMPLE);
    expect(() => model.setPriceVector([0, 0])).toThrow('Price vector must have 3 entries (got 2)');
    expect(() => model.setPriceVector([0, 0.5, 0])).toThrow('prices[1] must be a safe integer (got 0.5)');
  });

  it('setPriceVector copies its argument', () => {
    const model = new ValuationModel(SAMPLE);
    const prices = [1, 0, 0];
    model.setPriceVector(prices);
    prices[0] = 9;
    expect(model.getPriceVector()).toEqual([1, 0, 0]);
  });
});

// ---------------------------------------------------------------------------
// Random helpers
// ---------------------------------------------------------------------------
describe('mulberry32 / randomInt', () => {
  it('produces the same sequence for the same seed', () => {
    const a = mulberry32(1);
    const b = mulberry32(1);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('produces floats in [0, 1)', () => {
    const r = mulberry32(123);
    for (let i = 0; i < 1000; i++) {
      const v = r();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('randomInt maps the unit interval onto [min, max]', () => {
    expect(randomInt(() => 0, 2, 5)).toBe(2);
    expect(randomInt(() => 0.5, 2, 5)).toBe(4);
    expect(randomInt(() => 0.99, 2, 5)).toBe(5);
  });
});
