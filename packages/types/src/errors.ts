/**
 * Error codes and error classes for the clearprice packages.
 *
 * Every error carries a stable `CLEARING_Exxx` code so callers can branch
 * on the failure without parsing messages. Codes are grouped by hundreds:
 * input (1xx), solver (2xx), tooling (3xx).
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All clearprice error codes. */
export enum ClearingErrorCode {
  // Input (1xx)
  /** A value failed validation (wrong type, negative, non-integer, ...). */
  INVALID_INPUT = 'CLEARING_E100',
  /** A matrix is empty, not square, or has an unexpected dimension. */
  INVALID_SHAPE = 'CLEARING_E101',
  /** A buyer or product index lies outside `[0, n)`. */
  OUT_OF_RANGE = 'CLEARING_E102',
  /** A price vector does not have one entry per product. */
  INVALID_PRICE_VECTOR_LENGTH = 'CLEARING_E103',

  // Solver (2xx)
  /** The price loop exceeded its iteration bound. */
  CONVERGENCE_FAILED = 'CLEARING_E200',
  /** The exhaustive Hall check was asked to enumerate too many subsets. */
  HALL_CHECK_TOO_LARGE = 'CLEARING_E201',

  // Tooling (3xx)
  /** A configuration file could not be read or has the wrong shape. */
  CONFIG_INVALID = 'CLEARING_E300',
}

// ─── Base class ─────────────────────────────────────────────────────────────────

/** Options for constructing a {@link ClearingError}. */
export interface ClearingErrorOptions {
  /** Structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A short suggestion for resolving the error. */
  hint?: string;
  /** The underlying cause, for error chaining. */
  cause?: Error;
}

/**
 * Base error class for all clearprice errors.
 *
 * @example
 * ```typescript
 * throw new ClearingError(
 *   ClearingErrorCode.HALL_CHECK_TOO_LARGE,
 *   'Cannot enumerate subsets of 32 buyers',
 *   { hint: "Use hallCheck: 'matching'" },
 * );
 * ```
 */
export class ClearingError extends Error {
  readonly code: ClearingErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: ClearingErrorCode, message: string, options?: ClearingErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ClearingError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured representation for log entries and JSON output. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Specific errors ────────────────────────────────────────────────────────────

/**
 * Thrown when an input fails validation.
 */
export class ValidationError extends ClearingError {
  /** The name of the field or parameter that failed validation. */
  readonly field: string;

  constructor(message: string, field: string, options?: ClearingErrorOptions) {
    super(ClearingErrorCode.INVALID_INPUT, message, options);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Thrown when a valuation matrix is not square (or empty), or when its
 * dimension does not match the expected number of buyers.
 */
export class InvalidShapeError extends ClearingError {
  constructor(message: string, options?: ClearingErrorOptions) {
    super(ClearingErrorCode.INVALID_SHAPE, message, options);
    this.name = 'InvalidShapeError';
  }
}

/**
 * Thrown when a buyer or product index is outside `[0, size)`.
 */
export class OutOfRangeError extends ClearingError {
  readonly index: number;
  readonly size: number;

  constructor(name: string, index: number, size: number) {
    super(
      ClearingErrorCode.OUT_OF_RANGE,
      `${name} index ${index} is out of range [0, ${size})`,
      { context: { name, index, size } },
    );
    this.name = 'OutOfRangeError';
    this.index = index;
    this.size = size;
  }
}

/**
 * Thrown when a price vector is installed with the wrong number of entries.
 * Validation queries report the same condition as `false` instead.
 */
export class InvalidPriceVectorLengthError extends ClearingError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      ClearingErrorCode.INVALID_PRICE_VECTOR_LENGTH,
      `Price vector must have ${expected} entries (got ${actual})`,
      { context: { expected, actual } },
    );
    this.name = 'InvalidPriceVectorLengthError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when the price loop runs past its iteration bound.
 */
export class ConvergenceError extends ClearingError {
  readonly iterations: number;

  constructor(iterations: number, options?: ClearingErrorOptions) {
    super(
      ClearingErrorCode.CONVERGENCE_FAILED,
      `Prices did not clear the market within ${iterations} iterations`,
      { ...options, context: { iterations, ...options?.context } },
    );
    this.name = 'ConvergenceError';
    this.iterations = iterations;
  }
}

// ─── Formatting ─────────────────────────────────────────────────────────────────

/**
 * Format an error for terminal output.
 *
 * @example
 * ```typescript
 * formatError(new OutOfRangeError('product', 7, 3));
 * // [CLEARING_E102] product index 7 is out of range [0, 3)
 * ```
 */
export function formatError(error: ClearingError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
