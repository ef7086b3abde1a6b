/**
 * @clearprice/types: shared errors, validation helpers, logging and
 * metrics for the clearprice packages.
 *
 * @packageDocumentation
 */

import { OutOfRangeError, ValidationError } from './errors';

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  ClearingErrorCode,
  ClearingError,
  ValidationError,
  InvalidShapeError,
  OutOfRangeError,
  InvalidPriceVectorLengthError,
  ConvergenceError,
  formatError,
} from './errors';
export type { ClearingErrorOptions } from './errors';

// ─── Validation utilities ───────────────────────────────────────────────────────

/**
 * Assert that `value` is a safe integer.
 *
 * @throws {ValidationError} When it is not.
 *
 * @example
 * ```typescript
 * validateInteger(price, 'prices[2]');
 * ```
 */
export function validateInteger(value: number, name: string): void {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new ValidationError(`${name} must be a safe integer (got ${value})`, name);
  }
}

/**
 * Assert that `value` is a number within the inclusive range `[min, max]`.
 *
 * @throws {ValidationError} When it is outside the range or NaN.
 */
export function validateRange(value: number, min: number, max: number, name: string): void {
  if (typeof value !== 'number' || Number.isNaN(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be between ${min} and ${max} (got ${value})`, name);
  }
}

/**
 * Assert that `index` addresses one of `size` rows or columns.
 *
 * @throws {OutOfRangeError} When `index` is not an integer in `[0, size)`.
 */
export function validateIndex(index: number, size: number, name: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new OutOfRangeError(name, index, size);
  }
}

// ─── Logging, debug, metrics ────────────────────────────────────────────────────

export {
  Logger,
  LogLevel,
  createLogger,
  parseLogLevel,
  logLevelFromEnv,
  LOG_LEVEL_ENV,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

export { isDebugEnabled, createDebugLogger, DEBUG_ROOT } from './debug';
export type { DebugLogger } from './debug';

export {
  Counter,
  Gauge,
  Histogram,
  MetricsRegistry,
  createMetricsRegistry,
  DEFAULT_BUCKETS,
} from './metrics';
export type { HistogramSnapshot, MetricsSnapshot } from './metrics';
