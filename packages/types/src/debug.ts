/**
 * Verbose debug output, gated by the `DEBUG` environment variable.
 *
 * Patterns are comma-separated: `clearing` or `clearing:*` enable every
 * clearprice namespace, `clearing:solver` a single one, `prefix:*` a subtree
 * and `*` everything. A disabled logger is a set of no-ops.
 *
 * @packageDocumentation
 */

/** Root namespace shared by all clearprice debug loggers. */
export const DEBUG_ROOT = 'clearing';

/**
 * Check whether debug output is enabled for `namespace`, or for any
 * clearprice namespace when `namespace` is omitted.
 */
export function isDebugEnabled(
  namespace?: string,
  env: Record<string, string | undefined> = process.env,
): boolean {
  const debugEnv = env.DEBUG ?? '';
  if (!debugEnv) {
    return false;
  }

  const inRoot = !namespace || namespace === DEBUG_ROOT || namespace.startsWith(`${DEBUG_ROOT}:`);
  const patterns = debugEnv.split(',').map((p) => p.trim()).filter(Boolean);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }
    if ((pattern === DEBUG_ROOT || pattern === `${DEBUG_ROOT}:*`) && inRoot) {
      return true;
    }
    if (namespace && pattern === namespace) {
      return true;
    }
    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

/** Shape of a logger returned by {@link createDebugLogger}. */
export interface DebugLogger {
  readonly enabled: boolean;
  log: (...args: unknown[]) => void;
  /** Start a timer; the returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};

/**
 * Create a debug logger for `namespace`. The `DEBUG` variable is read once,
 * at creation.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('clearing:solver');
 * const stop = dbg.time('solve');
 * // ...
 * stop(); // [clearing:solver] solve: 1.42ms
 * ```
 */
export function createDebugLogger(
  namespace: string,
  env: Record<string, string | undefined> = process.env,
): DebugLogger {
  if (!isDebugEnabled(namespace, env)) {
    return { enabled: false, log: noop, time: () => noop };
  }

  const prefix = `[${namespace}]`;

  return {
    enabled: true,
    log: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, ...args);
    },
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.error(new Date().toISOString(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}
