/**
 * `clearing.config.json` support: defaults for the CLI's random market and
 * solver options, looked up from the working directory towards the root.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';

import { ClearingError, ClearingErrorCode } from '@clearprice/types';
import type { HallCheckStrategy } from '@clearprice/solver';

/** Shape of a `clearing.config.json` file. Every field is optional. */
export interface ClearingConfig {
  /** Buyers (and products) in a random market. */
  buyers?: number;
  /** Upper bound of random valuations. */
  maxValuation?: number;
  /** Seed for reproducible random markets. */
  seed?: number;
  hallCheck?: HallCheckStrategy;
  maxIterations?: number;
  outputFormat?: 'json' | 'text';
}

export const CONFIG_FILE_NAME = 'clearing.config.json';

const NUMERIC_KEYS = ['buyers', 'maxValuation', 'seed', 'maxIterations'] as const;

function invalid(filePath: string, message: string, cause?: Error): ClearingError {
  return new ClearingError(ClearingErrorCode.CONFIG_INVALID, `${filePath}: ${message}`, {
    context: { path: filePath },
    cause,
  });
}

/**
 * Check the parsed contents of a config file.
 *
 * @throws {ClearingError} `CONFIG_INVALID` naming the offending key.
 */
export function parseConfig(raw: unknown, filePath: string = CONFIG_FILE_NAME): ClearingConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw invalid(filePath, 'expected a JSON object');
  }
  const source = new Map(Object.entries(raw));
  const config: ClearingConfig = {};

  for (const key of NUMERIC_KEYS) {
    const value = source.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw invalid(filePath, `"${key}" must be an integer`);
    }
    config[key] = value;
  }

  const hallCheck = source.get('hallCheck');
  if (hallCheck !== undefined) {
    if (hallCheck !== 'subsets' && hallCheck !== 'matching') {
      throw invalid(filePath, `"hallCheck" must be "subsets" or "matching"`);
    }
    config.hallCheck = hallCheck;
  }

  const outputFormat = source.get('outputFormat');
  if (outputFormat !== undefined) {
    if (outputFormat !== 'json' && outputFormat !== 'text') {
      throw invalid(filePath, `"outputFormat" must be "json" or "text"`);
    }
    config.outputFormat = outputFormat;
  }

  return config;
}

/**
 * Search for `clearing.config.json` from `cwd` up to the filesystem root.
 * Returns the absolute path, or `undefined` if none exists.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');
  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Load the nearest config file. Returns an empty config when there is none.
 *
 * @throws {ClearingError} `CONFIG_INVALID` when the file is not valid JSON
 *   or has the wrong shape.
 */
export function loadConfig(cwd?: string): ClearingConfig {
  const filePath = findConfigFile(cwd);
  if (!filePath) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw invalid(filePath, 'not valid JSON', e instanceof Error ? e : undefined);
  }
  return parseConfig(raw, filePath);
}
