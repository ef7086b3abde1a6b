import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import { InvalidShapeError, ValidationError } from '@clearprice/types';
import { validateValuationMatrix } from '@clearprice/valuation';
import type { ValuationMatrix } from '@clearprice/valuation';

/** A named market bundled with the CLI. */
export interface MarketExample {
  name: string;
  description: string;
  matrix: ValuationMatrix;
}

export const EXAMPLES_FILE = fileURLToPath(new URL('../data/examples.json', import.meta.url));

let cached: MarketExample[] | undefined;

function parseExample(raw: unknown, index: number): MarketExample {
  if (typeof raw !== 'object' || raw === null) {
    throw new InvalidShapeError(`Example ${index} is not an object`);
  }
  const name = 'name' in raw ? raw.name : undefined;
  const description = 'description' in raw ? raw.description : undefined;
  const matrix = 'matrix' in raw ? raw.matrix : undefined;
  if (typeof name !== 'string' || typeof description !== 'string') {
    throw new InvalidShapeError(`Example ${index} needs a string name and description`);
  }
  validateValuationMatrix(matrix);
  return { name, description, matrix };
}

/** Read and check every example in `file`. The default file is cached. */
export function loadExamples(file: string = EXAMPLES_FILE): MarketExample[] {
  if (file === EXAMPLES_FILE && cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!Array.isArray(raw)) {
    throw new InvalidShapeError(`${file} must contain an array of examples`);
  }
  const examples = raw.map((entry: unknown, i) => parseExample(entry, i));
  if (file === EXAMPLES_FILE) cached = examples;
  return examples;
}

/**
 * Look up a bundled example by name.
 *
 * @throws {ValidationError} Listing the available names when none matches.
 */
export function getExample(name: string): MarketExample {
  const examples = loadExamples();
  const found = examples.find((e) => e.name === name);
  if (!found) {
    const available = examples.map((e) => e.name).join(', ');
    throw new ValidationError(`Unknown example "${name}" (available: ${available})`, 'example');
  }
  return found;
}
