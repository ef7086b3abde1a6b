/**
 * @clearprice/cli
 *
 * Command-line front end for the clearing solver. {@link run} takes the
 * user's arguments and returns what would be printed, so the commands can
 * be exercised without spawning a process; `bin.ts` writes the result.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';

import {
  ClearingError,
  InvalidPriceVectorLengthError,
  LogLevel,
  ValidationError,
  createLogger,
  formatError,
  logLevelFromEnv,
  validateInteger,
  validateRange,
} from '@clearprice/types';
import type { Logger } from '@clearprice/types';
import { ValuationModel, mulberry32, validateValuationMatrix } from '@clearprice/valuation';
import type { RandomSource, ValuationMatrix } from '@clearprice/valuation';
import { ClearingSolver, MAX_SUBSET_BUYERS } from '@clearprice/solver';
import type { HallCheckStrategy, SolverOptions } from '@clearprice/solver';

import { loadConfig } from './config';
import type { ClearingConfig } from './config';
import { getExample, loadExamples } from './examples';
import {
  bold,
  formatAssignment,
  formatMatrix,
  formatVector,
  header,
  setColorsEnabled,
  verdict,
} from './format';

export const VERSION = '0.1.0';

const DEFAULT_BUYERS = 4;
const DEFAULT_MAX_VALUATION = 8;

// ─── Public API ───────────────────────────────────────────────────────────────

/** What a command printed and the process exit code it asks for. */
export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Directory the config file search starts from. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Used for random markets when no seed is given. Defaults to `Math.random`. */
  random?: RandomSource;
  /** Environment read for `CLEARING_LOG_LEVEL`. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

// ─── Minimal argument parser ──────────────────────────────────────────────────

/** Flags that never take a value, so a following word stays a command. */
const BOOLEAN_FLAGS = new Set(['json', 'no-color', 'help', 'version']);

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  let command = '';

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // A following word that is not itself a flag is this flag's value
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i += 2;
      } else {
        flags[key] = true;
        i += 1;
      }
    } else if (command === '') {
      command = arg;
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { command, positional, flags };
}

function getFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
  const val = flags[key];
  if (val === undefined) return undefined;
  if (typeof val === 'boolean') {
    throw new ValidationError(`Option --${key} requires a value`, key);
  }
  return val;
}

function requireFlag(flags: Record<string, string | boolean>, key: string, description: string): string {
  const val = getFlag(flags, key);
  if (val === undefined) {
    throw new ValidationError(`Missing required option: --${key} <${description}>`, key);
  }
  return val;
}

function getIntegerFlag(flags: Record<string, string | boolean>, key: string): number | undefined {
  const val = getFlag(flags, key);
  if (val === undefined) return undefined;
  const n = val.trim() === '' ? NaN : Number(val);
  validateInteger(n, `--${key}`);
  return n;
}

// ─── Output collection ────────────────────────────────────────────────────────

class Output {
  readonly out: string[] = [];
  readonly err: string[] = [];

  info(msg = ''): void {
    this.out.push(msg);
  }

  warn(msg: string): void {
    this.err.push(msg);
  }

  result(exitCode: number): RunResult {
    const join = (lines: string[]): string => (lines.length === 0 ? '' : lines.join('\n') + '\n');
    return { stdout: join(this.out), stderr: join(this.err), exitCode };
  }
}

// ─── Markets ──────────────────────────────────────────────────────────────────

interface Context {
  parsed: ParsedArgs;
  config: ClearingConfig;
  output: Output;
  logger: Logger;
  random: RandomSource;
}

interface Market {
  title: string;
  model: ValuationModel;
}

async function readMatrixFile(filePath: string): Promise<ValuationMatrix> {
  const content = await fs.readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    throw new ValidationError(`${filePath} is not valid JSON`, 'matrix', {
      cause: e instanceof Error ? e : undefined,
    });
  }
  // Either a bare array of rows or { "matrix": [...] }
  const matrix: unknown =
    typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'matrix' in raw ? raw.matrix : raw;
  validateValuationMatrix(matrix);
  return matrix;
}

function randomMarket(ctx: Context): Market {
  const { flags } = ctx.parsed;
  const buyers = getIntegerFlag(flags, 'buyers') ?? ctx.config.buyers ?? DEFAULT_BUYERS;
  // The subset check refuses larger markets, so fail before generating one
  const maxBuyers = hallCheckFor(ctx) === 'matching' ? Number.MAX_SAFE_INTEGER : MAX_SUBSET_BUYERS;
  validateRange(buyers, 1, maxBuyers, '--buyers');
  const maxValuation = getIntegerFlag(flags, 'max-valuation') ?? ctx.config.maxValuation ?? DEFAULT_MAX_VALUATION;
  const seed = getIntegerFlag(flags, 'seed') ?? ctx.config.seed;
  const random = seed === undefined ? ctx.random : mulberry32(seed);
  const seedLabel = seed === undefined ? '' : `, seed ${seed}`;
  return {
    title: `Random ${buyers} x ${buyers} market (max valuation ${maxValuation}${seedLabel})`,
    model: ValuationModel.random(buyers, maxValuation, random),
  };
}

async function resolveMarket(ctx: Context): Promise<Market> {
  const { flags } = ctx.parsed;
  const matrixFile = getFlag(flags, 'matrix');
  if (matrixFile !== undefined) {
    return { title: matrixFile, model: new ValuationModel(await readMatrixFile(matrixFile)) };
  }
  const exampleName = getFlag(flags, 'example');
  if (exampleName !== undefined) {
    const example = getExample(exampleName);
    return { title: example.description, model: new ValuationModel(example.matrix) };
  }
  return randomMarket(ctx);
}

function hallCheckFor(ctx: Context): HallCheckStrategy | undefined {
  const hallFlag = getFlag(ctx.parsed.flags, 'hall-check');
  if (hallFlag === undefined) return ctx.config.hallCheck;
  if (hallFlag !== 'subsets' && hallFlag !== 'matching') {
    throw new ValidationError(`--hall-check must be "subsets" or "matching" (got ${hallFlag})`, 'hall-check');
  }
  return hallFlag;
}

function solverOptions(ctx: Context): SolverOptions {
  return {
    hallCheck: hallCheckFor(ctx),
    maxIterations: getIntegerFlag(ctx.parsed.flags, 'max-iterations') ?? ctx.config.maxIterations,
    logger: ctx.logger,
  };
}

function wantsJson(ctx: Context): boolean {
  return ctx.parsed.flags['json'] === true || ctx.config.outputFormat === 'json';
}

// ─── Solving ──────────────────────────────────────────────────────────────────

interface SolveReport {
  title: string;
  original: number[][];
  adjusted: number[][];
  prices: number[];
  assignment: number[] | undefined;
  rounds: number;
  valid: boolean;
}

function solveMarket(ctx: Context, market: Market): SolveReport {
  const solver = new ClearingSolver(market.model, solverOptions(ctx));
  const prices = solver.solve();
  return {
    title: market.title,
    original: market.model.getOriginalMatrix(),
    adjusted: solver.getAdjustedMatrix(),
    prices,
    assignment: solver.getAssignment(),
    rounds: solver.getStats().lastSolveRounds,
    valid: solver.isValidPriceVector(prices),
  };
}

function printReport(output: Output, report: SolveReport): void {
  output.info(header(report.title));
  output.info('');
  output.info(bold('Original valuations'));
  output.info(formatMatrix(report.original));
  output.info('');
  output.info(bold('Adjusted valuations'));
  output.info(formatMatrix(report.adjusted));
  output.info('');
  output.info(`Prices:     ${formatVector(report.prices)}`);
  output.info(`Assignment: ${report.assignment ? formatAssignment(report.assignment) : '(none)'}`);
  output.info(`Rounds:     ${report.rounds}`);
  output.info(`Result:     ${verdict(report.valid)}`);
}

// ─── Command: solve ───────────────────────────────────────────────────────────

async function cmdSolve(ctx: Context): Promise<void> {
  const report = solveMarket(ctx, await resolveMarket(ctx));
  if (wantsJson(ctx)) {
    ctx.output.info(JSON.stringify(report, null, 2));
    return;
  }
  printReport(ctx.output, report);
}

// ─── Command: check ───────────────────────────────────────────────────────────

function parsePrices(list: string): number[] {
  return list.split(',').map((part, j) => {
    const trimmed = part.trim();
    const price = trimmed === '' ? NaN : Number(trimmed);
    validateInteger(price, `prices[${j}]`);
    return price;
  });
}

async function cmdCheck(ctx: Context): Promise<void> {
  const prices = parsePrices(requireFlag(ctx.parsed.flags, 'prices', 'a,b,c'));
  const market = await resolveMarket(ctx);
  if (prices.length !== market.model.size) {
    throw new InvalidPriceVectorLengthError(market.model.size, prices.length);
  }
  const solver = new ClearingSolver(market.model, solverOptions(ctx));
  const clears = solver.checkClears(prices);

  if (wantsJson(ctx)) {
    ctx.output.info(JSON.stringify({ title: market.title, prices, clears }, null, 2));
    return;
  }
  ctx.output.info(header(market.title));
  ctx.output.info('');
  ctx.output.info(`Prices: ${formatVector(prices)}`);
  ctx.output.info(`Result: ${verdict(clears)}`);
}

// ─── Command: examples ────────────────────────────────────────────────────────

function cmdExamples(ctx: Context): void {
  const markets: Market[] = [
    randomMarket(ctx),
    ...loadExamples().map((e) => ({ title: e.description, model: new ValuationModel(e.matrix) })),
  ];
  const reports = markets.map((market) => solveMarket(ctx, market));

  if (wantsJson(ctx)) {
    ctx.output.info(JSON.stringify(reports, null, 2));
    return;
  }
  reports.forEach((report, i) => {
    if (i > 0) ctx.output.info('');
    printReport(ctx.output, report);
  });
}

// ─── Command: help ────────────────────────────────────────────────────────────

function cmdHelp(output: Output): void {
  output.info('');
  output.info('clearing - market-clearing prices for unit-demand markets');
  output.info('');
  output.info('Usage: clearing <command> [options]');
  output.info('');
  output.info('Commands:');
  output.info('');
  output.info('  solve                         Find clearing prices and an assignment');
  output.info('  check                         Test whether a price vector clears a market');
  output.info('    --prices <a,b,c>              Comma-separated prices (required)');
  output.info('  examples                      Solve a random market and the bundled samples');
  output.info('  help                          Show this help message');
  output.info('  version                       Show version information');
  output.info('');
  output.info('Market source (solve, check):');
  output.info('');
  output.info('  --matrix <file.json>          Square matrix of non-negative integers');
  output.info('  --example <name>              Bundled example (sample-3x3, sample-5x5)');
  output.info('  --buyers <n>                  Random market size (default: 4)');
  output.info('  --max-valuation <n>           Largest random valuation (default: 8)');
  output.info('  --seed <n>                    Seed for a reproducible random market');
  output.info('');
  output.info('Solver:');
  output.info('');
  output.info('  --hall-check <strategy>       subsets (default) or matching');
  output.info('  --max-iterations <n>          Give up after this many rounds');
  output.info('');
  output.info('Output:');
  output.info('');
  output.info('  --json                        Print JSON instead of text');
  output.info('  --no-color                    Disable ANSI colors');
  output.info('');
  output.info('Defaults are read from clearing.config.json in the working directory or above.');
  output.info('');
}

// ─── Command: version ─────────────────────────────────────────────────────────

function cmdVersion(output: Output): void {
  output.info(`clearing v${VERSION}`);
}

// ─── Entry point ──────────────────────────────────────────────────────────────

function describeError(err: unknown): string {
  if (err instanceof ClearingError) {
    return formatError(err);
  }
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    const missing = 'path' in err && typeof err.path === 'string' ? err.path : err.message;
    return `File not found: ${missing}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Run one CLI invocation.
 *
 * @param args - The arguments after the executable, e.g. `['solve', '--seed', '7']`.
 */
export async function run(args: string[], options: RunOptions = {}): Promise<RunResult> {
  const output = new Output();
  const parsed = parseArgs(args);

  setColorsEnabled(parsed.flags['no-color'] !== true);

  if (!parsed.command || parsed.command === 'help' || parsed.flags['help'] !== undefined) {
    cmdHelp(output);
    return output.result(0);
  }

  if (parsed.command === 'version' || parsed.flags['version'] !== undefined) {
    cmdVersion(output);
    return output.result(0);
  }

  try {
    const ctx: Context = {
      parsed,
      config: loadConfig(options.cwd),
      output,
      logger: createLogger({
        component: 'cli',
        level: logLevelFromEnv(LogLevel.WARN, options.env),
        output: (entry) => output.warn(JSON.stringify(entry)),
      }),
      random: options.random ?? Math.random,
    };

    switch (parsed.command) {
      case 'solve':
        await cmdSolve(ctx);
        break;

      case 'check':
        await cmdCheck(ctx);
        break;

      case 'examples':
        cmdExamples(ctx);
        break;

      default:
        throw new ValidationError(`Unknown command: '${parsed.command}'. Run 'clearing help' for usage.`, 'command');
    }
  } catch (err) {
    output.warn(`Error: ${describeError(err)}`);
    return output.result(1);
  }

  return output.result(0);
}
