/**
 * Terminal formatting for the clearing CLI: ANSI colors that can be
 * switched off globally, and renderers for matrices, price vectors and
 * assignments.
 *
 * @packageDocumentation
 */

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

let colorsEnabled = true;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

function c(code: string, text: string): string {
  if (!colorsEnabled) return text;
  return `${code}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return c(colors.bold, text);
}

export function green(text: string): string {
  return c(colors.green, text);
}

export function red(text: string): string {
  return c(colors.red, text);
}

export function yellow(text: string): string {
  return c(colors.yellow, text);
}

export function cyan(text: string): string {
  return c(colors.cyan, text);
}

export function dim(text: string): string {
  return c(colors.gray, text);
}

/** Section title, e.g. `=== Sample 3 x 3 ===`. */
export function header(title: string): string {
  return bold(`=== ${title} ===`);
}

/** Verdict line for a price vector check. */
export function verdict(clears: boolean): string {
  return clears ? green('market clears') : red('market does not clear');
}

/** Strip all ANSI escape sequences from a string. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Market rendering ─────────────────────────────────────────────────────────

/**
 * Render a buyer-by-product matrix with `B<i>` row and `P<j>` column labels,
 * every cell right-aligned to the widest entry.
 *
 * ```
 *    P0 P1 P2
 * B0  6  5  2
 * B1  7  6  3
 * ```
 */
export function formatMatrix(matrix: readonly (readonly number[])[]): string {
  const columns = matrix.length === 0 ? 0 : matrix[0].length;
  const head = ['', ...Array.from({ length: columns }, (_, j) => `P${j}`)];
  const rows = matrix.map((row, i) => [`B${i}`, ...row.map(String)]);

  let width = 0;
  for (const cell of [...head, ...rows.flat()]) {
    if (cell.length > width) width = cell.length;
  }
  const line = (cells: string[]): string => cells.map((cell) => cell.padStart(width)).join(' ');

  return [dim(line(head)), ...rows.map(line)].join('\n');
}

/** `[2, 1, 0]` */
export function formatVector(values: readonly number[]): string {
  return `[${values.join(', ')}]`;
}

/** `B0 -> P1, B1 -> P0` */
export function formatAssignment(assignment: readonly number[]): string {
  return assignment.map((product, buyer) => `B${buyer} -> P${product}`).join(', ');
}
