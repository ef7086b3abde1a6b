import { describe, it, expect, afterEach } from 'vitest';
import {
  colors,
  setColorsEnabled,
  getColorsEnabled,
  bold,
  green,
  red,
  dim,
  header,
  verdict,
  stripAnsi,
  formatMatrix,
  formatVector,
  formatAssignment,
} from './format';

afterEach(() => {
  setColorsEnabled(true);
});

// ---------------------------------------------------------------------------
// stripAnsi
// ---------------------------------------------------------------------------

describe('stripAnsi', () => {
  it('removes color codes', () => {
    expect(stripAnsi('\x1b[31mred\x1b[0m')).toBe('red');
  });

  it('removes stacked sequences', () => {
    expect(stripAnsi('\x1b[1m\x1b[32mok\x1b[0m')).toBe('ok');
  });

  it('returns plain strings unchanged', () => {
    expect(stripAnsi('no ansi here')).toBe('no ansi here');
  });
});

// ---------------------------------------------------------------------------
// color toggle
// ---------------------------------------------------------------------------

describe('color toggle', () => {
  it('is enabled by default', () => {
    expect(getColorsEnabled()).toBe(true);
  });

  it('wraps text while enabled', () => {
    expect(bold('x')).toBe(`${colors.bold}x${colors.reset}`);
    expect(green('x')).toBe(`${colors.green}x${colors.reset}`);
    expect(red('x')).toBe(`${colors.red}x${colors.reset}`);
  });

  it('returns plain text while disabled', () => {
    setColorsEnabled(false);
    expect(getColorsEnabled()).toBe(false);
    expect(bold('x')).toBe('x');
    expect(dim('x')).toBe('x');
  });
});

// ---------------------------------------------------------------------------
// semantic formatters
// ---------------------------------------------------------------------------

describe('header() and verdict()', () => {
  it('frames the title', () => {
    setColorsEnabled(false);
    expect(header('Sample')).toBe('=== Sample ===');
  });

  it('colors the verdict', () => {
    expect(verdict(true)).toBe(`${colors.green}market clears${colors.reset}`);
    expect(verdict(false)).toBe(`${colors.red}market does not clear${colors.reset}`);
  });
});

// ---------------------------------------------------------------------------
// market rendering
// ---------------------------------------------------------------------------

describe('formatMatrix()', () => {
  it('labels rows and columns', () => {
    setColorsEnabled(false);
    expect(
      formatMatrix([
        [6, 5, 2],
        [7, 6, 3],
        [6, 7, 6],
      ]),
    ).toBe(['   P0 P1 P2', 'B0  6  5  2', 'B1  7  6  3', 'B2  6  7  6'].join('\n'));
  });

  it('widens every column to the widest cell', () => {
    setColorsEnabled(false);
    expect(
      formatMatrix([
        [12, 3],
        [0, 100],
      ]),
    ).toBe(['     P0  P1', ' B0  12   3', ' B1   0 100'].join('\n'));
  });

  it('dims the column labels', () => {
    const lines = formatMatrix([[1]]).split('\n');
    expect(lines[0]).toBe(`${colors.gray}   P0${colors.reset}`);
    expect(lines[1]).toBe('B0  1');
  });

  it('renders negative adjusted values', () => {
    setColorsEnabled(false);
    expect(formatMatrix([[-4, 1], [0, 0]]).split('\n')[1]).toBe('B0 -4  1');
  });
});

describe('formatVector()', () => {
  it('lists values in brackets', () => {
    expect(formatVector([2, 1, 0])).toBe('[2, 1, 0]');
    expect(formatVector([])).toBe('[]');
  });
});

describe('formatAssignment()', () => {
  it('pairs each buyer with its product', () => {
    expect(formatAssignment([1, 0, 2])).toBe('B0 -> P1, B1 -> P0, B2 -> P2');
  });
});
