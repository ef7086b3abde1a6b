import type { RandomSource } from './types';

/**
 * Deterministic 32-bit generator. The same seed always yields the same
 * sequence, which makes random markets reproducible in tests and from
 * the CLI's `--seed` flag.
 */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in `[min, max]` drawn from `random`. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
