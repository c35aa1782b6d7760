/**
 * Random sources
 *
 * Each engine owns one source; nothing here touches Math.random or any
 * other process-wide generator.
 */

import seedrandom from 'seedrandom';

/** Uniform draws in [0, 1) */
export interface RandomSource {
  next(): number;
}

export type Seed = string | number;

/**
 * Deterministic source: equal seeds give equal sequences.
 * Numeric seeds are stringified, so `42` and `'42'` are the same seed.
 */
export function createSeededRandom(seed: Seed): RandomSource {
  const prng = seedrandom(String(seed));
  return { next: () => prng() };
}

/** Auto-seeded source for runs that need no reproducibility */
export function createDefaultRandom(): RandomSource {
  const prng = seedrandom();
  return { next: () => prng() };
}
