const STATE_INCREMENT = 0x6d2b79f5;
const GOLDEN_RATIO_32 = 0x9e3779b9;

/**
 * Uniform draws in [0, 1). Resolvers only ever call `next`, so tests can
 * substitute a scripted source.
 */
export interface RandomSource {
  next(): number;
}

export interface SeededRandomSource extends RandomSource {
  readonly seed: number;
  getState(): number;
}

export function normalizeSeed(seed: number): number {
  if (!Number.isFinite(seed)) {
    throw new Error('RNG seed must be a finite number.');
  }
  return Math.trunc(seed) >>> 0;
}

/**
 * Mulberry32 stream. Each run owns one; nothing is shared between runs.
 */
export function createRandomSource(seed: number): SeededRandomSource {
  const normalized = normalizeSeed(seed);
  let state = normalized || 0x1;

  return {
    seed: normalized,
    getState: () => state,
    next(): number {
      state = (state + STATE_INCREMENT) | 0;
      let t = Math.imul(state ^ (state >>> 15), 1 | state);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Seed for run `runIndex` of a batch seeded with `baseSeed`. The index is
 * spread by the golden ratio and passed through the murmur3 finalizer so
 * neighbouring runs do not get neighbouring mulberry32 states.
 */
export function deriveRunSeed(baseSeed: number, runIndex: number): number {
  let z = (normalizeSeed(baseSeed) + Math.imul(runIndex + 1, GOLDEN_RATIO_32)) >>> 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) >>> 0;
}

export function createEntropySeed(): number {
  return Math.floor(Math.random() * 0xffffffff) >>> 0;
}
