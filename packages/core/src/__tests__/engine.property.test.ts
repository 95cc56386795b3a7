import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { resolveSubAttempt } from '../alternate-path-resolver.js';
import { createGearState } from '../gear-state.js';
import { createPolicy, type Policy } from '../policy.js';
import { createRandomSource, type RandomSource } from '../rng.js';
import { runMonteCarlo } from '../monte-carlo.js';
import { stepGear } from '../run-driver.js';
import { createTestConfig } from '../test-utils.js';
import { computeEffectiveRate, resolveAttempt } from '../transition-resolver.js';

const PROPERTY_SEED = 731_001;
const PROPERTY_RUNS = 200;

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  seed: PROPERTY_SEED + offset,
  numRuns: PROPERTY_RUNS,
  endOnFailure: true,
});

const config = createTestConfig({
  rates: [0.6, 0.5, 0.4, 0.3, 0.2],
  pityThresholds: [0, 3, 4, 0, 5],
  recoveryRate: 0.5,
  alternatePaths: [
    { id: 'hepta', entryTier: 3, length: 3, successRate: 0.3, pityThreshold: 4 },
  ],
});

// Draws in [0, 1) at 1/1000 resolution, replayed cyclically.
const drawsArbitrary = fc
  .array(fc.integer({ min: 0, max: 999 }), { minLength: 1, maxLength: 64 })
  .map((values) => values.map((value) => value / 1000));

const cyclicRandom = (draws: readonly number[]): RandomSource => {
  let index = 0;
  return {
    next(): number {
      const value = draws[index % draws.length];
      index += 1;
      return value;
    },
  };
};

const policyArbitrary: fc.Arbitrary<Policy> = fc
  .record({
    minor: fc.integer({ min: 0, max: 5 }),
    major: fc.integer({ min: 0, max: 5 }),
    grand: fc.integer({ min: 0, max: 5 }),
    recoveryFrom: fc.integer({ min: 0, max: 5 }),
    engage: fc.boolean(),
  })
  .map(({ minor, major, grand, recoveryFrom, engage }) =>
    createPolicy({
      kind: 'threshold',
      modifiersFrom: { minor, major, grand },
      recoveryFrom,
      alternatePaths: engage ? ['hepta'] : [],
    }),
  );

describe('engine invariants', () => {
  it('moves pity energy by exactly one on failure and resets it on success', () => {
    fc.assert(
      fc.property(drawsArbitrary, policyArbitrary, (draws, policy) => {
        const state = createGearState(config);
        const random = cyclicRandom(draws);

        for (let step = 0; step < 100 && state.tier < config.maxTier; step += 1) {
          const target = state.tier + 1;
          const before = state.pityEnergy[target];
          const outcome = resolveAttempt(state, config, policy, random);

          expect(state.pityEnergy[target]).toBe(outcome.success ? 0 : before + 1);
        }
      }),
      propertyConfig(0),
    );
  });

  it('never leaves tier 0 downward and moves at most one tier per step', () => {
    fc.assert(
      fc.property(drawsArbitrary, policyArbitrary, (draws, policy) => {
        const state = createGearState(config);
        const random = cyclicRandom(draws);

        for (let step = 0; step < 100 && state.tier < config.maxTier; step += 1) {
          const before = state.tier;
          const outcome = stepGear(state, config, policy, random);

          expect(state.tier).toBeGreaterThanOrEqual(0);
          expect(Math.abs(state.tier - before)).toBeLessThanOrEqual(1);
          if (outcome.kind === 'main' && before === 0) {
            expect(state.tier).toBeGreaterThanOrEqual(0);
            expect(outcome.recoveryAttempted).toBe(false);
          }
        }
      }),
      propertyConfig(1),
    );
  });

  it('changes the tier on an alternate path only when the path completes', () => {
    fc.assert(
      fc.property(drawsArbitrary, (draws) => {
        const state = createGearState(config, { tier: 3 });
        const random = cyclicRandom(draws);

        while (state.tier === 3) {
          const outcome = resolveSubAttempt(state, config, 0, random);

          if (outcome.pathComplete) {
            expect(outcome.endingTier).toBe(4);
            expect(state.paths[0]).toEqual({ progress: 0, pity: 0 });
          } else {
            expect(state.tier).toBe(3);
            expect(outcome.progress).toBeLessThan(3);
          }
        }
      }),
      propertyConfig(2),
    );
  });

  it('keeps effective rates within (0, 1]', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 5 }),
        fc.constantFrom('minor' as const, 'major' as const, 'grand' as const),
        (tier, modifier) => {
          const rate = computeEffectiveRate(config, tier, config.modifiers[modifier]);

          expect(rate).toBeGreaterThan(0);
          expect(rate).toBeLessThanOrEqual(1);
        },
      ),
      propertyConfig(3),
    );
  });

  it('replays identical statistics for the same seed', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), policyArbitrary, (seed, policy) => {
        const run = () =>
          runMonteCarlo({ config, policy, targetTier: 5, runs: 5, seed });

        expect(run()).toEqual(run());
      }),
      { ...propertyConfig(4), numRuns: 25 },
    );
  });

  it('draws from per-run streams that do not interfere', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), (seed) => {
        const solo = createRandomSource(seed);
        const expected = [solo.next(), solo.next(), solo.next()];

        const interleaved = createRandomSource(seed);
        const other = createRandomSource(seed ^ 0x5bd1e995);
        const actual: number[] = [];
        for (let i = 0; i < 3; i += 1) {
          other.next();
          actual.push(interleaved.next());
        }

        expect(actual).toEqual(expected);
      }),
      propertyConfig(5),
    );
  });
});
