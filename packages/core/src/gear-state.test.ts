import { describe, expect, it } from 'vitest';

import { InvalidConfigurationError } from './errors.js';
import {
  assertGearState,
  cloneGearState,
  createGearState,
  getPityEnergy,
} from './gear-state.js';
import { createTestConfig } from './test-utils.js';

const config = createTestConfig({
  rates: [0.9, 0.8, 0.7, 0.6],
  alternatePaths: [
    { id: 'hepta', entryTier: 2, length: 4, successRate: 0.5 },
    { id: 'okta', entryTier: 3, length: 2, successRate: 0.5 },
  ],
});

describe('createGearState', () => {
  it('starts at tier 0 with empty pity and paths', () => {
    const state = createGearState(config);

    expect(state.tier).toBe(0);
    expect(Array.from(state.pityEnergy)).toEqual([0, 0, 0, 0, 0]);
    expect(state.paths).toEqual([
      { progress: 0, pity: 0 },
      { progress: 0, pity: 0 },
    ]);
  });

  it('applies starting tier, pity energy and path progress', () => {
    const state = createGearState(config, {
      tier: 2,
      pityEnergy: { 3: 5 },
      pathProgress: { hepta: 3 },
    });

    expect(state.tier).toBe(2);
    expect(getPityEnergy(state, 3)).toBe(5);
    expect(state.paths[0]).toEqual({ progress: 3, pity: 0 });
  });

  it('rejects out-of-range starting tiers', () => {
    expect(() => createGearState(config, { tier: 5 })).toThrowError(
      'Starting tier 5 is outside 0..4.',
    );
    expect(() => createGearState(config, { tier: -1 })).toThrowError(
      InvalidConfigurationError,
    );
  });

  it('rejects path progress away from the entry tier', () => {
    expect(() =>
      createGearState(config, { tier: 1, pathProgress: { okta: 1 } }),
    ).toThrowError(
      'Path "okta" has progress 1 but gear is at tier 1, not entry tier 3.',
    );
  });

  it('rejects progress at or beyond the path length', () => {
    expect(() =>
      createGearState(config, { tier: 3, pathProgress: { okta: 2 } }),
    ).toThrowError('Progress 2 on path "okta" must be an integer in 0..1.');
  });

  it('rejects unknown paths and pity tiers', () => {
    expect(() => createGearState(config, { pathProgress: { deca: 1 } })).toThrowError(
      'Unknown alternate path "deca".',
    );
    expect(() => createGearState(config, { pityEnergy: { 0: 1 } })).toThrowError(
      'Pity energy given for unknown tier 0.',
    );
  });
});

describe('cloneGearState', () => {
  it('copies every mutable part', () => {
    const original = createGearState(config, { tier: 2, pathProgress: { hepta: 1 } });
    const copy = cloneGearState(original);

    copy.tier = 0;
    copy.pityEnergy[3] = 9;
    copy.paths[0].progress = 0;

    expect(original.tier).toBe(2);
    expect(original.pityEnergy[3]).toBe(0);
    expect(original.paths[0].progress).toBe(1);
  });
});

describe('assertGearState', () => {
  it('rejects a state built for a different table', () => {
    const other = createTestConfig({ rates: [0.5] });
    const state = createGearState(other);

    expect(() => assertGearState(state, config)).toThrowError(
      'Gear state does not match table "test-table".',
    );
  });
});
