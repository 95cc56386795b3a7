import { describe, expect, it } from 'vitest';

import { parsePolicySettings } from '@gear-upgrade/upgrade-schema';

import {
  BASELINE_POLICY,
  createPolicy,
  createStrategyPolicy,
  createThresholdPolicy,
} from './policy.js';
import { createTestConfig } from './test-utils.js';

const config = createTestConfig({
  rates: Array.from({ length: 10 }, () => 0.5),
  alternatePaths: [
    { id: 'hepta', entryTier: 7, length: 5, successRate: 0.07 },
    { id: 'okta', entryTier: 8, length: 10, successRate: 0.07 },
  ],
});
const [hepta, okta] = config.alternatePaths;

describe('BASELINE_POLICY', () => {
  it('never boosts, recovers or engages a path', () => {
    expect(BASELINE_POLICY.selectModifier(10)).toBe('none');
    expect(BASELINE_POLICY.shouldRecover(9)).toBe(false);
    expect(BASELINE_POLICY.engageAlternatePath(hepta)).toBe(false);
  });
});

describe('createThresholdPolicy', () => {
  const policy = createThresholdPolicy({
    kind: 'threshold',
    modifiersFrom: { minor: 1, major: 3, grand: 5 },
    recoveryFrom: 6,
    alternatePaths: ['okta'],
  });

  it('picks the largest boost whose threshold the target tier reaches', () => {
    expect([1, 2, 3, 4, 5, 9].map((tier) => policy.selectModifier(tier))).toEqual([
      'minor',
      'minor',
      'major',
      'major',
      'grand',
      'grand',
    ]);
  });

  it('recovers from the configured tier onward', () => {
    expect(policy.shouldRecover(5)).toBe(false);
    expect(policy.shouldRecover(6)).toBe(true);
  });

  it('engages only listed paths', () => {
    expect(policy.engageAlternatePath(hepta)).toBe(false);
    expect(policy.engageAlternatePath(okta)).toBe(true);
  });

  it('treats zero thresholds as disabled', () => {
    const inert = createThresholdPolicy({
      kind: 'threshold',
      modifiersFrom: { minor: 0, major: 0, grand: 0 },
      recoveryFrom: 0,
      alternatePaths: [],
    });

    expect(inert.selectModifier(10)).toBe('none');
    expect(inert.shouldRecover(10)).toBe(false);
  });
});

describe('createStrategyPolicy', () => {
  const strategy = (input: Record<string, unknown>) => {
    const settings = parsePolicySettings({ kind: 'strategy', ...input });
    if (settings.kind !== 'strategy') {
      throw new Error('expected strategy settings');
    }
    return createStrategyPolicy(settings);
  };

  it('applies the recovery strategies', () => {
    expect(strategy({ recovery: 'never' }).shouldRecover(9)).toBe(false);
    expect(strategy({ recovery: 'always' }).shouldRecover(1)).toBe(true);

    const above = strategy({ recovery: 'above-threshold', recoveryThreshold: 5 });
    expect(above.shouldRecover(4)).toBe(false);
    expect(above.shouldRecover(5)).toBe(true);

    const efficient = strategy({ recovery: 'cost-efficient' });
    expect(efficient.shouldRecover(3)).toBe(false);
    expect(efficient.shouldRecover(4)).toBe(true);
  });

  it('applies the modifier strategies', () => {
    expect(strategy({ modifiers: 'never' }).selectModifier(10)).toBe('none');
    expect(strategy({ modifiers: 'minor-only' }).selectModifier(1)).toBe('minor');
    expect(strategy({ modifiers: 'major-only' }).selectModifier(1)).toBe('major');

    const highTier = strategy({ modifiers: 'major-high-tier' });
    expect(highTier.selectModifier(5)).toBe('none');
    expect(highTier.selectModifier(6)).toBe('major');

    const optimal = strategy({ modifiers: 'optimal' });
    expect([3, 4, 6, 7].map((tier) => optimal.selectModifier(tier))).toEqual([
      'none',
      'minor',
      'minor',
      'major',
    ]);
  });
});

describe('createPolicy', () => {
  it('dispatches on the settings kind', () => {
    const threshold = createPolicy(
      parsePolicySettings({ kind: 'threshold', recoveryFrom: 2 }),
    );
    const strategy = createPolicy(
      parsePolicySettings({ kind: 'strategy', recovery: 'never', alternatePaths: ['hepta'] }),
    );

    expect(threshold.shouldRecover(2)).toBe(true);
    expect(strategy.shouldRecover(2)).toBe(false);
    expect(strategy.engageAlternatePath(hepta)).toBe(true);
  });
});
