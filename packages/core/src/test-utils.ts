import type { TransitionTableInput } from '@gear-upgrade/upgrade-schema';

import type { RandomSource } from './rng.js';
import { createTransitionConfig, type TransitionConfig } from './transition-config.js';

type AlternatePathInput = NonNullable<TransitionTableInput['alternatePaths']>[number];

export interface TestTableOptions {
  /** `rates[i]` is the base rate for target tier `i + 1`. */
  readonly rates: readonly number[];
  readonly pityThresholds?: readonly number[];
  readonly recoveryRate?: number;
  readonly recoveryQuantity?: number;
  readonly alternatePaths?: readonly AlternatePathInput[];
}

export function createTestConfig(options: TestTableOptions): TransitionConfig {
  return createTransitionConfig({
    metadata: { id: 'test-table', title: 'Test table', version: '1.0.0' },
    maxTier: options.rates.length,
    tiers: options.rates.map((successRate, index) => ({
      tier: index + 1,
      successRate,
      pityThreshold: options.pityThresholds?.[index] ?? 0,
    })),
    recovery: {
      successRate: options.recoveryRate ?? 0.5,
      quantity: options.recoveryQuantity ?? 1,
    },
    alternatePaths: options.alternatePaths ? [...options.alternatePaths] : [],
  });
}

/**
 * Replays the given draws in order, then throws so a test notices when the
 * code under test draws more often than expected.
 */
export function createScriptedRandom(draws: readonly number[]): RandomSource & {
  readonly consumed: () => number;
} {
  let index = 0;
  return {
    next(): number {
      if (index >= draws.length) {
        throw new Error(`Scripted random exhausted after ${draws.length} draws.`);
      }
      const value = draws[index];
      index += 1;
      return value;
    },
    consumed: () => index,
  };
}

export function createConstantRandom(value: number): RandomSource {
  return { next: () => value };
}
