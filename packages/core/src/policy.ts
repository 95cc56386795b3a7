import type {
  PolicySettings,
  StrategyPolicySettings,
  ThresholdPolicySettings,
} from '@gear-upgrade/upgrade-schema';

import type { AlternatePathConfig, ModifierTier } from './transition-config.js';

/**
 * Caller-supplied decisions. The engine consults the policy at fixed points
 * of each attempt and never second-guesses the answer.
 */
export interface Policy {
  selectModifier(targetTier: number): ModifierTier;
  /** Asked only after a failed attempt, with the tier the gear failed from. */
  shouldRecover(currentTier: number): boolean;
  engageAlternatePath(path: AlternatePathConfig): boolean;
}

export const BASELINE_POLICY: Policy = Object.freeze({
  selectModifier: (): ModifierTier => 'none',
  shouldRecover: () => false,
  engageAlternatePath: () => false,
});

const COST_EFFICIENT_RECOVERY_FROM = 4;
const OPTIMAL_MAJOR_FROM = 7;
const OPTIMAL_MINOR_FROM = 4;

const engagesListedPaths = (ids: readonly string[]) => {
  const engaged = new Set(ids);
  return (path: AlternatePathConfig): boolean => engaged.has(path.id);
};

/**
 * Each boost applies from its tier onward; the largest applicable boost wins.
 * A threshold of 0 disables that boost (or recovery).
 */
export function createThresholdPolicy(settings: ThresholdPolicySettings): Policy {
  const { minor, major, grand } = settings.modifiersFrom;
  const applies = (from: number, targetTier: number) => from > 0 && targetTier >= from;

  return Object.freeze({
    selectModifier(targetTier: number): ModifierTier {
      if (applies(grand, targetTier)) {
        return 'grand';
      }
      if (applies(major, targetTier)) {
        return 'major';
      }
      if (applies(minor, targetTier)) {
        return 'minor';
      }
      return 'none';
    },
    shouldRecover: (currentTier: number) =>
      settings.recoveryFrom > 0 && currentTier >= settings.recoveryFrom,
    engageAlternatePath: engagesListedPaths(settings.alternatePaths),
  });
}

export function createStrategyPolicy(settings: StrategyPolicySettings): Policy {
  const selectModifier = (targetTier: number): ModifierTier => {
    switch (settings.modifiers) {
      case 'never':
        return 'none';
      case 'minor-only':
        return 'minor';
      case 'major-only':
        return 'major';
      case 'major-high-tier':
        return targetTier >= settings.majorModifierThreshold ? 'major' : 'none';
      case 'optimal':
        if (targetTier >= OPTIMAL_MAJOR_FROM) {
          return 'major';
        }
        return targetTier >= OPTIMAL_MINOR_FROM ? 'minor' : 'none';
    }
  };

  const shouldRecover = (currentTier: number): boolean => {
    switch (settings.recovery) {
      case 'never':
        return false;
      case 'always':
        return true;
      case 'above-threshold':
        return currentTier >= settings.recoveryThreshold;
      case 'cost-efficient':
        return currentTier >= COST_EFFICIENT_RECOVERY_FROM;
    }
  };

  return Object.freeze({
    selectModifier,
    shouldRecover,
    engageAlternatePath: engagesListedPaths(settings.alternatePaths),
  });
}

export function createPolicy(settings: PolicySettings): Policy {
  return settings.kind === 'threshold'
    ? createThresholdPolicy(settings)
    : createStrategyPolicy(settings);
}
