import type { ConsumableId } from '@gear-upgrade/upgrade-schema';

import { InvalidConfigurationError } from './errors.js';
import type { GearState } from './gear-state.js';
import { addConsumed, type SubAttemptOutcome } from './outcomes.js';
import type { Policy } from './policy.js';
import type { RandomSource } from './rng.js';
import type { AlternatePathConfig, TransitionConfig } from './transition-config.js';

/**
 * A path is worked while the gear sits at its entry tier and the path is not
 * yet complete. The policy decides whether to start; once progress is
 * nonzero the path is continued regardless.
 */
export function isAlternatePathEligible(
  state: GearState,
  config: TransitionConfig,
  policy: Policy,
  pathIndex: number,
): boolean {
  const path = config.alternatePaths[pathIndex];
  const progress = state.paths[pathIndex];
  if (!path || !progress) {
    return false;
  }
  if (state.tier !== path.entryTier || progress.progress >= path.length) {
    return false;
  }
  return progress.progress > 0 || policy.engageAlternatePath(path);
}

export function selectAlternatePath(
  state: GearState,
  config: TransitionConfig,
  policy: Policy,
): number | undefined {
  for (let index = 0; index < config.alternatePaths.length; index += 1) {
    if (isAlternatePathEligible(state, config, policy, index)) {
      return index;
    }
  }
  return undefined;
}

function requirePath(config: TransitionConfig, pathIndex: number): AlternatePathConfig {
  const path = config.alternatePaths[pathIndex];
  if (!path) {
    throw new InvalidConfigurationError(
      `No alternate path at index ${pathIndex}; "${config.tableId}" declares ${config.alternatePaths.length}.`,
    );
  }
  return path;
}

/**
 * Resolves one sub-step on an alternate path. Completing the final sub-step
 * moves the gear to `entryTier + 1`, clears that tier's pity energy and
 * resets the path. A failure only adds sub-pity; it never lowers the tier.
 */
export function resolveSubAttempt(
  state: GearState,
  config: TransitionConfig,
  pathIndex: number,
  random: RandomSource,
): SubAttemptOutcome {
  const path = requirePath(config, pathIndex);
  const progress = state.paths[pathIndex];
  if (state.tier !== path.entryTier) {
    throw new InvalidConfigurationError(
      `Path "${path.id}" starts at tier ${path.entryTier}; gear is at tier ${state.tier}.`,
    );
  }
  if (progress.progress >= path.length) {
    throw new InvalidConfigurationError(`Path "${path.id}" is already complete.`);
  }

  const consumed: Partial<Record<ConsumableId, number>> = {};
  addConsumed(consumed, path.consumable, path.quantity);

  const startingTier = state.tier;
  const pityTriggered = path.pityThreshold > 0 && progress.pity >= path.pityThreshold;
  const success = pityTriggered || random.next() < path.successRate;

  if (!success) {
    progress.pity += 1;
    return {
      kind: 'alternate',
      pathId: path.id,
      success,
      pityTriggered,
      startingTier,
      endingTier: startingTier,
      progress: progress.progress,
      pity: progress.pity,
      pathComplete: false,
      consumed,
    };
  }

  progress.progress += 1;
  progress.pity = 0;
  const pathComplete = progress.progress >= path.length;
  if (pathComplete) {
    const nextTier = path.entryTier + 1;
    state.tier = nextTier;
    state.pityEnergy[nextTier] = 0;
    progress.progress = 0;
  }

  return {
    kind: 'alternate',
    pathId: path.id,
    success,
    pityTriggered,
    startingTier,
    endingTier: state.tier,
    progress: progress.progress,
    pity: progress.pity,
    pathComplete,
    consumed,
  };
}
