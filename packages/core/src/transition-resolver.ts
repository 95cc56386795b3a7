import type { ConsumableId } from '@gear-upgrade/upgrade-schema';

import { AlreadyAtTargetError } from './errors.js';
import type { GearState } from './gear-state.js';
import {
  CERTAINTY,
  ceilingStage,
  createSuccessRatePipeline,
  multiplierStage,
} from './modifiers/success-rate.js';
import { addConsumed, type AttemptOutcome } from './outcomes.js';
import type { Policy } from './policy.js';
import type { RandomSource } from './rng.js';
import {
  getBaseRate,
  getModifier,
  getPityThreshold,
  type ModifierConfig,
  type TransitionConfig,
} from './transition-config.js';

const successRatePipeline = createSuccessRatePipeline<ModifierConfig | undefined>([
  multiplierStage((modifier) => modifier?.ratio ?? 1),
  ceilingStage(CERTAINTY),
]);

export function computeEffectiveRate(
  config: TransitionConfig,
  targetTier: number,
  modifier: ModifierConfig | undefined,
): number {
  return successRatePipeline.apply(getBaseRate(config, targetTier), modifier);
}

/**
 * Resolves one attempt at `state.tier + 1`, mutating `state` in place.
 *
 * Pity is checked before the draw: once the energy stored for the target tier
 * reaches its threshold the attempt succeeds without consuming randomness.
 * A failure adds one unit of energy, then either a recovery draw or the
 * policy's refusal decides whether the gear drops a tier. Tier 0 never drops.
 */
export function resolveAttempt(
  state: GearState,
  config: TransitionConfig,
  policy: Policy,
  random: RandomSource,
): AttemptOutcome {
  if (state.tier >= config.maxTier) {
    throw new AlreadyAtTargetError(state.tier, config.maxTier);
  }

  const startingTier = state.tier;
  const targetTier = startingTier + 1;
  const modifier = policy.selectModifier(targetTier);
  const modifierConfig = getModifier(config, modifier);
  const effectiveRate = computeEffectiveRate(config, targetTier, modifierConfig);

  const threshold = getPityThreshold(config, targetTier);
  const pityTriggered = threshold > 0 && state.pityEnergy[targetTier] >= threshold;
  const success = pityTriggered || random.next() < effectiveRate;

  const consumed: Partial<Record<ConsumableId, number>> = {};
  addConsumed(consumed, config.material.consumable, config.material.quantity);
  if (modifierConfig) {
    addConsumed(consumed, modifierConfig.consumable, 1);
  }

  if (success) {
    state.tier = targetTier;
    state.pityEnergy[targetTier] = 0;
    return {
      kind: 'main',
      success,
      pityTriggered,
      startingTier,
      endingTier: targetTier,
      modifier,
      effectiveRate,
      recoveryAttempted: false,
      recoverySuccess: false,
      consumed,
    };
  }

  state.pityEnergy[targetTier] += 1;

  let recoveryAttempted = false;
  let recoverySuccess = false;
  if (startingTier > 0) {
    if (policy.shouldRecover(startingTier)) {
      recoveryAttempted = true;
      addConsumed(consumed, config.recovery.consumable, config.recovery.quantity);
      recoverySuccess = random.next() < config.recovery.successRate;
    }
    if (!recoverySuccess) {
      state.tier = startingTier - 1;
    }
  }

  return {
    kind: 'main',
    success,
    pityTriggered,
    startingTier,
    endingTier: state.tier,
    modifier,
    effectiveRate,
    recoveryAttempted,
    recoverySuccess,
    consumed,
  };
}
