import { selectAlternatePath, resolveSubAttempt } from './alternate-path-resolver.js';
import { DEFAULT_SIMULATOR_CONFIG } from './config.js';
import {
  AlreadyAtTargetError,
  InvalidConfigurationError,
  NonConvergenceError,
} from './errors.js';
import { assertGearState, cloneGearState, type GearState } from './gear-state.js';
import type { StepOutcome } from './outcomes.js';
import type { Policy } from './policy.js';
import type { RandomSource } from './rng.js';
import { RunLedgerBuilder, type RunLedger } from './run-ledger.js';
import type { TransitionConfig } from './transition-config.js';
import { resolveAttempt } from './transition-resolver.js';

export interface RunOptions {
  readonly random: RandomSource;
  /** Attempt budget; defaults to `DEFAULT_SIMULATOR_CONFIG.limits.safetyBound`. */
  readonly safetyBound?: number;
}

/**
 * Advances the gear by one step: a sub-attempt when an alternate path is
 * eligible at the current tier, otherwise a main attempt.
 */
export function stepGear(
  state: GearState,
  config: TransitionConfig,
  policy: Policy,
  random: RandomSource,
): StepOutcome {
  const pathIndex = selectAlternatePath(state, config, policy);
  return pathIndex === undefined
    ? resolveAttempt(state, config, policy, random)
    : resolveSubAttempt(state, config, pathIndex, random);
}

export function validateRunRequest(
  initialState: GearState,
  targetTier: number,
  config: TransitionConfig,
): void {
  if (!Number.isInteger(targetTier) || targetTier < 1 || targetTier > config.maxTier) {
    throw new InvalidConfigurationError(
      `Target tier ${targetTier} is outside 1..${config.maxTier}.`,
    );
  }
  assertGearState(initialState, config);
  if (initialState.tier >= targetTier) {
    throw new AlreadyAtTargetError(initialState.tier, targetTier);
  }
}

export function resolveSafetyBound(safetyBound: number | undefined): number {
  if (safetyBound === undefined) {
    return DEFAULT_SIMULATOR_CONFIG.limits.safetyBound;
  }
  if (!Number.isInteger(safetyBound) || safetyBound <= 0) {
    throw new InvalidConfigurationError(
      `Safety bound must be a positive integer; received ${safetyBound}.`,
    );
  }
  return safetyBound;
}

/**
 * Runs until the target tier is reached or the attempt budget is spent and
 * reports which of the two happened. The initial state is cloned.
 */
export function simulateRun(
  initialState: GearState,
  targetTier: number,
  config: TransitionConfig,
  policy: Policy,
  options: RunOptions,
): RunLedger {
  validateRunRequest(initialState, targetTier, config);
  const safetyBound = resolveSafetyBound(options.safetyBound);
  return driveRun(cloneGearState(initialState), targetTier, config, policy, options.random, safetyBound);
}

/**
 * Same loop as {@link simulateRun}, but a spent budget is an error carrying
 * the partial ledger.
 */
export function runToTarget(
  initialState: GearState,
  targetTier: number,
  config: TransitionConfig,
  policy: Policy,
  options: RunOptions,
): RunLedger {
  const ledger = simulateRun(initialState, targetTier, config, policy, options);
  if (ledger.status === 'truncated') {
    throw new NonConvergenceError(ledger, resolveSafetyBound(options.safetyBound));
  }
  return ledger;
}

/** Loop body shared with the aggregator, which validates once per batch. */
export function driveRun(
  state: GearState,
  targetTier: number,
  config: TransitionConfig,
  policy: Policy,
  random: RandomSource,
  safetyBound: number,
): RunLedger {
  const ledger = new RunLedgerBuilder(state.tier, targetTier);
  while (state.tier < targetTier && ledger.attempts < safetyBound) {
    ledger.record(stepGear(state, config, policy, random));
  }
  return ledger.finalize(state.tier >= targetTier ? 'completed' : 'truncated', state.tier);
}
