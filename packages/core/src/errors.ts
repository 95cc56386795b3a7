import type { z } from 'zod';

import type { RunLedger } from './run-ledger.js';

export class UpgradeEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpgradeEngineError';
  }
}

/**
 * The gear already sits at (or above) the tier the caller asked for. This is
 * a caller error: the engine never turns it into a zero-attempt result.
 */
export class AlreadyAtTargetError extends UpgradeEngineError {
  readonly tier: number;
  readonly targetTier: number;

  constructor(tier: number, targetTier: number) {
    super(`Gear is already at tier ${tier}; target tier ${targetTier} leaves nothing to attempt.`);
    this.name = 'AlreadyAtTargetError';
    this.tier = tier;
    this.targetTier = targetTier;
  }
}

export class InvalidConfigurationError extends UpgradeEngineError {
  readonly issues: readonly z.ZodIssue[];

  constructor(message: string, issues: readonly z.ZodIssue[] = []) {
    super(message);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * A run exhausted its attempt budget before reaching the target tier. The
 * partial ledger is kept so callers can retry with a larger bound or report
 * the truncated run.
 */
export class NonConvergenceError extends UpgradeEngineError {
  readonly ledger: RunLedger;
  readonly safetyBound: number;

  constructor(ledger: RunLedger, safetyBound: number) {
    super(
      `Run did not reach tier ${ledger.targetTier} within ${safetyBound} attempts (stopped at tier ${ledger.finalTier}).`,
    );
    this.name = 'NonConvergenceError';
    this.ledger = ledger;
    this.safetyBound = safetyBound;
  }
}
