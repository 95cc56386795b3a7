import {
  CONSUMABLE_IDS,
  type ConsumableId,
  type PriceTable,
} from '@gear-upgrade/upgrade-schema';

import type { StepOutcome } from './outcomes.js';

export type RunStatus = 'completed' | 'truncated';

export type ConsumableTotals = Readonly<Record<ConsumableId, number>>;

export interface RunLedger {
  readonly status: RunStatus;
  readonly startTier: number;
  readonly targetTier: number;
  readonly finalTier: number;
  readonly attempts: number;
  readonly consumed: ConsumableTotals;
  readonly levelDrops: number;
  readonly pityTriggers: number;
  readonly recoveryAttempts: number;
  readonly recoverySuccesses: number;
  readonly pathCompletions: number;
}

export function createConsumableTotals(): Record<ConsumableId, number> {
  return {
    material: 0,
    boostMinor: 0,
    boostMajor: 0,
    boostGrand: 0,
    recoveryScroll: 0,
    pathMaterial: 0,
  };
}

/**
 * Accumulates step outcomes for one run. `finalize` hands out a frozen
 * ledger; the builder is discarded afterwards.
 */
export class RunLedgerBuilder {
  attempts = 0;
  private readonly consumed = createConsumableTotals();
  private levelDrops = 0;
  private pityTriggers = 0;
  private recoveryAttempts = 0;
  private recoverySuccesses = 0;
  private pathCompletions = 0;

  constructor(
    private readonly startTier: number,
    private readonly targetTier: number,
  ) {}

  record(outcome: StepOutcome): void {
    this.attempts += 1;
    for (const id of CONSUMABLE_IDS) {
      this.consumed[id] += outcome.consumed[id] ?? 0;
    }
    if (outcome.pityTriggered) {
      this.pityTriggers += 1;
    }

    if (outcome.kind === 'alternate') {
      if (outcome.pathComplete) {
        this.pathCompletions += 1;
      }
      return;
    }

    if (outcome.recoveryAttempted) {
      this.recoveryAttempts += 1;
    }
    if (outcome.recoverySuccess) {
      this.recoverySuccesses += 1;
    }
    if (outcome.endingTier < outcome.startingTier) {
      this.levelDrops += 1;
    }
  }

  finalize(status: RunStatus, finalTier: number): RunLedger {
    return Object.freeze({
      status,
      startTier: this.startTier,
      targetTier: this.targetTier,
      finalTier,
      attempts: this.attempts,
      consumed: Object.freeze({ ...this.consumed }),
      levelDrops: this.levelDrops,
      pityTriggers: this.pityTriggers,
      recoveryAttempts: this.recoveryAttempts,
      recoverySuccesses: this.recoverySuccesses,
      pathCompletions: this.pathCompletions,
    });
  }
}

export function ledgerCost(ledger: RunLedger, prices: PriceTable): number {
  let cost = 0;
  for (const id of CONSUMABLE_IDS) {
    cost += ledger.consumed[id] * prices[id];
  }
  return cost;
}
