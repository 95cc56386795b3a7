import type { ConsumableId } from '@gear-upgrade/upgrade-schema';

import type { ModifierTier } from './transition-config.js';

export type ConsumedAmounts = Readonly<Partial<Record<ConsumableId, number>>>;

export interface AttemptOutcome {
  readonly kind: 'main';
  readonly success: boolean;
  /** Success was forced by accumulated pity energy; no draw was made. */
  readonly pityTriggered: boolean;
  readonly startingTier: number;
  readonly endingTier: number;
  readonly modifier: ModifierTier;
  readonly effectiveRate: number;
  readonly recoveryAttempted: boolean;
  readonly recoverySuccess: boolean;
  readonly consumed: ConsumedAmounts;
}

export interface SubAttemptOutcome {
  readonly kind: 'alternate';
  readonly pathId: string;
  readonly success: boolean;
  readonly pityTriggered: boolean;
  readonly startingTier: number;
  readonly endingTier: number;
  /** Progress after the step; reset to 0 when the path completes. */
  readonly progress: number;
  readonly pity: number;
  readonly pathComplete: boolean;
  readonly consumed: ConsumedAmounts;
}

export type StepOutcome = AttemptOutcome | SubAttemptOutcome;

export function addConsumed(
  consumed: Partial<Record<ConsumableId, number>>,
  consumable: ConsumableId,
  quantity: number,
): void {
  consumed[consumable] = (consumed[consumable] ?? 0) + quantity;
}
