import {
  MODIFIER_TIERS,
  formatIssues,
  transitionTableSchema,
  type BoostTier,
  type ConsumableId,
  type ParsedTransitionTable,
} from '@gear-upgrade/upgrade-schema';

import { InvalidConfigurationError } from './errors.js';

export type ModifierTier = 'none' | BoostTier;

export const MODIFIER_TIER_ORDER: readonly ModifierTier[] = Object.freeze([
  'none',
  ...MODIFIER_TIERS,
]);

export interface ConsumableCost {
  readonly consumable: ConsumableId;
  readonly quantity: number;
}

export interface RecoveryConfig extends ConsumableCost {
  readonly successRate: number;
}

export interface ModifierConfig {
  readonly tier: BoostTier;
  readonly ratio: number;
  readonly consumable: ConsumableId;
}

export interface AlternatePathConfig extends ConsumableCost {
  readonly id: string;
  readonly title: string;
  /** Position in `TransitionConfig.alternatePaths` and `GearState.paths`. */
  readonly index: number;
  readonly entryTier: number;
  readonly length: number;
  readonly successRate: number;
  readonly pityThreshold: number;
}

/**
 * Read-only rate data for one gear type. Arrays are indexed by target tier and
 * frozen; slot 0 is unused because no attempt targets tier 0.
 */
export interface TransitionConfig {
  readonly tableId: string;
  readonly title: string;
  readonly maxTier: number;
  readonly baseRates: readonly number[];
  readonly pityThresholds: readonly number[];
  readonly material: ConsumableCost;
  readonly recovery: RecoveryConfig;
  readonly modifiers: Readonly<Record<BoostTier, ModifierConfig>>;
  readonly alternatePaths: readonly AlternatePathConfig[];
}

export function createTransitionConfigFromTable(
  table: ParsedTransitionTable,
): TransitionConfig {
  const baseRates = new Array<number>(table.maxTier + 1).fill(0);
  const pityThresholds = new Array<number>(table.maxTier + 1).fill(0);
  for (const entry of table.tiers) {
    baseRates[entry.tier] = entry.successRate;
    pityThresholds[entry.tier] = entry.pityThreshold;
  }

  for (let tier = 1; tier <= table.maxTier; tier += 1) {
    if (!(baseRates[tier] > 0)) {
      throw new InvalidConfigurationError(`Missing rate entry for tier ${tier}.`);
    }
  }

  const toModifier = (tier: BoostTier): ModifierConfig =>
    Object.freeze({
      tier,
      ratio: table.modifiers[tier].ratio,
      consumable: table.modifiers[tier].consumable,
    });
  const modifiers = Object.freeze({
    minor: toModifier('minor'),
    major: toModifier('major'),
    grand: toModifier('grand'),
  });

  const alternatePaths = Object.freeze(
    table.alternatePaths.map((path, index) =>
      Object.freeze({
        id: path.id,
        title: path.title ?? path.id,
        index,
        entryTier: path.entryTier,
        length: path.length,
        successRate: path.successRate,
        pityThreshold: path.pityThreshold,
        consumable: path.consumable,
        quantity: path.quantity,
      }),
    ),
  );

  return Object.freeze({
    tableId: table.metadata.id,
    title: table.metadata.title,
    maxTier: table.maxTier,
    baseRates: Object.freeze(baseRates),
    pityThresholds: Object.freeze(pityThresholds),
    material: Object.freeze({ ...table.material }),
    recovery: Object.freeze({ ...table.recovery }),
    modifiers,
    alternatePaths,
  });
}

/**
 * Validates raw table input and builds the engine configuration from it.
 * Schema failures surface as {@link InvalidConfigurationError}.
 */
export function createTransitionConfig(input: unknown): TransitionConfig {
  const result = transitionTableSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(
      `Invalid transition table: ${formatIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return createTransitionConfigFromTable(result.data);
}

function assertTargetTier(config: TransitionConfig, tier: number): void {
  if (!Number.isInteger(tier) || tier < 1 || tier > config.maxTier) {
    throw new InvalidConfigurationError(
      `No rate entry for tier ${tier}; "${config.tableId}" covers tiers 1..${config.maxTier}.`,
    );
  }
}

export function getBaseRate(config: TransitionConfig, targetTier: number): number {
  assertTargetTier(config, targetTier);
  return config.baseRates[targetTier];
}

export function getPityThreshold(config: TransitionConfig, targetTier: number): number {
  assertTargetTier(config, targetTier);
  return config.pityThresholds[targetTier];
}

export function getModifier(
  config: TransitionConfig,
  tier: ModifierTier,
): ModifierConfig | undefined {
  return tier === 'none' ? undefined : config.modifiers[tier];
}

export function findAlternatePath(
  config: TransitionConfig,
  id: string,
): AlternatePathConfig | undefined {
  const normalized = id.trim().toLowerCase();
  return config.alternatePaths.find((path) => path.id === normalized);
}
