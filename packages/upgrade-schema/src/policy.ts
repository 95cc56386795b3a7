import { z } from 'zod';

import { pathIdSchema } from './base/ids.js';
import { nonNegativeIntSchema } from './base/numbers.js';
import { TableValidationError } from './errors.js';

/**
 * Tier thresholds in the style of the in-game auto-enhance panel: each boost
 * is used from its tier onward (0 disables it) and the largest applicable
 * boost wins.
 */
const thresholdPolicySchema = z
  .object({
    kind: z.literal('threshold'),
    modifiersFrom: z
      .object({
        minor: nonNegativeIntSchema.default(0),
        major: nonNegativeIntSchema.default(0),
        grand: nonNegativeIntSchema.default(0),
      })
      .strict()
      .default({}),
    recoveryFrom: nonNegativeIntSchema.default(0),
    alternatePaths: z.array(pathIdSchema).default([]),
  })
  .strict();

export const RECOVERY_STRATEGIES = [
  'never',
  'always',
  'above-threshold',
  'cost-efficient',
] as const;

export const MODIFIER_STRATEGIES = [
  'never',
  'minor-only',
  'major-only',
  'major-high-tier',
  'optimal',
] as const;

export type RecoveryStrategy = (typeof RECOVERY_STRATEGIES)[number];
export type ModifierStrategy = (typeof MODIFIER_STRATEGIES)[number];

const strategyPolicySchema = z
  .object({
    kind: z.literal('strategy'),
    recovery: z.enum(RECOVERY_STRATEGIES).default('always'),
    recoveryThreshold: nonNegativeIntSchema.default(3),
    modifiers: z.enum(MODIFIER_STRATEGIES).default('never'),
    majorModifierThreshold: nonNegativeIntSchema.default(6),
    alternatePaths: z.array(pathIdSchema).default([]),
  })
  .strict();

export const policySettingsSchema = z.discriminatedUnion('kind', [
  thresholdPolicySchema,
  strategyPolicySchema,
]);

export type ThresholdPolicySettings = z.infer<typeof thresholdPolicySchema>;
export type StrategyPolicySettings = z.infer<typeof strategyPolicySchema>;
export type PolicySettings = z.infer<typeof policySettingsSchema>;
export type PolicySettingsInput = z.input<typeof policySettingsSchema>;

export const parsePolicySettings = (input: unknown): PolicySettings => {
  const result = policySettingsSchema.safeParse(input);
  if (!result.success) {
    throw new TableValidationError('policy settings', result.error.issues);
  }
  return result.data;
};
