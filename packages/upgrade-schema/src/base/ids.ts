import semver from 'semver';
import { z } from 'zod';

const TABLE_ID_PATTERN = /^[a-z0-9][a-z0-9\-._]{0,63}$/;
const PATH_ID_PATTERN = /^[a-z][a-z0-9-]{0,31}$/;

/**
 * Every consumable the engine can account for. The set is closed: resolvers
 * and ledgers key their counters by these ids.
 */
export const CONSUMABLE_IDS = [
  'material',
  'boostMinor',
  'boostMajor',
  'boostGrand',
  'recoveryScroll',
  'pathMaterial',
] as const;

export type ConsumableId = (typeof CONSUMABLE_IDS)[number];

export const consumableIdSchema = z.enum(CONSUMABLE_IDS);

export const MODIFIER_TIERS = ['minor', 'major', 'grand'] as const;

export type BoostTier = (typeof MODIFIER_TIERS)[number];

export const boostTierSchema = z.enum(MODIFIER_TIERS);

const validateSemver = (value: string, ctx: z.RefinementCtx): string => {
  const cleaned = semver.clean(value.trim());
  if (cleaned) {
    return cleaned;
  }

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Invalid semantic version.',
  });
  return z.NEVER;
};

export const semverSchema = z
  .string()
  .trim()
  .min(1, { message: 'Version must contain at least one character.' })
  .transform((value, ctx) => validateSemver(value, ctx));

export const tableIdSchema = z
  .string()
  .trim()
  .min(1, { message: 'Table id must contain at least one character.' })
  .max(64, { message: 'Table id must contain at most 64 characters.' })
  .transform((value) => value.toLowerCase())
  .refine((value) => TABLE_ID_PATTERN.test(value), {
    message:
      'Table id must start with a letter or digit and contain only letters, digits, "-", "_" or ".".',
  });

export const pathIdSchema = z
  .string()
  .trim()
  .transform((value) => value.toLowerCase())
  .refine((value) => PATH_ID_PATTERN.test(value), {
    message:
      'Path id must start with a letter and contain at most 32 letters, digits or "-".',
  });

export const isConsumableId = (value: unknown): value is ConsumableId =>
  typeof value === 'string' &&
  CONSUMABLE_IDS.some((id) => id === value);
