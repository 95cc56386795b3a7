import { z } from 'zod';

import {
  consumableIdSchema,
  pathIdSchema,
  semverSchema,
  tableIdSchema,
  type BoostTier,
  type ConsumableId,
} from './base/ids.js';
import {
  nonNegativeIntSchema,
  percentSchema,
  positiveIntSchema,
  probabilitySchema,
  ratioSchema,
} from './base/numbers.js';
import { TableValidationError } from './errors.js';

export const MAX_ALTERNATE_PATHS = 2;

const tableMetadataSchema = z
  .object({
    id: tableIdSchema,
    title: z.string().trim().min(1).max(96),
    version: semverSchema,
    description: z.string().trim().max(512).optional(),
  })
  .strict();

const tierEntrySchema = z
  .object({
    tier: positiveIntSchema,
    successRate: probabilitySchema,
    /** Failed attempts after which the next attempt is guaranteed. 0 disables pity. */
    pityThreshold: nonNegativeIntSchema.default(0),
  })
  .strict();

const consumableUsageSchema = z
  .object({
    consumable: consumableIdSchema,
    quantity: positiveIntSchema.default(1),
  })
  .strict();

const recoverySchema = z
  .object({
    successRate: percentSchema,
    consumable: consumableIdSchema.default('recoveryScroll'),
    quantity: positiveIntSchema.default(1),
  })
  .strict();

const modifierSchema = (consumable: ConsumableId, ratio: number) =>
  z
    .object({
      ratio: ratioSchema,
      consumable: consumableIdSchema.default(consumable),
    })
    .strict()
    .default({ ratio, consumable });

const modifiersSchema = z
  .object({
    minor: modifierSchema('boostMinor', 1.1),
    major: modifierSchema('boostMajor', 1.5),
    grand: modifierSchema('boostGrand', 2),
  })
  .strict()
  .default({});

const alternatePathSchema = z
  .object({
    id: pathIdSchema,
    title: z.string().trim().min(1).max(64).optional(),
    entryTier: nonNegativeIntSchema,
    length: positiveIntSchema,
    successRate: probabilitySchema,
    pityThreshold: nonNegativeIntSchema.default(0),
    consumable: consumableIdSchema.default('pathMaterial'),
    quantity: positiveIntSchema.default(1),
  })
  .strict();

export type TableMetadata = z.infer<typeof tableMetadataSchema>;
export type TierEntry = z.infer<typeof tierEntrySchema>;
export type ConsumableUsage = z.infer<typeof consumableUsageSchema>;
export type RecoveryEntry = z.infer<typeof recoverySchema>;
export type ModifierEntry = { readonly ratio: number; readonly consumable: ConsumableId };
export type AlternatePathEntry = z.infer<typeof alternatePathSchema>;

export interface ParsedTransitionTable {
  readonly metadata: TableMetadata;
  readonly maxTier: number;
  /** Sorted by tier, one entry for every tier in 1..maxTier. */
  readonly tiers: readonly TierEntry[];
  readonly material: ConsumableUsage;
  readonly recovery: RecoveryEntry;
  readonly modifiers: Readonly<Record<BoostTier, ModifierEntry>>;
  readonly alternatePaths: readonly AlternatePathEntry[];
}

export type TransitionTableInput = z.input<typeof baseTransitionTableSchema>;

const baseTransitionTableSchema = z
  .object({
    metadata: tableMetadataSchema,
    maxTier: positiveIntSchema,
    tiers: z.array(tierEntrySchema).min(1),
    material: consumableUsageSchema.default({ consumable: 'material', quantity: 1 }),
    recovery: recoverySchema,
    modifiers: modifiersSchema,
    alternatePaths: z.array(alternatePathSchema).default([]),
  })
  .strict();

type BaseTransitionTable = z.infer<typeof baseTransitionTableSchema>;

const validateTierCoverage = (
  table: BaseTransitionTable,
  ctx: z.RefinementCtx,
): void => {
  const seen = new Map<number, number>();
  table.tiers.forEach((entry, index) => {
    if (entry.tier > table.maxTier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tiers', index, 'tier'],
        message: `Tier ${entry.tier} exceeds maxTier ${table.maxTier}.`,
      });
      return;
    }
    const existing = seen.get(entry.tier);
    if (existing !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tiers', index, 'tier'],
        message: `Duplicate tier ${entry.tier} also declared at index ${existing}.`,
      });
      return;
    }
    seen.set(entry.tier, index);
  });

  for (let tier = 1; tier <= table.maxTier; tier += 1) {
    if (!seen.has(tier)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tiers'],
        message: `Missing rate entry for tier ${tier}.`,
      });
    }
  }
};

const validateAlternatePaths = (
  table: BaseTransitionTable,
  ctx: z.RefinementCtx,
): void => {
  if (table.alternatePaths.length > MAX_ALTERNATE_PATHS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['alternatePaths'],
      message: `At most ${MAX_ALTERNATE_PATHS} alternate paths may be declared.`,
    });
  }

  const ids = new Map<string, number>();
  const entryTiers = new Map<number, number>();
  table.alternatePaths.forEach((path, index) => {
    const existingId = ids.get(path.id);
    if (existingId !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['alternatePaths', index, 'id'],
        message: `Duplicate alternate path "${path.id}" also declared at index ${existingId}.`,
      });
    } else {
      ids.set(path.id, index);
    }

    const existingTier = entryTiers.get(path.entryTier);
    if (existingTier !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['alternatePaths', index, 'entryTier'],
        message: `Entry tier ${path.entryTier} is already used by the path at index ${existingTier}.`,
      });
    } else {
      entryTiers.set(path.entryTier, index);
    }

    if (path.entryTier >= table.maxTier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['alternatePaths', index, 'entryTier'],
        message: `Entry tier ${path.entryTier} must be below maxTier ${table.maxTier}.`,
      });
    }
  });
};

export const transitionTableSchema: z.ZodType<
  ParsedTransitionTable,
  z.ZodTypeDef,
  unknown
> = baseTransitionTableSchema
  .superRefine((table, ctx) => {
    validateTierCoverage(table, ctx);
    validateAlternatePaths(table, ctx);
  })
  .transform((table) =>
    Object.freeze({
      ...table,
      tiers: Object.freeze([...table.tiers].sort((left, right) => left.tier - right.tier)),
      alternatePaths: Object.freeze([...table.alternatePaths]),
    }),
  );

export const parseTransitionTable = (input: unknown): ParsedTransitionTable => {
  const result = transitionTableSchema.safeParse(input);
  if (!result.success) {
    throw new TableValidationError('transition table', result.error.issues);
  }
  return result.data;
};
