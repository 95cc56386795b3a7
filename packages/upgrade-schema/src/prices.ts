import { z } from 'zod';

import {
  CONSUMABLE_IDS,
  consumableIdSchema,
  isConsumableId,
  type ConsumableId,
} from './base/ids.js';
import { nonNegativeNumberSchema, positiveIntSchema } from './base/numbers.js';
import { TableValidationError } from './errors.js';

const unitPriceSchema = z
  .object({
    unit: nonNegativeNumberSchema,
  })
  .strict();

/** Market sells the consumable in bundles, e.g. 200 000 scrolls for one price. */
const bundlePriceSchema = z
  .object({
    bundle: z
      .object({
        price: nonNegativeNumberSchema,
        size: positiveIntSchema,
      })
      .strict(),
  })
  .strict();

const recipePriceSchema = z
  .object({
    recipe: z
      .object({
        ingredients: z.record(consumableIdSchema, positiveIntSchema),
        market: nonNegativeNumberSchema.optional(),
      })
      .strict(),
  })
  .strict();

const priceEntrySchema = z.union([
  unitPriceSchema,
  bundlePriceSchema,
  recipePriceSchema,
]);

export type PriceEntry = z.infer<typeof priceEntrySchema>;

export type PriceTable = Readonly<Record<ConsumableId, number>>;

export interface ParsedPriceTable {
  readonly currency: string;
  readonly prices: Readonly<Partial<Record<ConsumableId, PriceEntry>>>;
}

const basePriceTableSchema = z
  .object({
    currency: z.string().trim().min(1).max(32).default('silver'),
    prices: z.record(consumableIdSchema, priceEntrySchema).default({}),
  })
  .strict();

const isRecipe = (
  entry: PriceEntry | undefined,
): entry is z.infer<typeof recipePriceSchema> =>
  entry !== undefined && 'recipe' in entry;

const findRecipeCycle = (
  prices: Partial<Record<ConsumableId, PriceEntry>>,
): ConsumableId[] | undefined => {
  const state = new Map<ConsumableId, 'visiting' | 'done'>();
  const trail: ConsumableId[] = [];

  const visit = (id: ConsumableId): ConsumableId[] | undefined => {
    const status = state.get(id);
    if (status === 'done') {
      return undefined;
    }
    if (status === 'visiting') {
      return [...trail.slice(trail.indexOf(id)), id];
    }

    state.set(id, 'visiting');
    trail.push(id);
    const entry = prices[id];
    if (isRecipe(entry)) {
      for (const ingredient of Object.keys(entry.recipe.ingredients)) {
        const cycle = isConsumableId(ingredient) ? visit(ingredient) : undefined;
        if (cycle) {
          return cycle;
        }
      }
    }
    trail.pop();
    state.set(id, 'done');
    return undefined;
  };

  for (const id of CONSUMABLE_IDS) {
    const cycle = visit(id);
    if (cycle) {
      return cycle;
    }
  }
  return undefined;
};

export const priceTableSchema: z.ZodType<ParsedPriceTable, z.ZodTypeDef, unknown> =
  basePriceTableSchema.superRefine((table, ctx) => {
    const cycle = findRecipeCycle(table.prices);
    if (cycle) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['prices', cycle[0] ?? ''],
        message: `Recipe cycle detected: ${cycle.join(' -> ')}.`,
      });
    }
  });

export const parsePriceTable = (input: unknown): ParsedPriceTable => {
  const result = priceTableSchema.safeParse(input);
  if (!result.success) {
    throw new TableValidationError('price table', result.error.issues);
  }
  return result.data;
};

/**
 * Derives one unit price per consumable.
 *
 * Bundles divide the bundle price by its size. Recipes add up their
 * ingredients' unit prices; when a nonzero market price is also given the
 * cheaper of the two wins. Consumables without an entry cost nothing.
 */
export const resolvePriceTable = (table: ParsedPriceTable): PriceTable => {
  const resolved = new Map<ConsumableId, number>();

  const resolve = (id: ConsumableId): number => {
    const cached = resolved.get(id);
    if (cached !== undefined) {
      return cached;
    }

    const entry = table.prices[id];
    let price = 0;
    if (entry === undefined) {
      // Unpriced consumables are free.
    } else if ('unit' in entry) {
      price = entry.unit;
    } else if ('bundle' in entry) {
      price = entry.bundle.price / entry.bundle.size;
    } else {
      let crafted = 0;
      for (const [ingredient, quantity] of Object.entries(entry.recipe.ingredients)) {
        if (isConsumableId(ingredient)) {
          crafted += resolve(ingredient) * (quantity ?? 0);
        }
      }
      const market = entry.recipe.market ?? 0;
      price = market > 0 ? Math.min(market, crafted) : crafted;
    }

    resolved.set(id, price);
    return price;
  };

  return Object.freeze({
    material: resolve('material'),
    boostMinor: resolve('boostMinor'),
    boostMajor: resolve('boostMajor'),
    boostGrand: resolve('boostGrand'),
    recoveryScroll: resolve('recoveryScroll'),
    pathMaterial: resolve('pathMaterial'),
  });
};

export const ZERO_PRICE_TABLE: PriceTable = resolvePriceTable({
  currency: 'silver',
  prices: {},
});
