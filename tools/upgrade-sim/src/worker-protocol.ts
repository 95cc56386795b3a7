import { z } from 'zod';

import {
  CONSUMABLE_IDS,
  consumableIdSchema,
  parsePolicySettings,
  parsePriceTable,
  parseTransitionTable,
} from '@gear-upgrade/upgrade-schema';
import type { MonteCarloShard, ShardRange } from '@gear-upgrade/core';

import type { SimulationRequest } from './simulate.js';

/** Everything a worker needs to rebuild the request and run one shard. */
export interface ShardJob extends SimulationRequest {
  readonly range: ShardRange;
}

export type ShardWorkerMessage =
  | { readonly kind: 'shard'; readonly shard: MonteCarloShard }
  | { readonly kind: 'error'; readonly error: string };

const countSchema = z.number().int().nonnegative();
const positiveSchema = z.number().int().positive();

const shardJobSchema = z.object({
  table: z.unknown(),
  priceTable: z.unknown(),
  policy: z.unknown(),
  targetTier: positiveSchema,
  runs: positiveSchema,
  start: z
    .object({
      tier: countSchema.optional(),
      pityEnergy: z.record(z.string(), countSchema).optional(),
      pathProgress: z.record(z.string(), countSchema).optional(),
    })
    .strict(),
  seed: countSchema,
  safetyBound: positiveSchema.optional(),
  range: z.object({ startIndex: countSchema, count: countSchema }),
});

/**
 * Rebuilds a job from `workerData`. The documents are validated again since
 * they crossed a thread boundary as plain clones.
 */
export function parseShardJob(data: unknown): ShardJob {
  const job = shardJobSchema.parse(data);
  return {
    ...job,
    table: parseTransitionTable(job.table),
    priceTable: parsePriceTable(job.priceTable),
    policy: parsePolicySettings(job.policy),
  };
}

const consumedSchema = z
  .record(consumableIdSchema, countSchema)
  .transform((consumed) => {
    const totals = {
      material: 0,
      boostMinor: 0,
      boostMajor: 0,
      boostGrand: 0,
      recoveryScroll: 0,
      pathMaterial: 0,
    };
    for (const id of CONSUMABLE_IDS) {
      totals[id] = consumed[id] ?? 0;
    }
    return totals;
  });

const ledgerSchema = z.object({
  status: z.enum(['completed', 'truncated']),
  startTier: countSchema,
  targetTier: countSchema,
  finalTier: countSchema,
  attempts: countSchema,
  consumed: consumedSchema,
  levelDrops: countSchema,
  pityTriggers: countSchema,
  recoveryAttempts: countSchema,
  recoverySuccesses: countSchema,
  pathCompletions: countSchema,
});

const shardSchema = z.object({
  seed: countSchema,
  startIndex: countSchema,
  records: z.array(
    z.object({
      index: countSchema,
      ledger: ledgerSchema,
      cost: z.number().nonnegative(),
    }),
  ),
});

const workerMessageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('shard'), shard: shardSchema }),
  z.object({ kind: z.literal('error'), error: z.string() }),
]);

export function parseWorkerMessage(message: unknown): ShardWorkerMessage {
  const result = workerMessageSchema.safeParse(message);
  if (!result.success) {
    return { kind: 'error', error: 'protocol: malformed shard worker message' };
  }
  return result.data;
}
