import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import {
  CONSUMABLE_IDS,
  ZERO_PRICE_TABLE,
  type PriceTable,
} from '@gear-upgrade/upgrade-schema';

import {
  DEFAULT_SIMULATOR_CONFIG,
  toPositiveInt,
  type SimulatorConfig,
} from './config.js';
import { InvalidConfigurationError } from './errors.js';
import { cloneGearState, createGearState, type GearState, type GearStateInit } from './gear-state.js';
import type { Policy } from './policy.js';
import { createEntropySeed, createRandomSource, deriveRunSeed, normalizeSeed } from './rng.js';
import { driveRun, resolveSafetyBound, validateRunRequest } from './run-driver.js';
import { ledgerCost, type RunLedger } from './run-ledger.js';
import { summarizeSamples, type MetricSummary } from './statistics.js';
import { telemetry } from './telemetry.js';
import type { TransitionConfig } from './transition-config.js';

export const METRIC_IDS = [
  'attempts',
  'cost',
  ...CONSUMABLE_IDS,
  'levelDrops',
  'pityTriggers',
  'recoveryAttempts',
] as const;

export type MetricId = (typeof METRIC_IDS)[number];

export interface MonteCarloOptions {
  readonly config: TransitionConfig;
  readonly policy: Policy;
  readonly targetTier: number;
  /** Defaults to `simulatorConfig.defaultRuns`. */
  readonly runs?: number;
  readonly start?: GearStateInit;
  readonly prices?: PriceTable;
  /** Base seed; every run derives its own stream from it. Random when omitted. */
  readonly seed?: number;
  readonly safetyBound?: number;
  readonly simulatorConfig?: SimulatorConfig;
}

export interface RunRecord {
  readonly index: number;
  readonly ledger: RunLedger;
  readonly cost: number;
}

export interface AggregateStatistics {
  readonly requestedRuns: number;
  /** Runs actually executed; below `requestedRuns` only when cancelled. */
  readonly runs: number;
  readonly completedRuns: number;
  readonly nonConvergedRuns: number;
  readonly cancelled: boolean;
  readonly seed: number;
  readonly targetTier: number;
  /** Computed over completed runs only. */
  readonly metrics: Readonly<Record<MetricId, MetricSummary>>;
}

export interface AsyncMonteCarloOptions {
  readonly signal?: AbortSignal;
  /** Runs between yields; clamped to `simulatorConfig.batching.maxBatchSize`. */
  readonly batchSize?: number;
  readonly onProgress?: (progress: { readonly completed: number; readonly total: number }) => void;
}

export interface ShardRange {
  readonly startIndex: number;
  readonly count: number;
}

export interface MergeShardsOptions {
  /**
   * The shards are what finished before the request was cancelled: they may
   * leave gaps, and the statistics are flagged `cancelled`.
   */
  readonly cancelled?: boolean;
}

export interface MonteCarloShard {
  readonly seed: number;
  readonly startIndex: number;
  readonly records: readonly RunRecord[];
}

interface PreparedRequest {
  readonly config: TransitionConfig;
  readonly policy: Policy;
  readonly targetTier: number;
  readonly runs: number;
  readonly initialState: GearState;
  readonly prices: PriceTable;
  readonly seed: number;
  readonly safetyBound: number;
  readonly simulatorConfig: SimulatorConfig;
}

function prepareRequest(options: MonteCarloOptions): PreparedRequest {
  const simulatorConfig = options.simulatorConfig ?? DEFAULT_SIMULATOR_CONFIG;
  const runs = options.runs ?? simulatorConfig.defaultRuns;
  if (!Number.isInteger(runs) || runs <= 0 || runs > simulatorConfig.limits.maxRuns) {
    throw new InvalidConfigurationError(
      `Run count must be an integer in 1..${simulatorConfig.limits.maxRuns}; received ${runs}.`,
    );
  }

  const initialState = createGearState(options.config, options.start);
  validateRunRequest(initialState, options.targetTier, options.config);

  return {
    config: options.config,
    policy: options.policy,
    targetTier: options.targetTier,
    runs,
    initialState,
    prices: options.prices ?? ZERO_PRICE_TABLE,
    seed: normalizeSeed(options.seed ?? createEntropySeed()),
    safetyBound: resolveSafetyBound(options.safetyBound ?? simulatorConfig.limits.safetyBound),
    simulatorConfig,
  };
}

function executeRun(request: PreparedRequest, index: number): RunRecord {
  const random = createRandomSource(deriveRunSeed(request.seed, index));
  const ledger = driveRun(
    cloneGearState(request.initialState),
    request.targetTier,
    request.config,
    request.policy,
    random,
    request.safetyBound,
  );
  return { index, ledger, cost: ledgerCost(ledger, request.prices) };
}

const metricValue = (record: RunRecord, metric: MetricId): number => {
  switch (metric) {
    case 'attempts':
      return record.ledger.attempts;
    case 'cost':
      return record.cost;
    case 'levelDrops':
      return record.ledger.levelDrops;
    case 'pityTriggers':
      return record.ledger.pityTriggers;
    case 'recoveryAttempts':
      return record.ledger.recoveryAttempts;
    default:
      return record.ledger.consumed[metric];
  }
};

function summarizeRecords(
  records: readonly RunRecord[],
  request: PreparedRequest,
  cancelled: boolean,
): AggregateStatistics {
  const completed = records.filter((record) => record.ledger.status === 'completed');
  const nonConvergedRuns = records.length - completed.length;
  const summarize = (metric: MetricId): MetricSummary =>
    summarizeSamples(completed.map((record) => metricValue(record, metric)));

  if (nonConvergedRuns > 0) {
    telemetry.recordWarning('monte-carlo:non-convergence', {
      nonConvergedRuns,
      runs: records.length,
      safetyBound: request.safetyBound,
    });
  }
  if (cancelled) {
    telemetry.recordWarning('monte-carlo:cancelled', {
      completedRuns: records.length,
      requestedRuns: request.runs,
    });
  }
  telemetry.recordCounters('monte-carlo', {
    runs: records.length,
    completedRuns: completed.length,
    nonConvergedRuns,
  });

  return Object.freeze({
    requestedRuns: request.runs,
    runs: records.length,
    completedRuns: completed.length,
    nonConvergedRuns,
    cancelled,
    seed: request.seed,
    targetTier: request.targetTier,
    metrics: Object.freeze({
      attempts: summarize('attempts'),
      cost: summarize('cost'),
      material: summarize('material'),
      boostMinor: summarize('boostMinor'),
      boostMajor: summarize('boostMajor'),
      boostGrand: summarize('boostGrand'),
      recoveryScroll: summarize('recoveryScroll'),
      pathMaterial: summarize('pathMaterial'),
      levelDrops: summarize('levelDrops'),
      pityTriggers: summarize('pityTriggers'),
      recoveryAttempts: summarize('recoveryAttempts'),
    }),
  });
}

export function runMonteCarlo(options: MonteCarloOptions): AggregateStatistics {
  const request = prepareRequest(options);
  const records: RunRecord[] = [];
  for (let index = 0; index < request.runs; index += 1) {
    records.push(executeRun(request, index));
  }
  return summarizeRecords(records, request, false);
}

/**
 * Cooperative variant: yields to the event loop after every batch and checks
 * `signal` before each run. A run that has started always finishes; on abort
 * the statistics cover the runs completed so far.
 */
export async function runMonteCarloAsync(
  options: MonteCarloOptions,
  asyncOptions: AsyncMonteCarloOptions = {},
): Promise<AggregateStatistics> {
  const request = prepareRequest(options);
  const { batching } = request.simulatorConfig;
  const batchSize = Math.min(
    toPositiveInt(asyncOptions.batchSize) ?? batching.batchSize,
    batching.maxBatchSize,
  );

  const records: RunRecord[] = [];
  let cancelled = false;
  while (records.length < request.runs) {
    const batchEnd = Math.min(records.length + batchSize, request.runs);
    while (records.length < batchEnd && !cancelled) {
      if (asyncOptions.signal?.aborted) {
        cancelled = true;
      } else {
        records.push(executeRun(request, records.length));
      }
    }
    if (cancelled) {
      break;
    }

    const progress = { completed: records.length, total: request.runs };
    telemetry.recordProgress('monte-carlo:batch', progress);
    asyncOptions.onProgress?.(progress);
    if (records.length < request.runs) {
      await yieldToEventLoop();
    }
  }

  return summarizeRecords(records, request, cancelled);
}

/**
 * Executes runs `startIndex .. startIndex + count - 1` of the request. Shards
 * of one request can run anywhere (worker threads, other processes) as long
 * as they share the seed.
 */
export function runMonteCarloShard(
  options: MonteCarloOptions,
  range: ShardRange,
): MonteCarloShard {
  if (options.seed === undefined) {
    throw new InvalidConfigurationError('Sharded Monte Carlo runs require an explicit seed.');
  }
  const request = prepareRequest(options);
  const { startIndex, count } = range;
  if (
    !Number.isInteger(startIndex) ||
    !Number.isInteger(count) ||
    startIndex < 0 ||
    count < 0 ||
    startIndex + count > request.runs
  ) {
    throw new InvalidConfigurationError(
      `Shard ${startIndex}+${count} does not fit within ${request.runs} runs.`,
    );
  }

  const records: RunRecord[] = [];
  for (let index = startIndex; index < startIndex + count; index += 1) {
    records.push(executeRun(request, index));
  }
  return { seed: request.seed, startIndex, records };
}

/**
 * Combines shards into the statistics an unsharded run would have produced.
 * Shards may arrive in any order but must tile `0 .. runs - 1` exactly, unless
 * `cancelled` is set, in which case they only must not overlap.
 */
export function mergeShards(
  options: MonteCarloOptions,
  shards: readonly MonteCarloShard[],
  mergeOptions: MergeShardsOptions = {},
): AggregateStatistics {
  if (options.seed === undefined) {
    throw new InvalidConfigurationError('Sharded Monte Carlo runs require an explicit seed.');
  }
  const request = prepareRequest(options);
  const cancelled = mergeOptions.cancelled ?? false;

  const records = shards
    .map((shard) => {
      if (shard.seed !== request.seed) {
        throw new InvalidConfigurationError(
          `Shard at ${shard.startIndex} was run with seed ${shard.seed}, expected ${request.seed}.`,
        );
      }
      return shard.records;
    })
    .flat()
    .sort((left, right) => left.index - right.index);

  if (cancelled) {
    const overlapping = records.some(
      (record, position) =>
        record.index >= request.runs ||
        (position > 0 && record.index === records[position - 1].index),
    );
    if (overlapping) {
      throw new InvalidConfigurationError(
        `Shards overlap or fall outside 0..${request.runs - 1}.`,
      );
    }
  } else if (
    records.length !== request.runs ||
    records.some((record, index) => record.index !== index)
  ) {
    throw new InvalidConfigurationError(
      `Shards cover ${records.length} runs but do not tile 0..${request.runs - 1}.`,
    );
  }

  return summarizeRecords(records, request, cancelled);
}
