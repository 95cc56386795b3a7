import { setImmediate as flushPending } from 'node:timers/promises';

import { describe, expect, it, vi } from 'vitest';
import {
  InvalidConfigurationError,
  runMonteCarlo,
  runMonteCarloShard,
  type MonteCarloShard,
} from '@gear-upgrade/core';
import { samplePriceTable, sampleTable } from '@gear-upgrade/sample-tables';

import { planShards, runParallel, type ShardHandle, type ShardRunner } from './parallel.js';
import { resolvePresetSettings } from './presets.js';
import { toMonteCarloOptions, type SimulationRequest } from './simulate.js';

const request: SimulationRequest = {
  table: sampleTable,
  priceTable: samplePriceTable,
  policy: resolvePresetSettings('conservative'),
  targetTier: 5,
  runs: 30,
  start: {},
  seed: 21,
};

interface FakeShards {
  readonly runShard: ShardRunner;
  readonly stopped: number[];
}

/**
 * Runs shards in process. Shards whose start index is listed in `outcomes`
 * take that outcome instead: `'hang'` never settles, an Error rejects.
 */
function fakeShards(outcomes: ReadonlyMap<number, 'hang' | Error> = new Map()): FakeShards {
  const stopped: number[] = [];
  const runShard: ShardRunner = (job): ShardHandle => {
    const outcome = outcomes.get(job.range.startIndex);
    let result: Promise<MonteCarloShard>;
    if (outcome === 'hang') {
      result = new Promise<MonteCarloShard>(() => {});
    } else if (outcome instanceof Error) {
      result = Promise.reject(outcome);
    } else {
      result = Promise.resolve(runMonteCarloShard(toMonteCarloOptions(job), job.range));
    }
    return {
      result,
      stop: () => {
        stopped.push(job.range.startIndex);
      },
    };
  };
  return { runShard, stopped };
}

describe('planShards', () => {
  it('splits runs into contiguous near-equal ranges', () => {
    expect(planShards(10, 3)).toEqual([
      { startIndex: 0, count: 4 },
      { startIndex: 4, count: 3 },
      { startIndex: 7, count: 3 },
    ]);
    expect(planShards(8, 4).map((range) => range.count)).toEqual([2, 2, 2, 2]);
  });

  it('never plans more shards than runs', () => {
    expect(planShards(2, 5)).toEqual([
      { startIndex: 0, count: 1 },
      { startIndex: 1, count: 1 },
    ]);
  });

  it('rejects empty or fractional plans', () => {
    expect(() => planShards(0, 2)).toThrowError(
      new InvalidConfigurationError('Cannot split 0 runs across 2 workers.'),
    );
    expect(() => planShards(10, 1.5)).toThrow(InvalidConfigurationError);
  });
});

describe('runParallel', () => {
  it('merges every shard into the single-pass statistics', async () => {
    const { runShard } = fakeShards();

    const stats = await runParallel(request, 3, { runShard });

    expect(stats).toEqual(runMonteCarlo(toMonteCarloOptions(request)));
  });

  it('stops pending shards on abort and keeps the finished ones', async () => {
    const controller = new AbortController();
    const { runShard, stopped } = fakeShards(new Map<number, 'hang' | Error>([[10, 'hang']]));

    const pending = runParallel(request, 3, { runShard, signal: controller.signal });
    await flushPending();
    controller.abort();
    const stats = await pending;

    expect(stats.cancelled).toBe(true);
    expect(stats.requestedRuns).toBe(30);
    expect(stats.runs).toBe(20);
    expect(stopped).toEqual([0, 10, 20]);
  });

  it('returns empty cancelled statistics for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const runShard = vi.fn<ShardRunner>();

    const stats = await runParallel(request, 3, { runShard, signal: controller.signal });

    expect(runShard).not.toHaveBeenCalled();
    expect(stats.cancelled).toBe(true);
    expect(stats.runs).toBe(0);
  });

  it('rejects with the first shard failure and stops the rest', async () => {
    const failure = new Error('Shard at 10 failed: out of memory');
    const { runShard, stopped } = fakeShards(
      new Map<number, 'hang' | Error>([
        [10, failure],
        [20, 'hang'],
      ]),
    );

    await expect(runParallel(request, 3, { runShard })).rejects.toBe(failure);
    expect(stopped).toEqual([0, 10, 20]);
  });
});
