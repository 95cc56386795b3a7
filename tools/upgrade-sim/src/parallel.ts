import { Worker } from 'node:worker_threads';

import {
  InvalidConfigurationError,
  mergeShards,
  telemetry,
  type AggregateStatistics,
  type MonteCarloShard,
  type ShardRange,
} from '@gear-upgrade/core';

import { toMonteCarloOptions, type SimulationRequest } from './simulate.js';
import { parseWorkerMessage, type ShardJob } from './worker-protocol.js';

// Sources run through tsx, whose loader the worker inherits via execArgv.
const WORKER_URL = new URL(
  import.meta.url.endsWith('.ts') ? './shard-worker.ts' : './shard-worker.js',
  import.meta.url,
);

/** A shard in flight. `stop` abandons it; its result is then ignored. */
export interface ShardHandle {
  readonly result: Promise<MonteCarloShard>;
  stop(): void;
}

export type ShardRunner = (job: ShardJob) => ShardHandle;

export interface ParallelOptions {
  readonly signal?: AbortSignal;
  readonly runShard?: ShardRunner;
}

/** Contiguous ranges whose sizes differ by at most one. */
export function planShards(runs: number, workers: number): ShardRange[] {
  if (!Number.isInteger(runs) || runs <= 0 || !Number.isInteger(workers) || workers <= 0) {
    throw new InvalidConfigurationError(
      `Cannot split ${runs} runs across ${workers} workers.`,
    );
  }
  const shardCount = Math.min(runs, workers);
  const base = Math.floor(runs / shardCount);
  const remainder = runs % shardCount;

  const ranges: ShardRange[] = [];
  let startIndex = 0;
  for (let shard = 0; shard < shardCount; shard += 1) {
    const count = base + (shard < remainder ? 1 : 0);
    ranges.push({ startIndex, count });
    startIndex += count;
  }
  return ranges;
}

export const runShardInWorker: ShardRunner = (job) => {
  const worker = new Worker(WORKER_URL, { workerData: job });
  const result = new Promise<MonteCarloShard>((resolve, reject) => {
    worker.once('message', (raw: unknown) => {
      const message = parseWorkerMessage(raw);
      if (message.kind === 'shard') {
        telemetry.recordProgress('upgrade-sim:shard', { ...job.range });
        resolve(message.shard);
      } else {
        reject(new Error(`Shard at ${job.range.startIndex} failed: ${message.error}`));
      }
    });
    worker.once('error', reject);
    worker.once('exit', (code) => {
      if (code !== 0) {
        reject(new Error(`Shard worker at ${job.range.startIndex} exited with code ${code}.`));
      }
    });
  });

  return {
    result,
    stop() {
      worker.terminate().catch((error: unknown) => {
        telemetry.recordError('upgrade-sim:worker-terminate', {
          startIndex: job.range.startIndex,
          message: error instanceof Error ? error.message : String(error),
        });
      });
    },
  };
};

/**
 * Runs the request as one shard per worker and merges the results. The first
 * failing shard rejects the whole run; on abort the shards finished so far
 * are merged and flagged `cancelled`. Either way every other shard is stopped.
 */
export function runParallel(
  request: SimulationRequest,
  workers: number,
  options: ParallelOptions = {},
): Promise<AggregateStatistics> {
  const { signal, runShard = runShardInWorker } = options;
  const monteCarloOptions = toMonteCarloOptions(request);
  const ranges = planShards(request.runs, workers);
  if (signal?.aborted) {
    return Promise.resolve(mergeShards(monteCarloOptions, [], { cancelled: true }));
  }

  return new Promise((resolve, reject) => {
    const handles = ranges.map((range) => runShard({ ...request, range }));
    const finished: MonteCarloShard[] = [];
    let settled = false;

    const settle = (produce: () => AggregateStatistics): void => {
      if (settled) {
        return;
      }
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      for (const handle of handles) {
        handle.stop();
      }
      try {
        resolve(produce());
      } catch (error: unknown) {
        reject(error);
      }
    };

    const onAbort = (): void => {
      telemetry.recordWarning('upgrade-sim:cancelled', {
        finishedShards: finished.length,
        shards: handles.length,
      });
      settle(() => mergeShards(monteCarloOptions, finished, { cancelled: true }));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    for (const handle of handles) {
      void handle.result.then(
        (shard) => {
          if (settled) {
            return;
          }
          finished.push(shard);
          if (finished.length === handles.length) {
            settle(() => mergeShards(monteCarloOptions, finished));
          }
        },
        (error: unknown) => {
          settle(() => {
            throw error;
          });
        },
      );
    }
  });
}
