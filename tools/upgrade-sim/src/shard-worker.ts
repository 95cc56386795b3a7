import { parentPort, workerData } from 'node:worker_threads';

import { runMonteCarloShard } from '@gear-upgrade/core';

import { toMonteCarloOptions } from './simulate.js';
import { parseShardJob, type ShardWorkerMessage } from './worker-protocol.js';

if (!parentPort) {
  throw new Error('upgrade-sim shard worker requires parentPort');
}

const port = parentPort;
const emit = (message: ShardWorkerMessage): void => {
  port.postMessage(message);
};

try {
  const job = parseShardJob(workerData);
  emit({ kind: 'shard', shard: runMonteCarloShard(toMonteCarloOptions(job), job.range) });
} catch (error: unknown) {
  emit({ kind: 'error', error: error instanceof Error ? error.message : String(error) });
}
