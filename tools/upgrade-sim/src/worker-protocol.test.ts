import { describe, expect, it } from 'vitest';
import { mergeShards, runMonteCarlo, runMonteCarloShard } from '@gear-upgrade/core';
import { samplePriceTable, sampleTable } from '@gear-upgrade/sample-tables';
import { TableValidationError } from '@gear-upgrade/upgrade-schema';

import { planShards } from './parallel.js';
import { resolvePresetSettings } from './presets.js';
import { toMonteCarloOptions, type SimulationRequest } from './simulate.js';
import { parseShardJob, parseWorkerMessage } from './worker-protocol.js';

const request: SimulationRequest = {
  table: sampleTable,
  priceTable: samplePriceTable,
  policy: resolvePresetSettings('full-optimal'),
  targetTier: 6,
  runs: 24,
  start: { tier: 2 },
  seed: 314,
};

describe('parseShardJob', () => {
  it('rebuilds a structured clone of a job', () => {
    const job = parseShardJob(structuredClone({ ...request, range: { startIndex: 8, count: 8 } }));

    expect(job.table).toEqual(sampleTable);
    expect(job.priceTable).toEqual(samplePriceTable);
    expect(job.policy).toEqual(request.policy);
    expect(job.range).toEqual({ startIndex: 8, count: 8 });
    expect(job.start).toEqual({ tier: 2 });
  });

  it('keeps starting pity energy', () => {
    const job = parseShardJob(
      structuredClone({
        ...request,
        start: { tier: 3, pityEnergy: { 4: 3 } },
        range: { startIndex: 0, count: 24 },
      }),
    );

    expect(job.start).toEqual({ tier: 3, pityEnergy: { 4: 3 } });
  });

  it('rejects start fields it cannot carry', () => {
    expect(() =>
      parseShardJob({ ...request, start: { tier: 2, streak: 1 }, range: { startIndex: 0, count: 1 } }),
    ).toThrow();
  });

  it('validates the documents inside the job', () => {
    expect(() =>
      parseShardJob({ ...request, table: { maxTier: 3 }, range: { startIndex: 0, count: 1 } }),
    ).toThrow(TableValidationError);
  });
});

describe('parseWorkerMessage', () => {
  it('passes error messages through', () => {
    expect(parseWorkerMessage({ kind: 'error', error: 'boom' })).toEqual({
      kind: 'error',
      error: 'boom',
    });
  });

  it('turns malformed payloads into protocol errors', () => {
    expect(parseWorkerMessage({ kind: 'shard', shard: { seed: 1 } })).toEqual({
      kind: 'error',
      error: 'protocol: malformed shard worker message',
    });
    expect(parseWorkerMessage('done')).toEqual({
      kind: 'error',
      error: 'protocol: malformed shard worker message',
    });
  });

  it('round-trips shards into the same statistics as a single pass', () => {
    const shards = planShards(request.runs, 3).map((range) => {
      const job = parseShardJob(structuredClone({ ...request, range }));
      const shard = runMonteCarloShard(toMonteCarloOptions(job), job.range);
      const message = parseWorkerMessage(structuredClone({ kind: 'shard', shard }));
      if (message.kind !== 'shard') {
        throw new Error(message.error);
      }
      return message.shard;
    });

    const options = toMonteCarloOptions(request);
    expect(mergeShards(options, shards.reverse())).toEqual(runMonteCarlo(options));
  });

  it('merges shards started with pity energy into the single-pass statistics', () => {
    const charged: SimulationRequest = { ...request, start: { tier: 3, pityEnergy: { 4: 3 } } };
    const shards = planShards(charged.runs, 4).map((range) => {
      const job = parseShardJob(structuredClone({ ...charged, range }));
      return runMonteCarloShard(toMonteCarloOptions(job), job.range);
    });

    const options = toMonteCarloOptions(charged);
    const merged = mergeShards(options, shards);
    expect(merged).toEqual(runMonteCarlo(options));
    // Energy at the tier IV threshold forces the first attempt on it.
    expect(merged.metrics.pityTriggers.p50).toBeGreaterThanOrEqual(1);
  });
});
