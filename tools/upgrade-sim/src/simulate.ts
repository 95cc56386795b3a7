import {
  createPolicy,
  createTransitionConfigFromTable,
  runMonteCarloAsync,
  type AggregateStatistics,
  type GearStateInit,
  type MonteCarloOptions,
} from '@gear-upgrade/core';
import {
  resolvePriceTable,
  type ParsedPriceTable,
  type ParsedTransitionTable,
  type PolicySettings,
} from '@gear-upgrade/upgrade-schema';

import { runParallel } from './parallel.js';
import { POLICY_PRESETS, PRESET_NAMES, resolvePresetSettings, type PresetName } from './presets.js';

/**
 * A Monte Carlo request in plain data, so it can be handed to worker
 * threads as-is.
 */
export interface SimulationRequest {
  readonly table: ParsedTransitionTable;
  readonly priceTable: ParsedPriceTable;
  readonly policy: PolicySettings;
  readonly targetTier: number;
  readonly runs: number;
  readonly start: GearStateInit;
  readonly seed: number;
  readonly safetyBound?: number;
}

export interface SimulateOptions {
  readonly workers?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: { readonly completed: number; readonly total: number }) => void;
}

export interface ComparisonRow {
  readonly preset: PresetName;
  readonly description: string;
  readonly stats: AggregateStatistics;
}

export function toMonteCarloOptions(request: SimulationRequest): MonteCarloOptions {
  return {
    config: createTransitionConfigFromTable(request.table),
    policy: createPolicy(request.policy),
    prices: resolvePriceTable(request.priceTable),
    targetTier: request.targetTier,
    runs: request.runs,
    start: request.start,
    seed: request.seed,
    safetyBound: request.safetyBound,
  };
}

export async function simulate(
  request: SimulationRequest,
  options: SimulateOptions = {},
): Promise<AggregateStatistics> {
  const workers = Math.min(options.workers ?? 1, request.runs);
  if (workers > 1) {
    return runParallel(request, workers, { signal: options.signal });
  }
  return runMonteCarloAsync(toMonteCarloOptions(request), {
    signal: options.signal,
    onProgress: options.onProgress,
  });
}

/** Mean cost only counts completed runs, so it ranks nothing unless every run completed. */
export const finishedEveryRun = (stats: AggregateStatistics): boolean =>
  stats.completedRuns > 0 && stats.completedRuns === stats.requestedRuns;

/**
 * Runs every preset against the same seed and orders them by mean cost,
 * cheapest first. Presets with unfinished runs go last, those finishing the
 * most runs first. Stops early once a run reports cancellation.
 */
export async function compareStrategies(
  request: Omit<SimulationRequest, 'policy'>,
  alternatePaths: readonly string[],
  options: SimulateOptions = {},
): Promise<ComparisonRow[]> {
  const rows: ComparisonRow[] = [];
  for (const preset of PRESET_NAMES) {
    const stats = await simulate(
      { ...request, policy: resolvePresetSettings(preset, alternatePaths) },
      options,
    );
    rows.push({ preset, description: POLICY_PRESETS[preset].description, stats });
    if (stats.cancelled) {
      break;
    }
  }
  return rows.sort((left, right) => {
    const leftFinished = finishedEveryRun(left.stats);
    if (leftFinished !== finishedEveryRun(right.stats)) {
      return leftFinished ? -1 : 1;
    }
    if (!leftFinished && left.stats.completedRuns !== right.stats.completedRuns) {
      return right.stats.completedRuns - left.stats.completedRuns;
    }
    return left.stats.metrics.cost.mean - right.stats.metrics.cost.mean;
  });
}
