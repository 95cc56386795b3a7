import type {
  AggregateStatistics,
  MetricSummary,
  TransitionConfig,
} from '@gear-upgrade/core';
import { CONSUMABLE_IDS, type ConsumableId } from '@gear-upgrade/upgrade-schema';

import { formatCount, formatPercent, formatSilver, toRoman } from './format.js';
import { POLICY_PRESETS, type PresetName } from './presets.js';
import { finishedEveryRun, type ComparisonRow } from './simulate.js';

export interface ReportContext {
  readonly config: TransitionConfig;
  readonly tableVersion: string;
  readonly tableDigest: string;
  readonly currency: string;
  readonly preset: PresetName;
  readonly startTier: number;
  readonly paths: readonly string[];
}

const WIDE = 60;
const COMPARE_WIDE = 78;

const CONSUMABLE_LABELS: Readonly<Record<ConsumableId, string>> = {
  material: 'Material',
  boostMinor: 'Minor boosts',
  boostMajor: 'Major boosts',
  boostGrand: 'Grand boosts',
  recoveryScroll: 'Recovery scrolls',
  pathMaterial: 'Path material',
};

type SummaryField = keyof MetricSummary;

const FIELD_LABELS: Readonly<Record<SummaryField, string>> = {
  mean: 'Average',
  p50: 'Median',
  p90: 'P90',
  p99: 'P99',
  worst: 'Worst',
};

const banner = (title: string, width = WIDE): string[] => [
  '='.repeat(width),
  `  ${title}`,
  '='.repeat(width),
];

const section = (title: string): string[] => ['', '-'.repeat(WIDE), `  ${title}`, '-'.repeat(WIDE)];

const whole = (value: number): string => value.toFixed(0);
const oneDecimal = (value: number): string => value.toFixed(1);

/** Counts print whole except the mean, which keeps one decimal. */
function summaryLines(
  summary: MetricSummary,
  fields: readonly SummaryField[],
  indent: string,
  format: (value: number) => string = whole,
  formatMean: (value: number) => string = format === whole ? oneDecimal : format,
): string[] {
  return fields.map((field) => {
    const label = `${FIELD_LABELS[field]}:`.padEnd(12);
    const value = field === 'mean' ? formatMean(summary[field]) : format(summary[field]);
    return `${indent}${label}${value}`;
  });
}

const tierSpan = (startTier: number, targetTier: number): string =>
  `${toRoman(startTier)} -> ${toRoman(targetTier)}`;

export function renderReport(stats: AggregateStatistics, context: ReportContext): string {
  const { metrics } = stats;
  const preset = POLICY_PRESETS[context.preset];
  const lines = [
    ...banner(`${context.config.title} simulation results`),
    '',
    `Target: ${tierSpan(context.startTier, stats.targetTier)} (tier ${context.startTier} -> ${stats.targetTier})`,
    `Simulations: ${formatCount(stats.runs)} (seed ${stats.seed})`,
    `Preset: ${preset.name} (${preset.description})`,
  ];
  if (context.paths.length > 0) {
    lines.push(`Alternate paths: ${context.paths.join(', ')}`);
  }
  if (stats.cancelled) {
    lines.push(`Cancelled after ${formatCount(stats.runs)} of ${formatCount(stats.requestedRuns)} runs`);
  }
  if (stats.nonConvergedRuns > 0) {
    lines.push(
      `Non-converged runs: ${formatCount(stats.nonConvergedRuns)} (excluded from the figures below)`,
    );
  }

  lines.push(
    ...section('ATTEMPTS REQUIRED'),
    ...summaryLines(metrics.attempts, ['mean', 'p50', 'p90', 'p99', 'worst'], '  '),
    ...section(`COST (${context.currency})`),
    ...summaryLines(metrics.cost, ['mean', 'p50', 'p90', 'p99', 'worst'], '  ', formatSilver),
    ...section('MATERIALS'),
  );

  for (const id of CONSUMABLE_IDS) {
    const summary = metrics[id];
    // Consumables the policy never touched are left out.
    if (id !== 'material' && summary.worst === 0) {
      continue;
    }
    lines.push(`  ${CONSUMABLE_LABELS[id]}:`, ...summaryLines(summary, ['mean', 'p50', 'p90', 'worst'], '    '));
  }

  lines.push(
    ...section('FAILURES & PITY'),
    '  Level drops:',
    ...summaryLines(metrics.levelDrops, ['mean', 'p90', 'worst'], '    '),
    '  Pity triggers:',
    ...summaryLines(metrics.pityTriggers, ['mean', 'p90'], '    '),
    '  Recovery attempts:',
    ...summaryLines(metrics.recoveryAttempts, ['mean', 'p90'], '    '),
    '',
    '='.repeat(WIDE),
  );

  return `${lines.join('\n')}\n`;
}

export function renderComparison(
  rows: readonly ComparisonRow[],
  context: Pick<ReportContext, 'startTier'> & { readonly targetTier: number; readonly runs: number },
): string {
  const lines = [
    ...banner(`Strategy comparison: ${tierSpan(context.startTier, context.targetTier)}`, COMPARE_WIDE),
    `  Simulations per strategy: ${formatCount(context.runs)}`,
    '',
    `${'Preset'.padEnd(20)}${'Avg cost'.padEnd(12)}${'P50 cost'.padEnd(12)}${'P90 cost'.padEnd(12)}${'Avg attempts'.padEnd(14)}Unfinished`,
    '-'.repeat(COMPARE_WIDE),
  ];

  for (const { preset, stats } of rows) {
    const { cost, attempts } = stats.metrics;
    lines.push(
      `${preset.padEnd(20)}${formatSilver(cost.mean).padEnd(12)}${formatSilver(cost.p50).padEnd(12)}` +
        `${formatSilver(cost.p90).padEnd(12)}${oneDecimal(attempts.mean).padEnd(14)}${stats.nonConvergedRuns}`,
    );
  }

  lines.push('-'.repeat(COMPARE_WIDE));
  const [cheapest] = rows;
  if (cheapest && finishedEveryRun(cheapest.stats)) {
    lines.push(`Cheapest on average: ${cheapest.preset} (${cheapest.description})`);
  } else if (cheapest) {
    lines.push('No preset finished every run; averages cover completed runs only.');
  }
  return `${lines.join('\n')}\n`;
}

export function renderRateTable(config: TransitionConfig): string {
  const lines = [
    ...banner(`${config.title}: rates & pity`),
    `${'Tier'.padEnd(8)}${'Rate'.padEnd(12)}Pity`,
    '-'.repeat(WIDE),
  ];
  for (let tier = 1; tier <= config.maxTier; tier += 1) {
    const pity = config.pityThresholds[tier];
    lines.push(
      `${toRoman(tier).padEnd(8)}${formatPercent(config.baseRates[tier]).padEnd(12)}${pity > 0 ? String(pity) : 'N/A'}`,
    );
  }

  if (config.alternatePaths.length > 0) {
    lines.push('-'.repeat(WIDE), 'Alternate paths:');
    for (const path of config.alternatePaths) {
      const pity = path.pityThreshold > 0 ? `pity ${path.pityThreshold}` : 'no pity';
      lines.push(
        `  ${path.id}: ${tierSpan(path.entryTier, path.entryTier + 1)}, ` +
          `${path.length} steps at ${formatPercent(path.successRate)}, ${pity}`,
      );
    }
  }

  lines.push('='.repeat(WIDE), 'Pity = guaranteed success after N consecutive failures');
  return `${lines.join('\n')}\n`;
}

export interface JsonReport {
  readonly table: { readonly id: string; readonly version: string; readonly digest: string };
  readonly preset: PresetName;
  readonly paths: readonly string[];
  readonly startTier: number;
  readonly targetTier: number;
  readonly seed: number;
  readonly requestedRuns: number;
  readonly runs: number;
  readonly completedRuns: number;
  readonly nonConvergedRuns: number;
  readonly cancelled: boolean;
  readonly currency: string;
  readonly metrics: AggregateStatistics['metrics'];
}

export function buildJsonReport(
  stats: AggregateStatistics,
  context: ReportContext,
  preset: PresetName = context.preset,
): JsonReport {
  return {
    table: {
      id: context.config.tableId,
      version: context.tableVersion,
      digest: context.tableDigest,
    },
    preset,
    paths: context.paths,
    startTier: context.startTier,
    targetTier: stats.targetTier,
    seed: stats.seed,
    requestedRuns: stats.requestedRuns,
    runs: stats.runs,
    completedRuns: stats.completedRuns,
    nonConvergedRuns: stats.nonConvergedRuns,
    cancelled: stats.cancelled,
    currency: context.currency,
    metrics: stats.metrics,
  };
}
