import {
  createConsoleTelemetry,
  createEntropySeed,
  createTransitionConfigFromTable,
  resetTelemetry,
  setTelemetry,
  type TransitionConfig,
} from '@gear-upgrade/core';
import {
  loadPriceTable,
  loadTransitionTable,
  samplePriceTable,
  sampleTable,
} from '@gear-upgrade/sample-tables';
import {
  computeTableDigest,
  digestToKey,
  type ParsedPriceTable,
  type ParsedTransitionTable,
} from '@gear-upgrade/upgrade-schema';

import { HELP_TEXT, UsageError, parseArgs, type CliArgs } from './args.js';
import { formatCount } from './format.js';
import { resolvePresetSettings } from './presets.js';
import {
  buildJsonReport,
  renderComparison,
  renderRateTable,
  renderReport,
  type ReportContext,
} from './report.js';
import { compareStrategies, simulate, type SimulationRequest } from './simulate.js';

export { parseArgs, UsageError, HELP_TEXT, type CliArgs } from './args.js';
export { planShards, runParallel } from './parallel.js';
export { POLICY_PRESETS, PRESET_NAMES, resolvePresetSettings, type PresetName } from './presets.js';
export { compareStrategies, simulate, type ComparisonRow, type SimulationRequest } from './simulate.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIo {
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly signal?: AbortSignal;
}

interface LoadedTables {
  readonly table: ParsedTransitionTable;
  readonly priceTable: ParsedPriceTable;
}

function loadTables(args: CliArgs): LoadedTables {
  return {
    table: args.tablePath === undefined ? sampleTable : loadTransitionTable(args.tablePath),
    priceTable: args.pricesPath === undefined ? samplePriceTable : loadPriceTable(args.pricesPath),
  };
}

function checkAgainstTable(args: CliArgs, config: TransitionConfig): void {
  if (args.target > config.maxTier) {
    throw new UsageError(
      `--target ${args.target} exceeds the highest tier ${config.maxTier} of "${config.tableId}".`,
    );
  }

  const known = config.alternatePaths.map((path) => path.id);
  const requested = [...args.paths, ...Object.keys(args.startProgress)];
  for (const id of requested) {
    if (!known.includes(id)) {
      throw new UsageError(
        `Unknown alternate path "${id}". Table "${config.tableId}" declares: ${
          known.length > 0 ? known.join(', ') : 'none'
        }.`,
      );
    }
  }
}

async function execute(args: CliArgs, io: CliIo): Promise<void> {
  const { table, priceTable } = loadTables(args);
  const config = createTransitionConfigFromTable(table);

  if (args.showRates) {
    io.stdout.write(renderRateTable(config));
    return;
  }

  checkAgainstTable(args, config);

  const context: ReportContext = {
    config,
    tableVersion: table.metadata.version,
    tableDigest: digestToKey(computeTableDigest(table)),
    currency: priceTable.currency,
    preset: args.preset,
    startTier: args.start,
    paths: args.paths,
  };

  const request: Omit<SimulationRequest, 'policy'> = {
    table,
    priceTable,
    targetTier: args.target,
    runs: args.runs,
    start: { tier: args.start, pathProgress: args.startProgress },
    seed: args.seed ?? createEntropySeed(),
    safetyBound: args.safetyBound,
  };
  const options = { workers: args.workers, signal: io.signal };

  if (!args.json) {
    io.stderr.write(
      `Running ${formatCount(args.runs)} simulations${args.compare ? ' per preset' : ''} (seed ${request.seed})...\n`,
    );
  }

  if (args.compare) {
    const rows = await compareStrategies(request, args.paths, options);
    io.stdout.write(
      args.json
        ? `${JSON.stringify(
            { comparison: rows.map((row) => buildJsonReport(row.stats, context, row.preset)) },
            null,
            2,
          )}\n`
        : renderComparison(rows, { startTier: args.start, targetTier: args.target, runs: args.runs }),
    );
    return;
  }

  const stats = await simulate(
    { ...request, policy: resolvePresetSettings(args.preset, args.paths) },
    options,
  );
  io.stdout.write(
    args.json ? `${JSON.stringify(buildJsonReport(stats, context), null, 2)}\n` : renderReport(stats, context),
  );
}

/**
 * Runs the simulator for one command line and resolves with the process
 * exit code: 0 on success, 2 for usage errors, 1 for anything else.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    return reportFailure(error, io);
  }

  if (args.help) {
    io.stderr.write(HELP_TEXT);
    return 0;
  }

  if (args.verbose) {
    setTelemetry(createConsoleTelemetry());
  }
  try {
    await execute(args, io);
    return 0;
  } catch (error) {
    return reportFailure(error, io);
  } finally {
    resetTelemetry();
  }
}

function reportFailure(error: unknown, io: CliIo): number {
  const message = error instanceof Error ? error.message : String(error);
  io.stderr.write(`upgrade-sim failed: ${message}\n`);
  if (error instanceof UsageError) {
    io.stderr.write('Run with --help for usage.\n');
    return 2;
  }
  return 1;
}
