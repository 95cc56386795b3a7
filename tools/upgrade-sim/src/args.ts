import { DEFAULT_SIMULATOR_CONFIG } from '@gear-upgrade/core';

import { PRESET_NAMES, isPresetName, type PresetName } from './presets.js';

export const DEFAULT_TARGET_TIER = 5;

export interface CliArgs {
  tablePath?: string;
  pricesPath?: string;
  target: number;
  start: number;
  startProgress: Record<string, number>;
  runs: number;
  preset: PresetName;
  paths: string[];
  seed?: number;
  safetyBound?: number;
  workers: number;
  compare: boolean;
  showRates: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

/** Bad command line; the CLI exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const HELP_TEXT =
  `Usage: upgrade-sim [options]\n\n` +
  `Options:\n` +
  `  --table <file>              Transition table (JSON/JSON5); default: sample awakening table\n` +
  `  --prices <file>             Price table (JSON/JSON5); default: sample prices\n` +
  `  -t, --target <n>            Target tier (default: ${DEFAULT_TARGET_TIER})\n` +
  `  --start <n>                 Starting tier (default: 0)\n` +
  `  --start-progress <id>=<n>   Starting progress on an alternate path (repeatable)\n` +
  `  -n, --runs <n>              Simulations to run (default: ${DEFAULT_SIMULATOR_CONFIG.defaultRuns})\n` +
  `  -s, --preset <name>         Policy preset: ${PRESET_NAMES.join(', ')}\n` +
  `  --paths <id,...>            Engage the listed alternate paths\n` +
  `  --seed <n>                  RNG seed for reproducible results\n` +
  `  --safety-bound <n>          Attempts per run before it counts as non-converged\n` +
  `  --workers <n>               Worker threads (default: 1)\n` +
  `  --compare                   Compare every preset, cheapest first\n` +
  `  --show-rates                Print the rate and pity table\n` +
  `  --json                      Print results as JSON\n` +
  `  --verbose                   Log telemetry to the console\n` +
  `  -h, --help                  Show this help text\n`;

const FLAG_ALIASES: Readonly<Record<string, string>> = {
  '-t': '--target',
  '-n': '--runs',
  '-s': '--preset',
  '-h': '--help',
};

function parseInteger(flag: string, raw: string, min: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < min) {
    throw new UsageError(`${flag} expects an integer >= ${min}; received "${raw}".`);
  }
  return value;
}

function parseProgress(raw: string): [string, number] {
  const separator = raw.indexOf('=');
  if (separator <= 0) {
    throw new UsageError(`--start-progress expects <id>=<n>; received "${raw}".`);
  }
  return [
    raw.slice(0, separator).trim().toLowerCase(),
    parseInteger('--start-progress', raw.slice(separator + 1), 0),
  ];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    target: DEFAULT_TARGET_TIER,
    start: 0,
    startProgress: {},
    runs: DEFAULT_SIMULATOR_CONFIG.defaultRuns,
    preset: 'conservative',
    paths: [],
    workers: 1,
    compare: false,
    showRates: false,
    json: false,
    verbose: false,
    help: false,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const equals = token.startsWith('--') ? token.indexOf('=') : -1;
    const rawFlag = equals > 0 ? token.slice(0, equals) : token;
    const flag = FLAG_ALIASES[rawFlag] ?? rawFlag;
    const inlineValue = equals > 0 ? token.slice(equals + 1) : undefined;

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`${flag} requires a value.`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case '--table':
        args.tablePath = takeValue();
        break;
      case '--prices':
        args.pricesPath = takeValue();
        break;
      case '--target':
        args.target = parseInteger(flag, takeValue(), 1);
        break;
      case '--start':
        args.start = parseInteger(flag, takeValue(), 0);
        break;
      case '--start-progress': {
        const [id, progress] = parseProgress(takeValue());
        args.startProgress[id] = progress;
        break;
      }
      case '--runs':
        args.runs = parseInteger(flag, takeValue(), 1);
        break;
      case '--preset': {
        const preset = takeValue().trim().toLowerCase().replaceAll('_', '-');
        if (!isPresetName(preset)) {
          throw new UsageError(
            `Unknown preset "${preset}". Choose one of: ${PRESET_NAMES.join(', ')}.`,
          );
        }
        args.preset = preset;
        break;
      }
      case '--paths':
        args.paths = takeValue()
          .split(',')
          .map((id) => id.trim().toLowerCase())
          .filter((id) => id.length > 0);
        break;
      case '--seed':
        args.seed = parseInteger(flag, takeValue(), 0);
        break;
      case '--safety-bound':
        args.safetyBound = parseInteger(flag, takeValue(), 1);
        break;
      case '--workers':
        args.workers = parseInteger(flag, takeValue(), 1);
        break;
      case '--compare':
        args.compare = true;
        break;
      case '--show-rates':
        args.showRates = true;
        break;
      case '--json':
        args.json = true;
        break;
      case '--verbose':
        args.verbose = true;
        break;
      case '--help':
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown option "${token}".`);
    }
  }

  if (args.start >= args.target) {
    throw new UsageError(
      `--start ${args.start} must be below --target ${args.target}.`,
    );
  }

  return args;
}
