import { describe, expect, it } from 'vitest';

import { DEFAULT_TARGET_TIER, UsageError, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('applies defaults', () => {
    const args = parseArgs([]);

    expect(args).toEqual({
      target: DEFAULT_TARGET_TIER,
      start: 0,
      startProgress: {},
      runs: 10_000,
      preset: 'conservative',
      paths: [],
      workers: 1,
      compare: false,
      showRates: false,
      json: false,
      verbose: false,
      help: false,
    });
  });

  it('reads short aliases and inline values', () => {
    const args = parseArgs(['-t', '8', '-n', '500', '--seed=42', '-s', 'full_optimal']);

    expect(args.target).toBe(8);
    expect(args.runs).toBe(500);
    expect(args.seed).toBe(42);
    expect(args.preset).toBe('full-optimal');
  });

  it('reads paths, starting progress and output flags', () => {
    const args = parseArgs([
      '--start',
      '7',
      '--target',
      '9',
      '--paths',
      'Hepta, okta',
      '--start-progress',
      'hepta=3',
      '--json',
      '--compare',
      '--show-rates',
      '--verbose',
      '--workers',
      '4',
      '--safety-bound',
      '2000',
    ]);

    expect(args).toMatchObject({
      start: 7,
      target: 9,
      paths: ['hepta', 'okta'],
      startProgress: { hepta: 3 },
      json: true,
      compare: true,
      showRates: true,
      verbose: true,
      workers: 4,
      safetyBound: 2000,
    });
  });

  it('rejects malformed numbers', () => {
    expect(() => parseArgs(['--runs', '0'])).toThrowError(
      '--runs expects an integer >= 1; received "0".',
    );
    expect(() => parseArgs(['--target', 'five'])).toThrowError(UsageError);
    expect(() => parseArgs(['--seed', '1.5'])).toThrowError(UsageError);
  });

  it('rejects unknown options and presets', () => {
    expect(() => parseArgs(['--fast'])).toThrowError('Unknown option "--fast".');
    expect(() => parseArgs(['--preset', 'yolo'])).toThrowError(/Unknown preset "yolo"/);
  });

  it('requires values for value flags', () => {
    expect(() => parseArgs(['--table'])).toThrowError('--table requires a value.');
    expect(() => parseArgs(['--runs', '--json'])).toThrowError('--runs requires a value.');
  });

  it('rejects malformed starting progress', () => {
    expect(() => parseArgs(['--start-progress', 'hepta'])).toThrowError(
      '--start-progress expects <id>=<n>; received "hepta".',
    );
  });

  it('requires the start tier to be below the target', () => {
    expect(() => parseArgs(['--start', '5'])).toThrowError(
      '--start 5 must be below --target 5.',
    );
  });

  it('flags help requests', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });
});
