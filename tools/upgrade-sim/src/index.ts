#!/usr/bin/env tsx
/*
 * Monte Carlo simulator for gear upgrade strategies. Prints a cost and
 * attempt report for one policy preset, or compares every preset.
 */

import process from 'node:process';

import { runCli } from './cli.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    signal: controller.signal,
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
