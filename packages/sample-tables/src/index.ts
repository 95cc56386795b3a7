import { fileURLToPath } from 'node:url';

import {
  computeTableDigest,
  resolvePriceTable,
  type ParsedPriceTable,
  type ParsedTransitionTable,
  type PriceTable,
} from '@gear-upgrade/upgrade-schema';

import { loadPriceTable, loadTransitionTable } from './load.js';

export {
  loadPriceTable,
  loadTransitionTable,
  parseTableDocument,
  readTableDocument,
} from './load.js';

export const SAMPLE_TABLE_PATH = fileURLToPath(
  new URL('../tables/awakening.json5', import.meta.url),
);
export const SAMPLE_PRICES_PATH = fileURLToPath(
  new URL('../tables/prices.json5', import.meta.url),
);

export const sampleTable: ParsedTransitionTable = loadTransitionTable(SAMPLE_TABLE_PATH);
export const sampleTableDigest = computeTableDigest(sampleTable);

export const samplePriceTable: ParsedPriceTable = loadPriceTable(SAMPLE_PRICES_PATH);
export const samplePrices: PriceTable = resolvePriceTable(samplePriceTable);
