import canonicalize from 'canonicalize';

import type { ParsedPriceTable } from './prices.js';
import type { ParsedTransitionTable } from './tables.js';

export const TABLE_DIGEST_VERSION = 1;

export interface TableDigest {
  readonly version: number;
  readonly hash: string;
}

const FNV1A_OFFSET_BASIS = 0x811c9dc5;
const FNV1A_PRIME = 0x01000193;

const fnv1a = (input: string): number => {
  let hash = FNV1A_OFFSET_BASIS;
  for (const char of input) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) {
      continue;
    }
    hash ^= codePoint;
    hash = Math.imul(hash, FNV1A_PRIME);
    hash >>>= 0;
  }
  return hash >>> 0;
};

/**
 * Digest of the parsed tables a simulation ran against. Reports carry it so
 * two result files can be checked for comparable inputs.
 */
export const computeTableDigest = (
  table: ParsedTransitionTable | ParsedPriceTable,
): TableDigest => {
  const serialized = canonicalize(table);
  if (typeof serialized !== 'string') {
    throw new Error('Failed to canonicalize table for hashing.');
  }
  return {
    version: TABLE_DIGEST_VERSION,
    hash: `fnv1a-${fnv1a(serialized).toString(16).padStart(8, '0')}`,
  };
};

export const digestToKey = (digest: TableDigest): string =>
  `v${digest.version}:${digest.hash}`;
