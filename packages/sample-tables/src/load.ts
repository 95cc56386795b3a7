import { readFileSync } from 'node:fs';
import path from 'node:path';

import JSON5 from 'json5';
import {
  parsePriceTable,
  parseTransitionTable,
  type ParsedPriceTable,
  type ParsedTransitionTable,
} from '@gear-upgrade/upgrade-schema';

export function parseTableDocument(raw: string, documentPath: string): unknown {
  const document: unknown = documentPath.endsWith('.json5') ? JSON5.parse(raw) : JSON.parse(raw);
  return document;
}

export function readTableDocument(documentPath: string): unknown {
  const resolved = path.resolve(documentPath);
  return parseTableDocument(readFileSync(resolved, 'utf8'), resolved);
}

export function loadTransitionTable(documentPath: string): ParsedTransitionTable {
  return parseTransitionTable(readTableDocument(documentPath));
}

export function loadPriceTable(documentPath: string): ParsedPriceTable {
  return parsePriceTable(readTableDocument(documentPath));
}
