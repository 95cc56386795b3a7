import { describe, expect, it } from 'vitest';

import { TableValidationError } from './errors.js';
import { parseTransitionTable, transitionTableSchema } from './tables.js';

const baseTable = () => ({
  metadata: { id: 'Test-Table', title: 'Test table', version: '1.0.0' },
  maxTier: 3,
  tiers: [
    { tier: 2, successRate: 0.5, pityThreshold: 4 },
    { tier: 1, successRate: 0.9 },
    { tier: 3, successRate: 0.25, pityThreshold: 10 },
  ],
  recovery: { successRate: 0.5, quantity: 200 },
  alternatePaths: [
    { id: 'hepta', entryTier: 2, length: 5, successRate: 0.07, pityThreshold: 17, quantity: 15 },
  ],
});

describe('transitionTableSchema', () => {
  it('sorts tiers and fills defaults', () => {
    const table = parseTransitionTable(baseTable());

    expect(table.metadata.id).toBe('test-table');
    expect(table.tiers.map((entry) => entry.tier)).toEqual([1, 2, 3]);
    expect(table.tiers[0]).toEqual({ tier: 1, successRate: 0.9, pityThreshold: 0 });
    expect(table.material).toEqual({ consumable: 'material', quantity: 1 });
    expect(table.recovery).toEqual({
      successRate: 0.5,
      consumable: 'recoveryScroll',
      quantity: 200,
    });
    expect(table.modifiers).toEqual({
      minor: { ratio: 1.1, consumable: 'boostMinor' },
      major: { ratio: 1.5, consumable: 'boostMajor' },
      grand: { ratio: 2, consumable: 'boostGrand' },
    });
    expect(table.alternatePaths[0]).toEqual({
      id: 'hepta',
      entryTier: 2,
      length: 5,
      successRate: 0.07,
      pityThreshold: 17,
      consumable: 'pathMaterial',
      quantity: 15,
    });
  });

  it('rejects a table with a missing tier instead of defaulting it', () => {
    const input = baseTable();
    input.tiers = input.tiers.filter((entry) => entry.tier !== 2);

    const result = transitionTableSchema.safeParse(input);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toContain(
        'Missing rate entry for tier 2.',
      );
    }
  });

  it('rejects duplicate and out-of-range tiers', () => {
    const input = baseTable();
    input.tiers.push({ tier: 1, successRate: 0.8, pityThreshold: 0 });
    input.tiers.push({ tier: 4, successRate: 0.8, pityThreshold: 0 });

    const result = transitionTableSchema.safeParse(input);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'Duplicate tier 1 also declared at index 1.',
        'Tier 4 exceeds maxTier 3.',
      ]);
    }
  });

  it('rejects zero success rates', () => {
    const input = baseTable();
    input.tiers[0] = { tier: 2, successRate: 0, pityThreshold: 0 };

    expect(transitionTableSchema.safeParse(input).success).toBe(false);
  });

  it('limits alternate paths to two with distinct entry tiers below maxTier', () => {
    const input = {
      ...baseTable(),
      alternatePaths: [
        { id: 'a', entryTier: 1, length: 2, successRate: 0.5 },
        { id: 'b', entryTier: 1, length: 2, successRate: 0.5 },
        { id: 'c', entryTier: 3, length: 2, successRate: 0.5 },
      ],
    };

    const result = transitionTableSchema.safeParse(input);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'At most 2 alternate paths may be declared.',
        'Entry tier 1 is already used by the path at index 0.',
        'Entry tier 3 must be below maxTier 3.',
      ]);
    }
  });

  it('wraps failures in a TableValidationError with a readable message', () => {
    const input = baseTable();
    input.tiers = input.tiers.filter((entry) => entry.tier !== 3);

    expect(() => parseTransitionTable(input)).toThrowError(TableValidationError);
    expect(() => parseTransitionTable(input)).toThrowError(
      'Invalid transition table: tiers: Missing rate entry for tier 3.',
    );
  });
});
