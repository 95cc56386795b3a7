import { describe, expect, it } from 'vitest';

import { formatCount, formatPercent, formatSilver, toRoman } from './format.js';

describe('formatSilver', () => {
  it('uses one decimal with a magnitude suffix', () => {
    expect(formatSilver(1_500)).toBe('1.5K');
    expect(formatSilver(12_340_000)).toBe('12.3M');
    expect(formatSilver(6_289_500_000)).toBe('6.3B');
    expect(formatSilver(2_000_000_000_000)).toBe('2.0T');
  });

  it('prints small amounts as whole numbers', () => {
    expect(formatSilver(0)).toBe('0');
    expect(formatSilver(999.4)).toBe('999');
  });
});

describe('toRoman', () => {
  it('converts tier numbers', () => {
    expect([1, 4, 5, 7, 9, 10, 14].map(toRoman)).toEqual([
      'I',
      'IV',
      'V',
      'VII',
      'IX',
      'X',
      'XIV',
    ]);
  });

  it('leaves zero as a digit', () => {
    expect(toRoman(0)).toBe('0');
  });
});

describe('formatPercent', () => {
  it('prints one decimal', () => {
    expect(formatPercent(0.07)).toBe('7.0%');
    expect(formatPercent(0.015)).toBe('1.5%');
  });
});

describe('formatCount', () => {
  it('groups thousands', () => {
    expect(formatCount(10_000)).toBe('10,000');
  });
});
