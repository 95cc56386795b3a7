const SUFFIXES: readonly (readonly [number, string])[] = [
  [1e12, 'T'],
  [1e9, 'B'],
  [1e6, 'M'],
  [1e3, 'K'],
];

const ROMAN_NUMERALS: readonly (readonly [number, string])[] = [
  [1000, 'M'],
  [900, 'CM'],
  [500, 'D'],
  [400, 'CD'],
  [100, 'C'],
  [90, 'XC'],
  [50, 'L'],
  [40, 'XL'],
  [10, 'X'],
  [9, 'IX'],
  [5, 'V'],
  [4, 'IV'],
  [1, 'I'],
];

/** Compact currency amount: one decimal with a K/M/B/T suffix from 1 000 up. */
export function formatSilver(amount: number): string {
  for (const [scale, suffix] of SUFFIXES) {
    if (amount >= scale) {
      return `${(amount / scale).toFixed(1)}${suffix}`;
    }
  }
  return Math.round(amount).toString();
}

export function toRoman(value: number): string {
  if (!Number.isInteger(value) || value <= 0) {
    return String(value);
  }
  let remaining = value;
  let result = '';
  for (const [amount, numeral] of ROMAN_NUMERALS) {
    while (remaining >= amount) {
      result += numeral;
      remaining -= amount;
    }
  }
  return result;
}

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}
