export interface MetricSummary {
  readonly mean: number;
  readonly p50: number;
  readonly p90: number;
  readonly p99: number;
  readonly worst: number;
}

export const EMPTY_SUMMARY: MetricSummary = Object.freeze({
  mean: 0,
  p50: 0,
  p90: 0,
  p99: 0,
  worst: 0,
});

/**
 * Nearest-rank percentile over an ascending sample: index
 * `min(floor(n * p), n - 1)`, no interpolation.
 */
export function percentile(sorted: ArrayLike<number>, p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.min(Math.floor(sorted.length * p), sorted.length - 1);
  return sorted[Math.max(0, index)];
}

export function summarizeSamples(values: ArrayLike<number>): MetricSummary {
  const count = values.length;
  if (count === 0) {
    return EMPTY_SUMMARY;
  }

  // Summed in input order so merged shards reproduce the same mean.
  let total = 0;
  for (let index = 0; index < count; index += 1) {
    total += values[index];
  }

  const sorted = Float64Array.from(values).sort();
  return Object.freeze({
    mean: total / count,
    p50: percentile(sorted, 0.5),
    p90: percentile(sorted, 0.9),
    p99: percentile(sorted, 0.99),
    worst: sorted[count - 1],
  });
}
