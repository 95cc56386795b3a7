export interface SimulatorConfig {
  readonly limits: {
    /**
     * Attempts a single run may spend before it is reported as non-converged.
     *
     * @defaultValue `100000`
     */
    readonly safetyBound: number;
    /**
     * Upper bound on runs accepted by one Monte Carlo request.
     *
     * @defaultValue `10000000`
     */
    readonly maxRuns: number;
  };
  readonly batching: {
    /**
     * Runs executed between event-loop yields by the asynchronous aggregator.
     *
     * @defaultValue `250`
     */
    readonly batchSize: number;
    /**
     * Clamp applied to `batchSize` overrides so a cancellation request is
     * never starved for long.
     *
     * @defaultValue `10000`
     */
    readonly maxBatchSize: number;
  };
  /**
   * Runs used when a caller does not ask for a specific number.
   *
   * @defaultValue `10000`
   */
  readonly defaultRuns: number;
}

export type SimulatorConfigOverrides = Readonly<{
  readonly limits?: Partial<SimulatorConfig['limits']>;
  readonly batching?: Partial<SimulatorConfig['batching']>;
  readonly defaultRuns?: number;
}>;

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = Object.freeze({
  limits: Object.freeze({
    safetyBound: 100_000,
    maxRuns: 10_000_000,
  }),
  batching: Object.freeze({
    batchSize: 250,
    maxBatchSize: 10_000,
  }),
  defaultRuns: 10_000,
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function resolveLimitsConfig(
  overrides: SimulatorConfigOverrides['limits'] | undefined,
): SimulatorConfig['limits'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_SIMULATOR_CONFIG.limits;

  return {
    safetyBound: toPositiveInt(source.safetyBound) ?? defaults.safetyBound,
    maxRuns: toPositiveInt(source.maxRuns) ?? defaults.maxRuns,
  };
}

function resolveBatchingConfig(
  overrides: SimulatorConfigOverrides['batching'] | undefined,
): SimulatorConfig['batching'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_SIMULATOR_CONFIG.batching;

  const maxBatchSize = toPositiveInt(source.maxBatchSize) ?? defaults.maxBatchSize;
  const batchSize = toPositiveInt(source.batchSize) ?? defaults.batchSize;

  return {
    batchSize: Math.min(batchSize, maxBatchSize),
    maxBatchSize,
  };
}

export function resolveSimulatorConfig(
  overrides?: SimulatorConfigOverrides,
): SimulatorConfig {
  if (!overrides) {
    return DEFAULT_SIMULATOR_CONFIG;
  }

  const limits = resolveLimitsConfig(overrides.limits);
  return Object.freeze({
    limits: Object.freeze(limits),
    batching: Object.freeze(resolveBatchingConfig(overrides.batching)),
    defaultRuns: Math.min(
      toPositiveInt(overrides.defaultRuns) ?? DEFAULT_SIMULATOR_CONFIG.defaultRuns,
      limits.maxRuns,
    ),
  });
}
