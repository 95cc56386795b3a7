export {
  UpgradeEngineError,
  AlreadyAtTargetError,
  InvalidConfigurationError,
  NonConvergenceError,
} from './errors.js';

export {
  DEFAULT_SIMULATOR_CONFIG,
  resolveSimulatorConfig,
  type SimulatorConfig,
  type SimulatorConfigOverrides,
} from './config.js';

export {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';

export {
  createEntropySeed,
  createRandomSource,
  deriveRunSeed,
  normalizeSeed,
  type RandomSource,
  type SeededRandomSource,
} from './rng.js';

export {
  MODIFIER_TIER_ORDER,
  createTransitionConfig,
  createTransitionConfigFromTable,
  findAlternatePath,
  getBaseRate,
  getModifier,
  getPityThreshold,
  type AlternatePathConfig,
  type ConsumableCost,
  type ModifierConfig,
  type ModifierTier,
  type RecoveryConfig,
  type TransitionConfig,
} from './transition-config.js';

export {
  assertGearState,
  cloneGearState,
  createGearState,
  getPityEnergy,
  type GearState,
  type GearStateInit,
  type PathProgress,
} from './gear-state.js';

export {
  CERTAINTY,
  ceilingStage,
  createSuccessRatePipeline,
  multiplierStage,
  type RateAccumulator,
  type RateStage,
  type SuccessRatePipeline,
} from './modifiers/success-rate.js';

export {
  BASELINE_POLICY,
  createPolicy,
  createStrategyPolicy,
  createThresholdPolicy,
  type Policy,
} from './policy.js';

export type {
  AttemptOutcome,
  ConsumedAmounts,
  StepOutcome,
  SubAttemptOutcome,
} from './outcomes.js';

export { computeEffectiveRate, resolveAttempt } from './transition-resolver.js';

export {
  isAlternatePathEligible,
  resolveSubAttempt,
  selectAlternatePath,
} from './alternate-path-resolver.js';

export {
  RunLedgerBuilder,
  createConsumableTotals,
  ledgerCost,
  type ConsumableTotals,
  type RunLedger,
  type RunStatus,
} from './run-ledger.js';

export {
  runToTarget,
  simulateRun,
  stepGear,
  type RunOptions,
} from './run-driver.js';

export {
  EMPTY_SUMMARY,
  percentile,
  summarizeSamples,
  type MetricSummary,
} from './statistics.js';

export {
  METRIC_IDS,
  mergeShards,
  runMonteCarlo,
  runMonteCarloAsync,
  runMonteCarloShard,
  type AggregateStatistics,
  type AsyncMonteCarloOptions,
  type MetricId,
  type MonteCarloOptions,
  type MergeShardsOptions,
  type MonteCarloShard,
  type RunRecord,
  type ShardRange,
} from './monte-carlo.js';
