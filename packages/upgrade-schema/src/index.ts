export {
  UpgradeSchemaError,
  TableValidationError,
  formatIssuePath,
  formatIssues,
} from './errors.js';

export * from './base/ids.js';
export * from './base/numbers.js';

export {
  MAX_ALTERNATE_PATHS,
  parseTransitionTable,
  transitionTableSchema,
  type AlternatePathEntry,
  type ConsumableUsage,
  type ModifierEntry,
  type ParsedTransitionTable,
  type RecoveryEntry,
  type TableMetadata,
  type TierEntry,
  type TransitionTableInput,
} from './tables.js';

export {
  ZERO_PRICE_TABLE,
  parsePriceTable,
  priceTableSchema,
  resolvePriceTable,
  type ParsedPriceTable,
  type PriceEntry,
  type PriceTable,
} from './prices.js';

export {
  MODIFIER_STRATEGIES,
  RECOVERY_STRATEGIES,
  parsePolicySettings,
  policySettingsSchema,
  type ModifierStrategy,
  type PolicySettings,
  type PolicySettingsInput,
  type RecoveryStrategy,
  type StrategyPolicySettings,
  type ThresholdPolicySettings,
} from './policy.js';

export {
  TABLE_DIGEST_VERSION,
  computeTableDigest,
  digestToKey,
  type TableDigest,
} from './digest.js';
