import { InvalidConfigurationError } from './errors.js';
import {
  findAlternatePath,
  type TransitionConfig,
} from './transition-config.js';

export interface PathProgress {
  progress: number;
  pity: number;
}

/**
 * Mutable per-run state. `pityEnergy[t]` counts consecutive failures toward
 * tier `t`; `paths[i]` tracks the alternate path at the same index in the
 * configuration.
 */
export interface GearState {
  tier: number;
  readonly pityEnergy: Uint32Array;
  readonly paths: PathProgress[];
}

export interface GearStateInit {
  readonly tier?: number;
  /** Keyed by target tier. */
  readonly pityEnergy?: Readonly<Record<number, number>>;
  /** Keyed by alternate path id. */
  readonly pathProgress?: Readonly<Record<string, number>>;
}

const isNonNegativeInt = (value: number): boolean =>
  Number.isInteger(value) && value >= 0;

export function createGearState(
  config: TransitionConfig,
  init: GearStateInit = {},
): GearState {
  const tier = init.tier ?? 0;
  if (!isNonNegativeInt(tier) || tier > config.maxTier) {
    throw new InvalidConfigurationError(
      `Starting tier ${tier} is outside 0..${config.maxTier}.`,
    );
  }

  const pityEnergy = new Uint32Array(config.maxTier + 1);
  for (const [key, value] of Object.entries(init.pityEnergy ?? {})) {
    const target = Number(key);
    if (!Number.isInteger(target) || target < 1 || target > config.maxTier) {
      throw new InvalidConfigurationError(
        `Pity energy given for unknown tier ${key}.`,
      );
    }
    if (!isNonNegativeInt(value)) {
      throw new InvalidConfigurationError(
        `Pity energy for tier ${target} must be a non-negative integer.`,
      );
    }
    pityEnergy[target] = value;
  }

  const paths = config.alternatePaths.map(() => ({ progress: 0, pity: 0 }));
  for (const [id, progress] of Object.entries(init.pathProgress ?? {})) {
    const path = findAlternatePath(config, id);
    if (!path) {
      throw new InvalidConfigurationError(`Unknown alternate path "${id}".`);
    }
    paths[path.index].progress = progress;
  }

  const state: GearState = { tier, pityEnergy, paths };
  assertGearState(state, config);
  return state;
}

/**
 * Rejects path progress the engine could never have produced: progress must
 * stay below the path length and is only nonzero while the gear sits at the
 * path's entry tier.
 */
export function assertGearState(state: GearState, config: TransitionConfig): void {
  if (!isNonNegativeInt(state.tier) || state.tier > config.maxTier) {
    throw new InvalidConfigurationError(
      `Gear tier ${state.tier} is outside 0..${config.maxTier}.`,
    );
  }
  if (
    state.pityEnergy.length !== config.maxTier + 1 ||
    state.paths.length !== config.alternatePaths.length
  ) {
    throw new InvalidConfigurationError(
      `Gear state does not match table "${config.tableId}".`,
    );
  }

  config.alternatePaths.forEach((path, index) => {
    const { progress, pity } = state.paths[index];
    if (!isNonNegativeInt(progress) || progress >= path.length) {
      throw new InvalidConfigurationError(
        `Progress ${progress} on path "${path.id}" must be an integer in 0..${path.length - 1}.`,
      );
    }
    if (!isNonNegativeInt(pity)) {
      throw new InvalidConfigurationError(
        `Pity on path "${path.id}" must be a non-negative integer.`,
      );
    }
    if (progress > 0 && state.tier !== path.entryTier) {
      throw new InvalidConfigurationError(
        `Path "${path.id}" has progress ${progress} but gear is at tier ${state.tier}, not entry tier ${path.entryTier}.`,
      );
    }
  });
}

export function cloneGearState(state: GearState): GearState {
  return {
    tier: state.tier,
    pityEnergy: state.pityEnergy.slice(),
    paths: state.paths.map((path) => ({ progress: path.progress, pity: path.pity })),
  };
}

export function getPityEnergy(state: GearState, targetTier: number): number {
  return state.pityEnergy[targetTier] ?? 0;
}
