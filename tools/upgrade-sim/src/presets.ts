import {
  parsePolicySettings,
  type PolicySettings,
  type PolicySettingsInput,
} from '@gear-upgrade/upgrade-schema';

export const PRESET_NAMES = [
  'conservative',
  'no-recovery',
  'recovery-above-3',
  'recovery-above-5',
  'boost-high-tier',
  'full-optimal',
] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

export interface PolicyPreset {
  readonly name: PresetName;
  readonly description: string;
  readonly settings: PolicySettingsInput;
}

const PRESETS: Record<PresetName, PolicyPreset> = {
  conservative: {
    name: 'conservative',
    description: 'Always use recovery, no boosts',
    settings: { kind: 'strategy', recovery: 'always', modifiers: 'never' },
  },
  'no-recovery': {
    name: 'no-recovery',
    description: 'Never use recovery scrolls',
    settings: { kind: 'strategy', recovery: 'never', modifiers: 'never' },
  },
  'recovery-above-3': {
    name: 'recovery-above-3',
    description: 'Use recovery only at III and above',
    settings: {
      kind: 'strategy',
      recovery: 'above-threshold',
      recoveryThreshold: 3,
      modifiers: 'never',
    },
  },
  'recovery-above-5': {
    name: 'recovery-above-5',
    description: 'Use recovery only at V and above',
    settings: {
      kind: 'strategy',
      recovery: 'above-threshold',
      recoveryThreshold: 5,
      modifiers: 'never',
    },
  },
  'boost-high-tier': {
    name: 'boost-high-tier',
    description: 'Use the major boost from VI and above',
    settings: {
      kind: 'strategy',
      recovery: 'always',
      modifiers: 'major-high-tier',
      majorModifierThreshold: 6,
    },
  },
  'full-optimal': {
    name: 'full-optimal',
    description: 'Use recovery and optimal boosts',
    settings: { kind: 'strategy', recovery: 'always', modifiers: 'optimal' },
  },
};

export const POLICY_PRESETS: Readonly<Record<PresetName, PolicyPreset>> = Object.freeze(PRESETS);

export const isPresetName = (value: string): value is PresetName =>
  PRESET_NAMES.some((name) => name === value);

/** Validated policy settings for a preset, engaging the given alternate paths. */
export function resolvePresetSettings(
  name: PresetName,
  alternatePaths: readonly string[] = [],
): PolicySettings {
  return parsePolicySettings({
    ...POLICY_PRESETS[name].settings,
    alternatePaths: [...alternatePaths],
  });
}
