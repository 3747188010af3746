import type { AccuracyClass } from '../location/locationSample';

import { DEVICE_CLASS_PROFILES, type DeviceClass } from './deviceClasses';

export type NetworkClass = 'wifi' | 'cellular' | 'none';

export type PowerState = {
  /** 0-100 */
  batteryLevel: number;
  isCharging: boolean;
  isPowerSaveMode: boolean;
  networkClass: NetworkClass;
};

export type PolicyTier = 'CHARGING' | 'FULL' | 'BALANCED' | 'SAVER' | 'LOW' | 'CRITICAL';

export type SamplingPolicy = Readonly<{
  tier: PolicyTier;
  sampleIntervalMs: number;
  minDisplacementMeters: number;
  desiredAccuracy: AccuracyClass;
  /** Sampling continues; writes wait for connectivity. */
  publishDeferred: boolean;
}>;

type TierSettings = Pick<SamplingPolicy, 'sampleIntervalMs' | 'minDisplacementMeters' | 'desiredAccuracy'>;

const TIER_SETTINGS: Record<PolicyTier, TierSettings> = {
  CHARGING: { sampleIntervalMs: 10_000, minDisplacementMeters: 5, desiredAccuracy: 'high' },
  FULL: { sampleIntervalMs: 15_000, minDisplacementMeters: 10, desiredAccuracy: 'high' },
  BALANCED: { sampleIntervalMs: 30_000, minDisplacementMeters: 10, desiredAccuracy: 'high' },
  SAVER: { sampleIntervalMs: 30_000, minDisplacementMeters: 25, desiredAccuracy: 'medium' },
  LOW: { sampleIntervalMs: 45_000, minDisplacementMeters: 25, desiredAccuracy: 'medium' },
  CRITICAL: { sampleIntervalMs: 60_000, minDisplacementMeters: 50, desiredAccuracy: 'low' },
};

const FULL_BATTERY_THRESHOLD = 60;
const LOW_BATTERY_THRESHOLD = 30;
const CRITICAL_BATTERY_THRESHOLD = 15;

export const DEFAULT_POWER_STATE: PowerState = {
  batteryLevel: 100,
  isCharging: false,
  isPowerSaveMode: false,
  networkClass: 'wifi',
};

function normalizeBatteryLevel(level: number): number {
  if (!Number.isFinite(level)) {
    return 0;
  }
  return Math.min(100, Math.max(0, level));
}

export function resolvePolicyTier(state: PowerState): PolicyTier {
  if (state.isCharging) {
    return 'CHARGING';
  }

  const level = normalizeBatteryLevel(state.batteryLevel);
  if (level < CRITICAL_BATTERY_THRESHOLD) {
    return 'CRITICAL';
  }
  if (level < LOW_BATTERY_THRESHOLD) {
    return 'LOW';
  }
  if (state.isPowerSaveMode) {
    return 'SAVER';
  }
  return level >= FULL_BATTERY_THRESHOLD ? 'FULL' : 'BALANCED';
}

/**
 * Pure mapping from power/network state to sampling settings. Lower battery
 * never yields a shorter interval than higher battery at the same charging and
 * power-save state.
 */
export function resolveSamplingPolicy(state: PowerState, deviceClass: DeviceClass = 'standard'): SamplingPolicy {
  const tier = resolvePolicyTier(state);
  const settings = TIER_SETTINGS[tier];
  const { intervalMultiplier } = DEVICE_CLASS_PROFILES[deviceClass];

  return Object.freeze({
    tier,
    sampleIntervalMs: Math.round(settings.sampleIntervalMs * intervalMultiplier),
    minDisplacementMeters: settings.minDisplacementMeters,
    desiredAccuracy: settings.desiredAccuracy,
    publishDeferred: state.networkClass === 'none',
  });
}

export function isSamePolicy(a: SamplingPolicy, b: SamplingPolicy): boolean {
  return (
    a.tier === b.tier &&
    a.sampleIntervalMs === b.sampleIntervalMs &&
    a.minDisplacementMeters === b.minDisplacementMeters &&
    a.desiredAccuracy === b.desiredAccuracy &&
    a.publishDeferred === b.publishDeferred
  );
}
