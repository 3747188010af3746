import { describe, expect, it } from 'vitest';

import {
  type PowerState,
  resolvePolicyTier,
  resolveSamplingPolicy,
} from '../power/batteryAdaptationPolicy';
import { resolveDeviceClass } from '../power/deviceClasses';
import { PowerStateMonitor } from '../power/powerStateMonitor';

function buildState(overrides?: Partial<PowerState>): PowerState {
  return {
    batteryLevel: 80,
    isCharging: false,
    isPowerSaveMode: false,
    networkClass: 'wifi',
    ...overrides,
  };
}

describe('resolveSamplingPolicy', () => {
  it('maps battery bands to tiers', () => {
    expect(resolvePolicyTier(buildState({ batteryLevel: 100 }))).toBe('FULL');
    expect(resolvePolicyTier(buildState({ batteryLevel: 60 }))).toBe('FULL');
    expect(resolvePolicyTier(buildState({ batteryLevel: 59 }))).toBe('BALANCED');
    expect(resolvePolicyTier(buildState({ batteryLevel: 30 }))).toBe('BALANCED');
    expect(resolvePolicyTier(buildState({ batteryLevel: 29 }))).toBe('LOW');
    expect(resolvePolicyTier(buildState({ batteryLevel: 15 }))).toBe('LOW');
    expect(resolvePolicyTier(buildState({ batteryLevel: 14 }))).toBe('CRITICAL');
    expect(resolvePolicyTier(buildState({ batteryLevel: 5, isCharging: true }))).toBe('CHARGING');
    expect(resolvePolicyTier(buildState({ batteryLevel: 90, isPowerSaveMode: true }))).toBe('SAVER');
    expect(resolvePolicyTier(buildState({ batteryLevel: 20, isPowerSaveMode: true }))).toBe('LOW');
  });

  it('treats an unreadable battery level as empty', () => {
    expect(resolvePolicyTier(buildState({ batteryLevel: Number.NaN }))).toBe('CRITICAL');
  });

  it('returns the full settings for a tier', () => {
    expect(resolveSamplingPolicy(buildState({ batteryLevel: 10 }))).toEqual({
      tier: 'CRITICAL',
      sampleIntervalMs: 60_000,
      minDisplacementMeters: 50,
      desiredAccuracy: 'low',
      publishDeferred: false,
    });
    expect(resolveSamplingPolicy(buildState({ isCharging: true }))).toEqual({
      tier: 'CHARGING',
      sampleIntervalMs: 10_000,
      minDisplacementMeters: 5,
      desiredAccuracy: 'high',
      publishDeferred: false,
    });
  });

  it('never shortens the interval as the battery drains', () => {
    for (const isCharging of [false, true]) {
      for (const isPowerSaveMode of [false, true]) {
        for (const networkClass of ['wifi', 'cellular', 'none'] as const) {
          let previous = 0;
          for (let batteryLevel = 100; batteryLevel >= 0; batteryLevel -= 1) {
            const policy = resolveSamplingPolicy({ batteryLevel, isCharging, isPowerSaveMode, networkClass });
            expect(policy.sampleIntervalMs).toBeGreaterThanOrEqual(previous);
            previous = policy.sampleIntervalMs;
          }
        }
      }
    }
  });

  it('defers publishing without a network but keeps sampling', () => {
    const policy = resolveSamplingPolicy(buildState({ networkClass: 'none' }));

    expect(policy.publishDeferred).toBe(true);
    expect(policy.sampleIntervalMs).toBe(15_000);
  });

  it('stretches intervals on aggressive device classes', () => {
    const policy = resolveSamplingPolicy(buildState({ batteryLevel: 40 }), resolveDeviceClass('Xiaomi'));

    expect(policy.tier).toBe('BALANCED');
    expect(policy.sampleIntervalMs).toBe(45_000);
  });

  it('returns frozen policies', () => {
    expect(Object.isFrozen(resolveSamplingPolicy(buildState()))).toBe(true);
  });
});

describe('resolveDeviceClass', () => {
  it('classifies manufacturers case-insensitively', () => {
    expect(resolveDeviceClass('HUAWEI')).toBe('aggressive');
    expect(resolveDeviceClass('samsung')).toBe('moderate');
    expect(resolveDeviceClass('Google')).toBe('standard');
    expect(resolveDeviceClass(null)).toBe('standard');
  });
});

describe('PowerStateMonitor', () => {
  it('emits only when a reading changes', () => {
    const monitor = new PowerStateMonitor(buildState());
    const changes: PowerState[] = [];
    monitor.on('POWER_STATE_CHANGED', ({ state }) => {
      changes.push(state);
    });

    monitor.update({ batteryLevel: 80 });
    monitor.update({ batteryLevel: 25 });
    monitor.update({ networkClass: 'none' });

    expect(changes).toEqual([
      buildState({ batteryLevel: 25 }),
      buildState({ batteryLevel: 25, networkClass: 'none' }),
    ]);
  });
});
