import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { NotificationSurface } from '../notifications/notificationSurface';
import type { PowerState } from '../power/batteryAdaptationPolicy';
import type { DeviceClass, ExemptionKind, PowerExemptionRequester } from '../power/deviceClasses';
import { PowerStateMonitor } from '../power/powerStateMonitor';
import { PresenceSyncEngine } from '../presence/presenceSyncEngine';
import { ProximityEngine } from '../proximity/proximityEngine';
import { LocationSharingRuntime } from '../runtime/locationSharingRuntime';
import { InMemoryLocationStore } from '../store/inMemoryLocationStore';
import type { LocationConsent } from '../tracking/locationConsent';
import { StrategySelector } from '../tracking/strategySelector';
import { PermissionDeniedError } from '../tracking/trackingErrors';

import { FIXED_NOW_MS, FakeStrategy, makeSample } from './fakes';

const flush = () => vi.advanceTimersByTimeAsync(0);

const HOME = { lat: 51.5, lng: -0.12 };

function buildNotifications() {
  return {
    notifyProximity: vi.fn(),
    notifyGeofence: vi.fn(),
    notifyTrackingDegraded: vi.fn(),
    notifyTrackingRestored: vi.fn(),
  } satisfies NotificationSurface;
}

function buildRuntime(options?: {
  consent?: LocationConsent;
  deviceClass?: DeviceClass;
  exemptionRequester?: PowerExemptionRequester;
  power?: Partial<PowerState>;
  userId?: string;
  store?: InMemoryLocationStore;
}) {
  const userId = options?.userId ?? 'alice';
  const store = options?.store ?? new InMemoryLocationStore();
  const strategy = new FakeStrategy('foreground');
  const selector = new StrategySelector({
    strategies: [strategy],
    consentGate: { getLocationConsent: async () => options?.consent ?? 'granted' },
  });
  const presence = new PresenceSyncEngine({ userId, store });
  const proximity = new ProximityEngine({ selfId: userId });
  const powerMonitor = new PowerStateMonitor({
    batteryLevel: 80,
    isCharging: false,
    isPowerSaveMode: false,
    networkClass: 'wifi',
    ...options?.power,
  });
  const notifications = buildNotifications();
  const runtime = new LocationSharingRuntime({
    userId,
    selector,
    presence,
    proximity,
    powerMonitor,
    notifications,
    deviceClass: options?.deviceClass,
    exemptionRequester: options?.exemptionRequester,
  });

  return { store, strategy, selector, presence, powerMonitor, notifications, runtime };
}

async function enableWithFix(runtime: LocationSharingRuntime, strategy: FakeStrategy, at = HOME) {
  const pending = runtime.enableSharing();
  await flush();
  strategy.emitSample(makeSample(at.lat, at.lng));
  const result = await pending;
  await flush();
  return result;
}

describe('LocationSharingRuntime', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(FIXED_NOW_MS);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('publishes samples while sharing and clears the location on disable', async () => {
    const { store, strategy, runtime } = buildRuntime();

    await expect(enableWithFix(runtime, strategy)).resolves.toEqual({ ok: true, strategyId: 'foreground' });
    expect(store.get('presence/alice')?.lat).toBe(HOME.lat);
    expect(runtime.isSharing()).toBe(true);

    await expect(runtime.disableSharing()).resolves.toBe('written');
    expect(strategy.isRunning()).toBe(false);
    expect(store.get('presence/alice')).toEqual({
      sharingEnabled: false,
      lastHeartbeatEpochMs: FIXED_NOW_MS,
      trackingDegraded: false,
      revision: FIXED_NOW_MS + 2,
    });
  });

  it('can be toggled again after disabling', async () => {
    const { store, strategy, runtime } = buildRuntime();

    await enableWithFix(runtime, strategy);
    await runtime.disableSharing();
    await expect(enableWithFix(runtime, strategy)).resolves.toEqual({ ok: true, strategyId: 'foreground' });

    expect(strategy.startCount).toBe(2);
    expect(store.get('presence/alice')?.sharingEnabled).toBe(true);
  });

  it('turns sharing off when consent is missing', async () => {
    const { store, runtime } = buildRuntime({ consent: 'denied' });

    const result = await runtime.enableSharing();
    await flush();

    expect(result.ok).toBe(false);
    expect(runtime.isSharing()).toBe(false);
    expect(store.get('presence/alice')?.sharingEnabled).toBe(false);
  });

  it('turns sharing off when permission is revoked mid-session', async () => {
    const { store, strategy, runtime } = buildRuntime();
    await enableWithFix(runtime, strategy);

    strategy.emitError(new PermissionDeniedError('revoked'));
    await flush();

    expect(runtime.isSharing()).toBe(false);
    expect(store.get('presence/alice')?.sharingEnabled).toBe(false);
    expect(store.get('presence/alice')?.lat).toBeUndefined();
  });

  it('marks presence degraded when every strategy is exhausted', async () => {
    const { store, strategy, notifications, runtime } = buildRuntime();
    strategy.supported = false;

    const result = await runtime.enableSharing();
    await flush();

    expect(result.ok).toBe(false);
    expect(runtime.isSharing()).toBe(true);
    expect(store.get('presence/alice')?.trackingDegraded).toBe(true);
    expect(notifications.notifyTrackingDegraded).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'ALL_STRATEGIES_EXHAUSTED' }),
      FIXED_NOW_MS + 5_000
    );
    runtime.dispose();
  });

  it('forwards power changes to the running strategy', async () => {
    const { strategy, powerMonitor, runtime } = buildRuntime();
    await enableWithFix(runtime, strategy);

    powerMonitor.update({ batteryLevel: 10 });

    expect(runtime.getPolicy().tier).toBe('CRITICAL');
    expect(strategy.policies[strategy.policies.length - 1]?.sampleIntervalMs).toBe(60_000);
  });

  it('defers writes without a network and sends the newest on return', async () => {
    const { store, strategy, powerMonitor, runtime } = buildRuntime();
    await enableWithFix(runtime, strategy);
    const put = vi.spyOn(store, 'put');

    powerMonitor.update({ networkClass: 'none' });
    await flush();
    strategy.emitSample(makeSample(HOME.lat + 0.001, HOME.lng));
    strategy.emitSample(makeSample(HOME.lat + 0.002, HOME.lng));
    await flush();
    expect(put).not.toHaveBeenCalled();

    powerMonitor.update({ networkClass: 'wifi' });
    await flush();
    expect(put).toHaveBeenCalledTimes(1);
    expect(store.get('presence/alice')?.lat).toBe(HOME.lat + 0.002);
  });

  it('notifies when a peer comes within range', async () => {
    const { store, strategy, notifications, runtime } = buildRuntime();
    await enableWithFix(runtime, strategy);

    const bob = new PresenceSyncEngine({ userId: 'bob', store });
    await bob.start();
    await bob.publish(makeSample(HOME.lat + 0.0036, HOME.lng), true);
    await flush();

    expect(notifications.notifyProximity).toHaveBeenCalledTimes(1);
    expect(notifications.notifyProximity.mock.calls[0]?.[0]?.peerId).toBe('bob');
    bob.stop();
  });

  it('notifies both sharing users once per approach', async () => {
    const store = new InMemoryLocationStore();
    const alice = buildRuntime({ store });
    const bob = buildRuntime({ store, userId: 'bob' });
    const near = { lat: HOME.lat + 0.0036, lng: HOME.lng };
    const far = { lat: HOME.lat + 0.0054, lng: HOME.lng };
    let bobAt = near;

    const tick = async () => {
      await vi.advanceTimersByTimeAsync(15_000);
      alice.strategy.emitSample(makeSample(HOME.lat, HOME.lng));
      bob.strategy.emitSample(makeSample(bobAt.lat, bobAt.lng));
      await flush();
    };

    await enableWithFix(alice.runtime, alice.strategy);
    await enableWithFix(bob.runtime, bob.strategy, near);
    for (let i = 0; i < 12; i += 1) {
      await tick();
    }

    expect(alice.notifications.notifyProximity).toHaveBeenCalledTimes(1);
    expect(bob.notifications.notifyProximity).toHaveBeenCalledTimes(1);
    expect(alice.notifications.notifyProximity.mock.calls[0]?.[0]?.peerId).toBe('bob');
    expect(bob.notifications.notifyProximity.mock.calls[0]?.[0]?.peerId).toBe('alice');

    bobAt = far;
    await tick();
    await tick();
    expect(alice.notifications.notifyProximity).toHaveBeenCalledTimes(1);
    expect(bob.notifications.notifyProximity).toHaveBeenCalledTimes(1);

    bobAt = near;
    await tick();
    await tick();
    expect(alice.notifications.notifyProximity).toHaveBeenCalledTimes(2);
    expect(bob.notifications.notifyProximity).toHaveBeenCalledTimes(2);

    alice.runtime.dispose();
    bob.runtime.dispose();
  });

  it('stays silent after being disposed and started again', async () => {
    const { store, strategy, runtime } = buildRuntime();
    await enableWithFix(runtime, strategy);
    const before = store.get('presence/alice');

    runtime.dispose();
    await runtime.start();
    await vi.advanceTimersByTimeAsync(61_000);

    expect(runtime.isSharing()).toBe(false);
    expect(store.get('presence/alice')).toEqual(before);
    expect(before?.lastHeartbeatEpochMs).toBe(FIXED_NOW_MS);
  });

  it('requests the power exemptions of its device class', async () => {
    const requester = { requestExemption: vi.fn(async (_kind: ExemptionKind) => true) };
    const { strategy, runtime } = buildRuntime({ deviceClass: 'aggressive', exemptionRequester: requester });

    await enableWithFix(runtime, strategy);

    expect(requester.requestExemption.mock.calls.map(([kind]) => kind)).toEqual([
      'battery-optimization',
      'auto-start',
      'background-activity',
    ]);
  });

  it('removes the record on sign-out', async () => {
    const { store, strategy, runtime } = buildRuntime();
    await enableWithFix(runtime, strategy);

    await runtime.signOut();

    expect(store.get('presence/alice')).toBeNull();
    expect(strategy.isRunning()).toBe(false);
    expect(runtime.getHealth().map((health) => health.state)).toEqual(['idle', 'idle']);
  });
});
