import type { TrackingConfig } from '@/src/config/env';

import type { LocationSampler } from '../location/locationSampler';
import { setDebugLogging } from '../logger';
import type { NotificationSurface } from '../notifications/notificationSurface';
import { type PowerState, resolveSamplingPolicy } from '../power/batteryAdaptationPolicy';
import { type PowerExemptionRequester, resolveDeviceClass } from '../power/deviceClasses';
import { PowerStateMonitor } from '../power/powerStateMonitor';
import { type PeerDirectory, PresenceSyncEngine } from '../presence/presenceSyncEngine';
import { ProximityEngine } from '../proximity/proximityEngine';
import type { SharedLocationStore } from '../store/sharedLocationStore';
import type { LocationConsentGate } from '../tracking/locationConsent';
import { StrategySelector } from '../tracking/strategySelector';
import { createDefaultStrategies } from '../tracking/trackingStrategy';
import type { Clock } from '../types';

import { LocationSharingRuntime, type StoreConnectivity } from './locationSharingRuntime';

export type LocationSharingRuntimeInput = {
  userId: string;
  config: TrackingConfig;
  store: SharedLocationStore;
  samplers: {
    foreground: LocationSampler;
    background: LocationSampler;
    fallback: LocationSampler;
  };
  manufacturer?: string | null;
  initialPowerState?: PowerState;
  consentGate?: LocationConsentGate;
  exemptionRequester?: PowerExemptionRequester;
  notifications?: NotificationSurface;
  peerDirectory?: PeerDirectory;
  connectivity?: StoreConnectivity;
  clock?: Clock;
};

export type LocationSharingComponents = {
  runtime: LocationSharingRuntime;
  selector: StrategySelector;
  presence: PresenceSyncEngine;
  proximity: ProximityEngine;
  powerMonitor: PowerStateMonitor;
};

/** Builds one process-wide set of engines for a signed-in user. */
export function createLocationSharingRuntime(input: LocationSharingRuntimeInput): LocationSharingComponents {
  const { config, clock } = input;
  setDebugLogging(config.debugLogs);

  const deviceClass = resolveDeviceClass(input.manufacturer);
  const powerMonitor = new PowerStateMonitor(input.initialPowerState);

  const selector = new StrategySelector({
    strategies: createDefaultStrategies({
      ...input.samplers,
      sampleTimeoutMs: config.strategyStartupTimeoutMs,
    }),
    consentGate: input.consentGate,
    clock,
    initialPolicy: resolveSamplingPolicy(powerMonitor.getState(), deviceClass),
    startupTimeoutMs: config.strategyStartupTimeoutMs,
    healthCheckIntervalMs: config.healthCheckIntervalMs,
  });

  const presence = new PresenceSyncEngine({
    userId: input.userId,
    store: input.store,
    clock,
    peerDirectory: input.peerDirectory,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    stalenessThresholdMs: config.stalenessThresholdMs,
    sweepIntervalMs: config.stalenessSweepIntervalMs,
  });

  const proximity = new ProximityEngine({
    selfId: input.userId,
    thresholdMeters: config.proximityThresholdMeters,
    cooldownMs: config.proximityCooldownMs,
    clock,
  });

  const runtime = new LocationSharingRuntime({
    userId: input.userId,
    selector,
    presence,
    proximity,
    powerMonitor,
    deviceClass,
    exemptionRequester: input.exemptionRequester,
    notifications: input.notifications,
    connectivity: input.connectivity,
  });

  return { runtime, selector, presence, proximity, powerMonitor };
}
