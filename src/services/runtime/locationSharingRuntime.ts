import { createLogger, describeError } from '../logger';
import { loggingNotificationSurface, type NotificationSurface } from '../notifications/notificationSurface';
import {
  type SamplingPolicy,
  isSamePolicy,
  resolveSamplingPolicy,
} from '../power/batteryAdaptationPolicy';
import { DEVICE_CLASS_PROFILES, type DeviceClass, type PowerExemptionRequester } from '../power/deviceClasses';
import type { PowerStateMonitor } from '../power/powerStateMonitor';
import type { PresenceSyncEngine, PublishOutcome } from '../presence/presenceSyncEngine';
import type { ProximityEngine } from '../proximity/proximityEngine';
import type { StartResult, StrategySelector } from '../tracking/strategySelector';
import type { ServiceHealth } from '../types';

/** Reports whether the shared store is reachable, e.g. `SocketLocationStore`. */
export interface StoreConnectivity {
  isConnected(): boolean;
  onConnectionChange(listener: (connected: boolean) => void): () => void;
}

export type LocationSharingRuntimeDeps = {
  userId: string;
  selector: StrategySelector;
  presence: PresenceSyncEngine;
  proximity: ProximityEngine;
  powerMonitor: PowerStateMonitor;
  deviceClass?: DeviceClass;
  exemptionRequester?: PowerExemptionRequester;
  notifications?: NotificationSurface;
  connectivity?: StoreConnectivity;
};

const log = createLogger('runtime');

/**
 * Wires the tracking, presence and proximity engines for one signed-in user.
 * Sharing can be toggled any number of times; each enable creates a fresh
 * tracking session.
 */
export class LocationSharingRuntime {
  readonly userId: string;

  private readonly deps: LocationSharingRuntimeDeps;
  private readonly deviceClass: DeviceClass;
  private readonly notifications: NotificationSurface;
  private sharing = false;
  private started = false;
  private storeConnected: boolean;
  private policy: SamplingPolicy;
  private detach: Array<() => void> = [];

  constructor(deps: LocationSharingRuntimeDeps) {
    this.deps = deps;
    this.userId = deps.userId;
    this.deviceClass = deps.deviceClass ?? 'standard';
    this.notifications = deps.notifications ?? loggingNotificationSurface;
    this.storeConnected = deps.connectivity?.isConnected() ?? true;
    this.policy = resolveSamplingPolicy(deps.powerMonitor.getState(), this.deviceClass);
    deps.selector.applyPolicy(this.policy);
  }

  /** Subscribes to peers. Safe to call without enabling sharing. */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    const { selector, presence, proximity, powerMonitor, connectivity } = this.deps;
    this.detach = [
      selector.on('SAMPLE', ({ sample }) => {
        if (!this.sharing) {
          return;
        }
        proximity.setSelfLocation(sample);
        this.settle('publish sample', presence.publish(sample, true));
      }),
      selector.on('DEGRADED', ({ error, retryAt }) => {
        this.settle('mark degraded', presence.setTrackingDegraded(true));
        this.notifications.notifyTrackingDegraded(error, retryAt);
      }),
      selector.on('RESTORED', ({ strategyId }) => {
        this.settle('clear degraded', presence.setTrackingDegraded(false));
        this.notifications.notifyTrackingRestored(strategyId);
      }),
      selector.on('SESSION_FAILED', ({ error }) => {
        log.warn('tracking session failed, sharing turned off', { code: error.code });
        this.sharing = false;
        proximity.setSelfLocation(null);
        this.settle('publish sharing disabled', presence.publish(null, false));
      }),
      powerMonitor.on('POWER_STATE_CHANGED', ({ state }) => {
        this.applyPolicy(resolveSamplingPolicy(state, this.deviceClass));
      }),
      presence.subscribeAll(({ peers }) => {
        proximity.onPeerLocationsChanged(peers);
      }),
      proximity.on('PROXIMITY', ({ event }) => {
        this.notifications.notifyProximity(event);
      }),
      proximity.on('GEOFENCE_ENTERED', ({ event }) => {
        this.notifications.notifyGeofence('entered', event);
      }),
      proximity.on('GEOFENCE_EXITED', ({ event }) => {
        this.notifications.notifyGeofence('exited', event);
      }),
    ];

    if (connectivity) {
      this.detach.push(
        connectivity.onConnectionChange((connected) => {
          this.storeConnected = connected;
          this.syncConnectivity();
        })
      );
    }

    this.started = true;
    await presence.start();
    this.syncConnectivity();
  }

  async enableSharing(): Promise<StartResult> {
    await this.start();
    const { selector, presence, proximity } = this.deps;

    if (!this.sharing) {
      this.sharing = true;
      await this.requestExemptions();
      this.settle('publish sharing enabled', presence.publish(null, true));
    }

    const result = await selector.start(this.userId);
    if (!result.ok && result.error.code !== 'ALL_STRATEGIES_EXHAUSTED' && result.error.code !== 'SESSION_STOPPED') {
      log.warn('sharing could not start', { code: result.error.code, message: result.error.message });
      this.sharing = false;
      proximity.setSelfLocation(null);
      await presence.publish(null, false);
    }
    return result;
  }

  /** Tracking stops before the opt-out record is written, so no sample can follow it. */
  async disableSharing(): Promise<PublishOutcome> {
    this.sharing = false;
    this.deps.selector.stop();
    this.deps.proximity.setSelfLocation(null);
    return this.deps.presence.publish(null, false);
  }

  async signOut(): Promise<void> {
    this.sharing = false;
    this.deps.selector.stop();

    try {
      await this.deps.presence.withdraw();
    } finally {
      this.dispose();
    }
    log.info('signed out', { userId: this.userId });
  }

  dispose(): void {
    this.sharing = false;
    this.deps.selector.stop();
    this.deps.presence.stop();
    this.deps.proximity.reset();
    for (const detach of this.detach) {
      detach();
    }
    this.detach = [];
    this.started = false;
  }

  isSharing(): boolean {
    return this.sharing;
  }

  getPolicy(): SamplingPolicy {
    return this.policy;
  }

  getHealth(): ServiceHealth[] {
    return [this.deps.selector.getHealth(), this.deps.presence.getHealth()];
  }

  private applyPolicy(next: SamplingPolicy): void {
    const changed = !isSamePolicy(this.policy, next);
    const deferralChanged = this.policy.publishDeferred !== next.publishDeferred;
    this.policy = next;

    if (changed) {
      log.debug('sampling policy changed', {
        tier: next.tier,
        intervalMs: next.sampleIntervalMs,
        minDisplacementMeters: next.minDisplacementMeters,
      });
      this.deps.selector.applyPolicy(next);
    }
    if (deferralChanged) {
      this.syncConnectivity();
    }
  }

  private syncConnectivity(): void {
    const online = this.storeConnected && !this.policy.publishDeferred;
    this.settle('sync connectivity', this.deps.presence.setConnectivity(online));
  }

  private async requestExemptions(): Promise<void> {
    const requester = this.deps.exemptionRequester;
    if (!requester) {
      return;
    }

    for (const kind of DEVICE_CLASS_PROFILES[this.deviceClass].exemptions) {
      try {
        const granted = await requester.requestExemption(kind);
        log.debug('power exemption requested', { kind, granted });
      } catch (error) {
        log.warn('power exemption request failed', { kind, reason: describeError(error) });
      }
    }
  }

  private settle(label: string, pending: Promise<PublishOutcome>): void {
    void pending.then(
      (outcome) => {
        if (outcome === 'dropped' || outcome === 'rejected_stale') {
          log.warn(`${label}: ${outcome}`, { userId: this.userId });
        }
      },
      (error: unknown) => {
        log.error(`${label} failed`, { userId: this.userId, reason: describeError(error) });
      }
    );
  }
}
