import { type GeoPoint, type LocationSample, toGeoPoint } from '@/src/services/location/locationSample';
import type { PeerPresenceView } from '@/src/services/presence/peerPresence';
import { distanceMeters } from '@/src/utils/geo';

import { createLogger, describeError } from '../logger';
import { type Clock, systemClock } from '../types';

import { type GeofenceRegion, createGeofenceRegion } from './geofenceRegion';

export type ProximityEvent = Readonly<{
  peerId: string;
  distanceMeters: number;
  detectedAt: number;
}>;

export type GeofenceEvent = Readonly<{
  regionId: string;
  label: string;
  peerId: string;
  /** Null when the peer left by going offline or leaving the peer list. */
  distanceMeters: number | null;
  detectedAt: number;
}>;

type ProximityEventMap = {
  PROXIMITY: { type: 'PROXIMITY'; event: ProximityEvent };
  GEOFENCE_ENTERED: { type: 'GEOFENCE_ENTERED'; event: GeofenceEvent };
  GEOFENCE_EXITED: { type: 'GEOFENCE_EXITED'; event: GeofenceEvent };
};

type ProximityListener<TEvent extends keyof ProximityEventMap> = (payload: ProximityEventMap[TEvent]) => void;

export type ProximityEngineOptions = {
  selfId: string;
  thresholdMeters?: number;
  cooldownMs?: number;
  clock?: Clock;
};

const DEFAULT_THRESHOLD_METERS = 500;
const DEFAULT_COOLDOWN_MS = 10 * 60_000;

const log = createLogger('proximity');

export function peerPairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/**
 * Evaluates nearby peers and fixed regions on this device. Cooldowns live in
 * memory only: a pair is notified once per approach and re-armed as soon as
 * the pair separates beyond the threshold.
 */
export class ProximityEngine {
  readonly selfId: string;

  private readonly thresholdMeters: number;
  private readonly cooldownMs: number;
  private readonly clock: Clock;

  private selfLocation: LocationSample | null = null;
  private lastPeers: readonly PeerPresenceView[] = [];
  private cooldowns = new Map<string, number>();
  private regions = new Map<string, GeofenceRegion>();
  /** Keyed by `${regionId}|${peerId}`. */
  private insideRegions = new Map<string, { regionId: string; peerId: string }>();
  private listeners: {
    [K in keyof ProximityEventMap]: Set<ProximityListener<K>>;
  } = {
    PROXIMITY: new Set(),
    GEOFENCE_ENTERED: new Set(),
    GEOFENCE_EXITED: new Set(),
  };

  constructor(options: ProximityEngineOptions) {
    this.selfId = options.selfId;
    this.thresholdMeters = options.thresholdMeters ?? DEFAULT_THRESHOLD_METERS;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.clock = options.clock ?? systemClock;

    if (!(this.thresholdMeters > 0)) {
      throw new RangeError('thresholdMeters must be positive.');
    }
  }

  setSelfLocation(sample: LocationSample | null): void {
    this.selfLocation = sample;
    if (sample) {
      this.evaluatePeers(this.lastPeers);
    }
  }

  onPeerLocationsChanged(peers: readonly PeerPresenceView[]): void {
    this.lastPeers = peers;
    this.evaluatePeers(peers);
    this.evaluateRegions(peers);
  }

  addRegion(input: { id: string; label: string; center: GeoPoint; radiusMeters: number }): GeofenceRegion {
    const region = createGeofenceRegion(input);
    this.removeRegion(region.id);
    this.regions.set(region.id, region);
    this.evaluateRegions(this.lastPeers);
    return region;
  }

  removeRegion(regionId: string): boolean {
    for (const [membership, inside] of [...this.insideRegions]) {
      if (inside.regionId === regionId) {
        this.insideRegions.delete(membership);
      }
    }
    return this.regions.delete(regionId);
  }

  listRegions(): readonly GeofenceRegion[] {
    return Object.freeze([...this.regions.values()]);
  }

  reset(): void {
    this.selfLocation = null;
    this.lastPeers = [];
    this.cooldowns.clear();
    this.insideRegions.clear();
  }

  hasCooldown(peerId: string): boolean {
    return this.activeCooldown(peerPairKey(this.selfId, peerId), this.clock.now());
  }

  on<TEvent extends keyof ProximityEventMap>(event: TEvent, listener: ProximityListener<TEvent>): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  private evaluatePeers(peers: readonly PeerPresenceView[]): void {
    const self = this.selfLocation;
    if (!self) {
      return;
    }

    const now = this.clock.now();
    for (const peer of peers) {
      if (peer.userId === this.selfId || !peer.isOnline || !peer.location) {
        continue;
      }

      const key = peerPairKey(this.selfId, peer.userId);
      const distance = distanceMeters(toGeoPoint(self), toGeoPoint(peer.location));

      if (distance > this.thresholdMeters) {
        if (this.cooldowns.delete(key)) {
          log.debug('pair separated, cooldown cleared', { peerId: peer.userId, distance: Math.round(distance) });
        }
        continue;
      }

      if (this.activeCooldown(key, now)) {
        continue;
      }

      this.cooldowns.set(key, now);
      log.info('peer nearby', { peerId: peer.userId, distance: Math.round(distance) });
      this.emit('PROXIMITY', {
        type: 'PROXIMITY',
        event: Object.freeze({ peerId: peer.userId, distanceMeters: distance, detectedAt: now }),
      });
    }
  }

  private evaluateRegions(peers: readonly PeerPresenceView[]): void {
    if (this.regions.size === 0) {
      return;
    }

    const now = this.clock.now();
    const seen = new Set<string>();
    for (const region of this.regions.values()) {
      for (const peer of peers) {
        if (peer.userId === this.selfId) {
          continue;
        }

        const membership = `${region.id}|${peer.userId}`;
        seen.add(membership);
        const wasInside = this.insideRegions.has(membership);
        const distance = peer.isOnline && peer.location ? distanceMeters(region.center, toGeoPoint(peer.location)) : null;
        const isInside = distance !== null && distance <= region.radiusMeters;

        if (isInside === wasInside) {
          continue;
        }

        const event = this.geofenceEvent(region, peer.userId, distance, now);
        if (isInside) {
          this.insideRegions.set(membership, { regionId: region.id, peerId: peer.userId });
          this.emit('GEOFENCE_ENTERED', { type: 'GEOFENCE_ENTERED', event });
        } else {
          this.insideRegions.delete(membership);
          this.emit('GEOFENCE_EXITED', { type: 'GEOFENCE_EXITED', event });
        }
      }
    }

    // Peers missing from the snapshot are no longer followed and count as gone.
    for (const [membership, inside] of [...this.insideRegions]) {
      const region = this.regions.get(inside.regionId);
      if (seen.has(membership) || !region) {
        continue;
      }
      this.insideRegions.delete(membership);
      this.emit('GEOFENCE_EXITED', {
        type: 'GEOFENCE_EXITED',
        event: this.geofenceEvent(region, inside.peerId, null, now),
      });
    }
  }

  private geofenceEvent(region: GeofenceRegion, peerId: string, distance: number | null, now: number): GeofenceEvent {
    return Object.freeze({
      regionId: region.id,
      label: region.label,
      peerId,
      distanceMeters: distance,
      detectedAt: now,
    });
  }

  private activeCooldown(key: string, now: number): boolean {
    const notifiedAt = this.cooldowns.get(key);
    return notifiedAt !== undefined && now - notifiedAt < this.cooldownMs;
  }

  private emit<TEvent extends keyof ProximityEventMap>(event: TEvent, payload: ProximityEventMap[TEvent]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (error) {
        log.error('listener failed', { event, reason: describeError(error) });
      }
    }
  }
}
