import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { PeerPresenceView } from '../presence/peerPresence';
import { type GeofenceEvent, type ProximityEvent, ProximityEngine, peerPairKey } from '../proximity/proximityEngine';

import { FIXED_NOW_MS, makeSample } from './fakes';

const HOME = { lat: 51.5, lng: -0.12 };
// ~111.195 m per 0.001 degree of latitude.
const NEAR_400M = 0.0036;
const FAR_600M = 0.0054;

function peerAt(userId: string, latOffset: number, overrides?: Partial<PeerPresenceView>): PeerPresenceView {
  return {
    userId,
    isOnline: true,
    location: makeSample(HOME.lat + latOffset, HOME.lng, FIXED_NOW_MS),
    isSharingEnabled: true,
    trackingDegraded: false,
    lastSeenAt: FIXED_NOW_MS,
    ...overrides,
  };
}

describe('ProximityEngine', () => {
  let now: number;
  let engine: ProximityEngine;
  let proximity: ProximityEvent[];

  beforeEach(() => {
    now = FIXED_NOW_MS;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    engine = new ProximityEngine({ selfId: 'alice', clock: { now: () => now } });
    proximity = [];
    engine.on('PROXIMITY', ({ event }) => {
      proximity.push(event);
    });
    engine.setSelfLocation(makeSample(HOME.lat, HOME.lng, FIXED_NOW_MS));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('notifies once per approach and re-arms after separation', () => {
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    expect(proximity).toHaveLength(1);
    expect(proximity[0]?.peerId).toBe('bob');
    expect(proximity[0]?.distanceMeters).toBeCloseTo(400.3, 0);

    engine.onPeerLocationsChanged([peerAt('bob', FAR_600M)]);
    expect(engine.hasCooldown('bob')).toBe(false);

    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    expect(proximity).toHaveLength(2);
  });

  it('notifies again once the cooldown expires while still close', () => {
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);

    now += 10 * 60_000 - 1;
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    expect(proximity).toHaveLength(1);

    now += 1;
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    expect(proximity).toHaveLength(2);
    expect(proximity[1]?.detectedAt).toBe(FIXED_NOW_MS + 10 * 60_000);
  });

  it('ignores offline peers and keeps their cooldown', () => {
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    engine.onPeerLocationsChanged([peerAt('bob', 0, { isOnline: false, location: null })]);
    engine.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);

    expect(proximity).toHaveLength(1);
    expect(engine.hasCooldown('bob')).toBe(true);
  });

  it('does nothing until its own location is known', () => {
    const fresh = new ProximityEngine({ selfId: 'alice', clock: { now: () => now } });
    const listener = vi.fn();
    fresh.on('PROXIMITY', listener);

    fresh.onPeerLocationsChanged([peerAt('bob', NEAR_400M)]);
    expect(listener).not.toHaveBeenCalled();

    fresh.setSelfLocation(makeSample(HOME.lat, HOME.lng, FIXED_NOW_MS));
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('keys pairs independently of direction', () => {
    expect(peerPairKey('bob', 'alice')).toBe('alice|bob');
    expect(peerPairKey('alice', 'bob')).toBe('alice|bob');
  });

  it('tracks region entry and exit per peer', () => {
    const entered: GeofenceEvent[] = [];
    const exited: GeofenceEvent[] = [];
    engine.on('GEOFENCE_ENTERED', ({ event }) => {
      entered.push(event);
    });
    engine.on('GEOFENCE_EXITED', ({ event }) => {
      exited.push(event);
    });
    engine.addRegion({
      id: 'school',
      label: 'School',
      center: { latitude: HOME.lat, longitude: HOME.lng },
      radiusMeters: 200,
    });

    engine.onPeerLocationsChanged([peerAt('bob', 0.001), peerAt('carol', 0.003)]);
    engine.onPeerLocationsChanged([peerAt('bob', 0.0011), peerAt('carol', 0.003)]);
    expect(entered.map((event) => event.peerId)).toEqual(['bob']);

    engine.onPeerLocationsChanged([peerAt('bob', 0, { isOnline: false, location: null })]);
    expect(exited).toEqual([
      { regionId: 'school', label: 'School', peerId: 'bob', distanceMeters: null, detectedAt: FIXED_NOW_MS },
    ]);
  });

  it('counts a peer dropped from the peer list as leaving its regions', () => {
    const exited: GeofenceEvent[] = [];
    engine.on('GEOFENCE_EXITED', ({ event }) => {
      exited.push(event);
    });
    engine.addRegion({
      id: 'school',
      label: 'School',
      center: { latitude: HOME.lat, longitude: HOME.lng },
      radiusMeters: 200,
    });

    engine.onPeerLocationsChanged([peerAt('bob', 0.001), peerAt('carol', 0.0005)]);
    now += 5_000;
    engine.onPeerLocationsChanged([peerAt('carol', 0.0005)]);
    engine.onPeerLocationsChanged([peerAt('carol', 0.0005)]);

    expect(exited).toEqual([
      { regionId: 'school', label: 'School', peerId: 'bob', distanceMeters: null, detectedAt: FIXED_NOW_MS + 5_000 },
    ]);
  });

  it('rejects invalid regions', () => {
    expect(() =>
      engine.addRegion({ id: 'a|b', label: '', center: { latitude: 0, longitude: 0 }, radiusMeters: 10 })
    ).toThrow('Region id must be a non-empty string without "|".');
    expect(() =>
      engine.addRegion({ id: 'pool', label: '', center: { latitude: 0, longitude: 0 }, radiusMeters: 0 })
    ).toThrow('radiusMeters must be a positive number.');
  });
});
