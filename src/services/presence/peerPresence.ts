import type { LocationSample } from '../location/locationSample';

import type { PublishedPresence } from './presenceRecord';

export type PeerPresenceView = Readonly<{
  userId: string;
  isOnline: boolean;
  /** Always null while offline, whatever the store still holds. */
  location: LocationSample | null;
  isSharingEnabled: boolean;
  trackingDegraded: boolean;
  lastSeenAt: number | null;
}>;

export function isPeerOnline(presence: PublishedPresence, nowMs: number, stalenessThresholdMs: number): boolean {
  return presence.isSharingEnabled && nowMs - presence.lastHeartbeatAt < stalenessThresholdMs;
}

export function derivePeerView(
  userId: string,
  presence: PublishedPresence | null,
  nowMs: number,
  stalenessThresholdMs: number
): PeerPresenceView {
  if (!presence) {
    return Object.freeze({
      userId,
      isOnline: false,
      location: null,
      isSharingEnabled: false,
      trackingDegraded: false,
      lastSeenAt: null,
    });
  }

  const isOnline = isPeerOnline(presence, nowMs, stalenessThresholdMs);
  return Object.freeze({
    userId,
    isOnline,
    location: isOnline ? presence.lastSample : null,
    isSharingEnabled: presence.isSharingEnabled,
    trackingDegraded: presence.trackingDegraded,
    lastSeenAt: presence.lastHeartbeatAt,
  });
}

export function isSameView(a: PeerPresenceView, b: PeerPresenceView): boolean {
  return (
    a.userId === b.userId &&
    a.isOnline === b.isOnline &&
    a.location === b.location &&
    a.isSharingEnabled === b.isSharingEnabled &&
    a.trackingDegraded === b.trackingDegraded &&
    a.lastSeenAt === b.lastSeenAt
  );
}

export function describeLastSeen(view: PeerPresenceView, nowMs: number): string {
  if (!view.isSharingEnabled) {
    return 'Location not shared';
  }

  if (view.isOnline) {
    return view.trackingDegraded ? 'Sharing, waiting for a location fix' : 'Sharing location';
  }

  if (view.lastSeenAt === null) {
    return 'Location never updated';
  }

  const minutes = Math.floor(Math.max(0, nowMs - view.lastSeenAt) / 60_000);
  if (minutes < 1) {
    return 'Location updated just now';
  }
  if (minutes < 60) {
    return `Location ${minutes} min ago`;
  }

  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `Location ${hours} hr ago`;
  }
  return `Location ${Math.floor(hours / 24)} days ago`;
}
