import {
  type LocationSample,
  createLocationSample,
  isSourceProvider,
  isValidLatitude,
  isValidLongitude,
} from '../location/locationSample';
import type { StoreValue } from '../store/sharedLocationStore';

/** Authoritative shared-store record for one user, written only by that user. */
export type PublishedPresence = Readonly<{
  userId: string;
  lastSample: LocationSample | null;
  isSharingEnabled: boolean;
  lastHeartbeatAt: number;
  trackingDegraded: boolean;
  revision: number;
}>;

/** Wire shape stored under `presence/{userId}`. */
export type PresenceStoreRecord = {
  lat?: number;
  lng?: number;
  accuracy?: number;
  capturedAtEpochMs?: number;
  provider?: string;
  sharingEnabled: boolean;
  lastHeartbeatEpochMs: number;
  trackingDegraded: boolean;
  revision: number;
};

export type DecodeResult = { ok: true; presence: PublishedPresence } | { ok: false; message: string };

const LOCATION_FIELDS = ['lat', 'lng', 'accuracy', 'capturedAtEpochMs'] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEpochMs(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/** Location fields are left out entirely when sharing is off or there is no fix. */
export function encodePresence(presence: PublishedPresence): StoreValue {
  const base = {
    sharingEnabled: presence.isSharingEnabled,
    lastHeartbeatEpochMs: presence.lastHeartbeatAt,
    trackingDegraded: presence.trackingDegraded,
    revision: presence.revision,
  } satisfies PresenceStoreRecord;

  const sample = presence.isSharingEnabled ? presence.lastSample : null;
  if (!sample) {
    return base;
  }

  return {
    ...base,
    lat: sample.lat,
    lng: sample.lng,
    accuracy: sample.accuracyMeters,
    capturedAtEpochMs: sample.capturedAt,
    provider: sample.sourceProvider,
  } satisfies PresenceStoreRecord;
}

export function decodePresence(userId: string, value: unknown): DecodeResult {
  if (!isPlainObject(value)) {
    return { ok: false, message: 'Presence value must be an object.' };
  }

  if (typeof value.sharingEnabled !== 'boolean') {
    return { ok: false, message: 'sharingEnabled must be a boolean.' };
  }
  if (!isEpochMs(value.lastHeartbeatEpochMs)) {
    return { ok: false, message: 'lastHeartbeatEpochMs must be a Unix ms integer.' };
  }
  if (!isEpochMs(value.revision)) {
    return { ok: false, message: 'revision must be a positive integer.' };
  }
  if (value.trackingDegraded !== undefined && typeof value.trackingDegraded !== 'boolean') {
    return { ok: false, message: 'trackingDegraded must be a boolean.' };
  }

  const presentCount = LOCATION_FIELDS.filter((field) => isPresent(value[field])).length;
  if (presentCount !== 0 && presentCount !== LOCATION_FIELDS.length) {
    return { ok: false, message: 'Location fields must be all present or all absent.' };
  }

  let lastSample: LocationSample | null = null;
  if (presentCount > 0 && value.sharingEnabled) {
    const { lat, lng, accuracy, capturedAtEpochMs } = value;
    if (!isValidLatitude(lat)) {
      return { ok: false, message: 'lat must be between -90 and 90.' };
    }
    if (!isValidLongitude(lng)) {
      return { ok: false, message: 'lng must be between -180 and 180.' };
    }
    if (typeof accuracy !== 'number' || !Number.isFinite(accuracy) || accuracy < 0) {
      return { ok: false, message: 'accuracy must be a non-negative number.' };
    }
    if (!isEpochMs(capturedAtEpochMs)) {
      return { ok: false, message: 'capturedAtEpochMs must be a Unix ms integer.' };
    }

    lastSample = createLocationSample({
      lat,
      lng,
      accuracyMeters: accuracy,
      capturedAt: capturedAtEpochMs,
      sourceProvider: isSourceProvider(value.provider) ? value.provider : 'fused',
    });
  }

  return {
    ok: true,
    presence: Object.freeze({
      userId,
      lastSample,
      isSharingEnabled: value.sharingEnabled,
      lastHeartbeatAt: value.lastHeartbeatEpochMs,
      trackingDegraded: value.trackingDegraded === true,
      revision: value.revision,
    }),
  };
}
