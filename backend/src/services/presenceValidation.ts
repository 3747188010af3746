import type { PresenceValue, ValidationIssue } from '../types/presence';

export const DEFAULT_MAX_FUTURE_SKEW_MS = 5 * 60 * 1000;
const LOCATION_FIELDS = ['lat', 'lng', 'accuracy', 'capturedAtEpochMs'] as const;
const ALLOWED_FIELDS = new Set([
  ...LOCATION_FIELDS,
  'provider',
  'sharingEnabled',
  'lastHeartbeatEpochMs',
  'trackingDegraded',
  'revision',
]);
const PROVIDERS = new Set(['gps', 'network', 'passive', 'fused', 'replay']);

type ValueValidation = { ok: true; value: PresenceValue } | { ok: false; details: ValidationIssue[] };

type PutValidation =
  | { ok: true; value: PresenceValue; revision: number }
  | { ok: false; details: ValidationIssue[] };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEpochMs(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isFiniteInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max;
}

/**
 * Mirrors the client codec. Location fields are all present or all absent,
 * and must be absent while sharing is disabled.
 */
export function validatePresenceValue(
  input: unknown,
  nowMs: number,
  maxFutureSkewMs: number = DEFAULT_MAX_FUTURE_SKEW_MS
): ValueValidation {
  if (!isPlainObject(input)) {
    return { ok: false, details: [{ field: 'value', message: 'value must be an object.' }] };
  }

  const details: ValidationIssue[] = [];
  for (const field of Object.keys(input)) {
    if (!ALLOWED_FIELDS.has(field)) {
      details.push({ field, message: 'Unknown field.' });
    }
  }

  const { sharingEnabled, lastHeartbeatEpochMs, trackingDegraded, revision, provider } = input;
  if (typeof sharingEnabled !== 'boolean') {
    details.push({ field: 'sharingEnabled', message: 'sharingEnabled must be a boolean.' });
  }
  if (!isEpochMs(lastHeartbeatEpochMs)) {
    details.push({ field: 'lastHeartbeatEpochMs', message: 'lastHeartbeatEpochMs must be a Unix ms integer.' });
  } else if (lastHeartbeatEpochMs > nowMs + maxFutureSkewMs) {
    details.push({
      field: 'lastHeartbeatEpochMs',
      message: `lastHeartbeatEpochMs cannot be more than ${maxFutureSkewMs}ms in the future.`,
    });
  }
  if (trackingDegraded !== undefined && typeof trackingDegraded !== 'boolean') {
    details.push({ field: 'trackingDegraded', message: 'trackingDegraded must be a boolean.' });
  }
  if (!isEpochMs(revision)) {
    details.push({ field: 'revision', message: 'revision must be a positive integer.' });
  }
  if (provider !== undefined && (typeof provider !== 'string' || !PROVIDERS.has(provider))) {
    details.push({ field: 'provider', message: 'provider must be gps, network, passive, fused, or replay.' });
  }

  const present = LOCATION_FIELDS.filter((field) => input[field] !== undefined);
  if (present.length > 0 && present.length < LOCATION_FIELDS.length) {
    details.push({ field: 'value', message: 'Location fields must be all present or all absent.' });
  }
  if (present.length > 0 && sharingEnabled === false) {
    details.push({ field: 'value', message: 'Location fields must be absent while sharing is disabled.' });
  }

  const { lat, lng, accuracy, capturedAtEpochMs } = input;
  if (lat !== undefined && !isFiniteInRange(lat, -90, 90)) {
    details.push({ field: 'lat', message: 'lat must be between -90 and 90.' });
  }
  if (lng !== undefined && !isFiniteInRange(lng, -180, 180)) {
    details.push({ field: 'lng', message: 'lng must be between -180 and 180.' });
  }
  if (accuracy !== undefined && !isFiniteInRange(accuracy, 0, Number.MAX_VALUE)) {
    details.push({ field: 'accuracy', message: 'accuracy must be a non-negative number.' });
  }
  if (capturedAtEpochMs !== undefined && !isEpochMs(capturedAtEpochMs)) {
    details.push({ field: 'capturedAtEpochMs', message: 'capturedAtEpochMs must be a Unix ms integer.' });
  }

  if (
    details.length > 0 ||
    typeof sharingEnabled !== 'boolean' ||
    !isEpochMs(lastHeartbeatEpochMs) ||
    !isEpochMs(revision)
  ) {
    return { ok: false, details };
  }

  const value: PresenceValue = {
    sharingEnabled,
    lastHeartbeatEpochMs,
    trackingDegraded: trackingDegraded === true,
    revision,
  };

  if (
    isFiniteInRange(lat, -90, 90) &&
    isFiniteInRange(lng, -180, 180) &&
    isFiniteInRange(accuracy, 0, Number.MAX_VALUE) &&
    isEpochMs(capturedAtEpochMs)
  ) {
    value.lat = lat;
    value.lng = lng;
    value.accuracy = accuracy;
    value.capturedAtEpochMs = capturedAtEpochMs;
    if (typeof provider === 'string') {
      value.provider = provider;
    }
  }

  return { ok: true, value };
}

/** Body of a put: `{ value, revision }`, where `value.revision` must match. */
export function validatePutPayload(
  payload: unknown,
  nowMs: number,
  maxFutureSkewMs: number = DEFAULT_MAX_FUTURE_SKEW_MS
): PutValidation {
  if (!isPlainObject(payload)) {
    return { ok: false, details: [{ field: 'body', message: 'Request body must be an object.' }] };
  }

  const { revision } = payload;
  if (!isEpochMs(revision)) {
    return { ok: false, details: [{ field: 'revision', message: 'revision must be a positive integer.' }] };
  }

  const validation = validatePresenceValue(payload.value, nowMs, maxFutureSkewMs);
  if (!validation.ok) {
    return validation;
  }

  if (validation.value.revision !== revision) {
    return {
      ok: false,
      details: [{ field: 'value.revision', message: 'value.revision must equal revision.' }],
    };
  }

  return { ok: true, value: validation.value, revision };
}
