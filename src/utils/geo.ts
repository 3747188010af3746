import type { GeoPoint } from '@/src/services/location/locationSample';

const EARTH_RADIUS_METERS = 6_371_000;

const CARDINAL_DIRECTIONS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export type CardinalDirection = (typeof CARDINAL_DIRECTIONS)[number];

function toRadians(value: number): number {
  return (value * Math.PI) / 180;
}

function toDegrees(value: number): number {
  return (value * 180) / Math.PI;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Great-circle distance (haversine). The `a` term is clamped so rounding near
 * antipodal points cannot push `sqrt(1 - a)` into NaN.
 */
export function distanceMeters(from: GeoPoint, to: GeoPoint): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const fromLat = toRadians(from.latitude);
  const toLat = toRadians(to.latitude);

  const a = clamp(
    Math.sin(dLat / 2) ** 2 + Math.cos(fromLat) * Math.cos(toLat) * Math.sin(dLon / 2) ** 2,
    0,
    1
  );
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
}

/** Initial bearing from `from` to `to`, normalized to [0, 360). */
export function bearingDegrees(from: GeoPoint, to: GeoPoint): number {
  const fromLat = toRadians(from.latitude);
  const toLat = toRadians(to.latitude);
  const dLon = toRadians(to.longitude - from.longitude);

  const y = Math.sin(dLon) * Math.cos(toLat);
  const x = Math.cos(fromLat) * Math.sin(toLat) - Math.sin(fromLat) * Math.cos(toLat) * Math.cos(dLon);

  return (toDegrees(Math.atan2(y, x)) + 360) % 360;
}

export function cardinalDirection(bearing: number): CardinalDirection {
  const normalized = ((bearing % 360) + 360) % 360;
  const index = Math.floor((normalized + 22.5) / 45) % CARDINAL_DIRECTIONS.length;
  return CARDINAL_DIRECTIONS[index] ?? 'N';
}

export function formatDistance(meters: number): string {
  if (meters < 100) {
    return `${Math.round(meters)}m`;
  }
  if (meters < 1000) {
    return `${Math.round(meters / 100) * 100}m`;
  }
  return `${(meters / 1000).toFixed(1)}km`;
}
