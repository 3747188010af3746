import {
  type GeoPoint,
  isValidLatitude,
  isValidLongitude,
} from '@/src/services/location/locationSample';

export type GeofenceRegion = Readonly<{
  id: string;
  label: string;
  center: Readonly<GeoPoint>;
  radiusMeters: number;
}>;

export function createGeofenceRegion(input: {
  id: string;
  label: string;
  center: GeoPoint;
  radiusMeters: number;
}): GeofenceRegion {
  const id = input.id.trim();
  if (!id || id.includes('|')) {
    throw new Error('Region id must be a non-empty string without "|".');
  }
  if (!isValidLatitude(input.center.latitude) || !isValidLongitude(input.center.longitude)) {
    throw new RangeError('Region center is out of range.');
  }
  if (!Number.isFinite(input.radiusMeters) || input.radiusMeters <= 0) {
    throw new RangeError('radiusMeters must be a positive number.');
  }

  return Object.freeze({
    id,
    label: input.label.trim() || id,
    center: Object.freeze({ latitude: input.center.latitude, longitude: input.center.longitude }),
    radiusMeters: input.radiusMeters,
  });
}
