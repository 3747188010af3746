export type SourceProvider = 'gps' | 'network' | 'passive' | 'fused' | 'replay';

export type AccuracyClass = 'high' | 'medium' | 'low';

export type LocationSample = Readonly<{
  lat: number;
  lng: number;
  accuracyMeters: number;
  capturedAt: number;
  sourceProvider: SourceProvider;
}>;

export type GeoPoint = {
  latitude: number;
  longitude: number;
};

const SOURCE_PROVIDERS: readonly SourceProvider[] = ['gps', 'network', 'passive', 'fused', 'replay'];

export function isSourceProvider(value: unknown): value is SourceProvider {
  return typeof value === 'string' && SOURCE_PROVIDERS.some((provider) => provider === value);
}

export function isValidLatitude(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= -90 && value <= 90;
}

export function isValidLongitude(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= -180 && value <= 180;
}

export function createLocationSample(input: {
  lat: number;
  lng: number;
  accuracyMeters: number;
  capturedAt: number;
  sourceProvider: SourceProvider;
}): LocationSample {
  if (!isValidLatitude(input.lat)) {
    throw new RangeError(`Latitude out of range: ${input.lat}`);
  }
  if (!isValidLongitude(input.lng)) {
    throw new RangeError(`Longitude out of range: ${input.lng}`);
  }
  if (!Number.isFinite(input.accuracyMeters) || input.accuracyMeters < 0) {
    throw new RangeError(`Accuracy must be a non-negative number: ${input.accuracyMeters}`);
  }
  if (!Number.isInteger(input.capturedAt) || input.capturedAt <= 0) {
    throw new RangeError(`capturedAt must be a Unix ms integer: ${input.capturedAt}`);
  }

  return Object.freeze({
    lat: input.lat,
    lng: input.lng,
    accuracyMeters: input.accuracyMeters,
    capturedAt: input.capturedAt,
    sourceProvider: input.sourceProvider,
  });
}

export function toGeoPoint(sample: LocationSample): GeoPoint {
  return { latitude: sample.lat, longitude: sample.lng };
}

export function sampleAgeMs(sample: LocationSample, nowMs: number): number {
  return Math.max(0, nowMs - sample.capturedAt);
}

/** Worst horizontal error, in meters, still acceptable for each accuracy class. */
export const ACCURACY_CLASS_LIMIT_METERS: Record<AccuracyClass, number> = {
  high: 50,
  medium: 250,
  low: 2000,
};
