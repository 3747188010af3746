import { ProviderUnavailableError } from '../tracking/trackingErrors';
import { type Clock, systemClock } from '../types';

import type { PositionProvider, RawFix } from './positionProvider';

export type TrackPoint = {
  offsetMs: number;
  latitude: number;
  longitude: number;
  accuracyMeters: number;
};

function isTrackPoint(value: unknown): value is TrackPoint {
  if (!value || typeof value !== 'object') {
    return false;
  }

  const candidate = value as Partial<TrackPoint>;
  return (
    typeof candidate.offsetMs === 'number' &&
    candidate.offsetMs >= 0 &&
    typeof candidate.latitude === 'number' &&
    candidate.latitude >= -90 &&
    candidate.latitude <= 90 &&
    typeof candidate.longitude === 'number' &&
    candidate.longitude >= -180 &&
    candidate.longitude <= 180 &&
    typeof candidate.accuracyMeters === 'number' &&
    candidate.accuracyMeters >= 0
  );
}

export function parseTrack(value: unknown): TrackPoint[] {
  if (!Array.isArray(value)) {
    throw new Error('Track must be an array of points.');
  }

  const points: TrackPoint[] = [];
  value.forEach((entry, index) => {
    if (!isTrackPoint(entry)) {
      throw new Error(`Track point ${index} is malformed.`);
    }
    points.push(entry);
  });

  if (points.length === 0) {
    throw new Error('Track must contain at least one point.');
  }

  return points.sort((a, b) => a.offsetMs - b.offsetMs);
}

/**
 * Replays a recorded track against the clock: each fix is the last point whose
 * offset has elapsed since the first request. Holds the final point once the
 * track ends, unless `loop` is set.
 */
export class ReplayPositionProvider implements PositionProvider {
  readonly kind = 'replay' as const;
  readonly typicalAccuracyMeters: number;

  private readonly points: TrackPoint[];
  private readonly clock: Clock;
  private readonly loop: boolean;
  private startedAt: number | null = null;
  private enabled = true;

  constructor(options: { points: TrackPoint[]; clock?: Clock; loop?: boolean }) {
    this.points = parseTrack(options.points);
    this.clock = options.clock ?? systemClock;
    this.loop = options.loop ?? false;
    this.typicalAccuracyMeters = Math.max(...this.points.map((point) => point.accuracyMeters));
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  async isEnabled(): Promise<boolean> {
    return this.enabled;
  }

  async requestFix(signal: AbortSignal): Promise<RawFix> {
    if (signal.aborted || !this.enabled) {
      throw new ProviderUnavailableError('Replay provider is disabled.');
    }

    const now = this.clock.now();
    if (this.startedAt === null) {
      this.startedAt = now;
    }

    const point = this.pointAt(now - this.startedAt);
    return {
      latitude: point.latitude,
      longitude: point.longitude,
      accuracyMeters: point.accuracyMeters,
      timestamp: now,
    };
  }

  private pointAt(elapsedMs: number): TrackPoint {
    const last = this.points[this.points.length - 1];
    const duration = last.offsetMs;
    const offset = this.loop && duration > 0 ? elapsedMs % (duration + 1) : elapsedMs;

    let current = this.points[0];
    for (const point of this.points) {
      if (point.offsetMs > offset) {
        break;
      }
      current = point;
    }
    return current;
  }
}
