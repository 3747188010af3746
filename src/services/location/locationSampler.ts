import type { AccuracyClass, LocationSample } from './locationSample';

export type CurrentPositionOptions = {
  timeoutMs: number;
  accuracy: AccuracyClass;
};

export type WatchPositionOptions = {
  intervalMs: number;
  minDisplacementMeters: number;
  accuracy: AccuracyClass;
  /** Per-cycle fix timeout; defaults to the interval. */
  timeoutMs?: number;
};

export type SampleListener = (sample: LocationSample) => void;

export type SamplerErrorListener = (error: unknown) => void;

/**
 * Every positioning backend is consumed through this one capability.
 * Failures surface as TrackingError subclasses: PermissionDeniedError,
 * ProviderUnavailableError or SampleTimeoutError.
 */
export interface LocationSampler {
  readonly id: string;
  getCurrentPosition(options: CurrentPositionOptions): Promise<LocationSample>;
  watchPosition(
    options: WatchPositionOptions,
    onSample: SampleListener,
    onError: SamplerErrorListener
  ): () => void;
}
