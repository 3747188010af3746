import type { SourceProvider } from './locationSample';

export type RawFix = {
  latitude: number;
  longitude: number;
  accuracyMeters: number;
  timestamp: number;
};

/**
 * One concrete positioning backend (GPS chip, network location, passive
 * listener, recorded track). `requestFix` rejects with PermissionDeniedError
 * or ProviderUnavailableError and must stop work when `signal` aborts.
 */
export interface PositionProvider {
  readonly kind: SourceProvider;
  readonly typicalAccuracyMeters: number;
  isEnabled(): Promise<boolean>;
  requestFix(signal: AbortSignal): Promise<RawFix>;
}
