export type TrackingErrorCode =
  | 'PERMISSION_DENIED'
  | 'PROVIDER_UNAVAILABLE'
  | 'SAMPLE_TIMEOUT'
  | 'PUBLISH_FAILURE'
  | 'ALL_STRATEGIES_EXHAUSTED'
  | 'SESSION_STOPPED';

export class TrackingError extends Error {
  readonly code: TrackingErrorCode;

  constructor(code: TrackingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackingError';
    this.code = code;
  }
}

/** Fatal to the session: strategies are not retried. */
export class PermissionDeniedError extends TrackingError {
  constructor(message = 'Location permission denied.') {
    super('PERMISSION_DENIED', message);
    this.name = 'PermissionDeniedError';
  }
}

export class ProviderUnavailableError extends TrackingError {
  constructor(message = 'Location provider unavailable.', options?: { cause?: unknown }) {
    super('PROVIDER_UNAVAILABLE', message, options);
    this.name = 'ProviderUnavailableError';
  }
}

export class SampleTimeoutError extends TrackingError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('SAMPLE_TIMEOUT', `No position fix within ${timeoutMs}ms.`);
    this.name = 'SampleTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class PublishFailureError extends TrackingError {
  constructor(message = 'Presence write failed.', options?: { cause?: unknown }) {
    super('PUBLISH_FAILURE', message, options);
    this.name = 'PublishFailureError';
  }
}

export type StrategyFailure = {
  strategyId: string;
  code: TrackingErrorCode;
  message: string;
};

export class AllStrategiesExhaustedError extends TrackingError {
  readonly failures: StrategyFailure[];

  constructor(failures: StrategyFailure[]) {
    const summary = failures.map((failure) => `${failure.strategyId}: ${failure.code}`).join(', ');
    super(
      'ALL_STRATEGIES_EXHAUSTED',
      summary ? `No tracking strategy could start (${summary}).` : 'No tracking strategy available.'
    );
    this.name = 'AllStrategiesExhaustedError';
    this.failures = failures;
  }
}

export class TrackingStoppedError extends TrackingError {
  constructor() {
    super('SESSION_STOPPED', 'Tracking was stopped before a strategy started.');
    this.name = 'TrackingStoppedError';
  }
}

export function isTrackingError(value: unknown): value is TrackingError {
  return value instanceof TrackingError;
}

export function toTrackingError(value: unknown): TrackingError {
  if (isTrackingError(value)) {
    return value;
  }

  const message = value instanceof Error ? value.message : String(value);
  return new ProviderUnavailableError(message, { cause: value });
}
