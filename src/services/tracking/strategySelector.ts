import { createLogger, describeError } from '../logger';
import type { LocationSample } from '../location/locationSample';
import {
  DEFAULT_POWER_STATE,
  type SamplingPolicy,
  resolveSamplingPolicy,
} from '../power/batteryAdaptationPolicy';
import { type Clock, type ServiceHealth, systemClock } from '../types';

import { type LocationConsent, type LocationConsentGate, grantedConsentGate } from './locationConsent';
import {
  AllStrategiesExhaustedError,
  PermissionDeniedError,
  ProviderUnavailableError,
  SampleTimeoutError,
  type StrategyFailure,
  type TrackingError,
  type TrackingErrorCode,
  TrackingStoppedError,
  toTrackingError,
} from './trackingErrors';
import type { TrackingStrategy } from './trackingStrategy';

export type TrackingSession = {
  userId: string;
  startedAt: number;
  activeStrategy: string | null;
  isActive: boolean;
};

export type RecoveryReason = TrackingErrorCode | 'HEALTH_CHECK_FAILED';

export type TrackingState =
  | { kind: 'IDLE' }
  | { kind: 'STARTING'; strategyId: string }
  | { kind: 'RUNNING'; strategyId: string }
  | {
      kind: 'RECOVERING';
      reason: RecoveryReason;
      failedStrategyId: string | null;
      nextAttemptAt: number | null;
    }
  | { kind: 'STOPPED' };

export type StartResult = { ok: true; strategyId: string } | { ok: false; error: TrackingError };

export type HealthCheckResult = 'healthy' | 'failed' | 'skipped';

type TrackingEventMap = {
  STATE_CHANGED: { type: 'STATE_CHANGED'; state: TrackingState; previous: TrackingState };
  SAMPLE: { type: 'SAMPLE'; sample: LocationSample; strategyId: string };
  DEGRADED: { type: 'DEGRADED'; error: AllStrategiesExhaustedError; retryAt: number };
  RESTORED: { type: 'RESTORED'; strategyId: string };
  SESSION_FAILED: { type: 'SESSION_FAILED'; error: TrackingError };
};

type TrackingListener<TEvent extends keyof TrackingEventMap> = (payload: TrackingEventMap[TEvent]) => void;

type StartOutcome = { ok: true } | { ok: false; error: TrackingError };

type StrategyAttempt = {
  strategy: TrackingStrategy;
  generation: number;
  phase: 'starting' | 'running' | 'closed';
  settle: ((outcome: StartOutcome) => void) | null;
};

export type StrategySelectorOptions = {
  strategies: TrackingStrategy[];
  consentGate?: LocationConsentGate;
  clock?: Clock;
  initialPolicy?: SamplingPolicy;
  startupTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  /** How long a failed strategy is skipped before it is tried again. */
  strategyRetryBackoffMs?: number;
  exhaustedRetryBaseMs?: number;
  exhaustedRetryMaxMs?: number;
  maxConsecutiveTimeouts?: number;
};

const DEFAULT_STARTUP_TIMEOUT_MS = 15_000;
const DEFAULT_HEALTH_CHECK_INTERVAL_MS = 90_000;
const DEFAULT_STRATEGY_RETRY_BACKOFF_MS = 5 * 60_000;
const DEFAULT_EXHAUSTED_RETRY_BASE_MS = 5_000;
const DEFAULT_EXHAUSTED_RETRY_MAX_MS = 5 * 60_000;
const DEFAULT_MAX_CONSECUTIVE_TIMEOUTS = 3;

const log = createLogger('tracking');

/**
 * Owns the tracking session and the active strategy handle. Strategies are
 * tried in priority order; a strategy counts as started only once it has
 * delivered a sample. Health checks, repeated timeouts and provider loss
 * demote the active strategy and promote the next one.
 */
export class StrategySelector {
  private readonly strategies: TrackingStrategy[];
  private readonly consentGate: LocationConsentGate;
  private readonly clock: Clock;
  private readonly startupTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly strategyRetryBackoffMs: number;
  private readonly exhaustedRetryBaseMs: number;
  private readonly exhaustedRetryMaxMs: number;
  private readonly maxConsecutiveTimeouts: number;

  private state: TrackingState = { kind: 'IDLE' };
  private session: TrackingSession | null = null;
  private consent: LocationConsent = 'granted';
  private policy: SamplingPolicy;
  private generation = 0;
  private attempt: StrategyAttempt | null = null;
  private sequence: Promise<StartResult> | null = null;
  private excludedUntil = new Map<string, number>();
  private consecutiveTimeouts = 0;
  private exhaustedAttempts = 0;
  private lastExhaustedError: AllStrategiesExhaustedError | null = null;
  private degraded = false;
  private lastSample: LocationSample | null = null;
  private lastSampleAt: number | null = null;
  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private listeners: {
    [K in keyof TrackingEventMap]: Set<TrackingListener<K>>;
  } = {
    STATE_CHANGED: new Set(),
    SAMPLE: new Set(),
    DEGRADED: new Set(),
    RESTORED: new Set(),
    SESSION_FAILED: new Set(),
  };

  constructor(options: StrategySelectorOptions) {
    if (options.strategies.length === 0) {
      throw new Error('StrategySelector needs at least one strategy.');
    }

    const ids = new Set(options.strategies.map((strategy) => strategy.id));
    if (ids.size !== options.strategies.length) {
      throw new Error('Tracking strategy ids must be unique.');
    }

    this.strategies = [...options.strategies];
    this.consentGate = options.consentGate ?? grantedConsentGate;
    this.clock = options.clock ?? systemClock;
    this.policy = options.initialPolicy ?? resolveSamplingPolicy(DEFAULT_POWER_STATE);
    this.startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS;
    this.strategyRetryBackoffMs = options.strategyRetryBackoffMs ?? DEFAULT_STRATEGY_RETRY_BACKOFF_MS;
    this.exhaustedRetryBaseMs = options.exhaustedRetryBaseMs ?? DEFAULT_EXHAUSTED_RETRY_BASE_MS;
    this.exhaustedRetryMaxMs = options.exhaustedRetryMaxMs ?? DEFAULT_EXHAUSTED_RETRY_MAX_MS;
    this.maxConsecutiveTimeouts = options.maxConsecutiveTimeouts ?? DEFAULT_MAX_CONSECUTIVE_TIMEOUTS;
  }

  async start(userId: string): Promise<StartResult> {
    const trimmedUserId = userId.trim();
    if (!trimmedUserId) {
      throw new Error('userId must be a non-empty string.');
    }

    if (this.session?.isActive) {
      if (this.session.userId !== trimmedUserId) {
        this.stop();
      } else if (this.sequence) {
        return this.sequence;
      } else if (this.state.kind === 'RUNNING') {
        return { ok: true, strategyId: this.state.strategyId };
      } else {
        return {
          ok: false,
          error: this.lastExhaustedError ?? new AllStrategiesExhaustedError([]),
        };
      }
    }

    const generation = ++this.generation;
    let consent: LocationConsent;
    try {
      consent = await this.consentGate.getLocationConsent();
    } catch (error) {
      log.warn('consent lookup failed, treating as denied', { reason: describeError(error) });
      consent = 'denied';
    }

    if (generation !== this.generation) {
      return { ok: false, error: new TrackingStoppedError() };
    }

    if (consent === 'denied') {
      const error = new PermissionDeniedError('Location consent has not been granted.');
      log.warn('start refused', { userId: trimmedUserId, code: error.code });
      return { ok: false, error };
    }

    this.consent = consent;
    this.session = {
      userId: trimmedUserId,
      startedAt: this.clock.now(),
      activeStrategy: null,
      isActive: true,
    };
    this.excludedUntil.clear();
    this.consecutiveTimeouts = 0;
    this.exhaustedAttempts = 0;
    this.lastExhaustedError = null;
    this.degraded = false;
    this.lastSample = null;
    this.lastSampleAt = null;
    this.startHealthTimer();

    log.info('tracking session created', { userId: trimmedUserId, consent });
    return this.beginStartSequence(false);
  }

  /** Safe from any state. No sample is emitted after this returns. */
  stop(): void {
    this.generation += 1;

    const attempt = this.attempt;
    this.attempt = null;
    if (attempt) {
      this.closeAttempt(attempt, { ok: false, error: new TrackingStoppedError() });
    }

    this.stopHealthTimer();
    this.clearRetryTimer();

    if (this.session) {
      this.session.isActive = false;
      log.info('tracking session destroyed', { userId: this.session.userId });
    }

    this.session = null;
    this.sequence = null;
    this.excludedUntil.clear();
    this.consecutiveTimeouts = 0;
    this.exhaustedAttempts = 0;
    this.lastExhaustedError = null;
    this.degraded = false;
    this.lastSample = null;
    this.lastSampleAt = null;

    if (this.state.kind !== 'STOPPED') {
      this.setState({ kind: 'STOPPED' });
    }
  }

  onStrategyHealthCheck(): HealthCheckResult {
    const attempt = this.attempt;
    if (this.state.kind !== 'RUNNING' || !attempt || attempt.phase !== 'running') {
      return 'skipped';
    }

    const cadenceMs = attempt.strategy.expectedCadenceMs(this.policy);
    const lastSampleAt = this.lastSampleAt ?? this.session?.startedAt ?? this.clock.now();
    const silentForMs = this.clock.now() - lastSampleAt;

    if (silentForMs < cadenceMs * 2) {
      log.debug('health check passed', { strategyId: attempt.strategy.id, silentForMs, cadenceMs });
      return 'healthy';
    }

    log.warn('active strategy stopped producing samples', {
      strategyId: attempt.strategy.id,
      silentForMs,
      cadenceMs,
    });
    this.failover(attempt, 'HEALTH_CHECK_FAILED');
    return 'failed';
  }

  applyPolicy(policy: SamplingPolicy): void {
    this.policy = policy;
    const attempt = this.attempt;
    if (attempt && attempt.phase !== 'closed') {
      attempt.strategy.applyPolicy(policy);
    }
  }

  getPolicy(): SamplingPolicy {
    return this.policy;
  }

  getState(): TrackingState {
    return { ...this.state };
  }

  getSession(): TrackingSession | null {
    return this.session ? { ...this.session } : null;
  }

  getLastSample(): LocationSample | null {
    return this.lastSample;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  getHealth(): ServiceHealth {
    const state = this.state;
    if (state.kind === 'RUNNING') {
      return {
        name: 'Location Tracking',
        state: 'active',
        detail: `Tracking with ${state.strategyId}.`,
      };
    }

    if (state.kind === 'RECOVERING' || state.kind === 'STARTING') {
      return {
        name: 'Location Tracking',
        state: this.degraded ? 'degraded' : 'active',
        detail:
          state.kind === 'STARTING'
            ? `Starting ${state.strategyId}.`
            : `Recovering after ${state.reason.toLowerCase()}.`,
      };
    }

    return {
      name: 'Location Tracking',
      state: 'idle',
      detail: 'Location tracking is disabled.',
    };
  }

  on<TEvent extends keyof TrackingEventMap>(event: TEvent, listener: TrackingListener<TEvent>): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  private beginStartSequence(isRetry: boolean): Promise<StartResult> {
    const sequence = this.runStartSequence(isRetry).finally(() => {
      if (this.sequence === sequence) {
        this.sequence = null;
      }
    });
    this.sequence = sequence;
    return sequence;
  }

  private async runStartSequence(isRetry: boolean): Promise<StartResult> {
    const generation = ++this.generation;
    const failures: StrategyFailure[] = [];
    const permitted = this.strategies.filter(
      (strategy) => this.consent === 'granted' || !strategy.requiresBackgroundConsent
    );

    if (permitted.length === 0) {
      const error = new PermissionDeniedError('Background location consent is required by every strategy.');
      this.failSession(error);
      return { ok: false, error };
    }

    for (const strategy of this.resolveCandidates(permitted, isRetry)) {
      if (generation !== this.generation || !this.session?.isActive) {
        return { ok: false, error: new TrackingStoppedError() };
      }

      this.setState({ kind: 'STARTING', strategyId: strategy.id });
      const outcome = await this.tryStartStrategy(strategy, generation);

      if (generation !== this.generation || !this.session?.isActive) {
        return { ok: false, error: new TrackingStoppedError() };
      }

      if (outcome.ok) {
        return { ok: true, strategyId: strategy.id };
      }

      if (outcome.error.code === 'PERMISSION_DENIED') {
        this.failSession(outcome.error);
        return { ok: false, error: outcome.error };
      }

      log.warn('strategy failed to start', {
        strategyId: strategy.id,
        code: outcome.error.code,
        reason: outcome.error.message,
      });
      this.exclude(strategy.id);
      failures.push({ strategyId: strategy.id, code: outcome.error.code, message: outcome.error.message });
    }

    return { ok: false, error: this.handleExhausted(failures) };
  }

  private resolveCandidates(permitted: TrackingStrategy[], isRetry: boolean): TrackingStrategy[] {
    const now = this.clock.now();
    const available = permitted.filter((strategy) => (this.excludedUntil.get(strategy.id) ?? 0) <= now);
    if (available.length > 0 || !isRetry) {
      return available;
    }

    // Every strategy is still excluded: keep probing the last-resort one.
    return permitted.slice(-1);
  }

  private async tryStartStrategy(strategy: TrackingStrategy, generation: number): Promise<StartOutcome> {
    let supported: boolean;
    try {
      supported = await strategy.isSupported();
    } catch (error) {
      return { ok: false, error: toTrackingError(error) };
    }

    if (!supported) {
      return { ok: false, error: new ProviderUnavailableError(`${strategy.label} is not supported on this device.`) };
    }

    if (generation !== this.generation) {
      return { ok: false, error: new TrackingStoppedError() };
    }

    return new Promise<StartOutcome>((resolve) => {
      const attempt: StrategyAttempt = {
        strategy,
        generation,
        phase: 'starting',
        settle: null,
      };

      const timer = setTimeout(() => {
        settle({ ok: false, error: new SampleTimeoutError(this.startupTimeoutMs) });
      }, this.startupTimeoutMs);

      const settle = (outcome: StartOutcome) => {
        if (attempt.settle === null) {
          return;
        }
        attempt.settle = null;
        clearTimeout(timer);

        if (outcome.ok && attempt.phase === 'starting') {
          this.promote(attempt);
        } else if (!outcome.ok && attempt.phase !== 'closed') {
          attempt.phase = 'closed';
          attempt.strategy.stop();
          if (this.attempt === attempt) {
            this.attempt = null;
          }
        }
        resolve(outcome);
      };

      attempt.settle = settle;
      this.attempt = attempt;

      try {
        const started = strategy.start({
          policy: this.policy,
          onSample: (sample) => this.handleStrategySample(attempt, sample),
          onError: (error) => this.handleStrategyError(attempt, error),
        });
        if (started) {
          void started.catch((error: unknown) => settle({ ok: false, error: toTrackingError(error) }));
        }
      } catch (error) {
        settle({ ok: false, error: toTrackingError(error) });
      }
    });
  }

  private handleStrategySample(attempt: StrategyAttempt, sample: LocationSample): void {
    if (!this.isCurrent(attempt)) {
      log.debug('dropping sample from inactive strategy', { strategyId: attempt.strategy.id });
      return;
    }

    this.lastSample = sample;
    this.lastSampleAt = this.clock.now();
    this.consecutiveTimeouts = 0;

    if (attempt.phase === 'starting') {
      attempt.settle?.({ ok: true });
    }

    this.emit('SAMPLE', { type: 'SAMPLE', sample, strategyId: attempt.strategy.id });
  }

  private handleStrategyError(attempt: StrategyAttempt, rawError: unknown): void {
    if (!this.isCurrent(attempt)) {
      return;
    }

    const error = toTrackingError(rawError);

    if (attempt.phase === 'starting') {
      if (error.code === 'PERMISSION_DENIED' || error.code === 'PROVIDER_UNAVAILABLE') {
        attempt.settle?.({ ok: false, error });
      }
      return;
    }

    switch (error.code) {
      case 'PERMISSION_DENIED':
        this.failSession(error);
        return;
      case 'PROVIDER_UNAVAILABLE':
        this.failover(attempt, error.code);
        return;
      case 'SAMPLE_TIMEOUT':
        this.consecutiveTimeouts += 1;
        log.debug('sample cycle timed out', {
          strategyId: attempt.strategy.id,
          consecutiveTimeouts: this.consecutiveTimeouts,
        });
        if (this.consecutiveTimeouts >= this.maxConsecutiveTimeouts) {
          this.failover(attempt, error.code);
        }
        return;
      default:
        log.warn('unexpected strategy error', { strategyId: attempt.strategy.id, code: error.code });
    }
  }

  private isCurrent(attempt: StrategyAttempt): boolean {
    return (
      this.attempt === attempt &&
      attempt.phase !== 'closed' &&
      attempt.generation === this.generation &&
      this.session?.isActive === true
    );
  }

  private promote(attempt: StrategyAttempt): void {
    attempt.phase = 'running';
    this.consecutiveTimeouts = 0;
    this.exhaustedAttempts = 0;
    this.lastExhaustedError = null;
    if (this.session) {
      this.session.activeStrategy = attempt.strategy.id;
    }

    this.setState({ kind: 'RUNNING', strategyId: attempt.strategy.id });
    log.info('strategy running', { strategyId: attempt.strategy.id });

    if (this.degraded) {
      this.degraded = false;
      this.emit('RESTORED', { type: 'RESTORED', strategyId: attempt.strategy.id });
    }
  }

  private failover(attempt: StrategyAttempt, reason: RecoveryReason): void {
    this.closeAttempt(attempt, null);
    if (this.attempt === attempt) {
      this.attempt = null;
    }
    if (this.session) {
      this.session.activeStrategy = null;
    }

    this.exclude(attempt.strategy.id);
    this.consecutiveTimeouts = 0;
    this.setState({
      kind: 'RECOVERING',
      reason,
      failedStrategyId: attempt.strategy.id,
      nextAttemptAt: null,
    });

    void this.beginStartSequence(false);
  }

  private handleExhausted(failures: StrategyFailure[]): AllStrategiesExhaustedError {
    const error = new AllStrategiesExhaustedError(failures);
    const delayMs = Math.min(
      this.exhaustedRetryBaseMs * 2 ** this.exhaustedAttempts,
      this.exhaustedRetryMaxMs
    );
    this.exhaustedAttempts += 1;
    this.lastExhaustedError = error;

    const retryAt = this.clock.now() + delayMs;
    this.setState({
      kind: 'RECOVERING',
      reason: 'ALL_STRATEGIES_EXHAUSTED',
      failedStrategyId: null,
      nextAttemptAt: retryAt,
    });

    log.warn('all tracking strategies exhausted', { retryInMs: delayMs, failures });
    if (!this.degraded) {
      this.degraded = true;
      this.emit('DEGRADED', { type: 'DEGRADED', error, retryAt });
    }

    this.clearRetryTimer();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.session?.isActive && !this.sequence) {
        void this.beginStartSequence(true);
      }
    }, delayMs);

    return error;
  }

  private failSession(error: TrackingError): void {
    const userId = this.session?.userId;
    log.error('tracking session failed', { userId, code: error.code, reason: error.message });
    this.stop();
    this.emit('SESSION_FAILED', { type: 'SESSION_FAILED', error });
  }

  private closeAttempt(attempt: StrategyAttempt, outcome: StartOutcome | null): void {
    if (attempt.settle && outcome) {
      attempt.settle(outcome);
    }
    if (attempt.phase === 'closed') {
      return;
    }
    attempt.phase = 'closed';
    attempt.settle = null;
    attempt.strategy.stop();
  }

  private exclude(strategyId: string): void {
    this.excludedUntil.set(strategyId, this.clock.now() + this.strategyRetryBackoffMs);
  }

  private startHealthTimer(): void {
    this.stopHealthTimer();
    this.healthTimer = setInterval(() => {
      this.onStrategyHealthCheck();
    }, this.healthCheckIntervalMs);
  }

  private stopHealthTimer(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private setState(next: TrackingState): void {
    const previous = this.state;
    this.state = next;
    this.emit('STATE_CHANGED', { type: 'STATE_CHANGED', state: { ...next }, previous: { ...previous } });
  }

  private emit<TEvent extends keyof TrackingEventMap>(event: TEvent, payload: TrackingEventMap[TEvent]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (error) {
        log.error('listener failed', { event, reason: describeError(error) });
      }
    }
  }
}
