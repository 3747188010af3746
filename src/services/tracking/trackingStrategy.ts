import { STATIONARY_REFRESH_CYCLES } from '../location/providerChainSampler';
import type { AccuracyClass, LocationSample } from '../location/locationSample';
import type { LocationSampler } from '../location/locationSampler';
import type { SamplingPolicy } from '../power/batteryAdaptationPolicy';

export type StrategyContext = {
  policy: SamplingPolicy;
  onSample: (sample: LocationSample) => void;
  onError: (error: unknown) => void;
};

/**
 * One way of acquiring background location. The selector decides a strategy
 * has started once `onSample` fires, and judges its health against
 * `expectedCadenceMs`.
 */
export interface TrackingStrategy {
  readonly id: string;
  readonly label: string;
  readonly requiresBackgroundConsent: boolean;
  isSupported(): Promise<boolean>;
  start(context: StrategyContext): void | Promise<void>;
  applyPolicy(policy: SamplingPolicy): void;
  expectedCadenceMs(policy: SamplingPolicy): number;
  stop(): void;
}

export type SamplerStrategyMode = 'watch' | 'poll';

export type SamplerStrategyOptions = {
  id: string;
  label: string;
  sampler: LocationSampler;
  mode: SamplerStrategyMode;
  requiresBackgroundConsent?: boolean;
  /** Overrides the policy's accuracy class. */
  accuracy?: AccuracyClass;
  intervalMultiplier?: number;
  sampleTimeoutMs?: number;
  isSupported?: () => Promise<boolean>;
};

const DEFAULT_SAMPLE_TIMEOUT_MS = 15_000;

/**
 * Strategy backed by a LocationSampler, either through its update
 * subscription (`watch`) or by requesting a fix every interval (`poll`).
 */
export class SamplerStrategy implements TrackingStrategy {
  readonly id: string;
  readonly label: string;
  readonly requiresBackgroundConsent: boolean;

  private readonly options: SamplerStrategyOptions;
  private context: StrategyContext | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(options: SamplerStrategyOptions) {
    this.options = options;
    this.id = options.id;
    this.label = options.label;
    this.requiresBackgroundConsent = options.requiresBackgroundConsent ?? false;
  }

  async isSupported(): Promise<boolean> {
    return this.options.isSupported ? this.options.isSupported() : true;
  }

  start(context: StrategyContext): void {
    this.stop();
    this.context = context;
    this.subscribe(context.policy);
  }

  applyPolicy(policy: SamplingPolicy): void {
    if (!this.context) {
      return;
    }

    this.context = { ...this.context, policy };
    this.subscribe(policy);
  }

  expectedCadenceMs(policy: SamplingPolicy): number {
    const interval = this.intervalFor(policy);
    if (this.options.mode === 'watch' && policy.minDisplacementMeters > 0) {
      return interval * STATIONARY_REFRESH_CYCLES;
    }
    return interval;
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.context = null;
  }

  private subscribe(policy: SamplingPolicy): void {
    this.unsubscribe?.();
    this.unsubscribe = null;

    const context = this.context;
    if (!context) {
      return;
    }

    const intervalMs = this.intervalFor(policy);
    const accuracy = this.options.accuracy ?? policy.desiredAccuracy;
    const timeoutMs = this.options.sampleTimeoutMs ?? DEFAULT_SAMPLE_TIMEOUT_MS;

    if (this.options.mode === 'watch') {
      this.unsubscribe = this.options.sampler.watchPosition(
        {
          intervalMs,
          minDisplacementMeters: policy.minDisplacementMeters,
          accuracy,
          timeoutMs,
        },
        (sample) => context.onSample(sample),
        (error) => context.onError(error)
      );
      return;
    }

    this.unsubscribe = this.startPolling({ intervalMs, accuracy, timeoutMs }, context);
  }

  private startPolling(
    options: { intervalMs: number; accuracy: AccuracyClass; timeoutMs: number },
    context: StrategyContext
  ): () => void {
    let cancelled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const poll = async () => {
      try {
        const sample = await this.options.sampler.getCurrentPosition({
          timeoutMs: options.timeoutMs,
          accuracy: options.accuracy,
        });
        if (!cancelled) {
          context.onSample(sample);
        }
      } catch (error) {
        if (!cancelled) {
          context.onError(error);
        }
      } finally {
        if (!cancelled) {
          timer = setTimeout(() => {
            void poll();
          }, options.intervalMs);
        }
      }
    };

    void poll();

    return () => {
      cancelled = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };
  }

  private intervalFor(policy: SamplingPolicy): number {
    return Math.round(policy.sampleIntervalMs * (this.options.intervalMultiplier ?? 1));
  }
}

export function createDefaultStrategies(samplers: {
  foreground: LocationSampler;
  background: LocationSampler;
  fallback: LocationSampler;
  sampleTimeoutMs?: number;
}): TrackingStrategy[] {
  return [
    new SamplerStrategy({
      id: 'foreground-service',
      label: 'High-reliability foreground service',
      sampler: samplers.foreground,
      mode: 'watch',
      accuracy: 'high',
      sampleTimeoutMs: samplers.sampleTimeoutMs,
    }),
    new SamplerStrategy({
      id: 'background-service',
      label: 'Standard background service',
      sampler: samplers.background,
      mode: 'poll',
      requiresBackgroundConsent: true,
      sampleTimeoutMs: samplers.sampleTimeoutMs,
    }),
    new SamplerStrategy({
      id: 'degraded-fallback',
      label: 'Platform-degraded fallback',
      sampler: samplers.fallback,
      mode: 'poll',
      accuracy: 'low',
      intervalMultiplier: 2,
      requiresBackgroundConsent: true,
      sampleTimeoutMs: samplers.sampleTimeoutMs,
    }),
  ];
}
