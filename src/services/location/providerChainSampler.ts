import { distanceMeters } from '@/src/utils/geo';

import { createLogger, describeError } from '../logger';
import {
  PermissionDeniedError,
  ProviderUnavailableError,
  SampleTimeoutError,
  isTrackingError,
} from '../tracking/trackingErrors';
import { type Clock, systemClock } from '../types';

import {
  ACCURACY_CLASS_LIMIT_METERS,
  type AccuracyClass,
  type LocationSample,
  createLocationSample,
  toGeoPoint,
} from './locationSample';
import type {
  CurrentPositionOptions,
  LocationSampler,
  SampleListener,
  SamplerErrorListener,
  WatchPositionOptions,
} from './locationSampler';
import type { PositionProvider } from './positionProvider';

/** A stationary watcher still delivers one fix every this many cycles. */
export const STATIONARY_REFRESH_CYCLES = 4;

const log = createLogger('sampler');

export class ProviderChainSampler implements LocationSampler {
  readonly id: string;

  private readonly providers: PositionProvider[];
  private readonly clock: Clock;

  constructor(options: { id: string; providers: PositionProvider[]; clock?: Clock }) {
    if (options.providers.length === 0) {
      throw new Error('ProviderChainSampler needs at least one provider.');
    }

    this.id = options.id;
    this.providers = [...options.providers];
    this.clock = options.clock ?? systemClock;
  }

  async getCurrentPosition({ timeoutMs, accuracy }: CurrentPositionOptions): Promise<LocationSample> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | null = null;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new SampleTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.requestFromChain(accuracy, controller.signal), timeout]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      controller.abort();
    }
  }

  watchPosition(
    options: WatchPositionOptions,
    onSample: SampleListener,
    onError: SamplerErrorListener
  ): () => void {
    let cancelled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let lastDelivered: LocationSample | null = null;
    let cyclesSinceDelivery = 0;

    const runCycle = async () => {
      if (cancelled) {
        return;
      }

      try {
        const sample = await this.getCurrentPosition({
          timeoutMs: options.timeoutMs ?? options.intervalMs,
          accuracy: options.accuracy,
        });
        if (cancelled) {
          return;
        }

        cyclesSinceDelivery += 1;
        const moved =
          !lastDelivered ||
          distanceMeters(toGeoPoint(lastDelivered), toGeoPoint(sample)) >= options.minDisplacementMeters;

        if (moved || cyclesSinceDelivery >= STATIONARY_REFRESH_CYCLES) {
          lastDelivered = sample;
          cyclesSinceDelivery = 0;
          onSample(sample);
        }
      } catch (error) {
        if (!cancelled) {
          onError(error);
        }
      } finally {
        if (!cancelled) {
          timer = setTimeout(() => {
            void runCycle();
          }, options.intervalMs);
        }
      }
    };

    void runCycle();

    return () => {
      cancelled = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };
  }

  private async requestFromChain(accuracy: AccuracyClass, signal: AbortSignal): Promise<LocationSample> {
    const candidates = this.providers.filter(
      (provider) => provider.typicalAccuracyMeters <= ACCURACY_CLASS_LIMIT_METERS[accuracy]
    );
    const chain = candidates.length > 0 ? candidates : this.providers;
    const unavailable: string[] = [];

    for (const provider of chain) {
      if (signal.aborted) {
        break;
      }

      if (!(await provider.isEnabled())) {
        unavailable.push(`${provider.kind}: disabled`);
        continue;
      }

      try {
        const fix = await provider.requestFix(signal);
        return createLocationSample({
          lat: fix.latitude,
          lng: fix.longitude,
          accuracyMeters: fix.accuracyMeters,
          capturedAt: Math.round(fix.timestamp || this.clock.now()),
          sourceProvider: provider.kind,
        });
      } catch (error) {
        if (error instanceof PermissionDeniedError) {
          throw error;
        }
        if (isTrackingError(error) && error.code === 'SAMPLE_TIMEOUT') {
          throw error;
        }

        log.debug('provider failed, trying next', {
          sampler: this.id,
          provider: provider.kind,
          reason: describeError(error),
        });
        unavailable.push(`${provider.kind}: ${describeError(error)}`);
      }
    }

    throw new ProviderUnavailableError(`No location provider produced a fix (${unavailable.join('; ')}).`);
  }
}
