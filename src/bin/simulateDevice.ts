import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';

import { loadTrackingConfig } from '@/src/config/env';
import { ProviderChainSampler } from '@/src/services/location/providerChainSampler';
import { ReplayPositionProvider, parseTrack } from '@/src/services/location/replayPositionProvider';
import { createLogger, describeError } from '@/src/services/logger';
import type { NetworkClass } from '@/src/services/power/batteryAdaptationPolicy';
import { describeLastSeen } from '@/src/services/presence/peerPresence';
import { createLocationSharingRuntime } from '@/src/services/runtime/createLocationSharingRuntime';
import { SocketLocationStore } from '@/src/services/store/socketLocationStore';
import { createSocketTransport } from '@/src/services/store/socketTransport';
import { distanceMeters, formatDistance } from '@/src/utils/geo';

const DEFAULT_TRACK_PATH = fileURLToPath(new URL('../../fixtures/tracks/riverside-walk.json', import.meta.url));

const log = createLogger('simulator');

function parseNetwork(value: string | undefined): NetworkClass {
  if (value === undefined || value === 'wifi' || value === 'cellular' || value === 'none') {
    return value ?? 'wifi';
  }
  throw new Error(`Invalid --network: ${value}. Expected wifi, cellular, or none.`);
}

function parseBattery(value: string | undefined): number {
  if (value === undefined) {
    return 80;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(`Invalid --battery: ${value}. Expected 0-100.`);
  }
  return parsed;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      user: { type: 'string' },
      track: { type: 'string' },
      battery: { type: 'string' },
      network: { type: 'string' },
      manufacturer: { type: 'string' },
      loop: { type: 'boolean', default: false },
    },
  });

  const userId = values.user?.trim();
  if (!userId) {
    throw new Error('--user is required.');
  }

  const config = loadTrackingConfig();
  const points = parseTrack(JSON.parse(await readFile(values.track ?? DEFAULT_TRACK_PATH, 'utf8')));
  const durationMs = points[points.length - 1]?.offsetMs ?? 0;

  const replay = new ReplayPositionProvider({ points, loop: values.loop });
  const sampler = new ProviderChainSampler({ id: 'replay', providers: [replay] });
  const store = new SocketLocationStore({ transport: createSocketTransport(config.presenceStoreUrl) });

  const { runtime, presence } = createLocationSharingRuntime({
    userId,
    config,
    store,
    samplers: { foreground: sampler, background: sampler, fallback: sampler },
    manufacturer: values.manufacturer,
    initialPowerState: {
      batteryLevel: parseBattery(values.battery),
      isCharging: false,
      isPowerSaveMode: false,
      networkClass: parseNetwork(values.network),
    },
    connectivity: store,
  });

  presence.subscribeAll(({ changed }) => {
    for (const view of changed) {
      log.info('peer updated', {
        userId: view.userId,
        online: view.isOnline,
        status: describeLastSeen(view, Date.now()),
      });
    }
  });

  const result = await runtime.enableSharing();
  if (!result.ok) {
    log.warn('tracking did not start', { code: result.error.code, message: result.error.message });
  } else {
    log.info('sharing location', { userId, strategyId: result.strategyId, tier: runtime.getPolicy().tier });
  }

  const shutdown = async (signal: string) => {
    log.info(`received ${signal}, disabling sharing`);
    try {
      await runtime.disableSharing();
      runtime.dispose();
    } catch (error) {
      log.error('clean shutdown failed', { reason: describeError(error) });
    } finally {
      store.close();
      process.exit(0);
    }
  };

  process.on('SIGINT', (signal) => {
    void shutdown(signal);
  });
  process.on('SIGTERM', (signal) => {
    void shutdown(signal);
  });

  if (!values.loop) {
    setTimeout(() => {
      const last = points[points.length - 1];
      const first = points[0];
      if (first && last) {
        log.info('track finished', {
          displacement: formatDistance(distanceMeters(first, last)),
        });
      }
      void shutdown('end of track');
    }, durationMs + config.heartbeatIntervalMs);
  }
}

main().catch((error: unknown) => {
  console.error(`[startup] Simulator failed: ${describeError(error)}`);
  process.exit(1);
});
