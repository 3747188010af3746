import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_PRESENCE_STORE_URL = 'http://localhost:4000';

export interface TrackingConfig {
  presenceStoreUrl: string;
  debugLogs: boolean;
  heartbeatIntervalMs: number;
  stalenessThresholdMs: number;
  stalenessSweepIntervalMs: number;
  healthCheckIntervalMs: number;
  strategyStartupTimeoutMs: number;
  proximityThresholdMeters: number;
  proximityCooldownMs: number;
}

type EnvSource = Record<string, string | undefined>;

function parseUrl(name: string, value: string | undefined, fallback: string): string {
  const input = value?.trim();
  if (!input) {
    return fallback;
  }

  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    throw new Error(`Invalid ${name}: ${value}. Expected an http(s) URL.`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Invalid ${name}: ${value}. Expected an http(s) URL.`);
  }
  return input.replace(/\/+$/, '');
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  const input = value?.trim().toLowerCase();
  if (!input) {
    return fallback;
  }
  if (input === 'true' || input === '1' || input === 'yes') {
    return true;
  }
  if (input === 'false' || input === '0' || input === 'no') {
    return false;
  }

  throw new Error(`Invalid ${name}: ${value}. Expected true or false.`);
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  const input = value?.trim();
  if (!input) {
    return fallback;
  }

  const parsed = Number(input);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: ${value}. Expected a positive integer.`);
  }
  return parsed;
}

export function loadTrackingConfig(env: EnvSource = process.env): TrackingConfig {
  const config: TrackingConfig = {
    presenceStoreUrl: parseUrl('PRESENCE_STORE_URL', env.PRESENCE_STORE_URL, DEFAULT_PRESENCE_STORE_URL),
    debugLogs: parseBoolean('LOCATION_DEBUG_LOGS', env.LOCATION_DEBUG_LOGS, false),
    heartbeatIntervalMs: parsePositiveInt('HEARTBEAT_INTERVAL_MS', env.HEARTBEAT_INTERVAL_MS, 30_000),
    stalenessThresholdMs: parsePositiveInt('STALENESS_THRESHOLD_MS', env.STALENESS_THRESHOLD_MS, 120_000),
    stalenessSweepIntervalMs: parsePositiveInt(
      'STALENESS_SWEEP_INTERVAL_MS',
      env.STALENESS_SWEEP_INTERVAL_MS,
      15_000
    ),
    healthCheckIntervalMs: parsePositiveInt('HEALTH_CHECK_INTERVAL_MS', env.HEALTH_CHECK_INTERVAL_MS, 90_000),
    strategyStartupTimeoutMs: parsePositiveInt(
      'STRATEGY_STARTUP_TIMEOUT_MS',
      env.STRATEGY_STARTUP_TIMEOUT_MS,
      15_000
    ),
    proximityThresholdMeters: parsePositiveInt(
      'PROXIMITY_THRESHOLD_METERS',
      env.PROXIMITY_THRESHOLD_METERS,
      500
    ),
    proximityCooldownMs: parsePositiveInt('PROXIMITY_COOLDOWN_MS', env.PROXIMITY_COOLDOWN_MS, 10 * 60_000),
  };

  if (config.stalenessThresholdMs <= config.heartbeatIntervalMs * 2) {
    throw new Error(
      `STALENESS_THRESHOLD_MS (${config.stalenessThresholdMs}) must be more than twice HEARTBEAT_INTERVAL_MS (${config.heartbeatIntervalMs}).`
    );
  }

  return config;
}
