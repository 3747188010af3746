import { type RequestHandler, Router } from 'express';

import type { DatabaseHealth, HealthResponse, RealtimeHealth } from '../types/health';

export interface HealthRouteDeps {
  getDbHealth: () => DatabaseHealth;
  getRealtimeHealth: () => RealtimeHealth;
  now: () => Date;
  uptimeSec: () => number;
}

const SERVICE_NAME: HealthResponse['service'] = 'presence-store-backend';

/** Status follows the database alone; socket counts are informational. */
export function buildHealthResponse({ getDbHealth, getRealtimeHealth, now, uptimeSec }: HealthRouteDeps): {
  statusCode: number;
  body: HealthResponse;
} {
  const database = getDbHealth();
  return {
    statusCode: database.connected ? 200 : 503,
    body: {
      status: database.connected ? 'ok' : 'degraded',
      service: SERVICE_NAME,
      timestamp: now().toISOString(),
      uptimeSec: uptimeSec(),
      database,
      realtime: getRealtimeHealth(),
    },
  };
}

export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();

  const handler: RequestHandler = (_req, res) => {
    const response = buildHealthResponse(deps);
    res.status(response.statusCode).json(response.body);
  };

  router.get('/health', handler);
  router.get('/api/v1/health', handler);

  return router;
}
