import { randomUUID } from 'node:crypto';

import cors from 'cors';
import express from 'express';

import { createHealthRouter } from './routes/health';
import { createPresenceRouter } from './routes/presence';
import type { DatabaseHealth, RealtimeHealth } from './types/health';
import type { PresenceChange, PresenceRepository } from './types/presence';

interface CreateAppDeps {
  getDbHealth: () => DatabaseHealth;
  getRealtimeHealth: () => RealtimeHealth;
  presenceRepository: PresenceRepository;
  presenceMaxClockSkewMs?: number;
  onPresenceChanged?: (change: PresenceChange) => Promise<void> | void;
  now: () => Date;
  uptimeSec: () => number;
  corsOrigins: string[];
}

export function createApp({
  getDbHealth,
  getRealtimeHealth,
  presenceRepository,
  presenceMaxClockSkewMs,
  onPresenceChanged,
  now,
  uptimeSec,
  corsOrigins,
}: CreateAppDeps) {
  const app = express();

  const allowedOrigins = new Set(corsOrigins);

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }

        callback(new Error(`Origin not allowed by CORS: ${origin}`));
      },
    })
  );

  app.use((_request, response, next) => {
    const requestId = randomUUID();
    response.locals.requestId = requestId;
    response.setHeader('X-Request-Id', requestId);
    next();
  });

  app.use(express.json());
  app.use(createHealthRouter({ getDbHealth, getRealtimeHealth, now, uptimeSec }));
  app.use(
    createPresenceRouter({
      repository: presenceRepository,
      nowMs: () => now().getTime(),
      maxClockSkewMs: presenceMaxClockSkewMs,
      onPresenceChanged,
    })
  );

  return app;
}
