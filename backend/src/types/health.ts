export type DbReadyStateName =
  | 'disconnected'
  | 'connected'
  | 'connecting'
  | 'disconnecting'
  | 'uninitialized';

export interface DatabaseHealth {
  connected: boolean;
  readyStateCode: number;
  readyState: DbReadyStateName;
  dbName?: string;
  host?: string;
}

/** Socket.IO side of the store: live clients and the watch rooms they hold. */
export interface RealtimeHealth {
  connectedClients: number;
  watchRooms: number;
}

export interface HealthResponse {
  status: 'ok' | 'degraded';
  service: 'presence-store-backend';
  timestamp: string;
  uptimeSec: number;
  database: DatabaseHealth;
  realtime: RealtimeHealth;
}
