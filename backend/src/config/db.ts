import mongoose from 'mongoose';

import type { DatabaseHealth, DbReadyStateName } from '../types/health';

const READY_STATE_NAME: Record<number, DbReadyStateName> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

function mapReadyState(code: number): DbReadyStateName {
  return READY_STATE_NAME[code] ?? 'uninitialized';
}

// Indexes are synced explicitly at startup so a failed unique index stops the boot.
export async function connectToDatabase(uri: string): Promise<void> {
  mongoose.set('strictQuery', true);
  await mongoose.connect(uri, {
    appName: 'presence-store',
    autoIndex: false,
    serverSelectionTimeoutMS: 5000,
  });
}

export async function disconnectFromDatabase(): Promise<void> {
  await mongoose.disconnect();
}

export function readDbHealth(): DatabaseHealth {
  const readyStateCode = mongoose.connection.readyState;
  const readyState = mapReadyState(readyStateCode);

  return {
    connected: readyStateCode === 1,
    readyStateCode,
    readyState,
    dbName: mongoose.connection.name || undefined,
    host: mongoose.connection.host || undefined,
  };
}
