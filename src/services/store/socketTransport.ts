import { io } from 'socket.io-client';

import { createLogger } from '../logger';

export type PresenceRequestEvent = 'presence:put' | 'presence:remove' | 'presence:watch' | 'presence:unwatch';

/**
 * The slice of a Socket.IO client the store needs. Kept narrow so the store
 * can be driven by an in-process fake.
 */
export interface PresenceTransport {
  isConnected(): boolean;
  request(event: PresenceRequestEvent, payload: unknown, timeoutMs: number): Promise<unknown>;
  onConnect(listener: () => void): () => void;
  onDisconnect(listener: (reason: string) => void): () => void;
  onChanged(listener: (payload: unknown) => void): () => void;
  close(): void;
}

const log = createLogger('socket');

export function createSocketTransport(url: string): PresenceTransport {
  const socket = io(url, {
    autoConnect: true,
    reconnection: true,
    reconnectionAttempts: Infinity,
    reconnectionDelay: 500,
    timeout: 8000,
  });

  socket.on('connect', () => {
    log.debug('connected', { url });
  });
  socket.on('disconnect', (reason) => {
    log.debug('disconnected', { url, reason });
  });

  return {
    isConnected: () => socket.connected,
    request: (event, payload, timeoutMs) => socket.timeout(timeoutMs).emitWithAck(event, payload),
    onConnect(listener) {
      socket.on('connect', listener);
      return () => {
        socket.off('connect', listener);
      };
    },
    onDisconnect(listener) {
      const handler = (reason: string) => {
        listener(reason);
      };
      socket.on('disconnect', handler);
      return () => {
        socket.off('disconnect', handler);
      };
    },
    onChanged(listener) {
      const handler = (payload: unknown) => {
        listener(payload);
      };
      socket.on('presence:changed', handler);
      return () => {
        socket.off('presence:changed', handler);
      };
    },
    close() {
      socket.disconnect();
    },
  };
}
