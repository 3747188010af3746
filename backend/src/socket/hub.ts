import type { Server as HttpServer } from 'node:http';

import { Server, type Socket } from 'socket.io';

import { parseWatchPattern, roomsForKey, userIdFromKey, watchRoom } from '../services/presenceKeys';
import { isPlainObject, validatePutPayload } from '../services/presenceValidation';
import type { RealtimeHealth } from '../types/health';
import type { PresenceChange, PresenceErrorCode, PresenceRepository } from '../types/presence';

type Ack = (response: unknown) => void;

export interface SocketHubDeps {
  repository: PresenceRepository;
  nowMs: () => number;
  maxClockSkewMs?: number;
}

function ackError(ack: Ack, code: PresenceErrorCode, message: string): void {
  ack({ ok: false, error: { code, message } });
}

function resolveAck(candidate: unknown): Ack | null {
  return typeof candidate === 'function' ? (response: unknown) => candidate(response) : null;
}

export class SocketHub {
  private io: Server | null = null;

  init(server: HttpServer, corsOrigins: string[], deps: SocketHubDeps): void {
    this.io = new Server(server, {
      cors: {
        origin(origin, callback) {
          if (!origin || corsOrigins.includes(origin)) {
            callback(null, true);
            return;
          }
          callback(new Error(`Origin not allowed by Socket.IO CORS: ${origin}`));
        },
      },
    });

    this.io.on('connection', (socket: Socket) => {
      socket.on('presence:put', (payload: unknown, callback: unknown) => {
        const ack = resolveAck(callback);
        if (ack) {
          void this.handlePut(payload, ack, deps);
        }
      });

      socket.on('presence:remove', (payload: unknown, callback: unknown) => {
        const ack = resolveAck(callback);
        if (ack) {
          void this.handleRemove(payload, ack, deps);
        }
      });

      socket.on('presence:watch', (payload: unknown, callback: unknown) => {
        const ack = resolveAck(callback);
        if (ack) {
          void this.handleWatch(socket, payload, ack, deps);
        }
      });

      socket.on('presence:unwatch', (payload: unknown, callback: unknown) => {
        const target = parseWatchPattern(isPlainObject(payload) ? payload.pattern : null);
        if (target) {
          void socket.leave(watchRoom(target));
        }
        resolveAck(callback)?.({ ok: target !== null });
      });
    });
  }

  emitPresenceChanged(change: PresenceChange): void {
    if (!this.io) {
      return;
    }

    const rooms = roomsForKey(change.key);
    console.log('[socket] emit presence:changed', {
      key: change.key,
      removed: change.value === null,
      revision: change.value?.revision ?? null,
    });
    this.io.to(rooms).emit('presence:changed', { key: change.key, value: change.value });
  }

  getStats(): RealtimeHealth {
    if (!this.io) {
      return { connectedClients: 0, watchRooms: 0 };
    }

    let watchRooms = 0;
    for (const room of this.io.of('/').adapter.rooms.keys()) {
      if (room.startsWith('watch:')) {
        watchRooms += 1;
      }
    }
    return { connectedClients: this.io.engine.clientsCount, watchRooms };
  }

  close(): void {
    void this.io?.close();
    this.io = null;
  }

  private async handlePut(payload: unknown, ack: Ack, deps: SocketHubDeps): Promise<void> {
    if (!isPlainObject(payload) || typeof payload.key !== 'string' || !userIdFromKey(payload.key)) {
      ackError(ack, 'VALIDATION_ERROR', 'key must be presence/{userId}.');
      return;
    }

    const key = payload.key;
    const validation = validatePutPayload(payload, deps.nowMs(), deps.maxClockSkewMs);
    if (!validation.ok) {
      ackError(ack, 'VALIDATION_ERROR', validation.details.map((issue) => `${issue.field}: ${issue.message}`).join('; '));
      return;
    }

    try {
      const outcome = await deps.repository.putEntry({ key, value: validation.value, revision: validation.revision });
      if (outcome.kind === 'stale') {
        ack({ ok: true, applied: false });
        return;
      }

      ack({ ok: true, applied: true, revision: outcome.record.revision });
      this.emitPresenceChanged({ key, value: outcome.record.value });
    } catch (error) {
      console.error('[socket] presence:put failed', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
      ackError(ack, 'INTERNAL_ERROR', 'Failed to persist presence');
    }
  }

  private async handleRemove(payload: unknown, ack: Ack, deps: SocketHubDeps): Promise<void> {
    if (!isPlainObject(payload) || typeof payload.key !== 'string' || !userIdFromKey(payload.key)) {
      ackError(ack, 'VALIDATION_ERROR', 'key must be presence/{userId}.');
      return;
    }

    const key = payload.key;
    try {
      const { removed } = await deps.repository.removeEntry(key);
      if (!removed) {
        ackError(ack, 'NOT_FOUND', `No presence stored at ${key}.`);
        return;
      }

      ack({ ok: true });
      this.emitPresenceChanged({ key, value: null });
    } catch (error) {
      console.error('[socket] presence:remove failed', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
      ackError(ack, 'INTERNAL_ERROR', 'Failed to remove presence');
    }
  }

  /** Joins the watch room first so no change falls between snapshot and push. */
  private async handleWatch(socket: Socket, payload: unknown, ack: Ack, deps: SocketHubDeps): Promise<void> {
    const target = parseWatchPattern(isPlainObject(payload) ? payload.pattern : null);
    if (!target) {
      ackError(ack, 'VALIDATION_ERROR', 'pattern must be presence/* or presence/{userId}.');
      return;
    }

    await socket.join(watchRoom(target));

    try {
      const records =
        target.kind === 'prefix'
          ? await deps.repository.listEntries(target.prefix)
          : await deps.repository.getEntry(target.key).then((record) => (record ? [record] : []));

      ack({ ok: true, entries: records.map((record) => ({ key: record.key, value: record.value })) });
    } catch (error) {
      console.error('[socket] presence:watch snapshot failed', {
        pattern: watchRoom(target),
        reason: error instanceof Error ? error.message : String(error),
      });
      ackError(ack, 'INTERNAL_ERROR', 'Failed to load presence snapshot');
    }
  }
}
