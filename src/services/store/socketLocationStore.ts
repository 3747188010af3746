import { createLogger, describeError } from '../logger';
import { PublishFailureError } from '../tracking/trackingErrors';

import {
  type PutOptions,
  type PutResult,
  type SharedLocationStore,
  type StoreChange,
  type StoreChangeListener,
  type StoreValue,
  matchesKeyPattern,
} from './sharedLocationStore';
import type { PresenceRequestEvent, PresenceTransport } from './socketTransport';

type AckResult =
  | { ok: true; body: Record<string, unknown> }
  | { ok: false; code: string; message: string };

type Watcher = {
  pattern: string;
  listener: StoreChangeListener;
};

export type SocketLocationStoreOptions = {
  transport: PresenceTransport;
  requestTimeoutMs?: number;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 8000;

const log = createLogger('store');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseAck(response: unknown): AckResult {
  if (!isRecord(response)) {
    return { ok: false, code: 'INVALID_ACK', message: 'Acknowledgement is not an object.' };
  }

  if (response.ok === true) {
    return { ok: true, body: response };
  }

  const error = isRecord(response.error) ? response.error : {};
  return {
    ok: false,
    code: typeof error.code === 'string' ? error.code : 'UNKNOWN',
    message: typeof error.message === 'string' ? error.message : 'Request rejected.',
  };
}

function parseChange(payload: unknown): StoreChange | null {
  if (!isRecord(payload) || typeof payload.key !== 'string') {
    return null;
  }
  return { key: payload.key, value: payload.value ?? null };
}

/**
 * Client for the presence store backend. Watches are re-sent after every
 * reconnect so the server can deliver a fresh snapshot of what was missed.
 */
export class SocketLocationStore implements SharedLocationStore {
  private readonly transport: PresenceTransport;
  private readonly requestTimeoutMs: number;
  private watchers = new Set<Watcher>();
  private patternCounts = new Map<string, number>();
  private connectionListeners = new Set<(connected: boolean) => void>();
  private detachTransport: Array<() => void> = [];

  constructor(options: SocketLocationStoreOptions) {
    this.transport = options.transport;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    this.detachTransport = [
      this.transport.onConnect(() => {
        this.notifyConnection(true);
        for (const pattern of this.patternCounts.keys()) {
          void this.sendWatch(pattern);
        }
      }),
      this.transport.onDisconnect((reason) => {
        log.warn('store connection lost', { reason });
        this.notifyConnection(false);
      }),
      this.transport.onChanged((payload) => {
        const change = parseChange(payload);
        if (!change) {
          log.warn('discarding malformed change push');
          return;
        }
        this.dispatch(change, null);
      }),
    ];
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  onConnectionChange(listener: (connected: boolean) => void): () => void {
    this.connectionListeners.add(listener);
    return () => {
      this.connectionListeners.delete(listener);
    };
  }

  async put(key: string, value: StoreValue, { revision }: PutOptions): Promise<PutResult> {
    const ack = await this.request('presence:put', { key, value, revision });
    if (ack.ok) {
      return { applied: ack.body.applied === true };
    }
    if (ack.code === 'STALE_WRITE') {
      return { applied: false };
    }
    throw new PublishFailureError(`Store rejected write for ${key}: ${ack.code} ${ack.message}`);
  }

  async remove(key: string): Promise<void> {
    const ack = await this.request('presence:remove', { key });
    if (!ack.ok && ack.code !== 'NOT_FOUND') {
      throw new PublishFailureError(`Store rejected removal of ${key}: ${ack.code} ${ack.message}`);
    }
  }

  onValueChanged(keyPattern: string, listener: StoreChangeListener): () => void {
    const watcher: Watcher = { pattern: keyPattern, listener };
    this.watchers.add(watcher);

    const count = this.patternCounts.get(keyPattern) ?? 0;
    this.patternCounts.set(keyPattern, count + 1);
    if (count === 0) {
      if (this.transport.isConnected()) {
        void this.sendWatch(keyPattern);
      }
    } else {
      void this.sendWatch(keyPattern, watcher);
    }

    return () => {
      if (!this.watchers.delete(watcher)) {
        return;
      }

      const remaining = (this.patternCounts.get(keyPattern) ?? 1) - 1;
      if (remaining > 0) {
        this.patternCounts.set(keyPattern, remaining);
        return;
      }

      this.patternCounts.delete(keyPattern);
      if (this.transport.isConnected()) {
        void this.request('presence:unwatch', { pattern: keyPattern }).catch((error: unknown) => {
          log.debug('unwatch failed', { pattern: keyPattern, reason: describeError(error) });
        });
      }
    };
  }

  close(): void {
    for (const detach of this.detachTransport) {
      detach();
    }
    this.detachTransport = [];
    this.watchers.clear();
    this.patternCounts.clear();
    this.transport.close();
  }

  private async request(event: PresenceRequestEvent, payload: unknown): Promise<AckResult> {
    if (!this.transport.isConnected()) {
      throw new PublishFailureError(`Store is not connected (${event}).`);
    }

    try {
      return parseAck(await this.transport.request(event, payload, this.requestTimeoutMs));
    } catch (error) {
      throw new PublishFailureError(`Store request ${event} failed.`, { cause: error });
    }
  }

  /** Subscribes on the server; the snapshot goes to `only` when given, else to every watcher of the pattern. */
  private async sendWatch(pattern: string, only: Watcher | null = null): Promise<void> {
    if (!this.transport.isConnected()) {
      return;
    }

    let ack: AckResult;
    try {
      ack = await this.request('presence:watch', { pattern });
    } catch (error) {
      log.warn('watch request failed', { pattern, reason: describeError(error) });
      return;
    }

    if (!ack.ok) {
      log.warn('watch rejected', { pattern, code: ack.code, message: ack.message });
      return;
    }

    const entries = Array.isArray(ack.body.entries) ? ack.body.entries : [];
    for (const entry of entries) {
      const change = parseChange(entry);
      if (change && matchesKeyPattern(pattern, change.key)) {
        this.dispatch(change, only ?? pattern);
      }
    }
  }

  private dispatch(change: StoreChange, target: Watcher | string | null): void {
    for (const watcher of [...this.watchers]) {
      if (typeof target === 'string' ? watcher.pattern !== target : target !== null && watcher !== target) {
        continue;
      }
      if (!matchesKeyPattern(watcher.pattern, change.key)) {
        continue;
      }

      try {
        watcher.listener(change);
      } catch (error) {
        log.error('watcher threw', { key: change.key, reason: describeError(error) });
      }
    }
  }

  private notifyConnection(connected: boolean): void {
    for (const listener of this.connectionListeners) {
      listener(connected);
    }
  }
}
