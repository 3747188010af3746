import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { StoreChange } from '../store/sharedLocationStore';
import { SocketLocationStore } from '../store/socketLocationStore';
import type { PresenceRequestEvent, PresenceTransport } from '../store/socketTransport';
import { PublishFailureError } from '../tracking/trackingErrors';

type SentRequest = { event: PresenceRequestEvent; payload: unknown };

/** In-process stand-in for the Socket.IO client. */
class FakeTransport implements PresenceTransport {
  connected = true;
  closed = false;
  sent: SentRequest[] = [];
  respond: (request: SentRequest) => unknown = () => ({ ok: true });

  private connectListeners = new Set<() => void>();
  private disconnectListeners = new Set<(reason: string) => void>();
  private changeListeners = new Set<(payload: unknown) => void>();

  isConnected(): boolean {
    return this.connected;
  }

  async request(event: PresenceRequestEvent, payload: unknown): Promise<unknown> {
    const request = { event, payload };
    this.sent.push(request);
    return this.respond(request);
  }

  onConnect(listener: () => void): () => void {
    this.connectListeners.add(listener);
    return () => {
      this.connectListeners.delete(listener);
    };
  }

  onDisconnect(listener: (reason: string) => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  onChanged(listener: (payload: unknown) => void): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  close(): void {
    this.closed = true;
  }

  connect(): void {
    this.connected = true;
    for (const listener of this.connectListeners) {
      listener();
    }
  }

  disconnect(reason: string): void {
    this.connected = false;
    for (const listener of this.disconnectListeners) {
      listener(reason);
    }
  }

  push(payload: unknown): void {
    for (const listener of this.changeListeners) {
      listener(payload);
    }
  }
}

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

const BOB_VALUE = {
  sharingEnabled: true,
  lastHeartbeatEpochMs: 1_760_000_000_000,
  trackingDegraded: false,
  revision: 1_760_000_000_000,
};

describe('SocketLocationStore', () => {
  let transport: FakeTransport;
  let store: SocketLocationStore;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    transport = new FakeTransport();
    store = new SocketLocationStore({ transport });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends puts with their revision', async () => {
    transport.respond = () => ({ ok: true, applied: true, revision: 7 });

    await expect(store.put('presence/alice', BOB_VALUE, { revision: 7 })).resolves.toEqual({ applied: true });
    expect(transport.sent).toEqual([
      { event: 'presence:put', payload: { key: 'presence/alice', value: BOB_VALUE, revision: 7 } },
    ]);
  });

  it('reports a stale write as not applied', async () => {
    transport.respond = () => ({ ok: false, error: { code: 'STALE_WRITE', message: 'Newer revision stored.' } });

    await expect(store.put('presence/alice', BOB_VALUE, { revision: 7 })).resolves.toEqual({ applied: false });
  });

  it('throws on other rejections and while disconnected', async () => {
    transport.respond = () => ({ ok: false, error: { code: 'VALIDATION_ERROR', message: 'bad value' } });
    await expect(store.put('presence/alice', BOB_VALUE, { revision: 7 })).rejects.toThrow(
      'Store rejected write for presence/alice: VALIDATION_ERROR bad value'
    );

    transport.disconnect('transport close');
    await expect(store.put('presence/alice', BOB_VALUE, { revision: 8 })).rejects.toBeInstanceOf(PublishFailureError);
    expect(transport.sent).toHaveLength(1);
  });

  it('treats removing a missing key as done', async () => {
    transport.respond = () => ({ ok: false, error: { code: 'NOT_FOUND', message: 'missing' } });

    await expect(store.remove('presence/alice')).resolves.toBeUndefined();
  });

  it('delivers the watch snapshot, then pushed changes', async () => {
    transport.respond = ({ event }) =>
      event === 'presence:watch'
        ? {
            ok: true,
            entries: [
              { key: 'presence/bob', value: BOB_VALUE },
              { key: 'rooms/lobby', value: BOB_VALUE },
            ],
          }
        : { ok: true };
    const changes: StoreChange[] = [];

    store.onValueChanged('presence/*', (change) => {
      changes.push(change);
    });
    await settle();
    transport.push({ key: 'presence/bob', value: null });
    transport.push({ nope: true });

    expect(changes).toEqual([
      { key: 'presence/bob', value: BOB_VALUE },
      { key: 'presence/bob', value: null },
    ]);
    expect(console.warn).toHaveBeenCalledWith('[store]', 'discarding malformed change push');
  });

  it('sends a second watcher its own snapshot', async () => {
    transport.respond = ({ event }) =>
      event === 'presence:watch' ? { ok: true, entries: [{ key: 'presence/bob', value: BOB_VALUE }] } : { ok: true };
    const first = vi.fn();
    const second = vi.fn();

    store.onValueChanged('presence/*', first);
    await settle();
    store.onValueChanged('presence/*', second);
    await settle();

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('unwatches once the last listener leaves', async () => {
    const first = store.onValueChanged('presence/*', () => undefined);
    const second = store.onValueChanged('presence/*', () => undefined);
    await settle();

    first();
    second();
    await settle();

    expect(transport.sent.map((request) => request.event)).toEqual([
      'presence:watch',
      'presence:watch',
      'presence:unwatch',
    ]);
  });

  it('re-sends watches after a reconnect', async () => {
    const connection = vi.fn();
    store.onConnectionChange(connection);
    store.onValueChanged('presence/*', () => undefined);
    await settle();

    transport.disconnect('ping timeout');
    transport.connect();
    await settle();

    expect(connection.mock.calls).toEqual([[false], [true]]);
    expect(transport.sent.filter((request) => request.event === 'presence:watch')).toHaveLength(2);
  });

  it('waits for a connection before watching', async () => {
    transport.connected = false;
    store.onValueChanged('presence/*', () => undefined);
    await settle();
    expect(transport.sent).toEqual([]);

    transport.connect();
    await settle();
    expect(transport.sent).toEqual([{ event: 'presence:watch', payload: { pattern: 'presence/*' } }]);
  });

  it('closes the transport', () => {
    store.close();
    expect(transport.closed).toBe(true);
  });
});
