import { createLogger, describeError } from '../logger';
import type { LocationSample } from '../location/locationSample';
import {
  PRESENCE_KEY_PREFIX,
  type SharedLocationStore,
  type StoreChange,
  presenceKey,
  userIdFromPresenceKey,
} from '../store/sharedLocationStore';
import { PublishFailureError } from '../tracking/trackingErrors';
import { type Clock, type ServiceHealth, systemClock } from '../types';

import { type PeerPresenceView, derivePeerView, isSameView } from './peerPresence';
import { type PublishedPresence, decodePresence, encodePresence } from './presenceRecord';

export type PublishOutcome =
  | 'written'
  | 'deferred'
  | 'superseded'
  | 'rejected_stale'
  | 'dropped'
  | 'skipped'
  | 'inactive';

export type PeerPresenceUpdate = {
  changed: readonly PeerPresenceView[];
  peers: readonly PeerPresenceView[];
};

/** Social-graph collaborator: which users this device may see. */
export interface PeerDirectory {
  listPeerIds(): Promise<string[]>;
}

type PresenceEventMap = {
  PEERS_CHANGED: { type: 'PEERS_CHANGED' } & PeerPresenceUpdate;
  PUBLISH_FAILED: { type: 'PUBLISH_FAILED'; error: PublishFailureError; revision: number };
};

type PresenceListener<TEvent extends keyof PresenceEventMap> = (payload: PresenceEventMap[TEvent]) => void;

export type PublishRetryOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
};

export type PresenceSyncOptions = {
  userId: string;
  store: SharedLocationStore;
  clock?: Clock;
  peerDirectory?: PeerDirectory;
  heartbeatIntervalMs?: number;
  stalenessThresholdMs?: number;
  sweepIntervalMs?: number;
  publishRetry?: Partial<PublishRetryOptions>;
};

type PendingWait = {
  timer: ReturnType<typeof setTimeout>;
  resolve: (proceed: boolean) => void;
};

const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const DEFAULT_STALENESS_THRESHOLD_MS = 120_000;
const DEFAULT_SWEEP_INTERVAL_MS = 15_000;
const DEFAULT_PUBLISH_RETRY: PublishRetryOptions = {
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxAttempts: 5,
};

const log = createLogger('presence');

/**
 * Publishes this user's presence and derives every peer's online state.
 * Liveness is judged by the viewer: a periodic sweep re-evaluates staleness
 * because a peer that stops writing produces no event at all.
 */
export class PresenceSyncEngine {
  readonly userId: string;

  private readonly store: SharedLocationStore;
  private readonly clock: Clock;
  private readonly peerDirectory: PeerDirectory | null;
  private readonly heartbeatIntervalMs: number;
  private readonly stalenessThresholdMs: number;
  private readonly sweepIntervalMs: number;
  private readonly retry: PublishRetryOptions;

  private active = false;
  private sharingEnabled = false;
  private trackingDegraded = false;
  private connected = true;
  private lastSample: LocationSample | null = null;
  private lastRevision = 0;
  private writeSeq = 0;
  private pending: boolean = false;
  private lastWritten: PublishedPresence | null = null;
  private peerIds: Set<string> | null = null;
  private peerRecords = new Map<string, PublishedPresence>();
  private peerViews = new Map<string, PeerPresenceView>();
  private unsubscribeStore: (() => void) | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private waits = new Set<PendingWait>();
  private listeners: {
    [K in keyof PresenceEventMap]: Set<PresenceListener<K>>;
  } = {
    PEERS_CHANGED: new Set(),
    PUBLISH_FAILED: new Set(),
  };

  constructor(options: PresenceSyncOptions) {
    const userId = options.userId.trim();
    if (!userId || userId.includes('/')) {
      throw new Error('userId must be a non-empty string without "/".');
    }

    this.userId = userId;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.peerDirectory = options.peerDirectory ?? null;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.stalenessThresholdMs = options.stalenessThresholdMs ?? DEFAULT_STALENESS_THRESHOLD_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.retry = { ...DEFAULT_PUBLISH_RETRY, ...options.publishRetry };

    if (this.stalenessThresholdMs <= this.heartbeatIntervalMs * 2) {
      throw new Error('stalenessThresholdMs must be more than twice heartbeatIntervalMs.');
    }
  }

  async start(): Promise<void> {
    if (this.active) {
      return;
    }

    this.active = true;
    await this.refreshPeers();
    if (!this.active) {
      return;
    }

    this.unsubscribeStore = this.store.onValueChanged(`${PRESENCE_KEY_PREFIX}*`, (change) => {
      this.handleStoreChange(change);
    });
    this.sweepTimer = setInterval(() => {
      this.runStalenessSweep();
    }, this.sweepIntervalMs);
    this.syncHeartbeatTimer();
    log.info('presence sync started', { userId: this.userId });
  }

  stop(): void {
    if (!this.active) {
      return;
    }

    this.active = false;
    this.writeSeq += 1;
    this.pending = false;
    // A later start() must not heartbeat the previous session's fix.
    this.sharingEnabled = false;
    this.trackingDegraded = false;
    this.lastSample = null;
    this.unsubscribeStore?.();
    this.unsubscribeStore = null;

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.syncHeartbeatTimer();

    for (const wait of this.waits) {
      clearTimeout(wait.timer);
      wait.resolve(false);
    }
    this.waits.clear();

    this.peerRecords.clear();
    this.peerViews.clear();
    log.info('presence sync stopped', { userId: this.userId });
  }

  /**
   * Replaces this user's record. With `sharingEnabled=false` the record is
   * written without any location fields in a single put.
   */
  publish(sample: LocationSample | null, sharingEnabled: boolean): Promise<PublishOutcome> {
    if (!this.active) {
      log.debug('publish ignored, presence sync inactive', { userId: this.userId });
      return Promise.resolve('inactive');
    }

    if (sharingEnabled) {
      this.sharingEnabled = true;
      if (sample) {
        this.lastSample = sample;
      }
    } else {
      this.sharingEnabled = false;
      this.lastSample = null;
      this.trackingDegraded = false;
    }

    this.syncHeartbeatTimer();
    return this.write();
  }

  sendHeartbeat(): Promise<PublishOutcome> {
    if (!this.active || !this.sharingEnabled || this.trackingDegraded) {
      return Promise.resolve('skipped');
    }
    return this.write();
  }

  /**
   * While degraded the record is written once with `trackingDegraded` and
   * heartbeats pause, so peers see sharing enabled without a recent fix and
   * then let the entry go stale.
   */
  setTrackingDegraded(degraded: boolean): Promise<PublishOutcome> {
    if (this.trackingDegraded === degraded || !this.active) {
      return Promise.resolve('skipped');
    }

    this.trackingDegraded = degraded;
    this.syncHeartbeatTimer();
    return this.sharingEnabled ? this.write() : Promise.resolve('skipped');
  }

  /** While disconnected only the newest record is kept, then written on reconnect. */
  setConnectivity(connected: boolean): Promise<PublishOutcome> {
    if (this.connected === connected) {
      return Promise.resolve('skipped');
    }

    this.connected = connected;
    log.debug('connectivity changed', { userId: this.userId, connected });
    if (connected && this.pending && this.active) {
      return this.write();
    }
    return Promise.resolve('skipped');
  }

  /** Deletes this user's record from the store (sign-out). */
  async withdraw(): Promise<void> {
    this.writeSeq += 1;
    this.pending = false;
    this.sharingEnabled = false;
    this.lastSample = null;
    this.syncHeartbeatTimer();

    try {
      await this.store.remove(presenceKey(this.userId));
      this.lastWritten = null;
    } catch (error) {
      throw new PublishFailureError('Failed to remove presence record.', { cause: error });
    }
  }

  subscribeAll(listener: (update: PeerPresenceUpdate) => void): () => void {
    return this.on('PEERS_CHANGED', (payload) => {
      listener({ changed: payload.changed, peers: payload.peers });
    });
  }

  getPeerViews(): readonly PeerPresenceView[] {
    return Object.freeze([...this.peerViews.values()]);
  }

  getPeerView(userId: string): PeerPresenceView | null {
    return this.peerViews.get(userId) ?? null;
  }

  getLastWritten(): PublishedPresence | null {
    return this.lastWritten;
  }

  isSharing(): boolean {
    return this.sharingEnabled;
  }

  async refreshPeers(): Promise<void> {
    if (!this.peerDirectory) {
      this.peerIds = null;
      return;
    }

    try {
      const ids = await this.peerDirectory.listPeerIds();
      this.peerIds = new Set(ids.filter((id) => id !== this.userId));
    } catch (error) {
      log.warn('peer directory lookup failed, keeping previous list', { reason: describeError(error) });
      return;
    }

    let dropped = false;
    for (const userId of [...new Set([...this.peerRecords.keys(), ...this.peerViews.keys()])]) {
      if (!this.peerIds.has(userId)) {
        this.peerRecords.delete(userId);
        dropped = this.peerViews.delete(userId) || dropped;
      }
    }

    if (dropped) {
      this.emit('PEERS_CHANGED', { type: 'PEERS_CHANGED', changed: Object.freeze([]), peers: this.getPeerViews() });
    }
  }

  /** Re-derives every peer view against the clock and emits what changed. */
  runStalenessSweep(): void {
    this.refreshViews([...new Set([...this.peerRecords.keys(), ...this.peerViews.keys()])]);
  }

  getHealth(): ServiceHealth {
    if (!this.active) {
      return { name: 'Presence Sync', state: 'idle', detail: 'Presence sync is stopped.' };
    }

    const online = [...this.peerViews.values()].filter((view) => view.isOnline).length;
    return {
      name: 'Presence Sync',
      state: this.connected ? 'active' : 'degraded',
      detail: `${online}/${this.peerViews.size} peers online${this.connected ? '' : ', writes deferred'}.`,
    };
  }

  on<TEvent extends keyof PresenceEventMap>(event: TEvent, listener: PresenceListener<TEvent>): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  private handleStoreChange(change: StoreChange): void {
    const userId = userIdFromPresenceKey(change.key);
    if (!userId || userId === this.userId) {
      return;
    }
    if (this.peerIds && !this.peerIds.has(userId)) {
      return;
    }

    if (change.value === null) {
      this.peerRecords.delete(userId);
      this.refreshViews([userId]);
      return;
    }

    const decoded = decodePresence(userId, change.value);
    if (!decoded.ok) {
      log.warn('discarding malformed presence', { userId, reason: decoded.message });
      return;
    }

    const known = this.peerRecords.get(userId);
    if (known && known.revision >= decoded.presence.revision) {
      log.debug('ignoring out-of-order presence', {
        userId,
        known: known.revision,
        received: decoded.presence.revision,
      });
      return;
    }

    this.peerRecords.set(userId, decoded.presence);
    this.refreshViews([userId]);
  }

  private refreshViews(userIds: string[]): void {
    const now = this.clock.now();
    const changed: PeerPresenceView[] = [];

    for (const userId of userIds) {
      const next = derivePeerView(userId, this.peerRecords.get(userId) ?? null, now, this.stalenessThresholdMs);
      const previous = this.peerViews.get(userId);
      if (previous && isSameView(previous, next)) {
        continue;
      }

      if (previous?.isOnline && !next.isOnline) {
        log.info('peer went offline', { userId, lastSeenAt: next.lastSeenAt });
      }
      this.peerViews.set(userId, next);
      changed.push(next);
    }

    if (changed.length > 0) {
      this.emit('PEERS_CHANGED', {
        type: 'PEERS_CHANGED',
        changed: Object.freeze(changed),
        peers: this.getPeerViews(),
      });
    }
  }

  private buildPresence(): PublishedPresence {
    const now = this.clock.now();
    const revision = Math.max(now, this.lastRevision + 1);
    this.lastRevision = revision;

    return Object.freeze({
      userId: this.userId,
      lastSample: this.sharingEnabled ? this.lastSample : null,
      isSharingEnabled: this.sharingEnabled,
      lastHeartbeatAt: now,
      trackingDegraded: this.sharingEnabled && this.trackingDegraded,
      revision,
    });
  }

  private write(): Promise<PublishOutcome> {
    const writeId = ++this.writeSeq;
    if (!this.connected) {
      this.pending = true;
      log.debug('write deferred until connectivity returns', { userId: this.userId });
      return Promise.resolve('deferred');
    }

    this.pending = false;
    return this.deliver(this.buildPresence(), writeId);
  }

  private async deliver(presence: PublishedPresence, writeId: number): Promise<PublishOutcome> {
    const key = presenceKey(this.userId);
    const value = encodePresence(presence);

    for (let attempt = 0; ; attempt += 1) {
      if (!this.active) {
        return 'inactive';
      }
      if (writeId !== this.writeSeq) {
        return 'superseded';
      }

      try {
        const result = await this.store.put(key, value, { revision: presence.revision });
        if (!result.applied) {
          log.warn('store kept a newer presence record', { userId: this.userId, revision: presence.revision });
          return 'rejected_stale';
        }

        this.lastWritten = presence;
        log.debug('presence written', {
          userId: this.userId,
          revision: presence.revision,
          sharingEnabled: presence.isSharingEnabled,
        });
        return 'written';
      } catch (error) {
        if (attempt + 1 >= this.retry.maxAttempts) {
          const failure = new PublishFailureError(
            `Presence write dropped after ${attempt + 1} attempts.`,
            { cause: error }
          );
          log.warn('presence write dropped', {
            userId: this.userId,
            revision: presence.revision,
            reason: describeError(error),
          });
          this.emit('PUBLISH_FAILED', { type: 'PUBLISH_FAILED', error: failure, revision: presence.revision });
          return 'dropped';
        }

        const delayMs = Math.min(this.retry.baseDelayMs * 2 ** attempt, this.retry.maxDelayMs);
        log.debug('presence write failed, retrying', {
          userId: this.userId,
          attempt: attempt + 1,
          delayMs,
          reason: describeError(error),
        });
        if (!(await this.wait(delayMs))) {
          return 'inactive';
        }
      }
    }
  }

  private wait(delayMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const entry: PendingWait = {
        timer: setTimeout(() => {
          this.waits.delete(entry);
          resolve(true);
        }, delayMs),
        resolve,
      };
      this.waits.add(entry);
    });
  }

  private syncHeartbeatTimer(): void {
    const shouldRun = this.active && this.sharingEnabled && !this.trackingDegraded;
    if (shouldRun && !this.heartbeatTimer) {
      this.heartbeatTimer = setInterval(() => {
        void this.sendHeartbeat();
      }, this.heartbeatIntervalMs);
      return;
    }

    if (!shouldRun && this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private emit<TEvent extends keyof PresenceEventMap>(event: TEvent, payload: PresenceEventMap[TEvent]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (error) {
        log.error('listener failed', { event, reason: describeError(error) });
      }
    }
  }
}
