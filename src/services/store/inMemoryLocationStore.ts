import { createLogger, describeError } from '../logger';

import {
  type PutOptions,
  type PutResult,
  type SharedLocationStore,
  type StoreChange,
  type StoreChangeListener,
  type StoreValue,
  matchesKeyPattern,
} from './sharedLocationStore';

type Entry = {
  value: StoreValue;
  revision: number;
};

type Watcher = {
  pattern: string;
  listener: StoreChangeListener;
};

const log = createLogger('store');

/**
 * Process-local store with the same last-writer-wins contract as the backend.
 * Listeners are notified on a microtask so writers never run subscriber code
 * synchronously.
 */
export class InMemoryLocationStore implements SharedLocationStore {
  private entries = new Map<string, Entry>();
  private watchers = new Set<Watcher>();

  async put(key: string, value: StoreValue, { revision }: PutOptions): Promise<PutResult> {
    const existing = this.entries.get(key);
    if (existing && existing.revision >= revision) {
      return { applied: false };
    }

    const frozen = Object.freeze({ ...value });
    this.entries.set(key, { value: frozen, revision });
    this.notify({ key, value: frozen });
    return { applied: true };
  }

  async remove(key: string): Promise<void> {
    if (!this.entries.delete(key)) {
      return;
    }
    this.notify({ key, value: null });
  }

  onValueChanged(keyPattern: string, listener: StoreChangeListener): () => void {
    const watcher: Watcher = { pattern: keyPattern, listener };
    this.watchers.add(watcher);

    const snapshot = [...this.entries.entries()].filter(([key]) => matchesKeyPattern(keyPattern, key));
    queueMicrotask(() => {
      for (const [key, entry] of snapshot) {
        if (this.watchers.has(watcher)) {
          this.deliver(watcher, { key, value: entry.value });
        }
      }
    });

    return () => {
      this.watchers.delete(watcher);
    };
  }

  get(key: string): StoreValue | null {
    return this.entries.get(key)?.value ?? null;
  }

  getRevision(key: string): number | null {
    return this.entries.get(key)?.revision ?? null;
  }

  private notify(change: StoreChange): void {
    const targets = [...this.watchers].filter((watcher) => matchesKeyPattern(watcher.pattern, change.key));
    if (targets.length === 0) {
      return;
    }

    queueMicrotask(() => {
      for (const watcher of targets) {
        if (this.watchers.has(watcher)) {
          this.deliver(watcher, change);
        }
      }
    });
  }

  private deliver(watcher: Watcher, change: StoreChange): void {
    try {
      watcher.listener(change);
    } catch (error) {
      log.error('watcher threw', { key: change.key, reason: describeError(error) });
    }
  }
}
