export type StoreScalar = string | number | boolean | null;

export type StoreValue = Readonly<Record<string, StoreScalar>>;

export type StoreChange = {
  key: string;
  /** `null` when the key was removed. Unvalidated: readers decode it. */
  value: unknown;
};

export type PutOptions = {
  /** Writes whose revision is not newer than the stored one are rejected. */
  revision: number;
};

export type PutResult = {
  applied: boolean;
};

export type StoreChangeListener = (change: StoreChange) => void;

/**
 * Real-time key-value store addressed by path (`presence/{userId}`).
 * `onValueChanged` takes a pattern where `*` matches one path segment and
 * delivers the current matching values before live changes.
 */
export interface SharedLocationStore {
  put(key: string, value: StoreValue, options: PutOptions): Promise<PutResult>;
  remove(key: string): Promise<void>;
  onValueChanged(keyPattern: string, listener: StoreChangeListener): () => void;
}

export const PRESENCE_KEY_PREFIX = 'presence/';

export function presenceKey(userId: string): string {
  return `${PRESENCE_KEY_PREFIX}${userId}`;
}

export function userIdFromPresenceKey(key: string): string | null {
  if (!key.startsWith(PRESENCE_KEY_PREFIX)) {
    return null;
  }

  const userId = key.slice(PRESENCE_KEY_PREFIX.length);
  return userId && !userId.includes('/') ? userId : null;
}

export function matchesKeyPattern(pattern: string, key: string): boolean {
  const patternSegments = pattern.split('/');
  const keySegments = key.split('/');
  if (patternSegments.length !== keySegments.length) {
    return false;
  }

  return patternSegments.every((segment, index) =>
    segment === '*' ? keySegments[index] !== '' : segment === keySegments[index]
  );
}
