export const PRESENCE_KEY_PREFIX = 'presence/';

const USER_ID_PATTERN = /^[A-Za-z0-9._:@-]{1,128}$/;

export type WatchTarget = { kind: 'exact'; key: string } | { kind: 'prefix'; prefix: string };

export function isValidUserId(value: unknown): value is string {
  return typeof value === 'string' && USER_ID_PATTERN.test(value);
}

export function presenceKeyFor(userId: string): string {
  return `${PRESENCE_KEY_PREFIX}${userId}`;
}

export function userIdFromKey(key: string): string | null {
  if (!key.startsWith(PRESENCE_KEY_PREFIX)) {
    return null;
  }
  const userId = key.slice(PRESENCE_KEY_PREFIX.length);
  return isValidUserId(userId) ? userId : null;
}

/** Accepts an exact presence key or `presence/*`. */
export function parseWatchPattern(pattern: unknown): WatchTarget | null {
  if (typeof pattern !== 'string') {
    return null;
  }
  if (pattern === `${PRESENCE_KEY_PREFIX}*`) {
    return { kind: 'prefix', prefix: PRESENCE_KEY_PREFIX };
  }
  return userIdFromKey(pattern) ? { kind: 'exact', key: pattern } : null;
}

export function watchRoom(target: WatchTarget): string {
  return target.kind === 'exact' ? `watch:${target.key}` : `watch:${target.prefix}*`;
}

/** Every room a change to `key` must reach. */
export function roomsForKey(key: string): string[] {
  const rooms = [watchRoom({ kind: 'exact', key })];
  if (key.startsWith(PRESENCE_KEY_PREFIX)) {
    rooms.push(watchRoom({ kind: 'prefix', prefix: PRESENCE_KEY_PREFIX }));
  }
  return rooms;
}
