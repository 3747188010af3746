import { describe, expect, it, vi } from 'vitest';

import {
  createPresenceRouter,
  processDeletePresenceRequest,
  processGetPresenceRequest,
  processListPresenceRequest,
  processPutPresenceRequest,
} from '../routes/presence';
import { parseWatchPattern, roomsForKey } from '../services/presenceKeys';
import { validatePresenceValue } from '../services/presenceValidation';
import type {
  PresenceEntryRecord,
  PresenceRepository,
  PresenceValue,
  PutPresenceInput,
  PutPresenceOutcome,
} from '../types/presence';

const FIXED_NOW_MS = 1_760_000_000_000;

function buildValue(overrides?: Partial<PresenceValue>): PresenceValue {
  return {
    lat: 48.8566,
    lng: 2.3522,
    accuracy: 12,
    capturedAtEpochMs: FIXED_NOW_MS - 2000,
    provider: 'gps',
    sharingEnabled: true,
    lastHeartbeatEpochMs: FIXED_NOW_MS - 1000,
    trackingDegraded: false,
    revision: FIXED_NOW_MS - 1000,
    ...overrides,
  };
}

function buildRecord(key: string, value: PresenceValue): PresenceEntryRecord {
  return {
    key,
    value,
    revision: value.revision,
    updatedAt: FIXED_NOW_MS,
    createdAt: FIXED_NOW_MS - 60_000,
  };
}

function buildRepository(overrides?: Partial<PresenceRepository>): PresenceRepository {
  return {
    getEntry: vi.fn(async () => null),
    listEntries: vi.fn(async () => []),
    putEntry: vi.fn(async (input: PutPresenceInput): Promise<PutPresenceOutcome> => ({
      kind: 'applied',
      record: buildRecord(input.key, input.value),
    })),
    removeEntry: vi.fn(async () => ({ removed: true })),
    ...overrides,
  };
}

describe('presence value validation', () => {
  it('accepts a sharing-disabled value without location fields', () => {
    const result = validatePresenceValue(
      {
        sharingEnabled: false,
        lastHeartbeatEpochMs: FIXED_NOW_MS,
        trackingDegraded: false,
        revision: FIXED_NOW_MS,
      },
      FIXED_NOW_MS
    );

    expect(result).toEqual({
      ok: true,
      value: {
        sharingEnabled: false,
        lastHeartbeatEpochMs: FIXED_NOW_MS,
        trackingDegraded: false,
        revision: FIXED_NOW_MS,
      },
    });
  });

  it('rejects location fields on a sharing-disabled value', () => {
    const result = validatePresenceValue(buildValue({ sharingEnabled: false }), FIXED_NOW_MS);

    expect(result.ok).toBe(false);
    if (result.ok) {
      throw new Error('Expected validation failure');
    }
    expect(result.details).toContainEqual({
      field: 'value',
      message: 'Location fields must be absent while sharing is disabled.',
    });
  });

  it('rejects a partial location', () => {
    const { lng: _lng, ...partial } = buildValue();
    const result = validatePresenceValue(partial, FIXED_NOW_MS);

    expect(result.ok).toBe(false);
    if (result.ok) {
      throw new Error('Expected validation failure');
    }
    expect(result.details).toEqual([
      { field: 'value', message: 'Location fields must be all present or all absent.' },
    ]);
  });

  it('rejects unknown fields and out-of-range coordinates', () => {
    const result = validatePresenceValue({ ...buildValue({ lat: 91 }), speed: 3 }, FIXED_NOW_MS);

    expect(result.ok).toBe(false);
    if (result.ok) {
      throw new Error('Expected validation failure');
    }
    expect(result.details.map((issue) => issue.field)).toEqual(['speed', 'lat']);
  });

  it('rejects heartbeats more than five minutes in the future', () => {
    const result = validatePresenceValue(
      buildValue({ lastHeartbeatEpochMs: FIXED_NOW_MS + 5 * 60 * 1000 + 1 }),
      FIXED_NOW_MS
    );

    expect(result.ok).toBe(false);
  });

  it('applies a configured clock skew', () => {
    const at = (offsetMs: number) =>
      validatePresenceValue(buildValue({ lastHeartbeatEpochMs: FIXED_NOW_MS + offsetMs }), FIXED_NOW_MS, 60_000);
    const atLimit = at(60_000);
    const beyond = at(60_001);

    expect(atLimit.ok).toBe(true);
    expect(beyond).toEqual({
      ok: false,
      details: [
        {
          field: 'lastHeartbeatEpochMs',
          message: 'lastHeartbeatEpochMs cannot be more than 60000ms in the future.',
        },
      ],
    });
  });
});

describe('presence contract', () => {
  it('200 when a newer revision is written and notifies watchers', async () => {
    const repository = buildRepository();
    const onPresenceChanged = vi.fn();
    const value = buildValue();

    const result = await processPutPresenceRequest({
      userId: 'user-a',
      payload: { value, revision: value.revision },
      requestId: 'req-put',
      nowMs: () => FIXED_NOW_MS,
      repository,
      onPresenceChanged,
    });

    expect(result.statusCode).toBe(200);
    expect(repository.putEntry).toHaveBeenCalledWith({
      key: 'presence/user-a',
      value,
      revision: value.revision,
    });
    expect(onPresenceChanged).toHaveBeenCalledWith({ key: 'presence/user-a', value });
  });

  it('409 STALE_WRITE when the store holds a newer revision', async () => {
    const repository = buildRepository({
      putEntry: vi.fn(async (): Promise<PutPresenceOutcome> => ({ kind: 'stale' })),
    });
    const onPresenceChanged = vi.fn();
    const value = buildValue();

    const result = await processPutPresenceRequest({
      userId: 'user-a',
      payload: { value, revision: value.revision },
      requestId: 'req-stale',
      nowMs: () => FIXED_NOW_MS,
      repository,
      onPresenceChanged,
    });

    expect(result.statusCode).toBe(409);
    if (result.statusCode !== 409) {
      throw new Error('Expected 409 response');
    }
    expect(result.body.error.code).toBe('STALE_WRITE');
    expect(onPresenceChanged).not.toHaveBeenCalled();
  });

  it('400 when value.revision does not match revision', async () => {
    const value = buildValue();

    const result = await processPutPresenceRequest({
      userId: 'user-a',
      payload: { value, revision: value.revision + 1 },
      requestId: 'req-mismatch',
      nowMs: () => FIXED_NOW_MS,
      repository: buildRepository(),
    });

    expect(result.statusCode).toBe(400);
    if (result.statusCode !== 400) {
      throw new Error('Expected 400 response');
    }
    expect(result.body.error.details).toEqual([
      { field: 'value.revision', message: 'value.revision must equal revision.' },
    ]);
  });

  it('400 for a user id containing a slash', async () => {
    const result = await processGetPresenceRequest({
      userId: 'a/b',
      requestId: 'req-bad-id',
      repository: buildRepository(),
    });

    expect(result.statusCode).toBe(400);
  });

  it('404 when no presence is stored', async () => {
    const result = await processGetPresenceRequest({
      userId: 'user-b',
      requestId: 'req-missing',
      repository: buildRepository(),
    });

    expect(result.statusCode).toBe(404);
    if (result.statusCode !== 404) {
      throw new Error('Expected 404 response');
    }
    expect(result.body.error.code).toBe('NOT_FOUND');
  });

  it('lists entries under the presence prefix only', async () => {
    const record = buildRecord('presence/user-a', buildValue());
    const repository = buildRepository({ listEntries: vi.fn(async () => [record]) });

    const ok = await processListPresenceRequest({ prefix: undefined, requestId: 'req-list', repository });
    const rejected = await processListPresenceRequest({ prefix: 'secrets/', requestId: 'req-list-2', repository });

    expect(ok).toEqual({ statusCode: 200, body: { requestId: 'req-list', data: [record] } });
    expect(rejected.statusCode).toBe(400);
    expect(repository.listEntries).toHaveBeenCalledTimes(1);
    expect(repository.listEntries).toHaveBeenCalledWith('presence/');
  });

  it('broadcasts a removal as a null value', async () => {
    const onPresenceChanged = vi.fn();

    const result = await processDeletePresenceRequest({
      userId: 'user-a',
      requestId: 'req-delete',
      repository: buildRepository(),
      onPresenceChanged,
    });

    expect(result).toEqual({
      statusCode: 200,
      body: { requestId: 'req-delete', data: { key: 'presence/user-a', removed: true } },
    });
    expect(onPresenceChanged).toHaveBeenCalledWith({ key: 'presence/user-a', value: null });
  });

  it('500 when the repository throws', async () => {
    const value = buildValue();
    const result = await processPutPresenceRequest({
      userId: 'user-a',
      payload: { value, revision: value.revision },
      requestId: 'req-fail',
      nowMs: () => FIXED_NOW_MS,
      repository: buildRepository({
        putEntry: vi.fn(async (): Promise<PutPresenceOutcome> => {
          throw new Error('connection reset');
        }),
      }),
    });

    expect(result).toEqual({
      statusCode: 500,
      body: {
        requestId: 'req-fail',
        error: { code: 'INTERNAL_ERROR', message: 'Failed to persist presence' },
      },
    });
  });

  it('registers the presence routes', () => {
    const router = createPresenceRouter({ repository: buildRepository(), nowMs: () => FIXED_NOW_MS });

    const routes = ((router as unknown as { stack?: Array<{ route?: { path?: string } }> }).stack ?? [])
      .map((layer) => layer.route?.path)
      .filter((path): path is string => Boolean(path));

    expect(routes).toEqual([
      '/api/v1/presence',
      '/api/v1/presence/:userId',
      '/api/v1/presence/:userId',
      '/api/v1/presence/:userId',
    ]);
  });
});

describe('presence watch rooms', () => {
  it('parses prefix and exact patterns', () => {
    expect(parseWatchPattern('presence/*')).toEqual({ kind: 'prefix', prefix: 'presence/' });
    expect(parseWatchPattern('presence/user-a')).toEqual({ kind: 'exact', key: 'presence/user-a' });
    expect(parseWatchPattern('presence/*/x')).toBeNull();
    expect(parseWatchPattern(42)).toBeNull();
  });

  it('routes a change to the exact and prefix rooms', () => {
    expect(roomsForKey('presence/user-a')).toEqual(['watch:presence/user-a', 'watch:presence/*']);
  });
});
