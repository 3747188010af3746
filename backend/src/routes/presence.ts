import { randomUUID } from 'node:crypto';

import { type RequestHandler, type Response, Router } from 'express';

import { PRESENCE_KEY_PREFIX, isValidUserId, presenceKeyFor } from '../services/presenceKeys';
import { validatePutPayload } from '../services/presenceValidation';
import type {
  PresenceChange,
  PresenceEntryRecord,
  PresenceErrorBody,
  PresenceRepository,
} from '../types/presence';

export interface CreatePresenceRouteDeps {
  repository: PresenceRepository;
  nowMs: () => number;
  /** How far ahead of the server clock a heartbeat may be. */
  maxClockSkewMs?: number;
  onPresenceChanged?: (change: PresenceChange) => void | Promise<void>;
}

type ErrorResult<TStatus extends number> = { statusCode: TStatus; body: PresenceErrorBody };

type GetPresenceResult =
  | { statusCode: 200; body: { requestId: string; data: PresenceEntryRecord } }
  | ErrorResult<400 | 404 | 500>;

type ListPresenceResult =
  | { statusCode: 200; body: { requestId: string; data: PresenceEntryRecord[] } }
  | ErrorResult<400 | 500>;

type PutPresenceResult =
  | { statusCode: 200; body: { requestId: string; data: PresenceEntryRecord } }
  | ErrorResult<400 | 409 | 500>;

type DeletePresenceResult =
  | { statusCode: 200; body: { requestId: string; data: { key: string; removed: true } } }
  | ErrorResult<400 | 404 | 500>;

function resolveRequestId(response: Response): string {
  const requestId = response.locals.requestId;
  if (typeof requestId === 'string' && requestId.length > 0) {
    return requestId;
  }

  const fallbackId = randomUUID();
  response.locals.requestId = fallbackId;
  return fallbackId;
}

function invalidUserId(requestId: string): ErrorResult<400> {
  return {
    statusCode: 400,
    body: {
      requestId,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'userId must be 1-128 characters of letters, digits, or ._:@-',
      },
    },
  };
}

function internalError(requestId: string, message: string): ErrorResult<500> {
  return {
    statusCode: 500,
    body: {
      requestId,
      error: { code: 'INTERNAL_ERROR', message },
    },
  };
}

export async function processGetPresenceRequest({
  userId,
  requestId,
  repository,
}: {
  userId: string;
  requestId: string;
  repository: PresenceRepository;
}): Promise<GetPresenceResult> {
  if (!isValidUserId(userId)) {
    return invalidUserId(requestId);
  }

  try {
    const record = await repository.getEntry(presenceKeyFor(userId));
    if (!record) {
      return {
        statusCode: 404,
        body: {
          requestId,
          error: { code: 'NOT_FOUND', message: `No presence for ${userId}.` },
        },
      };
    }
    return { statusCode: 200, body: { requestId, data: record } };
  } catch {
    return internalError(requestId, 'Failed to read presence');
  }
}

export async function processListPresenceRequest({
  prefix,
  requestId,
  repository,
}: {
  prefix: unknown;
  requestId: string;
  repository: PresenceRepository;
}): Promise<ListPresenceResult> {
  const resolvedPrefix = prefix === undefined ? PRESENCE_KEY_PREFIX : prefix;
  if (typeof resolvedPrefix !== 'string' || resolvedPrefix !== PRESENCE_KEY_PREFIX) {
    return {
      statusCode: 400,
      body: {
        requestId,
        error: {
          code: 'VALIDATION_ERROR',
          message: `prefix must be ${PRESENCE_KEY_PREFIX}`,
        },
      },
    };
  }

  try {
    const records = await repository.listEntries(resolvedPrefix);
    return { statusCode: 200, body: { requestId, data: records } };
  } catch {
    return internalError(requestId, 'Failed to list presence');
  }
}

export async function processPutPresenceRequest({
  userId,
  payload,
  requestId,
  nowMs,
  maxClockSkewMs,
  repository,
  onPresenceChanged,
}: {
  userId: string;
  payload: unknown;
  requestId: string;
  nowMs: () => number;
  maxClockSkewMs?: number;
  repository: PresenceRepository;
  onPresenceChanged?: CreatePresenceRouteDeps['onPresenceChanged'];
}): Promise<PutPresenceResult> {
  if (!isValidUserId(userId)) {
    return invalidUserId(requestId);
  }

  const validation = validatePutPayload(payload, nowMs(), maxClockSkewMs);
  if (!validation.ok) {
    return {
      statusCode: 400,
      body: {
        requestId,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: validation.details,
        },
      },
    };
  }

  const key = presenceKeyFor(userId);
  try {
    const outcome = await repository.putEntry({ key, value: validation.value, revision: validation.revision });
    if (outcome.kind === 'stale') {
      return {
        statusCode: 409,
        body: {
          requestId,
          error: {
            code: 'STALE_WRITE',
            message: `A presence record with revision >= ${validation.revision} is already stored.`,
          },
        },
      };
    }

    if (onPresenceChanged) {
      await onPresenceChanged({ key, value: outcome.record.value });
    }
    return { statusCode: 200, body: { requestId, data: outcome.record } };
  } catch {
    return internalError(requestId, 'Failed to persist presence');
  }
}

export async function processDeletePresenceRequest({
  userId,
  requestId,
  repository,
  onPresenceChanged,
}: {
  userId: string;
  requestId: string;
  repository: PresenceRepository;
  onPresenceChanged?: CreatePresenceRouteDeps['onPresenceChanged'];
}): Promise<DeletePresenceResult> {
  if (!isValidUserId(userId)) {
    return invalidUserId(requestId);
  }

  const key = presenceKeyFor(userId);
  try {
    const { removed } = await repository.removeEntry(key);
    if (!removed) {
      return {
        statusCode: 404,
        body: {
          requestId,
          error: { code: 'NOT_FOUND', message: `No presence for ${userId}.` },
        },
      };
    }

    if (onPresenceChanged) {
      await onPresenceChanged({ key, value: null });
    }
    return { statusCode: 200, body: { requestId, data: { key, removed: true } } };
  } catch {
    return internalError(requestId, 'Failed to remove presence');
  }
}

export function createPresenceRouter({
  repository,
  nowMs,
  maxClockSkewMs,
  onPresenceChanged,
}: CreatePresenceRouteDeps): Router {
  const router = Router();

  const listHandler: RequestHandler = async (request, response) => {
    const result = await processListPresenceRequest({
      prefix: request.query.prefix,
      requestId: resolveRequestId(response),
      repository,
    });
    response.status(result.statusCode).json(result.body);
  };

  const getHandler: RequestHandler = async (request, response) => {
    const result = await processGetPresenceRequest({
      userId: request.params.userId,
      requestId: resolveRequestId(response),
      repository,
    });
    response.status(result.statusCode).json(result.body);
  };

  const putHandler: RequestHandler = async (request, response) => {
    const result = await processPutPresenceRequest({
      userId: request.params.userId,
      payload: request.body,
      requestId: resolveRequestId(response),
      nowMs,
      maxClockSkewMs,
      repository,
      onPresenceChanged,
    });
    response.status(result.statusCode).json(result.body);
  };

  const deleteHandler: RequestHandler = async (request, response) => {
    const result = await processDeletePresenceRequest({
      userId: request.params.userId,
      requestId: resolveRequestId(response),
      repository,
      onPresenceChanged,
    });
    response.status(result.statusCode).json(result.body);
  };

  router.get('/api/v1/presence', listHandler);
  router.get('/api/v1/presence/:userId', getHandler);
  router.put('/api/v1/presence/:userId', putHandler);
  router.delete('/api/v1/presence/:userId', deleteHandler);

  return router;
}
