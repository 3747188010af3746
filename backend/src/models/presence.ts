import mongoose, { Schema } from 'mongoose';

import { validatePresenceValue } from '../services/presenceValidation';
import type {
  PresenceEntryRecord,
  PutPresenceInput,
  PutPresenceOutcome,
} from '../types/presence';

const presenceEntrySchema = new Schema(
  {
    key: { type: String, required: true, trim: true, unique: true },
    value: { type: Schema.Types.Mixed, required: true },
    revision: { type: Number, required: true },
    createdAt: { type: Number, required: true },
    updatedAt: { type: Number, required: true },
  },
  {
    collection: 'presence_entries',
    versionKey: false,
    strict: 'throw',
    minimize: false,
  }
);

type PresenceEntryDocument = {
  _id: mongoose.Types.ObjectId;
  key: string;
  value: unknown;
  revision: number;
  createdAt: number;
  updatedAt: number;
};

const PresenceEntryModel =
  (mongoose.models.PresenceEntry as mongoose.Model<PresenceEntryDocument> | undefined) ??
  mongoose.model<PresenceEntryDocument>('PresenceEntry', presenceEntrySchema);

const DUPLICATE_KEY_ERROR_CODE = 11000;

/** The unique `key` index backs the conditional upsert. */
export async function syncPresenceIndexes(): Promise<void> {
  await PresenceEntryModel.syncIndexes();
}

function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === DUPLICATE_KEY_ERROR_CODE
  );
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mapPresenceDocument(document: PresenceEntryDocument): PresenceEntryRecord | null {
  const validation = validatePresenceValue(document.value, Number.MAX_SAFE_INTEGER);
  if (!validation.ok) {
    console.warn('[presence] skipping stored entry with invalid value', {
      key: document.key,
      details: validation.details,
    });
    return null;
  }

  return {
    key: document.key,
    value: validation.value,
    revision: document.revision,
    updatedAt: document.updatedAt,
    createdAt: document.createdAt,
  };
}

export async function getPresenceEntry(key: string): Promise<PresenceEntryRecord | null> {
  const document = await PresenceEntryModel.findOne({ key }).lean<PresenceEntryDocument | null>();
  return document ? mapPresenceDocument(document) : null;
}

/** Entries directly under `prefix` (one path segment deep). */
export async function listPresenceEntries(prefix: string): Promise<PresenceEntryRecord[]> {
  const documents = await PresenceEntryModel.find({
    key: { $regex: `^${escapeRegex(prefix)}[^/]+$` },
  }).lean<PresenceEntryDocument[]>();

  return documents
    .map((document) => mapPresenceDocument(document))
    .filter((record): record is PresenceEntryRecord => record !== null);
}

/**
 * Last-writer-wins by revision. The filter only matches an older revision, so
 * a newer stored entry makes the upsert collide on the unique key.
 */
export async function putPresenceEntry(input: PutPresenceInput): Promise<PutPresenceOutcome> {
  const now = Date.now();
  try {
    const document = await PresenceEntryModel.findOneAndUpdate(
      { key: input.key, revision: { $lt: input.revision } },
      {
        $set: {
          value: input.value,
          revision: input.revision,
          updatedAt: now,
        },
        $setOnInsert: {
          createdAt: now,
        },
      },
      { upsert: true, new: true }
    ).lean<PresenceEntryDocument | null>();

    const record = document ? mapPresenceDocument(document) : null;
    if (!record) {
      throw new Error(`Presence upsert for ${input.key} returned no document.`);
    }
    return { kind: 'applied', record };
  } catch (error) {
    if (isDuplicateKeyError(error)) {
      return { kind: 'stale' };
    }
    throw error;
  }
}

export async function removePresenceEntry(key: string): Promise<{ removed: boolean }> {
  const result = await PresenceEntryModel.deleteOne({ key });
  return { removed: result.deletedCount > 0 };
}
