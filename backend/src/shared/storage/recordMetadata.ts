import { randomUUID } from 'crypto';
import { isDeepStrictEqual } from 'util';
import type { RecordFields, RecordFilter, StoredRecord } from './collectionStore.types.js';

const METADATA_KEYS = new Set(['id', 'created_at', 'updated_at']);

export const defaultGenerateId = () => randomUUID();

export const defaultNow = () => new Date();

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const stripMetadata = (fields: RecordFields): RecordFields => {
  const result: RecordFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (!METADATA_KEYS.has(key)) {
      result[key] = value;
    }
  }
  return result;
};

export const stampNewRecord = (fields: RecordFields, id: string, now: Date): StoredRecord => {
  const timestamp = now.toISOString();
  return {
    ...stripMetadata(fields),
    id,
    created_at: timestamp,
    updated_at: timestamp
  };
};

export const mergeRecord = (record: StoredRecord, updates: RecordFields, now: Date): StoredRecord => ({
  ...record,
  ...stripMetadata(updates),
  id: record.id,
  created_at: record.created_at,
  updated_at: now.toISOString()
});

export const matchesFilter = (record: StoredRecord, filter: RecordFilter) =>
  Object.entries(filter).every(([key, value]) => isDeepStrictEqual(record[key], value));

/**
 * Validates one element of a persisted collection. Anything that is not an object with a
 * string id yields null.
 */
export const toStoredRecord = (value: unknown): StoredRecord | null => {
  if (!isPlainObject(value) || typeof value.id !== 'string' || !value.id) {
    return null;
  }
  return {
    ...value,
    id: value.id,
    created_at: typeof value.created_at === 'string' ? value.created_at : '',
    updated_at: typeof value.updated_at === 'string' ? value.updated_at : ''
  };
};
