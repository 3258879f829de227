export type RecordFields = Record<string, unknown>;

export interface RecordMetadata {
  id: string;
  created_at: string;
  updated_at: string;
}

export type StoredRecord = RecordFields & RecordMetadata;

export type RecordFilter = Record<string, unknown>;

/**
 * One collection of JSON records. The store owns id generation and timestamp stamping:
 * `id`, `created_at` and `updated_at` given by callers are dropped. Field schemas are the
 * repositories' business.
 */
export interface CollectionStore {
  readonly collection: string;
  /** Every record in storage order; an absent backing file or table reads as empty. */
  readAll(): Promise<StoredRecord[]>;
  addItem(fields: RecordFields): Promise<string>;
  getItem(id: string): Promise<StoredRecord | null>;
  /** Shallow merge; resolves `false` when no record has the id. */
  updateItem(id: string, updates: RecordFields): Promise<boolean>;
  deleteItem(id: string): Promise<boolean>;
  /** Conjunctive deep-equality filter over top-level fields. */
  findItems(filter: RecordFilter): Promise<StoredRecord[]>;
}

export interface CollectionStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}
