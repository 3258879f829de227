import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { StorageError, describeError } from '../errors.js';
import type { CollectionStoreOptions, StoredRecord } from './collectionStore.types.js';
import { toStoredRecord } from './recordMetadata.js';
import { WholeCollectionStore } from './wholeCollectionStore.js';

const isMissingFile = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Collection backed by one pretty-printed JSON array on disk.
 */
export class JsonFileCollectionStore extends WholeCollectionStore {
  constructor(
    collection: string,
    private readonly filePath: string,
    options: CollectionStoreOptions = {}
  ) {
    super(collection, options);
  }

  protected async load(): Promise<StoredRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new StorageError(this.collection, `Failed to read ${this.filePath}: ${describeError(error)}`, error);
    }

    if (!raw.trim()) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(this.collection, `Malformed JSON in ${this.filePath}.`, error);
    }

    if (!Array.isArray(parsed)) {
      throw new StorageError(this.collection, `${this.filePath} does not contain a JSON array.`);
    }

    const records: StoredRecord[] = [];
    parsed.forEach((entry, index) => {
      const record = toStoredRecord(entry);
      if (!record) {
        throw new StorageError(this.collection, `Entry ${index} in ${this.filePath} is not a record with an id.`);
      }
      records.push(record);
    });
    return records;
  }

  protected async save(records: StoredRecord[]): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(records, null, 2), 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StorageError(this.collection, `Failed to write ${this.filePath}: ${describeError(error)}`, error);
    }
  }
}
