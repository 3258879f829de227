import type {
  CollectionStore,
  CollectionStoreOptions,
  RecordFields,
  RecordFilter,
  StoredRecord
} from './collectionStore.types.js';
import { defaultGenerateId, defaultNow, matchesFilter, mergeRecord, stampNewRecord } from './recordMetadata.js';
import { SerialQueue } from './serialQueue.js';

/**
 * Base for drivers that load and save the whole collection at once. Each write reads the
 * full array, applies the change in memory and saves the full array back; the queue keeps
 * those cycles from interleaving within the process.
 */
export abstract class WholeCollectionStore implements CollectionStore {
  private readonly queue = new SerialQueue();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  protected constructor(
    public readonly collection: string,
    options: CollectionStoreOptions = {}
  ) {
    this.now = options.now ?? defaultNow;
    this.generateId = options.generateId ?? defaultGenerateId;
  }

  protected abstract load(): Promise<StoredRecord[]>;

  protected abstract save(records: StoredRecord[]): Promise<void>;

  readAll(): Promise<StoredRecord[]> {
    return this.queue.run(() => this.load());
  }

  addItem(fields: RecordFields): Promise<string> {
    return this.queue.run(async () => {
      const records = await this.load();
      const record = stampNewRecord(fields, this.generateId(), this.now());
      await this.save([...records, record]);
      return record.id;
    });
  }

  getItem(id: string): Promise<StoredRecord | null> {
    return this.queue.run(async () => {
      const records = await this.load();
      return records.find((record) => record.id === id) ?? null;
    });
  }

  updateItem(id: string, updates: RecordFields): Promise<boolean> {
    return this.queue.run(async () => {
      const records = await this.load();
      const index = records.findIndex((record) => record.id === id);
      if (index === -1) {
        return false;
      }
      const next = [...records];
      next[index] = mergeRecord(records[index], updates, this.now());
      await this.save(next);
      return true;
    });
  }

  deleteItem(id: string): Promise<boolean> {
    return this.queue.run(async () => {
      const records = await this.load();
      const remaining = records.filter((record) => record.id !== id);
      if (remaining.length === records.length) {
        return false;
      }
      await this.save(remaining);
      return true;
    });
  }

  findItems(filter: RecordFilter): Promise<StoredRecord[]> {
    return this.queue.run(async () => {
      const records = await this.load();
      return records.filter((record) => matchesFilter(record, filter));
    });
  }
}
