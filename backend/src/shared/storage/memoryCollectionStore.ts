import type { CollectionStoreOptions, StoredRecord } from './collectionStore.types.js';
import { WholeCollectionStore } from './wholeCollectionStore.js';

const cloneRecords = (records: StoredRecord[]): StoredRecord[] => structuredClone(records);

export class MemoryCollectionStore extends WholeCollectionStore {
  private records: StoredRecord[];

  constructor(collection: string, options: CollectionStoreOptions & { initial?: StoredRecord[] } = {}) {
    super(collection, options);
    this.records = cloneRecords(options.initial ?? []);
  }

  protected async load(): Promise<StoredRecord[]> {
    return cloneRecords(this.records);
  }

  protected async save(records: StoredRecord[]): Promise<void> {
    this.records = cloneRecords(records);
  }
}
