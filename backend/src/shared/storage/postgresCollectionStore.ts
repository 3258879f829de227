import { StorageError, describeError } from '../errors.js';
import { COLLECTION_RECORDS_TABLE } from '../database/migrations.js';
import type { SqlExecutor } from '../database/postgres.client.js';
import type {
  CollectionStore,
  CollectionStoreOptions,
  RecordFields,
  RecordFilter,
  StoredRecord
} from './collectionStore.types.js';
import {
  defaultGenerateId,
  defaultNow,
  matchesFilter,
  stampNewRecord,
  stripMetadata,
  toStoredRecord
} from './recordMetadata.js';
import { SerialQueue } from './serialQueue.js';

/**
 * Collection stored as one JSONB row per record in a shared table. Records keep their
 * insertion order through the `seq` column.
 */
export class PostgresCollectionStore implements CollectionStore {
  private readonly queue = new SerialQueue();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    public readonly collection: string,
    private readonly executor: SqlExecutor,
    options: CollectionStoreOptions = {}
  ) {
    this.now = options.now ?? defaultNow;
    this.generateId = options.generateId ?? defaultGenerateId;
  }

  private async execute(action: string, text: string, values: unknown[]) {
    try {
      return await this.executor.query(text, values);
    } catch (error) {
      throw new StorageError(this.collection, `Failed to ${action}: ${describeError(error)}`, error);
    }
  }

  private toRecords(rows: Array<Record<string, unknown>>): StoredRecord[] {
    return rows.map((row, index) => {
      const record = toStoredRecord(row.payload);
      if (!record) {
        throw new StorageError(this.collection, `Row ${index} of ${this.collection} holds no record payload.`);
      }
      return record;
    });
  }

  readAll(): Promise<StoredRecord[]> {
    return this.queue.run(async () => {
      const result = await this.execute(
        'read the collection',
        `SELECT payload FROM ${COLLECTION_RECORDS_TABLE} WHERE collection = $1 ORDER BY seq ASC;`,
        [this.collection]
      );
      return this.toRecords(result.rows);
    });
  }

  addItem(fields: RecordFields): Promise<string> {
    return this.queue.run(async () => {
      const record = stampNewRecord(fields, this.generateId(), this.now());
      await this.execute(
        'insert a record',
        `INSERT INTO ${COLLECTION_RECORDS_TABLE} (collection, id, payload) VALUES ($1, $2, $3::jsonb);`,
        [this.collection, record.id, JSON.stringify(record)]
      );
      return record.id;
    });
  }

  getItem(id: string): Promise<StoredRecord | null> {
    return this.queue.run(async () => {
      const result = await this.execute(
        'read a record',
        `SELECT payload FROM ${COLLECTION_RECORDS_TABLE} WHERE collection = $1 AND id = $2 LIMIT 1;`,
        [this.collection, id]
      );
      const [record] = this.toRecords(result.rows);
      return record ?? null;
    });
  }

  updateItem(id: string, updates: RecordFields): Promise<boolean> {
    return this.queue.run(async () => {
      const patch = { ...stripMetadata(updates), updated_at: this.now().toISOString() };
      const result = await this.execute(
        'update a record',
        `UPDATE ${COLLECTION_RECORDS_TABLE}
            SET payload = payload || $3::jsonb
          WHERE collection = $1 AND id = $2
          RETURNING id;`,
        [this.collection, id, JSON.stringify(patch)]
      );
      return result.rows.length > 0;
    });
  }

  deleteItem(id: string): Promise<boolean> {
    return this.queue.run(async () => {
      const result = await this.execute(
        'delete a record',
        `DELETE FROM ${COLLECTION_RECORDS_TABLE} WHERE collection = $1 AND id = $2 RETURNING id;`,
        [this.collection, id]
      );
      return result.rows.length > 0;
    });
  }

  async findItems(filter: RecordFilter): Promise<StoredRecord[]> {
    const records = await this.readAll();
    return records.filter((record) => matchesFilter(record, filter));
  }
}
