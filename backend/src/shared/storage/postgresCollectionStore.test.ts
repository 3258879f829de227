import { describe, expect, it } from 'vitest';
import { StorageError } from '../errors.js';
import type { SqlExecutor, SqlQueryResult } from '../database/postgres.client.js';
import { PostgresCollectionStore } from './postgresCollectionStore.js';
import { createSequenceClock, createSequenceIds } from './testClock.js';

interface RecordedQuery {
  text: string;
  values: unknown[];
}

class FakeExecutor implements SqlExecutor {
  readonly queries: RecordedQuery[] = [];

  constructor(private readonly rows: Array<Record<string, unknown>> = []) {}

  async query(text: string, values: unknown[] = []): Promise<SqlQueryResult> {
    this.queries.push({ text, values });
    return { rows: this.rows, rowCount: this.rows.length };
  }
}

const T1 = '2024-06-01T12:00:00.000Z';
const T2 = '2024-06-02T12:00:00.000Z';

const createStore = (executor: SqlExecutor) =>
  new PostgresCollectionStore('analyses', executor, {
    now: createSequenceClock(T1, T2),
    generateId: createSequenceIds('an')
  });

describe('PostgresCollectionStore', () => {
  it('inserts the stamped record as a JSON payload', async () => {
    const executor = new FakeExecutor();
    const id = await createStore(executor).addItem({ relevance_score: 0.9, id: 'forged' });

    expect(id).toBe('an-1');
    const [query] = executor.queries;
    expect(query.text).toContain('INSERT INTO collection_records');
    expect(query.values.slice(0, 2)).toEqual(['analyses', 'an-1']);
    expect(JSON.parse(String(query.values[2]))).toEqual({
      relevance_score: 0.9,
      id: 'an-1',
      created_at: T1,
      updated_at: T1
    });
  });

  it('reads payloads in insertion order', async () => {
    const executor = new FakeExecutor([
      { payload: { id: 'a', created_at: T1, updated_at: T1, score: 1 } },
      { payload: { id: 'b', created_at: T1, updated_at: T1, score: 2 } }
    ]);

    const records = await createStore(executor).readAll();

    expect(records.map((record) => record.id)).toEqual(['a', 'b']);
    expect(executor.queries[0].text).toContain('ORDER BY seq ASC');
    expect(executor.queries[0].values).toEqual(['analyses']);
  });

  it('returns null when no row matches', async () => {
    const executor = new FakeExecutor();
    expect(await createStore(executor).getItem('missing')).toBeNull();
    expect(executor.queries[0].values).toEqual(['analyses', 'missing']);
  });

  it('rejects rows without a record payload', async () => {
    const executor = new FakeExecutor([{ payload: { score: 1 } }]);
    await expect(createStore(executor).readAll()).rejects.toBeInstanceOf(StorageError);
  });

  it('sends only the stripped fields and a fresh updated_at as the patch', async () => {
    const executor = new FakeExecutor([{ id: 'an-1' }]);

    expect(await createStore(executor).updateItem('an-1', { score: 3, created_at: 'x', id: 'y' })).toBe(true);
    const [query] = executor.queries;
    expect(query.values.slice(0, 2)).toEqual(['analyses', 'an-1']);
    expect(JSON.parse(String(query.values[2]))).toEqual({ score: 3, updated_at: T1 });
  });

  it('reports not-found when update or delete touch no row', async () => {
    const store = createStore(new FakeExecutor());
    expect(await store.updateItem('missing', { score: 1 })).toBe(false);
    expect(await store.deleteItem('missing')).toBe(false);
  });

  it('filters records after reading the collection', async () => {
    const executor = new FakeExecutor([
      { payload: { id: 'a', resume_id: 'r1', job_id: 'j1' } },
      { payload: { id: 'b', resume_id: 'r2', job_id: 'j1' } }
    ]);

    const records = await createStore(executor).findItems({ job_id: 'j1', resume_id: 'r2' });
    expect(records.map((record) => record.id)).toEqual(['b']);
  });

  it('wraps driver failures in a storage error', async () => {
    const executor: SqlExecutor = {
      query: async () => {
        throw new Error('connection refused');
      }
    };

    await expect(createStore(executor).deleteItem('an-1')).rejects.toThrow(
      'Failed to delete a record: connection refused'
    );
  });
});
