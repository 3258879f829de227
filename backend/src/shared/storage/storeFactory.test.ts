import path from 'path';
import { describe, expect, it } from 'vitest';
import { JsonFileCollectionStore } from './jsonFileCollectionStore.js';
import { MemoryCollectionStore } from './memoryCollectionStore.js';
import { PostgresCollectionStore } from './postgresCollectionStore.js';
import { COLLECTIONS, createCollectionStores } from './storeFactory.js';

describe('createCollectionStores', () => {
  it('builds one store per collection', () => {
    const stores = createCollectionStores({ storageDriver: 'memory', dataDir: 'unused' });

    expect(Object.keys(stores)).toEqual([...COLLECTIONS]);
    for (const name of COLLECTIONS) {
      expect(stores[name]).toBeInstanceOf(MemoryCollectionStore);
      expect(stores[name].collection).toBe(name);
    }
  });

  it('places file stores under the data directory', () => {
    const stores = createCollectionStores({ storageDriver: 'file', dataDir: path.join('tmp', 'data') });
    expect(stores.jobs).toBeInstanceOf(JsonFileCollectionStore);
    expect(stores.jobs.collection).toBe('jobs');
  });

  it('requires a connection for the postgres driver', () => {
    expect(() => createCollectionStores({ storageDriver: 'postgres', dataDir: 'data' })).toThrow(
      'The postgres storage driver requires a database connection.'
    );

    const executor = { query: async () => ({ rows: [], rowCount: 0 }) };
    const stores = createCollectionStores({ storageDriver: 'postgres', dataDir: 'data' }, { executor });
    expect(stores.analyses).toBeInstanceOf(PostgresCollectionStore);
  });
});
