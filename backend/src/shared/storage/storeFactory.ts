import path from 'path';
import type { AppConfig } from '../config/appConfig.js';
import type { SqlExecutor } from '../database/postgres.client.js';
import type { CollectionStore, CollectionStoreOptions } from './collectionStore.types.js';
import { JsonFileCollectionStore } from './jsonFileCollectionStore.js';
import { MemoryCollectionStore } from './memoryCollectionStore.js';
import { PostgresCollectionStore } from './postgresCollectionStore.js';

export const COLLECTIONS = ['resumes', 'jobs', 'analyses', 'users', 'logs'] as const;

export type CollectionName = (typeof COLLECTIONS)[number];

export type CollectionStores = Record<CollectionName, CollectionStore>;

type StoreFactoryOptions = CollectionStoreOptions & {
  executor?: SqlExecutor;
};

/**
 * Builds exactly one store per collection so that the per-store queue covers every writer
 * of that collection in the process.
 */
export const createCollectionStores = (
  config: Pick<AppConfig, 'storageDriver' | 'dataDir'>,
  options: StoreFactoryOptions = {}
): CollectionStores => {
  const { executor, ...storeOptions } = options;

  const build = (collection: CollectionName): CollectionStore => {
    switch (config.storageDriver) {
      case 'memory':
        return new MemoryCollectionStore(collection, storeOptions);
      case 'postgres':
        if (!executor) {
          throw new Error('The postgres storage driver requires a database connection.');
        }
        return new PostgresCollectionStore(collection, executor, storeOptions);
      case 'file':
        return new JsonFileCollectionStore(collection, path.join(config.dataDir, `${collection}.json`), storeOptions);
    }
  };

  return {
    resumes: build('resumes'),
    jobs: build('jobs'),
    analyses: build('analyses'),
    users: build('users'),
    logs: build('logs')
  };
};
