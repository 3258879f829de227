import type { CollectionStore } from '../../shared/storage/collectionStore.types.js';
import { JobsRepository } from './jobs.repository.js';
import { JobsService } from './jobs.service.js';

export const createJobsModule = (store: CollectionStore) => {
  const repository = new JobsRepository(store);
  return { repository, service: new JobsService(repository) };
};
