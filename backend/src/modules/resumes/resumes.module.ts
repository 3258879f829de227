import type { CollectionStore } from '../../shared/storage/collectionStore.types.js';
import { ResumesRepository } from './resumes.repository.js';
import { ResumesService } from './resumes.service.js';

export const createResumesModule = (store: CollectionStore) => {
  const repository = new ResumesRepository(store);
  return { repository, service: new ResumesService(repository) };
};
