import { StorageError } from '../../shared/errors.js';
import type { CollectionStore, RecordFields, StoredRecord } from '../../shared/storage/collectionStore.types.js';
import { readNonNegativeInteger, readStringList } from '../../shared/utils/readers.js';
import type { JobFilter, JobRecord, JobUpdateModel, JobWriteModel } from './jobs.types.js';

const mapDocumentToJob = (document: StoredRecord): JobRecord => ({
  id: document.id,
  title: typeof document.title === 'string' ? document.title : '',
  requirements: readStringList(document.requirements),
  responsibilities: readStringList(document.responsibilities),
  skillsRequired: readStringList(document.skills_required),
  experienceRequired: readNonNegativeInteger(document.experience_required) ?? 0,
  createdAt: document.created_at,
  updatedAt: document.updated_at
});

const toDocumentFields = (model: JobUpdateModel): RecordFields => {
  const fields: RecordFields = {};
  if (model.title !== undefined) {
    fields.title = model.title;
  }
  if (model.requirements !== undefined) {
    fields.requirements = model.requirements;
  }
  if (model.responsibilities !== undefined) {
    fields.responsibilities = model.responsibilities;
  }
  if (model.skillsRequired !== undefined) {
    fields.skills_required = model.skillsRequired;
  }
  if (model.experienceRequired !== undefined) {
    fields.experience_required = model.experienceRequired;
  }
  return fields;
};

export class JobsRepository {
  constructor(private readonly store: CollectionStore) {}

  async listJobs(filter: JobFilter = {}): Promise<JobRecord[]> {
    const documents = await this.store.findItems(filter.title !== undefined ? { title: filter.title } : {});
    return documents.map(mapDocumentToJob);
  }

  async findJob(id: string): Promise<JobRecord | null> {
    const document = await this.store.getItem(id);
    return document ? mapDocumentToJob(document) : null;
  }

  async createJob(model: JobWriteModel): Promise<JobRecord> {
    const id = await this.store.addItem(toDocumentFields(model));
    const created = await this.findJob(id);
    if (!created) {
      throw new StorageError(this.store.collection, `Job ${id} disappeared right after it was written.`);
    }
    return created;
  }

  async updateJob(id: string, model: JobUpdateModel): Promise<JobRecord | null> {
    const updated = await this.store.updateItem(id, toDocumentFields(model));
    return updated ? this.findJob(id) : null;
  }

  async deleteJob(id: string): Promise<boolean> {
    return this.store.deleteItem(id);
  }
}
