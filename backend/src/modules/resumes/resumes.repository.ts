import { StorageError } from '../../shared/errors.js';
import type { CollectionStore, RecordFields, StoredRecord } from '../../shared/storage/collectionStore.types.js';
import { isPlainObject } from '../../shared/storage/recordMetadata.js';
import { readNonNegativeInteger, readStringList } from '../../shared/utils/readers.js';
import type { ContactInfo, ResumeFilter, ResumeRecord, ResumeUpdateModel, ResumeWriteModel } from './resumes.types.js';

const readText = (value: unknown) => (typeof value === 'string' ? value : '');

const mapContactInfo = (value: unknown): ContactInfo => {
  if (!isPlainObject(value)) {
    return { email: '', phone: '' };
  }
  return { email: readText(value.email), phone: readText(value.phone) };
};

const mapDocumentToResume = (document: StoredRecord): ResumeRecord => ({
  id: document.id,
  name: readText(document.name),
  position: readText(document.position),
  experienceYears: readNonNegativeInteger(document.experience) ?? 0,
  skills: readStringList(document.skills),
  education: readText(document.education),
  languages: readStringList(document.languages),
  contactInfo: mapContactInfo(document.contact_info),
  createdAt: document.created_at,
  updatedAt: document.updated_at
});

const toDocumentFields = (model: ResumeUpdateModel): RecordFields => {
  const fields: RecordFields = {};
  if (model.name !== undefined) {
    fields.name = model.name;
  }
  if (model.position !== undefined) {
    fields.position = model.position;
  }
  if (model.experienceYears !== undefined) {
    fields.experience = model.experienceYears;
  }
  if (model.skills !== undefined) {
    fields.skills = model.skills;
  }
  if (model.education !== undefined) {
    fields.education = model.education;
  }
  if (model.languages !== undefined) {
    fields.languages = model.languages;
  }
  if (model.contactInfo !== undefined) {
    fields.contact_info = { email: model.contactInfo.email, phone: model.contactInfo.phone };
  }
  return fields;
};

const toDocumentFilter = (filter: ResumeFilter): RecordFields => {
  const fields: RecordFields = {};
  if (filter.name !== undefined) {
    fields.name = filter.name;
  }
  if (filter.position !== undefined) {
    fields.position = filter.position;
  }
  return fields;
};

export class ResumesRepository {
  constructor(private readonly store: CollectionStore) {}

  async listResumes(filter: ResumeFilter = {}): Promise<ResumeRecord[]> {
    const documents = await this.store.findItems(toDocumentFilter(filter));
    return documents.map(mapDocumentToResume);
  }

  async findResume(id: string): Promise<ResumeRecord | null> {
    const document = await this.store.getItem(id);
    return document ? mapDocumentToResume(document) : null;
  }

  async createResume(model: ResumeWriteModel): Promise<ResumeRecord> {
    const id = await this.store.addItem(toDocumentFields(model));
    const created = await this.findResume(id);
    if (!created) {
      throw new StorageError(this.store.collection, `Résumé ${id} disappeared right after it was written.`);
    }
    return created;
  }

  async updateResume(id: string, model: ResumeUpdateModel): Promise<ResumeRecord | null> {
    const updated = await this.store.updateItem(id, toDocumentFields(model));
    return updated ? this.findResume(id) : null;
  }

  async deleteResume(id: string): Promise<boolean> {
    return this.store.deleteItem(id);
  }
}
