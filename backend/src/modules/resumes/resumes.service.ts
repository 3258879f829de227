import { NotFoundError, StorageError, ValidationError } from '../../shared/errors.js';
import { isPlainObject } from '../../shared/storage/recordMetadata.js';
import {
  hasField,
  optionalStringList,
  optionalText,
  readRecordId,
  requireNonNegativeInteger,
  requirePayload,
  requireText,
  type Payload
} from '../../shared/validation.js';
import { mapHhResume } from './hhResume.mapper.js';
import { ResumesRepository } from './resumes.repository.js';
import type { ContactInfo, ResumeFilter, ResumeRecord, ResumeUpdateModel, ResumeWriteModel } from './resumes.types.js';

const readContactInfo = (source: Payload): ContactInfo | undefined => {
  if (!hasField(source, 'contactInfo')) {
    return undefined;
  }
  const value = source.contactInfo;
  if (!isPlainObject(value)) {
    throw new ValidationError('contactInfo', 'invalid', 'Field "contactInfo" must be an object with email and phone.');
  }
  return {
    email: optionalText(value, 'email') ?? '',
    phone: optionalText(value, 'phone') ?? ''
  };
};

const buildWriteModel = (payload: unknown): ResumeWriteModel => {
  const source = requirePayload(payload, 'Provide résumé data.');
  return {
    name: requireText(source, 'name'),
    position: requireText(source, 'position'),
    experienceYears: requireNonNegativeInteger(source, 'experienceYears'),
    skills: optionalStringList(source, 'skills') ?? [],
    education: optionalText(source, 'education') ?? '',
    languages: optionalStringList(source, 'languages') ?? [],
    contactInfo: readContactInfo(source) ?? { email: '', phone: '' }
  };
};

const buildUpdateModel = (payload: unknown): ResumeUpdateModel => {
  const source = requirePayload(payload, 'Provide the résumé fields to update.');
  const model: ResumeUpdateModel = {
    name: hasField(source, 'name') ? requireText(source, 'name') : undefined,
    position: hasField(source, 'position') ? requireText(source, 'position') : undefined,
    experienceYears: hasField(source, 'experienceYears')
      ? requireNonNegativeInteger(source, 'experienceYears')
      : undefined,
    skills: optionalStringList(source, 'skills'),
    education: optionalText(source, 'education'),
    languages: optionalStringList(source, 'languages'),
    contactInfo: readContactInfo(source)
  };
  if (Object.values(model).every((value) => value === undefined)) {
    throw new ValidationError('body', 'missing', 'Provide at least one résumé field to update.');
  }
  return model;
};

export class ResumesService {
  constructor(private readonly repository: ResumesRepository) {}

  /** Storage failures read as an empty list; the failure is logged. */
  async listResumes(filter: ResumeFilter = {}): Promise<ResumeRecord[]> {
    try {
      return await this.repository.listResumes(filter);
    } catch (error) {
      if (error instanceof StorageError) {
        console.error('[resumes] Failed to read résumés, answering with an empty list:', error.message);
        return [];
      }
      throw error;
    }
  }

  async getResume(id: string): Promise<ResumeRecord> {
    const resume = await this.repository.findResume(readRecordId(id));
    if (!resume) {
      throw new NotFoundError('Résumé');
    }
    return resume;
  }

  async createResume(payload: unknown): Promise<ResumeRecord> {
    return this.repository.createResume(buildWriteModel(payload));
  }

  async importHhResume(payload: unknown): Promise<ResumeRecord> {
    return this.repository.createResume(mapHhResume(payload));
  }

  async updateResume(id: string, payload: unknown): Promise<ResumeRecord> {
    const trimmed = readRecordId(id);
    const updated = await this.repository.updateResume(trimmed, buildUpdateModel(payload));
    if (!updated) {
      throw new NotFoundError('Résumé');
    }
    return updated;
  }

  async deleteResume(id: string): Promise<string> {
    const trimmed = readRecordId(id);
    const deleted = await this.repository.deleteResume(trimmed);
    if (!deleted) {
      throw new NotFoundError('Résumé');
    }
    return trimmed;
  }
}
