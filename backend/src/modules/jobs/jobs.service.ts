import { NotFoundError, StorageError, ValidationError } from '../../shared/errors.js';
import {
  hasField,
  optionalStringList,
  readRecordId,
  requireNonNegativeInteger,
  requirePayload,
  requireText
} from '../../shared/validation.js';
import { JobsRepository } from './jobs.repository.js';
import type { JobFilter, JobRecord, JobUpdateModel, JobWriteModel } from './jobs.types.js';

const buildWriteModel = (payload: unknown): JobWriteModel => {
  const source = requirePayload(payload, 'Provide job posting data.');
  return {
    title: requireText(source, 'title'),
    requirements: optionalStringList(source, 'requirements') ?? [],
    responsibilities: optionalStringList(source, 'responsibilities') ?? [],
    skillsRequired: optionalStringList(source, 'skillsRequired') ?? [],
    experienceRequired: requireNonNegativeInteger(source, 'experienceRequired')
  };
};

const buildUpdateModel = (payload: unknown): JobUpdateModel => {
  const source = requirePayload(payload, 'Provide the job posting fields to update.');
  const model: JobUpdateModel = {
    title: hasField(source, 'title') ? requireText(source, 'title') : undefined,
    requirements: optionalStringList(source, 'requirements'),
    responsibilities: optionalStringList(source, 'responsibilities'),
    skillsRequired: optionalStringList(source, 'skillsRequired'),
    experienceRequired: hasField(source, 'experienceRequired')
      ? requireNonNegativeInteger(source, 'experienceRequired')
      : undefined
  };
  if (Object.values(model).every((value) => value === undefined)) {
    throw new ValidationError('body', 'missing', 'Provide at least one job posting field to update.');
  }
  return model;
};

export class JobsService {
  constructor(private readonly repository: JobsRepository) {}

  /** Storage failures read as an empty list; the failure is logged. */
  async listJobs(filter: JobFilter = {}): Promise<JobRecord[]> {
    try {
      return await this.repository.listJobs(filter);
    } catch (error) {
      if (error instanceof StorageError) {
        console.error('[jobs] Failed to read job postings, answering with an empty list:', error.message);
        return [];
      }
      throw error;
    }
  }

  async getJob(id: string): Promise<JobRecord> {
    const job = await this.repository.findJob(readRecordId(id));
    if (!job) {
      throw new NotFoundError('Job posting');
    }
    return job;
  }

  async createJob(payload: unknown): Promise<JobRecord> {
    return this.repository.createJob(buildWriteModel(payload));
  }

  async updateJob(id: string, payload: unknown): Promise<JobRecord> {
    const trimmed = readRecordId(id);
    const updated = await this.repository.updateJob(trimmed, buildUpdateModel(payload));
    if (!updated) {
      throw new NotFoundError('Job posting');
    }
    return updated;
  }

  async deleteJob(id: string): Promise<string> {
    const trimmed = readRecordId(id);
    const deleted = await this.repository.deleteJob(trimmed);
    if (!deleted) {
      throw new NotFoundError('Job posting');
    }
    return trimmed;
  }
}
