import { NotFoundError, StorageError, UpstreamError, ValidationError } from '../../shared/errors.js';
import { readOptionalString } from '../../shared/utils/readers.js';
import { readRecordId } from '../../shared/validation.js';
import type { JobsRepository } from '../jobs/jobs.repository.js';
import type { JobRecord } from '../jobs/jobs.types.js';
import type { ResumesRepository } from '../resumes/resumes.repository.js';
import type { ResumeRecord } from '../resumes/resumes.types.js';
import { AnalysesRepository } from './analyses.repository.js';
import type {
  AnalysisFilter,
  AnalysisRecord,
  AnalysisSource,
  AnalyzeRequest,
  RelevanceAnalyzer,
  RelevanceAssessment
} from './analyses.types.js';
import { scoreRelevance } from './relevanceScorer.js';

export class AnalysesService {
  constructor(
    private readonly resumes: ResumesRepository,
    private readonly jobs: JobsRepository,
    private readonly repository: AnalysesRepository,
    private readonly analyzer: RelevanceAnalyzer | null
  ) {}

  private async assess(
    resume: ResumeRecord,
    job: JobRecord
  ): Promise<{ assessment: RelevanceAssessment; source: AnalysisSource }> {
    if (this.analyzer) {
      try {
        return { assessment: await this.analyzer.analyze(resume, job), source: 'llm' };
      } catch (error) {
        if (!(error instanceof UpstreamError)) {
          throw error;
        }
        console.warn(`[analyses] Language-model analysis failed, using the mock scorer: ${error.message}`);
      }
    }
    return { assessment: scoreRelevance(resume, job), source: 'mock' };
  }

  /**
   * Scores one résumé against one job posting and stores the result. Every call creates a new
   * analysis record.
   */
  async analyze(request: AnalyzeRequest): Promise<AnalysisRecord> {
    const resumeId = readOptionalString(request.resumeId);
    const jobId = readOptionalString(request.jobId);
    if (!resumeId || !jobId) {
      throw new ValidationError(resumeId ? 'jobId' : 'resumeId', 'missing', 'Both resumeId and jobId are required.');
    }

    const [resume, job] = await Promise.all([this.resumes.findResume(resumeId), this.jobs.findJob(jobId)]);
    if (!resume || !job) {
      throw new NotFoundError(!resume ? 'Résumé' : 'Job posting', 'Résumé or job posting not found.');
    }

    const { assessment, source } = await this.assess(resume, job);
    return this.repository.createAnalysis({ ...assessment, resumeId, jobId, source });
  }

  /** Storage failures read as an empty list; the failure is logged. */
  async listAnalyses(filter: AnalysisFilter = {}): Promise<AnalysisRecord[]> {
    try {
      return await this.repository.listAnalyses(filter);
    } catch (error) {
      if (error instanceof StorageError) {
        console.error('[analyses] Failed to read analyses, answering with an empty list:', error.message);
        return [];
      }
      throw error;
    }
  }

  async getAnalysis(id: string): Promise<AnalysisRecord> {
    const analysis = await this.repository.findAnalysis(readRecordId(id));
    if (!analysis) {
      throw new NotFoundError('Analysis');
    }
    return analysis;
  }
}
