import type { JobRecord } from '../jobs/jobs.types.js';
import type { ResumeRecord } from '../resumes/resumes.types.js';

export type AnalysisSource = 'llm' | 'mock';

export interface RelevanceAssessment {
  relevanceScore: number;
  jobMatchPercentage: number;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  analysisText: string;
}

export interface AnalysisWriteModel extends RelevanceAssessment {
  resumeId: string;
  jobId: string;
  source: AnalysisSource;
}

export interface AnalysisRecord extends AnalysisWriteModel {
  id: string;
  createdAt: string;
}

export interface AnalysisFilter {
  resumeId?: string;
  jobId?: string;
}

export interface AnalyzeRequest {
  resumeId?: unknown;
  jobId?: unknown;
}

/**
 * External relevance analysis. Implementations raise UpstreamError for every failure so the
 * orchestrator can fall back to the local scorer.
 */
export interface RelevanceAnalyzer {
  analyze(resume: ResumeRecord, job: JobRecord): Promise<RelevanceAssessment>;
}
