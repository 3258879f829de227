import type { OpenAiConfig } from '../../shared/config/appConfig.js';
import type { CollectionStore } from '../../shared/storage/collectionStore.types.js';
import type { JobsRepository } from '../jobs/jobs.repository.js';
import type { ResumesRepository } from '../resumes/resumes.repository.js';
import { AnalysesRepository } from './analyses.repository.js';
import { AnalysesService } from './analyses.service.js';
import type { RelevanceAnalyzer } from './analyses.types.js';
import { createOpenAiAnalyzer } from './openAiAnalyzer.js';

type AnalysesModuleDependencies = {
  store: CollectionStore;
  resumes: ResumesRepository;
  jobs: JobsRepository;
  openAi: OpenAiConfig | null;
  /** Overrides the analyzer built from `openAi`; null forces the mock scorer. */
  analyzer?: RelevanceAnalyzer | null;
};

export const createAnalysesModule = ({ store, resumes, jobs, openAi, analyzer }: AnalysesModuleDependencies) => {
  let resolvedAnalyzer: RelevanceAnalyzer | null;
  if (analyzer !== undefined) {
    resolvedAnalyzer = analyzer;
  } else if (openAi) {
    resolvedAnalyzer = createOpenAiAnalyzer(openAi);
  } else {
    console.warn('[analyses] OPENAI_API_KEY is not set. Relevance analyses will use the mock scorer.');
    resolvedAnalyzer = null;
  }

  const repository = new AnalysesRepository(store);
  return { repository, service: new AnalysesService(resumes, jobs, repository, resolvedAnalyzer) };
};
