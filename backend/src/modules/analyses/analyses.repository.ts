import { StorageError } from '../../shared/errors.js';
import type { CollectionStore, RecordFields, StoredRecord } from '../../shared/storage/collectionStore.types.js';
import { readOptionalNumber, readStringList } from '../../shared/utils/readers.js';
import type { AnalysisFilter, AnalysisRecord, AnalysisSource, AnalysisWriteModel } from './analyses.types.js';

const readText = (value: unknown) => (typeof value === 'string' ? value : '');

const readSource = (value: unknown): AnalysisSource => (value === 'llm' ? 'llm' : 'mock');

const mapDocumentToAnalysis = (document: StoredRecord): AnalysisRecord => ({
  id: document.id,
  resumeId: readText(document.resume_id),
  jobId: readText(document.job_id),
  source: readSource(document.source),
  relevanceScore: readOptionalNumber(document.relevance_score) ?? 0,
  jobMatchPercentage: readOptionalNumber(document.job_match_percentage) ?? 0,
  strengths: readStringList(document.strengths),
  weaknesses: readStringList(document.weaknesses),
  recommendations: readStringList(document.recommendations),
  analysisText: readText(document.analysis_text),
  createdAt: document.created_at
});

const toDocumentFields = (model: AnalysisWriteModel): RecordFields => ({
  resume_id: model.resumeId,
  job_id: model.jobId,
  source: model.source,
  relevance_score: model.relevanceScore,
  job_match_percentage: model.jobMatchPercentage,
  strengths: model.strengths,
  weaknesses: model.weaknesses,
  recommendations: model.recommendations,
  analysis_text: model.analysisText
});

const toDocumentFilter = (filter: AnalysisFilter): RecordFields => {
  const fields: RecordFields = {};
  if (filter.resumeId !== undefined) {
    fields.resume_id = filter.resumeId;
  }
  if (filter.jobId !== undefined) {
    fields.job_id = filter.jobId;
  }
  return fields;
};

// Analyses are append-only: there is no update or delete path
export class AnalysesRepository {
  constructor(private readonly store: CollectionStore) {}

  async listAnalyses(filter: AnalysisFilter = {}): Promise<AnalysisRecord[]> {
    const documents = await this.store.findItems(toDocumentFilter(filter));
    return documents.map(mapDocumentToAnalysis);
  }

  async findAnalysis(id: string): Promise<AnalysisRecord | null> {
    const document = await this.store.getItem(id);
    return document ? mapDocumentToAnalysis(document) : null;
  }

  async createAnalysis(model: AnalysisWriteModel): Promise<AnalysisRecord> {
    const id = await this.store.addItem(toDocumentFields(model));
    const created = await this.findAnalysis(id);
    if (!created) {
      throw new StorageError(this.store.collection, `Analysis ${id} disappeared right after it was written.`);
    }
    return created;
  }
}
