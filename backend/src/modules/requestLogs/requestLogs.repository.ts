import type { CollectionStore, StoredRecord } from '../../shared/storage/collectionStore.types.js';
import { readOptionalNumber } from '../../shared/utils/readers.js';
import type { RequestLogEntry } from './requestLogs.types.js';

const readText = (value: unknown) => (typeof value === 'string' ? value : '');

const readNullableText = (value: unknown) => (typeof value === 'string' ? value : null);

const mapDocumentToEntry = (document: StoredRecord): RequestLogEntry => ({
  ts: readText(document.ts),
  method: readText(document.method),
  path: readText(document.path),
  status: readOptionalNumber(document.status) ?? 0,
  user: readNullableText(document.user),
  ip: readNullableText(document.ip),
  durationMs: readOptionalNumber(document.duration_ms) ?? 0
});

export class RequestLogsRepository {
  constructor(private readonly store: CollectionStore) {}

  async append(entry: RequestLogEntry): Promise<void> {
    await this.store.addItem({
      ts: entry.ts,
      method: entry.method,
      path: entry.path,
      status: entry.status,
      user: entry.user,
      ip: entry.ip,
      duration_ms: entry.durationMs
    });
  }

  async listRecent(limit: number): Promise<RequestLogEntry[]> {
    const documents = await this.store.readAll();
    return documents.slice(-limit).map(mapDocumentToEntry);
  }
}
