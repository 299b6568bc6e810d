import type { ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';
import {
  anomalyLevelForCount,
  APPLIED_TOKEN_HISTORY,
  type AnomalyLevel,
  type BulkOutcome,
  type DocumentFailure,
  type SearchIndexRepository,
} from './search-index.repository.js';

export interface IndexedLogDocument {
  readonly id: string;
  readonly anomalyPredictedCount: number;
  readonly drainAnomaly: boolean;
  readonly anomalyLevel?: AnomalyLevel;
  readonly clusterId?: number;
  readonly clusterSupport?: number;
  readonly appliedTokens: readonly string[];
}

export interface InMemorySearchIndexRepository extends SearchIndexRepository {
  /** Indexes empty log documents so later updates have something to hit. */
  seed(index: string, ids: readonly string[]): void;
  getDocument(index: string, id: string): IndexedLogDocument | undefined;
  readonly reconnectCount: number;
}

function missing(id: string): DocumentFailure {
  return {
    id,
    status: 404,
    reason: `document_missing_exception: [${id}]: document missing`,
    retryable: false,
  };
}

export function createInMemorySearchIndexRepository(): InMemorySearchIndexRepository {
  const indices = new Map<string, Map<string, IndexedLogDocument>>();
  let reconnectCount = 0;

  function documentsOf(index: string): Map<string, IndexedLogDocument> {
    let docs = indices.get(index);
    if (!docs) {
      docs = new Map();
      indices.set(index, docs);
    }
    return docs;
  }

  function applyEach(
    index: string,
    records: readonly ScoredRecord[],
    update: (doc: IndexedLogDocument, record: ScoredRecord) => IndexedLogDocument,
  ): BulkOutcome {
    const docs = documentsOf(index);
    const succeeded: string[] = [];
    const failed: DocumentFailure[] = [];
    for (const record of records) {
      const doc = docs.get(record.id);
      if (!doc) {
        failed.push(missing(record.id));
        continue;
      }
      docs.set(record.id, update(doc, record));
      succeeded.push(record.id);
    }
    return { succeeded, failed };
  }

  return {
    get reconnectCount(): number {
      return reconnectCount;
    },

    seed(index: string, ids: readonly string[]): void {
      const docs = documentsOf(index);
      for (const id of ids) {
        docs.set(id, { id, anomalyPredictedCount: 0, drainAnomaly: false, appliedTokens: [] });
      }
    },

    getDocument(index: string, id: string): IndexedLogDocument | undefined {
      return indices.get(index)?.get(id);
    },

    markAnomalies(
      index: string,
      records: readonly ScoredRecord[],
      token: string,
    ): Promise<BulkOutcome> {
      const outcome = applyEach(index, records, (doc) => {
        if (doc.appliedTokens.includes(token)) return doc;
        const count = doc.anomalyPredictedCount + 1;
        return {
          ...doc,
          anomalyPredictedCount: count,
          drainAnomaly: true,
          anomalyLevel: anomalyLevelForCount(count),
          appliedTokens: [...doc.appliedTokens, token].slice(-APPLIED_TOKEN_HISTORY),
        };
      });
      return Promise.resolve(outcome);
    },

    updateClusterFields(index: string, records: readonly ScoredRecord[]): Promise<BulkOutcome> {
      const outcome = applyEach(index, records, (doc, record) => ({
        ...doc,
        clusterId: record.clusterId,
        clusterSupport: record.clusterSupport,
      }));
      return Promise.resolve(outcome);
    },

    reconnect(): Promise<void> {
      reconnectCount += 1;
      return Promise.resolve();
    },
  };
}
