import type { PersistBatch, ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import {
  IndexConnectionError,
  TransientIndexError,
  toError,
} from '@logloom/shared/src/utils/errors.js';
import type { BoundedQueue } from '../queue/bounded-queue.js';
import type {
  BulkOutcome,
  DocumentFailure,
  SearchIndexRepository,
} from '../repositories/search-index.repository.js';

const log = createChildLogger('persistence:stage');

export const DEFAULT_MAX_DELIVERY_ATTEMPTS = 20;

export type PersistOutcome = 'persisted' | 'requeued' | 'dropped';

export interface PersistenceStats {
  readonly persisted: number;
  readonly requeued: number;
  readonly dropped: number;
  readonly documentFailures: number;
}

export interface PersistenceStageDeps {
  readonly repository: SearchIndexRepository;
  readonly persistQueue: BoundedQueue<PersistBatch>;
}

export interface PersistenceStageConfig {
  readonly maxDeliveryAttempts?: number;
}

export interface PersistenceStage {
  processNext(): Promise<PersistOutcome>;
  processBatch(batch: PersistBatch): Promise<PersistOutcome>;
  run(): Promise<void>;
  stop(): void;
  stats(): PersistenceStats;
}

export function partitionByAnomaly(records: readonly ScoredRecord[]): {
  readonly anomalous: readonly ScoredRecord[];
  readonly normal: readonly ScoredRecord[];
} {
  const anomalous: ScoredRecord[] = [];
  const normal: ScoredRecord[] = [];
  for (const record of records) {
    (record.isAnomalous ? anomalous : normal).push(record);
  }
  return { anomalous, normal };
}

export function createPersistenceStage(
  deps: PersistenceStageDeps,
  config: PersistenceStageConfig = {},
): PersistenceStage {
  const maxDeliveryAttempts = config.maxDeliveryAttempts ?? DEFAULT_MAX_DELIVERY_ATTEMPTS;
  const attempts = new Map<string, number>();
  const counters = { persisted: 0, requeued: 0, dropped: 0, documentFailures: 0 };
  let running = false;

  function settle(batch: PersistBatch, outcome: PersistOutcome): PersistOutcome {
    if (outcome !== 'requeued') attempts.delete(batch.batchId);
    counters[outcome] += 1;
    return outcome;
  }

  function retry(batch: PersistBatch, attempt: number, reason: string): PersistOutcome {
    if (attempt >= maxDeliveryAttempts) {
      log.error(
        { batchId: batch.batchId, attempts: attempt, records: batch.records.length, reason },
        'Dropping poison batch',
      );
      return settle(batch, 'dropped');
    }
    log.warn(
      { batchId: batch.batchId, attempt, records: batch.records.length, reason },
      'Re-queueing batch',
    );
    deps.persistQueue.requeue(batch);
    return settle(batch, 'requeued');
  }

  function logFailures(batch: PersistBatch, operation: string, outcome: BulkOutcome): void {
    for (const failure of outcome.failed) {
      counters.documentFailures += 1;
      log.warn(
        {
          batchId: batch.batchId,
          operation,
          id: failure.id,
          status: failure.status,
          reason: failure.reason,
          retryable: failure.retryable,
        },
        'Document update failed',
      );
    }
  }

  async function reconnect(): Promise<void> {
    try {
      await deps.repository.reconnect();
    } catch (error) {
      log.error({ error: toError(error).message }, 'Search index reconnect failed');
    }
  }

  async function processBatch(batch: PersistBatch): Promise<PersistOutcome> {
    const attempt = (attempts.get(batch.batchId) ?? 0) + 1;
    attempts.set(batch.batchId, attempt);

    const { anomalous } = partitionByAnomaly(batch.records);
    let failures: DocumentFailure[];
    try {
      const marked = await deps.repository.markAnomalies(batch.index, anomalous, batch.batchId);
      logFailures(batch, 'mark_anomalies', marked);
      const clustered = await deps.repository.updateClusterFields(batch.index, batch.records);
      logFailures(batch, 'update_cluster_fields', clustered);
      failures = [...marked.failed, ...clustered.failed];
    } catch (error) {
      if (error instanceof TransientIndexError) {
        return retry(batch, attempt, error.message);
      }
      if (error instanceof IndexConnectionError) {
        await reconnect();
        return retry(batch, attempt, error.message);
      }
      log.error(
        { batchId: batch.batchId, records: batch.records.length, error: toError(error).message },
        'Bulk update rejected; batch not retried',
      );
      return settle(batch, 'dropped');
    }

    const retryIds = new Set(failures.filter((failure) => failure.retryable).map((failure) => failure.id));
    if (retryIds.size > 0) {
      const remaining = batch.records.filter((record) => retryIds.has(record.id));
      return retry(
        { ...batch, records: remaining },
        attempt,
        `${String(remaining.length)} documents failed with a retryable status`,
      );
    }

    log.debug(
      { batchId: batch.batchId, records: batch.records.length, anomalies: anomalous.length },
      'Persisted batch',
    );
    return settle(batch, 'persisted');
  }

  async function processNext(): Promise<PersistOutcome> {
    const batch = await deps.persistQueue.get();
    return processBatch(batch);
  }

  return {
    processNext,

    processBatch,

    async run(): Promise<void> {
      running = true;
      log.info({ maxDeliveryAttempts }, 'Persistence stage started');
      while (running) {
        try {
          await processNext();
        } catch (error) {
          log.error({ error: toError(error).message }, 'Persistence iteration failed');
        }
      }
    },

    stop(): void {
      running = false;
    },

    stats(): PersistenceStats {
      return { ...counters };
    },
  };
}
