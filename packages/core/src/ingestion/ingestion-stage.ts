import { createHash } from 'node:crypto';
import type { LogRecord, PersistBatch } from '@logloom/shared/src/types/pipeline.types.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { PayloadDecodeError } from '@logloom/shared/src/utils/errors.js';
import { decodeLogBatch, decodePredictionBatch } from '@logloom/schemas/src/wire/table-codec.js';
import type { MessageBus } from '../messaging/message-bus.js';
import type { BoundedQueue } from '../queue/bounded-queue.js';

const log = createChildLogger('ingestion:stage');

export interface IngestionStageDeps {
  readonly bus: Pick<MessageBus, 'subscribe'>;
  readonly logQueue: BoundedQueue<readonly LogRecord[]>;
  readonly persistQueue: BoundedQueue<PersistBatch>;
}

export interface IngestionStageConfig {
  readonly logsTopic: string;
  readonly feedbackTopic: string;
  readonly index: string;
}

export interface IngestionStats {
  readonly logBatches: number;
  readonly feedbackBatches: number;
  readonly malformed: number;
}

export interface IngestionStage {
  /** Registers both topic handlers on the bus. */
  start(): Promise<void>;
  handleLogs(payload: Uint8Array): Promise<void>;
  handleFeedback(payload: Uint8Array): Promise<void>;
  stats(): IngestionStats;
}

/**
 * Feedback batches carry no id of their own. Hashing the payload gives a
 * redelivered message the same token, so the index counts it once.
 */
export function feedbackBatchId(payload: Uint8Array): string {
  return `feedback-${createHash('sha256').update(payload).digest('hex').slice(0, 32)}`;
}

export function createIngestionStage(
  deps: IngestionStageDeps,
  config: IngestionStageConfig,
): IngestionStage {
  const counters = { logBatches: 0, feedbackBatches: 0, malformed: 0 };

  function dropMalformed(topic: string, error: PayloadDecodeError): void {
    counters.malformed += 1;
    log.warn(
      { topic, error: error.message, details: error.validationErrors },
      'Dropping malformed message',
    );
  }

  async function handleLogs(payload: Uint8Array): Promise<void> {
    let records: LogRecord[];
    try {
      records = decodeLogBatch(payload);
    } catch (error) {
      if (error instanceof PayloadDecodeError) {
        dropMalformed(config.logsTopic, error);
        return;
      }
      throw error;
    }
    if (records.length === 0) return;

    await deps.logQueue.put(records);
    counters.logBatches += 1;
    log.debug({ records: records.length, queued: deps.logQueue.size }, 'Queued log batch');
  }

  async function handleFeedback(payload: Uint8Array): Promise<void> {
    let batch: PersistBatch;
    try {
      batch = {
        batchId: feedbackBatchId(payload),
        index: config.index,
        records: decodePredictionBatch(payload),
      };
    } catch (error) {
      if (error instanceof PayloadDecodeError) {
        dropMalformed(config.feedbackTopic, error);
        return;
      }
      throw error;
    }
    if (batch.records.length === 0) return;

    await deps.persistQueue.put(batch);
    counters.feedbackBatches += 1;
    log.debug({ batchId: batch.batchId, records: batch.records.length }, 'Queued anomaly feedback');
  }

  return {
    handleLogs,

    handleFeedback,

    async start(): Promise<void> {
      await deps.bus.subscribe(config.logsTopic, handleLogs);
      await deps.bus.subscribe(config.feedbackTopic, handleFeedback);
      log.info(
        { logsTopic: config.logsTopic, feedbackTopic: config.feedbackTopic },
        'Ingestion stage subscribed',
      );
    },

    stats(): IngestionStats {
      return { ...counters };
    },
  };
}
