import { randomUUID } from 'node:crypto';
import type {
  ClassificationResult,
  LogRecord,
  PersistBatch,
  ScoredRecord,
} from '@logloom/shared/src/types/pipeline.types.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { toError } from '@logloom/shared/src/utils/errors.js';
import { encodePredictionBatch } from '@logloom/schemas/src/wire/table-codec.js';
import type { TemplateClassifier } from '../clustering/clustering-capability.js';
import type { MessagePublisher } from '../messaging/message-bus.js';
import type { BoundedQueue } from '../queue/bounded-queue.js';
import { scoreClassifications } from './anomaly-scorer.js';
import {
  createTrackingWindows,
  recordBatch,
  snapshotTrackingWindows,
  type TrackingSnapshot,
} from './tracking-windows.js';

const log = createChildLogger('scoring:stage');

export interface ScoringStageDeps {
  readonly classifier: TemplateClassifier;
  readonly logQueue: BoundedQueue<readonly LogRecord[]>;
  readonly persistQueue: BoundedQueue<PersistBatch>;
  readonly publisher: MessagePublisher;
}

export interface ScoringStageConfig {
  readonly keywordPattern: RegExp;
  readonly index: string;
  readonly predictionsTopic: string;
  readonly createBatchId?: () => string;
}

export interface ScoringStage {
  /** Takes one batch off the log queue and scores it. */
  processNext(): Promise<readonly ScoredRecord[]>;
  processBatch(records: readonly LogRecord[]): Promise<readonly ScoredRecord[]>;
  run(): Promise<void>;
  stop(): void;
  trackingWindows(): TrackingSnapshot;
}

export function createScoringStage(deps: ScoringStageDeps, config: ScoringStageConfig): ScoringStage {
  const windows = createTrackingWindows();
  const createBatchId = config.createBatchId ?? randomUUID;
  let running = false;

  function classifyAll(records: readonly LogRecord[]): ClassificationResult[] {
    const results: ClassificationResult[] = [];
    for (const record of records) {
      if (!record.maskedText) continue;
      const match = deps.classifier.classify(record.maskedText);
      results.push({ id: record.id, ...match });
    }
    return results;
  }

  async function publishPredictions(records: readonly ScoredRecord[]): Promise<void> {
    try {
      await deps.publisher.publish(config.predictionsTopic, encodePredictionBatch(records));
    } catch (error) {
      log.error(
        { topic: config.predictionsTopic, count: records.length, error: toError(error).message },
        'Failed to publish predictions',
      );
    }
  }

  async function processBatch(records: readonly LogRecord[]): Promise<readonly ScoredRecord[]> {
    const results = classifyAll(records);
    if (results.length === 0) {
      log.debug({ received: records.length }, 'Batch had no text to classify');
      return [];
    }

    recordBatch(windows, results);
    const scored = scoreClassifications(results, config.keywordPattern);
    const anomalies = scored.filter((record) => record.isAnomalous).length;
    log.info({ classified: scored.length, anomalies }, 'Scored batch');

    await publishPredictions(scored);
    await deps.persistQueue.put({ batchId: createBatchId(), index: config.index, records: scored });
    return scored;
  }

  async function processNext(): Promise<readonly ScoredRecord[]> {
    const records = await deps.logQueue.get();
    return processBatch(records);
  }

  return {
    processNext,

    processBatch,

    async run(): Promise<void> {
      running = true;
      log.info('Scoring stage started');
      while (running) {
        try {
          await processNext();
        } catch (error) {
          log.error({ error: toError(error).message }, 'Scoring iteration failed');
        }
      }
    },

    stop(): void {
      running = false;
    },

    trackingWindows(): TrackingSnapshot {
      return snapshotTrackingWindows(windows);
    },
  };
}
