import type {
  LogRecord,
  PersistBatch,
  TimestampNs,
} from '@logloom/shared/src/types/pipeline.types.js';
import type { MessagingConfig, PipelineTuning } from '@logloom/schemas/src/config.schema.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import type { ClusteringEngine } from '../clustering/clustering-capability.js';
import { createIngestionStage, type IngestionStage, type IngestionStats } from '../ingestion/ingestion-stage.js';
import type { MessageBus } from '../messaging/message-bus.js';
import {
  createPersistenceStage,
  type PersistenceStage,
  type PersistenceStats,
} from '../persistence/persistence-stage.js';
import { createBoundedQueue, type BoundedQueue } from '../queue/bounded-queue.js';
import type { SearchIndexRepository } from '../repositories/search-index.repository.js';
import {
  createRetrainSignalLoop,
  type ControllerSnapshot,
  type RetrainSignalLoop,
} from '../retrain/retrain-signal-loop.js';
import { compileKeywordPattern } from '../scoring/anomaly-scorer.js';
import { createScoringStage, type ScoringStage } from '../scoring/scoring-stage.js';
import type { TrackingSnapshot } from '../scoring/tracking-windows.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineDeps {
  readonly engine: ClusteringEngine;
  readonly bus: MessageBus;
  readonly repository: SearchIndexRepository;
  readonly clock?: () => TimestampNs;
  readonly createBatchId?: () => string;
}

export interface PipelineConfig {
  readonly index: string;
  readonly failKeywords: readonly string[];
  readonly topics: MessagingConfig['topics'];
  readonly tuning: PipelineTuning;
}

export interface QueueDepth {
  readonly size: number;
  readonly capacity: number;
}

export interface PipelineStats {
  readonly queues: { readonly logs: QueueDepth; readonly persist: QueueDepth };
  readonly tracking: TrackingSnapshot;
  readonly ingestion: IngestionStats;
  readonly persistence: PersistenceStats;
  readonly controller: ControllerSnapshot;
}

export interface Pipeline {
  readonly ingestion: IngestionStage;
  readonly scoring: ScoringStage;
  readonly persistence: PersistenceStage;
  readonly retrain: RetrainSignalLoop;
  /** Subscribes, connects the bus and starts every stage loop. */
  start(): Promise<void>;
  /** Stops the loops and closes the bus. In-flight queue contents are lost. */
  stop(): Promise<void>;
  stats(): PipelineStats;
}

function depth<T>(queue: BoundedQueue<T>): QueueDepth {
  return { size: queue.size, capacity: queue.capacity };
}

export function createPipeline(deps: PipelineDeps, config: PipelineConfig): Pipeline {
  const logQueue = createBoundedQueue<readonly LogRecord[]>(config.tuning.logQueueCapacity);
  const persistQueue = createBoundedQueue<PersistBatch>(config.tuning.persistQueueCapacity);

  const ingestion = createIngestionStage(
    { bus: deps.bus, logQueue, persistQueue },
    { logsTopic: config.topics.logs, feedbackTopic: config.topics.feedback, index: config.index },
  );

  const scoring = createScoringStage(
    { classifier: deps.engine, logQueue, persistQueue, publisher: deps.bus },
    {
      keywordPattern: compileKeywordPattern(config.failKeywords),
      index: config.index,
      predictionsTopic: config.topics.predictions,
      createBatchId: deps.createBatchId,
    },
  );

  const persistence = createPersistenceStage(
    { repository: deps.repository, persistQueue },
    { maxDeliveryAttempts: config.tuning.maxDeliveryAttempts },
  );

  const retrain = createRetrainSignalLoop(
    { clusterCounts: deps.engine, publisher: deps.bus, clock: deps.clock },
    { trainTopic: config.topics.train, intervalMs: config.tuning.signalIntervalMs },
  );

  return {
    ingestion,
    scoring,
    persistence,
    retrain,

    async start(): Promise<void> {
      await ingestion.start();
      await deps.bus.start();
      void scoring.run();
      void persistence.run();
      retrain.start();
      log.info(
        {
          index: config.index,
          keywords: config.failKeywords.length,
          logQueueCapacity: logQueue.capacity,
          persistQueueCapacity: persistQueue.capacity,
        },
        'Pipeline started',
      );
    },

    async stop(): Promise<void> {
      retrain.stop();
      scoring.stop();
      persistence.stop();
      await deps.bus.close();
      log.info(
        { pendingLogBatches: logQueue.size, pendingPersistBatches: persistQueue.size },
        'Pipeline stopped',
      );
    },

    stats(): PipelineStats {
      return {
        queues: { logs: depth(logQueue), persist: depth(persistQueue) },
        tracking: scoring.trackingWindows(),
        ingestion: ingestion.stats(),
        persistence: persistence.stats(),
        controller: retrain.snapshot(),
      };
    },
  };
}
