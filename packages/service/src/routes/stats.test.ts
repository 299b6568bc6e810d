import { describe, it, expect } from 'vitest';
import { createTemplateMiner } from '@logloom/core/src/clustering/template-miner.js';
import { createInMemoryMessageBus } from '@logloom/core/src/messaging/in-memory-message-bus.js';
import { createPipeline } from '@logloom/core/src/orchestration/pipeline.js';
import { createInMemorySearchIndexRepository } from '@logloom/core/src/repositories/in-memory-search-index.repository.js';
import { createApp } from '../app.js';
import { createStatsSource, sampleStats } from '../test-helpers.js';

describe('Stats Route', () => {
  it('should render pipeline statistics with nanosecond timestamps as strings', async () => {
    const app = createApp({ pipeline: createStatsSource() });

    const res = await app.request('/stats');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      queues: { logs: { size: 3, capacity: 1000 }, persist: { size: 0, capacity: 1000 } },
      tracking: { cluster_created: [2, 5], cluster_template_changed: [1], none: [40, 38] },
      ingestion: { logBatches: 12, feedbackBatches: 1, malformed: 2 },
      persistence: { persisted: 11, requeued: 1, dropped: 0, documentFailures: 4 },
      controller: {
        iteration: 7,
        numTemplatesAtLastTrain: 18,
        awaitingRetrainOpportunity: false,
        isStable: true,
        currentPeriodStartTs: '1700000000123456789',
        stablePeriods: 0,
        clusterCounts: [19, 19, 18],
        volatility: 0.025,
        weightedVolatility: 0.02,
        signalsSent: 1,
      },
    });
  });

  it('should report null volatility and period before the controller has data', async () => {
    const app = createApp({
      pipeline: createStatsSource({
        ...sampleStats,
        controller: { ...sampleStats.controller, currentPeriodStartTs: null, lastMetrics: null },
      }),
    });

    const res = await app.request('/stats');
    const body: unknown = await res.json();

    expect(body).toMatchObject({
      controller: { currentPeriodStartTs: null, volatility: null, weightedVolatility: null },
    });
  });

  it('should read live statistics from a pipeline', async () => {
    const bus = createInMemoryMessageBus();
    const pipeline = createPipeline(
      {
        engine: createTemplateMiner(),
        bus,
        repository: createInMemorySearchIndexRepository(),
        clock: () => 5n,
      },
      {
        index: 'logs',
        failKeywords: [],
        topics: { logs: 'logs-in', feedback: 'feedback-in', predictions: 'out', train: 'train' },
        tuning: {
          logQueueCapacity: 2,
          persistQueueCapacity: 2,
          signalIntervalMs: 20_000,
          maxDeliveryAttempts: 20,
        },
      },
    );
    await pipeline.ingestion.start();
    await bus.deliver('logs-in', '[{"_id":"doc-1","masked_log":"worker started"}]');
    await bus.deliver('feedback-in', 'not json');
    const app = createApp({ pipeline });

    const res = await app.request('/stats');

    expect(await res.json()).toMatchObject({
      queues: { logs: { size: 1, capacity: 2 }, persist: { size: 0, capacity: 2 } },
      ingestion: { logBatches: 1, feedbackBatches: 0, malformed: 1 },
      controller: { iteration: 0, currentPeriodStartTs: '5', awaitingRetrainOpportunity: true },
    });
  });
});
