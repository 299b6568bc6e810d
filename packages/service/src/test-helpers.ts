import type { PipelineStats } from '@logloom/core/src/orchestration/pipeline.js';
import type { StatsSource } from './routes/stats.js';

export const sampleStats: PipelineStats = {
  queues: { logs: { size: 3, capacity: 1000 }, persist: { size: 0, capacity: 1000 } },
  tracking: { cluster_created: [2, 5], cluster_template_changed: [1], none: [40, 38] },
  ingestion: { logBatches: 12, feedbackBatches: 1, malformed: 2 },
  persistence: { persisted: 11, requeued: 1, dropped: 0, documentFailures: 4 },
  controller: {
    iteration: 7,
    numTemplatesAtLastTrain: 18,
    awaitingRetrainOpportunity: false,
    isStable: true,
    currentPeriodStartTs: 1_700_000_000_123_456_789n,
    historyLength: 0,
    samples: [19, 19, 18],
    lastMetrics: { vol: 0.025, weightedMean: 18.75, weightedVol: 0.02 },
    signalsSent: 1,
  },
};

/** A fixed stats source, for route tests that need no running pipeline. */
export function createStatsSource(stats: PipelineStats = sampleStats): StatsSource {
  return { stats: () => stats };
}
