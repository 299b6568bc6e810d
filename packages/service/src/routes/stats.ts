import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { PipelineStats } from '@logloom/core/src/orchestration/pipeline.js';
import { createRouter, type AppEnv } from '../types.js';
import { StatsResponseSchema, type StatsResponse } from '../schemas/responses.js';

export interface StatsSource {
  stats(): PipelineStats;
}

const statsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Stats'],
  summary: 'Queue depths, change-kind windows and retrain controller state',
  responses: {
    200: {
      description: 'Current pipeline statistics',
      content: {
        'application/json': {
          schema: StatsResponseSchema,
        },
      },
    },
  },
});

export function toStatsResponse(stats: PipelineStats): StatsResponse {
  const { controller } = stats;
  return {
    queues: stats.queues,
    tracking: stats.tracking,
    ingestion: stats.ingestion,
    persistence: stats.persistence,
    controller: {
      iteration: controller.iteration,
      numTemplatesAtLastTrain: controller.numTemplatesAtLastTrain,
      awaitingRetrainOpportunity: controller.awaitingRetrainOpportunity,
      isStable: controller.isStable,
      currentPeriodStartTs:
        controller.currentPeriodStartTs === null ? null : controller.currentPeriodStartTs.toString(),
      stablePeriods: controller.historyLength,
      clusterCounts: controller.samples,
      volatility: controller.lastMetrics?.vol ?? null,
      weightedVolatility: controller.lastMetrics?.weightedVol ?? null,
      signalsSent: controller.signalsSent,
    },
  };
}

export function createStatsRoutes(source: StatsSource): OpenAPIHono<AppEnv> {
  const router = createRouter();

  router.openapi(statsRoute, (c) => {
    return c.json(toStatsResponse(source.stats()), 200);
  });

  return router;
}
