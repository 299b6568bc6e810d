import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

const QueueDepthSchema = z.object({
  size: z.number().int(),
  capacity: z.number().int(),
});

const CountWindowSchema = z.array(z.number()).openapi({
  description: 'Per-batch counts, most recent first',
});

export const StatsResponseSchema = z
  .object({
    queues: z.object({
      logs: QueueDepthSchema,
      persist: QueueDepthSchema,
    }),
    tracking: z.object({
      cluster_created: CountWindowSchema,
      cluster_template_changed: CountWindowSchema,
      none: CountWindowSchema,
    }),
    ingestion: z.object({
      logBatches: z.number().int(),
      feedbackBatches: z.number().int(),
      malformed: z.number().int(),
    }),
    persistence: z.object({
      persisted: z.number().int(),
      requeued: z.number().int(),
      dropped: z.number().int(),
      documentFailures: z.number().int(),
    }),
    controller: z.object({
      iteration: z.number().int(),
      numTemplatesAtLastTrain: z.number().int(),
      awaitingRetrainOpportunity: z.boolean(),
      isStable: z.boolean(),
      currentPeriodStartTs: z.string().nullable().openapi({
        description: 'Epoch nanoseconds, as a decimal string',
      }),
      stablePeriods: z.number().int(),
      clusterCounts: z.array(z.number()),
      volatility: z.number().nullable(),
      weightedVolatility: z.number().nullable(),
      signalsSent: z.number().int(),
    }),
  })
  .openapi('StatsResponse');

export type StatsResponse = z.infer<typeof StatsResponseSchema>;
