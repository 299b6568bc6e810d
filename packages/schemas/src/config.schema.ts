import { z } from 'zod';

const positiveInt = (fallback: number): z.ZodDefault<z.ZodNumber> =>
  z.coerce.number().int().positive().default(fallback);

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const EnvSchema = z
  .object({
    ES_ENDPOINT: z.string().url(),
    ES_USERNAME: z.string().min(1),
    ES_PASSWORD: z.string().min(1),
    ES_INDEX: z.string().min(1).default('logs'),
    ES_REJECT_UNAUTHORIZED: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),

    FAIL_KEYWORDS: z.string().default('').transform(splitList),

    KAFKA_BROKERS: z
      .string()
      .default('localhost:9092')
      .transform(splitList)
      .pipe(z.array(z.string()).min(1)),
    KAFKA_CLIENT_ID: z.string().min(1).default('logloom'),
    KAFKA_GROUP_ID: z.string().min(1).default('logloom-scoring'),

    LOGS_TOPIC: z.string().min(1).default('preprocessed_logs'),
    FEEDBACK_TOPIC: z.string().min(1).default('anomalies'),
    PREDICTIONS_TOPIC: z.string().min(1).default('predictions'),
    TRAIN_TOPIC: z.string().min(1).default('train'),

    LOG_QUEUE_CAPACITY: positiveInt(1000),
    PERSIST_QUEUE_CAPACITY: positiveInt(1000),
    SIGNAL_INTERVAL_MS: positiveInt(20_000),
    MAX_DELIVERY_ATTEMPTS: positiveInt(20),

    MINER_STATE_PATH: z.string().min(1).default('data/miner-state.json'),
    MINER_CHECKPOINT_INTERVAL_MS: positiveInt(60_000),

    PORT: positiveInt(3000),
  })
  .superRefine((env, ctx) => {
    // Outbound predictions must never land on a topic this service consumes.
    if (env.PREDICTIONS_TOPIC === env.FEEDBACK_TOPIC) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PREDICTIONS_TOPIC'],
        message: 'must differ from FEEDBACK_TOPIC',
      });
    }
    if (env.PREDICTIONS_TOPIC === env.LOGS_TOPIC) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PREDICTIONS_TOPIC'],
        message: 'must differ from LOGS_TOPIC',
      });
    }
  });

export type EnvInput = z.input<typeof EnvSchema>;

export interface SearchIndexConfig {
  readonly endpoint: string;
  readonly username: string;
  readonly password: string;
  readonly index: string;
  readonly rejectUnauthorized: boolean;
}

export interface MessagingConfig {
  readonly brokers: readonly string[];
  readonly clientId: string;
  readonly groupId: string;
  readonly topics: {
    readonly logs: string;
    readonly feedback: string;
    readonly predictions: string;
    readonly train: string;
  };
}

export interface PipelineTuning {
  readonly logQueueCapacity: number;
  readonly persistQueueCapacity: number;
  readonly signalIntervalMs: number;
  readonly maxDeliveryAttempts: number;
}

export interface MinerStateConfig {
  readonly path: string;
  readonly checkpointIntervalMs: number;
}

export interface AppConfig {
  readonly searchIndex: SearchIndexConfig;
  readonly messaging: MessagingConfig;
  readonly pipeline: PipelineTuning;
  readonly minerState: MinerStateConfig;
  readonly failKeywords: readonly string[];
  readonly port: number;
}
