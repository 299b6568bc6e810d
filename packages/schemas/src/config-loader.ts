import { ConfigurationError } from '@logloom/shared/src/utils/errors.js';
import { EnvSchema } from './config.schema.js';
import type { AppConfig } from './config.schema.js';
import { formatZodErrors } from './validators.js';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const details = formatZodErrors(result.error);
    throw new ConfigurationError(
      `Invalid environment configuration: ${details.join('; ')}`,
      details,
    );
  }

  const parsed = result.data;

  return {
    searchIndex: {
      endpoint: parsed.ES_ENDPOINT,
      username: parsed.ES_USERNAME,
      password: parsed.ES_PASSWORD,
      index: parsed.ES_INDEX,
      rejectUnauthorized: parsed.ES_REJECT_UNAUTHORIZED,
    },
    messaging: {
      brokers: parsed.KAFKA_BROKERS,
      clientId: parsed.KAFKA_CLIENT_ID,
      groupId: parsed.KAFKA_GROUP_ID,
      topics: {
        logs: parsed.LOGS_TOPIC,
        feedback: parsed.FEEDBACK_TOPIC,
        predictions: parsed.PREDICTIONS_TOPIC,
        train: parsed.TRAIN_TOPIC,
      },
    },
    pipeline: {
      logQueueCapacity: parsed.LOG_QUEUE_CAPACITY,
      persistQueueCapacity: parsed.PERSIST_QUEUE_CAPACITY,
      signalIntervalMs: parsed.SIGNAL_INTERVAL_MS,
      maxDeliveryAttempts: parsed.MAX_DELIVERY_ATTEMPTS,
    },
    minerState: {
      path: parsed.MINER_STATE_PATH,
      checkpointIntervalMs: parsed.MINER_CHECKPOINT_INTERVAL_MS,
    },
    failKeywords: parsed.FAIL_KEYWORDS,
    port: parsed.PORT,
  };
}
