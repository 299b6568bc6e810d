import { describe, it, expect } from 'vitest';
import { loadConfig } from './config-loader.js';
import { ConfigurationError } from '@logloom/shared/src/utils/errors.js';

const baseEnv = {
  ES_ENDPOINT: 'https://search.local:9200',
  ES_USERNAME: 'admin',
  ES_PASSWORD: 'test-secret',
};

describe('loadConfig', () => {
  it('should apply defaults for optional variables', () => {
    const config = loadConfig(baseEnv);

    expect(config.searchIndex).toEqual({
      endpoint: 'https://search.local:9200',
      username: 'admin',
      password: 'test-secret',
      index: 'logs',
      rejectUnauthorized: false,
    });
    expect(config.messaging.brokers).toEqual(['localhost:9092']);
    expect(config.messaging.topics).toEqual({
      logs: 'preprocessed_logs',
      feedback: 'anomalies',
      predictions: 'predictions',
      train: 'train',
    });
    expect(config.pipeline).toEqual({
      logQueueCapacity: 1000,
      persistQueueCapacity: 1000,
      signalIntervalMs: 20000,
      maxDeliveryAttempts: 20,
    });
    expect(config.minerState).toEqual({
      path: 'data/miner-state.json',
      checkpointIntervalMs: 60000,
    });
    expect(config.failKeywords).toEqual([]);
    expect(config.port).toBe(3000);
  });

  it('should split comma-separated lists and drop empty entries', () => {
    const config = loadConfig({
      ...baseEnv,
      FAIL_KEYWORDS: 'error, fatal,,timed out',
      KAFKA_BROKERS: 'kafka-1:9092,kafka-2:9092',
    });

    expect(config.failKeywords).toEqual(['error', 'fatal', 'timed out']);
    expect(config.messaging.brokers).toEqual(['kafka-1:9092', 'kafka-2:9092']);
  });

  it('should coerce numeric settings', () => {
    const config = loadConfig({ ...baseEnv, SIGNAL_INTERVAL_MS: '500', PORT: '8081' });

    expect(config.pipeline.signalIntervalMs).toBe(500);
    expect(config.port).toBe(8081);
  });

  it('should report every missing credential', () => {
    try {
      loadConfig({ ES_ENDPOINT: 'https://search.local:9200' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      const details = error.validationErrors;
      expect(details).toContain('ES_USERNAME: Required');
      expect(details).toContain('ES_PASSWORD: Required');
    }
  });

  it('should reject a non-numeric queue capacity', () => {
    expect(() => loadConfig({ ...baseEnv, LOG_QUEUE_CAPACITY: 'lots' })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject an empty broker list', () => {
    expect(() => loadConfig({ ...baseEnv, KAFKA_BROKERS: ' , ' })).toThrow(ConfigurationError);
  });

  it('should reject predictions published to the feedback topic', () => {
    try {
      loadConfig({ ...baseEnv, PREDICTIONS_TOPIC: 'anomalies' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.validationErrors).toEqual([
        'PREDICTIONS_TOPIC: must differ from FEEDBACK_TOPIC',
      ]);
    }
  });

  it('should reject predictions published to the logs topic', () => {
    try {
      loadConfig({ ...baseEnv, LOGS_TOPIC: 'raw', PREDICTIONS_TOPIC: 'raw' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.validationErrors).toEqual(['PREDICTIONS_TOPIC: must differ from LOGS_TOPIC']);
    }
  });

  it('should accept distinct custom topics', () => {
    const config = loadConfig({
      ...baseEnv,
      FEEDBACK_TOPIC: 'escalations',
      PREDICTIONS_TOPIC: 'anomalies',
    });

    expect(config.messaging.topics.feedback).toBe('escalations');
    expect(config.messaging.topics.predictions).toBe('anomalies');
  });
});
