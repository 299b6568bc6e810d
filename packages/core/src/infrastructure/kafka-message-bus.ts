import { CompressionTypes, Kafka, logLevel } from 'kafkajs';
import type {
  ConsumerConfig,
  ConsumerRunConfig,
  ConsumerSubscribeTopics,
  EachMessagePayload,
  ProducerRecord,
  RecordMetadata,
} from 'kafkajs';
import type { MessagingConfig } from '@logloom/schemas/src/config.schema.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { MessagingError, toError } from '@logloom/shared/src/utils/errors.js';
import type { MessageBus, MessageHandler } from '../messaging/message-bus.js';

const log = createChildLogger('infrastructure:kafka');

export interface KafkaProducerLike {
  connect(): Promise<void>;
  send(record: ProducerRecord): Promise<RecordMetadata[]>;
  disconnect(): Promise<void>;
}

export interface KafkaConsumerLike {
  connect(): Promise<void>;
  subscribe(subscription: ConsumerSubscribeTopics): Promise<void>;
  run(config: ConsumerRunConfig): Promise<void>;
  disconnect(): Promise<void>;
}

/** The part of the kafkajs client the bus drives. */
export interface KafkaClientLike {
  producer(): KafkaProducerLike;
  consumer(config: ConsumerConfig): KafkaConsumerLike;
}

export function createKafkaClient(config: MessagingConfig): KafkaClientLike {
  return new Kafka({
    clientId: config.clientId,
    brokers: [...config.brokers],
    connectionTimeout: 10_000,
    requestTimeout: 30_000,
    retry: { initialRetryTime: 300, retries: 8 },
    logLevel: logLevel.WARN,
  });
}

export const SESSION_TIMEOUT_MS = 30_000;
export const HEARTBEAT_INTERVAL_MS = 3_000;

/** Each subscribed topic gets its own group, so one stalled topic never holds the other. */
export function consumerGroupFor(groupId: string, topic: string): string {
  return `${groupId}.${topic}`;
}

/**
 * One consumer per subscribed topic. Messages are handled one at a time and
 * the offset only moves on once the handler resolves, so a handler waiting on
 * a full queue holds the partition. kafkajs only heartbeats between messages;
 * while a handler is pending the bus heartbeats for it, keeping the member in
 * its group however long the wait.
 */
export function createKafkaMessageBus(
  config: MessagingConfig,
  kafka: KafkaClientLike = createKafkaClient(config),
): MessageBus {
  const handlers = new Map<string, MessageHandler[]>();
  const producer = kafka.producer();
  let consumers: KafkaConsumerLike[] = [];
  let connected = false;
  let started = false;

  async function whileBeating<T>(
    work: Promise<T>,
    heartbeat: () => Promise<void>,
    topic: string,
  ): Promise<T> {
    const timer = setInterval(() => {
      void heartbeat().catch((error: unknown) => {
        log.warn({ topic, error: toError(error).message }, 'Heartbeat during pending handler failed');
      });
    }, HEARTBEAT_INTERVAL_MS);
    try {
      return await work;
    } finally {
      clearInterval(timer);
    }
  }

  async function dispatch({ topic, partition, message, heartbeat }: EachMessagePayload): Promise<void> {
    if (message.value === null) {
      log.warn({ topic, partition, offset: message.offset }, 'Skipping message without a value');
      return;
    }
    for (const handler of handlers.get(topic) ?? []) {
      try {
        await whileBeating(handler(message.value), heartbeat, topic);
      } catch (error) {
        log.error(
          { topic, partition, offset: message.offset, error: toError(error).message },
          'Message handler failed',
        );
        throw error;
      }
    }
  }

  async function startConsumer(topic: string): Promise<void> {
    const groupId = consumerGroupFor(config.groupId, topic);
    const consumer = kafka.consumer({
      groupId,
      sessionTimeout: SESSION_TIMEOUT_MS,
      heartbeatInterval: HEARTBEAT_INTERVAL_MS,
    });
    consumers.push(consumer);
    await consumer.connect();
    await consumer.subscribe({ topics: [topic], fromBeginning: false });
    await consumer.run({ eachMessage: dispatch });
    log.info({ topic, groupId, brokers: config.brokers }, 'Kafka consumer running');
  }

  return {
    subscribe(topic: string, handler: MessageHandler): Promise<void> {
      if (started) {
        return Promise.reject(new MessagingError(`Cannot subscribe to ${topic} after start`));
      }
      handlers.set(topic, [...(handlers.get(topic) ?? []), handler]);
      return Promise.resolve();
    },

    async start(): Promise<void> {
      if (started) return;
      started = true;
      try {
        await producer.connect();
        connected = true;
        for (const topic of handlers.keys()) {
          await startConsumer(topic);
        }
      } catch (error) {
        throw new MessagingError('Failed to start Kafka bus', toError(error));
      }
    },

    async publish(topic: string, payload: string): Promise<void> {
      if (!connected) {
        throw new MessagingError(`Cannot publish to ${topic}: producer not connected`);
      }
      try {
        await producer.send({
          topic,
          messages: [{ value: payload }],
          compression: CompressionTypes.GZIP,
        });
      } catch (error) {
        throw new MessagingError(`Failed to publish to ${topic}`, toError(error));
      }
    },

    async close(): Promise<void> {
      connected = false;
      const running = consumers;
      consumers = [];
      for (const consumer of running) {
        await consumer.disconnect();
      }
      await producer.disconnect();
      log.info('Kafka bus closed');
    },
  };
}
