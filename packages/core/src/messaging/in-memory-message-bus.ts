import { MessagingError } from '@logloom/shared/src/utils/errors.js';
import type { MessageBus, MessageHandler } from './message-bus.js';

export interface PublishedMessage {
  readonly topic: string;
  readonly payload: string;
}

export interface InMemoryMessageBus extends MessageBus {
  readonly published: readonly PublishedMessage[];
  /** Delivers a payload to the topic's handlers, as the broker would. */
  deliver(topic: string, payload: string | Uint8Array): Promise<void>;
}

/**
 * In-process bus: publishes are recorded and routed to local subscribers,
 * handlers run one message at a time and delivery resolves only after every
 * handler has.
 */
export function createInMemoryMessageBus(): InMemoryMessageBus {
  const handlers = new Map<string, MessageHandler[]>();
  const published: PublishedMessage[] = [];
  const encoder = new TextEncoder();
  let closed = false;

  async function deliver(topic: string, payload: string | Uint8Array): Promise<void> {
    const bytes = typeof payload === 'string' ? encoder.encode(payload) : payload;
    for (const handler of handlers.get(topic) ?? []) {
      await handler(bytes);
    }
  }

  return {
    published,

    deliver,

    subscribe(topic: string, handler: MessageHandler): Promise<void> {
      const existing = handlers.get(topic) ?? [];
      handlers.set(topic, [...existing, handler]);
      return Promise.resolve();
    },

    start(): Promise<void> {
      return Promise.resolve();
    },

    async publish(topic: string, payload: string): Promise<void> {
      if (closed) {
        throw new MessagingError(`Cannot publish to ${topic}: bus is closed`);
      }
      published.push({ topic, payload });
      await deliver(topic, payload);
    },

    close(): Promise<void> {
      closed = true;
      handlers.clear();
      return Promise.resolve();
    },
  };
}
