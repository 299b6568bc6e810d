import { describe, it, expect } from 'vitest';
import type { LogRecord, PersistBatch } from '@logloom/shared/src/types/pipeline.types.js';
import { createInMemoryMessageBus } from '../messaging/in-memory-message-bus.js';
import { createBoundedQueue } from '../queue/bounded-queue.js';
import { createIngestionStage, feedbackBatchId } from './ingestion-stage.js';

const config = { logsTopic: 'preprocessed_logs', feedbackTopic: 'anomalies', index: 'logs' };

const logPayload = JSON.stringify({
  _id: { '0': 'doc-1', '1': 'doc-2' },
  masked_log: { '0': 'connection from <IP> closed', '1': null },
});

const feedbackPayload = JSON.stringify([
  { _id: 'doc-9', drain_prediction: 1, drain_matched_template_id: 4, drain_matched_template_support: 3 },
]);

async function setup(logCapacity = 4) {
  const bus = createInMemoryMessageBus();
  const logQueue = createBoundedQueue<readonly LogRecord[]>(logCapacity);
  const persistQueue = createBoundedQueue<PersistBatch>(4);
  const stage = createIngestionStage({ bus, logQueue, persistQueue }, config);
  await stage.start();
  return { bus, logQueue, persistQueue, stage };
}

const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('IngestionStage', () => {
  it('should queue decoded log batches', async () => {
    const { bus, logQueue } = await setup();

    await bus.deliver('preprocessed_logs', logPayload);

    expect(await logQueue.get()).toEqual([
      { id: 'doc-1', maskedText: 'connection from <IP> closed' },
      { id: 'doc-2', maskedText: null },
    ]);
  });

  it('should queue anomaly feedback for persistence under a content token', async () => {
    const { bus, persistQueue } = await setup();

    await bus.deliver('anomalies', feedbackPayload);

    expect(await persistQueue.get()).toEqual({
      batchId: feedbackBatchId(new TextEncoder().encode(feedbackPayload)),
      index: 'logs',
      records: [{ id: 'doc-9', isAnomalous: true, clusterId: 4, clusterSupport: 3 }],
    });
  });

  it('should give a redelivered feedback message the same token', () => {
    const bytes = new TextEncoder().encode(feedbackPayload);
    const token = feedbackBatchId(bytes);

    expect(token).toMatch(/^feedback-[0-9a-f]{32}$/);
    expect(feedbackBatchId(new TextEncoder().encode(feedbackPayload))).toBe(token);
    expect(feedbackBatchId(new TextEncoder().encode(`${feedbackPayload} `))).not.toBe(token);
  });

  it('should drop malformed payloads and keep consuming', async () => {
    const { bus, logQueue, persistQueue, stage } = await setup();

    await bus.deliver('preprocessed_logs', 'not json');
    await bus.deliver('anomalies', JSON.stringify([{ _id: 'doc-9' }]));
    await bus.deliver('preprocessed_logs', logPayload);

    expect(stage.stats()).toEqual({ logBatches: 1, feedbackBatches: 0, malformed: 2 });
    expect(logQueue.size).toBe(1);
    expect(persistQueue.size).toBe(0);
  });

  it('should not queue an empty batch', async () => {
    const { bus, logQueue } = await setup();

    await bus.deliver('preprocessed_logs', '[]');

    expect(logQueue.size).toBe(0);
  });

  it('should hold the handler while the log queue is full', async () => {
    const { bus, logQueue } = await setup(1);
    await bus.deliver('preprocessed_logs', logPayload);

    let delivered = false;
    const pending = bus.deliver('preprocessed_logs', logPayload).then(() => {
      delivered = true;
    });
    await settle();
    expect(delivered).toBe(false);

    await logQueue.get();
    await pending;
    expect(delivered).toBe(true);
    expect(logQueue.size).toBe(1);
  });
});
