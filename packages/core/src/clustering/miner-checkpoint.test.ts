import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { TemplateMinerSnapshot } from '@logloom/schemas/src/miner-state.schema.js';
import type { MinerStateStore } from '../infrastructure/file-miner-state-store.js';
import { createMinerCheckpointer } from './miner-checkpoint.js';
import { createTemplateMiner } from './template-miner.js';

function recordingStore(): MinerStateStore & { saved: TemplateMinerSnapshot[] } {
  const saved: TemplateMinerSnapshot[] = [];
  return {
    saved,
    load: () => Promise.resolve(saved[saved.length - 1]),
    save: (snapshot) => {
      saved.push(snapshot);
      return Promise.resolve();
    },
  };
}

describe('MinerCheckpointer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should save the miner on every interval', async () => {
    const miner = createTemplateMiner();
    const store = recordingStore();
    const checkpointer = createMinerCheckpointer({ source: miner, store }, { intervalMs: 1_000 });

    checkpointer.start();
    miner.classify('cache miss');
    await vi.advanceTimersByTimeAsync(1_000);
    miner.classify('cache hit');
    await vi.advanceTimersByTimeAsync(1_000);
    await checkpointer.stop();

    expect(store.saved.map((snapshot) => snapshot.clusters.length)).toEqual([1, 1, 1]);
    expect(store.saved[2].clusters[0]).toEqual({
      id: 1,
      route: 'cache',
      tokens: ['cache', '<*>'],
      support: 2,
    });
  });

  it('should write a final snapshot on stop', async () => {
    const miner = createTemplateMiner();
    const store = recordingStore();
    const checkpointer = createMinerCheckpointer({ source: miner, store });

    checkpointer.start();
    miner.classify('disk full on sda');
    await checkpointer.stop();
    await vi.advanceTimersByTimeAsync(120_000);

    expect(store.saved).toHaveLength(1);
    expect(store.saved[0].clusters[0].support).toBe(1);
  });

  it('should keep checkpointing after a failed save', async () => {
    const miner = createTemplateMiner();
    const store = recordingStore();
    const save = vi
      .fn<MinerStateStore['save']>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockImplementation(store.save);
    const checkpointer = createMinerCheckpointer(
      { source: miner, store: { load: store.load, save } },
      { intervalMs: 1_000 },
    );

    checkpointer.start();
    await vi.advanceTimersByTimeAsync(2_000);
    await checkpointer.stop();

    expect(save).toHaveBeenCalledTimes(3);
    expect(store.saved).toHaveLength(2);
  });
});
