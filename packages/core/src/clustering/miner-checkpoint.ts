import type { TemplateMinerSnapshot } from '@logloom/schemas/src/miner-state.schema.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { toError } from '@logloom/shared/src/utils/errors.js';
import type { MinerStateStore } from '../infrastructure/file-miner-state-store.js';

const log = createChildLogger('clustering:checkpoint');

export const DEFAULT_CHECKPOINT_INTERVAL_MS = 60_000;

export interface MinerSnapshotSource {
  snapshot(): TemplateMinerSnapshot;
}

export interface MinerCheckpointDeps {
  readonly source: MinerSnapshotSource;
  readonly store: MinerStateStore;
}

export interface MinerCheckpointConfig {
  readonly intervalMs?: number;
}

export interface MinerCheckpointer {
  /** Writes the current snapshot once. */
  checkpoint(): Promise<void>;
  start(): void;
  /** Stops the interval and writes a final snapshot. */
  stop(): Promise<void>;
}

export function createMinerCheckpointer(
  deps: MinerCheckpointDeps,
  config: MinerCheckpointConfig = {},
): MinerCheckpointer {
  const intervalMs = config.intervalMs ?? DEFAULT_CHECKPOINT_INTERVAL_MS;
  let timer: NodeJS.Timeout | undefined;
  let pending: Promise<void> | undefined;

  async function write(): Promise<void> {
    const snapshot = deps.source.snapshot();
    await deps.store.save(snapshot);
  }

  // Saves never overlap: a checkpoint requested mid-save waits for that save to settle.
  async function checkpoint(): Promise<void> {
    while (pending) {
      await Promise.allSettled([pending]);
    }
    pending = write();
    try {
      await pending;
    } finally {
      pending = undefined;
    }
  }

  async function onInterval(): Promise<void> {
    try {
      await checkpoint();
    } catch (error) {
      log.error({ error: toError(error).message }, 'Miner checkpoint failed');
    }
  }

  return {
    checkpoint,

    start(): void {
      if (timer) return;
      timer = setInterval(() => {
        void onInterval();
      }, intervalMs);
      log.info({ intervalMs }, 'Miner checkpoints started');
    },

    async stop(): Promise<void> {
      clearInterval(timer);
      timer = undefined;
      await checkpoint();
    },
  };
}
