import { serve } from '@hono/node-server';
import { loadConfig } from '@logloom/schemas/src/config-loader.js';
import { createMinerCheckpointer } from '@logloom/core/src/clustering/miner-checkpoint.js';
import { createTemplateMiner } from '@logloom/core/src/clustering/template-miner.js';
import { createFileMinerStateStore } from '@logloom/core/src/infrastructure/file-miner-state-store.js';
import { createKafkaMessageBus } from '@logloom/core/src/infrastructure/kafka-message-bus.js';
import { createOpenSearchClient } from '@logloom/core/src/infrastructure/opensearch-client.js';
import { createOpenSearchSearchIndexRepository } from '@logloom/core/src/infrastructure/opensearch-search-index.repository.js';
import { createPipeline } from '@logloom/core/src/orchestration/pipeline.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { toError } from '@logloom/shared/src/utils/errors.js';
import { createApp } from './app.js';

const log = createChildLogger('service:main');

async function main(): Promise<void> {
  const config = loadConfig();

  const minerStore = createFileMinerStateStore(config.minerState.path);
  const miner = createTemplateMiner({ state: await minerStore.load() });
  const checkpointer = createMinerCheckpointer(
    { source: miner, store: minerStore },
    { intervalMs: config.minerState.checkpointIntervalMs },
  );

  const repository = createOpenSearchSearchIndexRepository({
    connect: () => createOpenSearchClient(config.searchIndex),
  });

  const pipeline = createPipeline(
    {
      engine: miner,
      bus: createKafkaMessageBus(config.messaging),
      repository,
    },
    {
      index: config.searchIndex.index,
      failKeywords: config.failKeywords,
      topics: config.messaging.topics,
      tuning: config.pipeline,
    },
  );

  await pipeline.start();
  checkpointer.start();

  const app = createApp({ pipeline });
  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'Status API listening');
  });

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    log.info({ signal }, 'Shutting down');
    try {
      await pipeline.stop();
    } catch (error) {
      log.error({ error: toError(error).message }, 'Error while stopping pipeline');
    }
    try {
      await checkpointer.stop();
    } catch (error) {
      log.error({ error: toError(error).message }, 'Failed to save miner state');
    }
    process.exit(0);
  }
  process.once('SIGINT', (signal) => {
    void shutdown(signal);
  });
  process.once('SIGTERM', (signal) => {
    void shutdown(signal);
  });
}

main().catch((error: unknown) => {
  log.error({ error: toError(error).message }, 'Failed to start logloom');
  process.exit(1);
});
