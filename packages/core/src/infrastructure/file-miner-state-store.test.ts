import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StateStoreError } from '@logloom/shared/src/utils/errors.js';
import { createTemplateMiner } from '../clustering/template-miner.js';
import { createFileMinerStateStore } from './file-miner-state-store.js';

describe('FileMinerStateStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'logloom-miner-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load nothing before the first save', async () => {
    const store = createFileMinerStateStore(join(dir, 'state.json'));

    await expect(store.load()).resolves.toBeUndefined();
  });

  it('should restore a miner saved by an earlier run', async () => {
    const store = createFileMinerStateStore(join(dir, 'nested', 'state.json'));
    const miner = createTemplateMiner();
    for (let i = 0; i < 12; i++) {
      miner.classify(`worker ${String(i)} finished job`);
    }
    await store.save(miner.snapshot());

    const restored = createTemplateMiner({ state: await store.load() });

    expect(restored.classify('worker 99 finished job')).toEqual({
      changeKind: 'none',
      clusterId: 1,
      templateText: 'worker <*> finished job',
      clusterSupport: 13,
    });
  });

  it('should replace the previous snapshot on save', async () => {
    const path = join(dir, 'state.json');
    const store = createFileMinerStateStore(path);
    await store.save({ version: 1, clusters: [] });
    await store.save({
      version: 1,
      clusters: [{ id: 1, route: 'cache', tokens: ['cache', 'miss'], support: 4 }],
    });

    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({
      version: 1,
      clusters: [{ id: 1, route: 'cache', tokens: ['cache', 'miss'], support: 4 }],
    });
  });

  it('should reject a snapshot whose cluster ids have gaps', async () => {
    const path = join(dir, 'state.json');
    await writeFile(
      path,
      JSON.stringify({
        version: 1,
        clusters: [{ id: 2, route: 'cache', tokens: ['cache', 'miss'], support: 1 }],
      }),
    );

    try {
      await createFileMinerStateStore(path).load();
      expect.unreachable('load should have thrown');
    } catch (error) {
      if (!(error instanceof StateStoreError)) throw error;
      expect(error.validationErrors).toEqual(['clusters.0.id: Expected cluster id 1, got 2']);
    }
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(dir, 'state.json');
    await writeFile(path, 'not json');

    await expect(createFileMinerStateStore(path).load()).rejects.toThrow(
      `Miner state at ${path} is not JSON`,
    );
  });
});
