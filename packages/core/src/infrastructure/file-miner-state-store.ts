import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  TemplateMinerSnapshotSchema,
  type TemplateMinerSnapshot,
} from '@logloom/schemas/src/miner-state.schema.js';
import { formatZodErrors } from '@logloom/schemas/src/validators.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { StateStoreError, toError } from '@logloom/shared/src/utils/errors.js';

const log = createChildLogger('infrastructure:miner-state');

export interface MinerStateStore {
  /** Resolves undefined when nothing has been saved yet. */
  load(): Promise<TemplateMinerSnapshot | undefined>;
  save(snapshot: TemplateMinerSnapshot): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseSnapshot(raw: string, path: string): TemplateMinerSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StateStoreError(`Miner state at ${path} is not JSON`, [], toError(error));
  }

  const result = TemplateMinerSnapshotSchema.safeParse(json);
  if (!result.success) {
    const details = formatZodErrors(result.error);
    throw new StateStoreError(`Miner state at ${path} is invalid: ${details.join('; ')}`, details);
  }
  return result.data;
}

/**
 * Keeps the miner snapshot in a single JSON file. Saves go through a sibling
 * temp file and a rename, so a crash mid-write leaves the previous snapshot.
 */
export function createFileMinerStateStore(path: string): MinerStateStore {
  const tempPath = `${path}.tmp`;

  return {
    async load(): Promise<TemplateMinerSnapshot | undefined> {
      let raw: string;
      try {
        raw = await readFile(path, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          log.info({ path }, 'No miner state found, starting empty');
          return undefined;
        }
        throw new StateStoreError(`Failed to read miner state at ${path}`, [], toError(error));
      }
      return parseSnapshot(raw, path);
    },

    async save(snapshot: TemplateMinerSnapshot): Promise<void> {
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tempPath, JSON.stringify(snapshot), 'utf8');
        await rename(tempPath, path);
      } catch (error) {
        throw new StateStoreError(`Failed to write miner state at ${path}`, [], toError(error));
      }
      log.debug({ path, clusters: snapshot.clusters.length }, 'Miner state saved');
    },
  };
}
