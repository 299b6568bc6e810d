import { describe, it, expect, vi } from 'vitest';
import { errors } from '@opensearch-project/opensearch';
import type { ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';
import {
  IndexConnectionError,
  IndexRequestError,
  TransientIndexError,
} from '@logloom/shared/src/utils/errors.js';
import { toIndexError } from './opensearch-client.js';
import type { IndexClient } from './opensearch-client.js';
import {
  BULK_MAX_RETRIES,
  BULK_REQUEST_TIMEOUT_MS,
  MARK_ANOMALY_SCRIPT,
  createOpenSearchSearchIndexRepository,
  parseBulkResponse,
} from './opensearch-search-index.repository.js';

const records: ScoredRecord[] = [
  { id: 'doc-1', isAnomalous: true, clusterId: 5, clusterSupport: 2 },
  { id: 'doc-2', isAnomalous: true, clusterId: 8, clusterSupport: 3 },
];

function fakeClient(response: unknown): IndexClient {
  return {
    bulk: vi.fn().mockResolvedValue(response),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

const allUpdated = {
  errors: false,
  items: [
    { update: { _id: 'doc-1', status: 200, result: 'updated' } },
    { update: { _id: 'doc-2', status: 200, result: 'noop' } },
  ],
};

describe('OpenSearchSearchIndexRepository', () => {
  it('should send one scripted update per anomalous document', async () => {
    const client = fakeClient(allUpdated);
    const repo = createOpenSearchSearchIndexRepository({ connect: () => client });

    const outcome = await repo.markAnomalies('logs', records, 'batch-7');

    expect(outcome).toEqual({ succeeded: ['doc-1', 'doc-2'], failed: [] });
    expect(client.bulk).toHaveBeenCalledWith(
      {
        index: 'logs',
        body: [
          { update: { _index: 'logs', _id: 'doc-1' } },
          {
            script: {
              source: MARK_ANOMALY_SCRIPT,
              lang: 'painless',
              params: { token: 'batch-7', max_tokens: 20 },
            },
          },
          { update: { _index: 'logs', _id: 'doc-2' } },
          {
            script: {
              source: MARK_ANOMALY_SCRIPT,
              lang: 'painless',
              params: { token: 'batch-7', max_tokens: 20 },
            },
          },
        ],
      },
      { requestTimeout: BULK_REQUEST_TIMEOUT_MS, maxRetries: BULK_MAX_RETRIES },
    );
  });

  it('should send partial document updates for cluster fields', async () => {
    const client = fakeClient(allUpdated);
    const repo = createOpenSearchSearchIndexRepository({ connect: () => client });

    await repo.updateClusterFields('logs', records.slice(0, 1));

    expect(client.bulk).toHaveBeenCalledWith(
      {
        index: 'logs',
        body: [
          { update: { _index: 'logs', _id: 'doc-1' } },
          { doc: { drain_matched_template_id: 5, drain_matched_template_support: 2 } },
        ],
      },
      { requestTimeout: 5000, maxRetries: 1 },
    );
  });

  it('should skip the request for an empty subset', async () => {
    const client = fakeClient(allUpdated);
    const repo = createOpenSearchSearchIndexRepository({ connect: () => client });

    expect(await repo.markAnomalies('logs', [], 'batch-7')).toEqual({ succeeded: [], failed: [] });
    expect(client.bulk).not.toHaveBeenCalled();
  });

  it('should swap in a new client on reconnect and close the old one', async () => {
    const first = fakeClient(allUpdated);
    const second = fakeClient(allUpdated);
    const connect = vi.fn<() => IndexClient>().mockReturnValueOnce(first).mockReturnValueOnce(second);
    const repo = createOpenSearchSearchIndexRepository({ connect });

    await repo.reconnect();
    await repo.updateClusterFields('logs', records);

    expect(connect).toHaveBeenCalledTimes(2);
    expect(first.close).toHaveBeenCalledTimes(1);
    expect(first.bulk).not.toHaveBeenCalled();
    expect(second.bulk).toHaveBeenCalledTimes(1);
  });

  it('should still reconnect when closing the old client fails', async () => {
    const broken: IndexClient = {
      bulk: vi.fn(),
      close: vi.fn().mockRejectedValue(new Error('socket hang up')),
    };
    const replacement = fakeClient(allUpdated);
    const connect = vi
      .fn<() => IndexClient>()
      .mockReturnValueOnce(broken)
      .mockReturnValueOnce(replacement);
    const repo = createOpenSearchSearchIndexRepository({ connect });

    await expect(repo.reconnect()).resolves.toBeUndefined();
    await repo.updateClusterFields('logs', records);
    expect(replacement.bulk).toHaveBeenCalledTimes(1);
  });
});

describe('parseBulkResponse', () => {
  it('should split per-document failures from successes', () => {
    const outcome = parseBulkResponse({
      errors: true,
      items: [
        { update: { _id: 'doc-1', status: 200 } },
        {
          update: {
            _id: 'doc-2',
            status: 404,
            error: { type: 'document_missing_exception', reason: '[doc-2]: document missing' },
          },
        },
        {
          update: {
            _id: 'doc-3',
            status: 429,
            error: { type: 'es_rejected_execution_exception' },
          },
        },
      ],
    });

    expect(outcome).toEqual({
      succeeded: ['doc-1'],
      failed: [
        {
          id: 'doc-2',
          status: 404,
          reason: 'document_missing_exception: [doc-2]: document missing',
          retryable: false,
        },
        {
          id: 'doc-3',
          status: 429,
          reason: 'es_rejected_execution_exception: no reason given',
          retryable: true,
        },
      ],
    });
  });

  it('should reject a response it does not recognize', () => {
    expect(() => parseBulkResponse({ took: 3 })).toThrow(IndexRequestError);
  });
});

describe('toIndexError', () => {
  it('should treat timeouts as transient', () => {
    expect(toIndexError(new errors.TimeoutError('Request timed out'))).toBeInstanceOf(
      TransientIndexError,
    );
  });

  it('should treat connection failures as needing a reconnect', () => {
    expect(toIndexError(new errors.ConnectionError('connect ECONNREFUSED'))).toBeInstanceOf(
      IndexConnectionError,
    );
  });

  it('should treat anything else as a rejected request', () => {
    expect(toIndexError(new Error('boom'))).toBeInstanceOf(IndexRequestError);
    expect(toIndexError('boom')).toBeInstanceOf(IndexRequestError);
  });
});
