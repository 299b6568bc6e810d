import { Client, errors } from '@opensearch-project/opensearch';
import type { SearchIndexConfig } from '@logloom/schemas/src/config.schema.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import {
  IndexConnectionError,
  IndexRequestError,
  TransientIndexError,
} from '@logloom/shared/src/utils/errors.js';

const log = createChildLogger('infrastructure:opensearch');

/** Statuses the whole bulk request may be retried on. */
const RETRYABLE_REQUEST_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

export interface BulkRequest {
  readonly index: string;
  readonly body: Record<string, unknown>[];
}

export interface BulkRequestOptions {
  readonly requestTimeout: number;
  readonly maxRetries: number;
}

/** The slice of the search client the repository relies on. */
export interface IndexClient {
  bulk(request: BulkRequest, options: BulkRequestOptions): Promise<unknown>;
  close(): Promise<void>;
}

export function toIndexError(error: unknown): Error {
  if (error instanceof errors.TimeoutError) {
    return new TransientIndexError(`Search index request timed out: ${error.message}`, undefined, error);
  }
  if (error instanceof errors.NoLivingConnectionsError || error instanceof errors.ConnectionError) {
    return new IndexConnectionError(`Search index unreachable: ${error.message}`, error);
  }
  if (error instanceof errors.ResponseError) {
    const status = error.statusCode;
    if (RETRYABLE_REQUEST_STATUSES.has(status)) {
      return new TransientIndexError(`Search index answered ${String(status)}`, status, error);
    }
    return new IndexRequestError(`Search index rejected request with ${String(status)}`, status, error);
  }
  if (error instanceof Error) {
    return new IndexRequestError(`Search index request failed: ${error.message}`, undefined, error);
  }
  return new IndexRequestError(`Search index request failed: ${String(error)}`);
}

export function createOpenSearchClient(config: SearchIndexConfig): IndexClient {
  log.info({ endpoint: config.endpoint }, 'Connecting to search index');

  const client = new Client({
    node: config.endpoint,
    auth: { username: config.username, password: config.password },
    ssl: { rejectUnauthorized: config.rejectUnauthorized },
    compression: 'gzip',
    maxRetries: 10,
    requestTimeout: 20_000,
    sniffOnStart: false,
    sniffOnConnectionFault: true,
    sniffInterval: 60_000,
  });

  return {
    async bulk(request: BulkRequest, options: BulkRequestOptions): Promise<unknown> {
      try {
        const response = await client.bulk(
          { index: request.index, body: request.body },
          { requestTimeout: options.requestTimeout, maxRetries: options.maxRetries },
        );
        return response.body;
      } catch (error) {
        throw toIndexError(error);
      }
    },

    async close(): Promise<void> {
      await client.close();
    },
  };
}
