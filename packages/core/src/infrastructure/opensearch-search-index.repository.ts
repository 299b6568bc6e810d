import { z } from 'zod';
import type { ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { IndexRequestError, toError } from '@logloom/shared/src/utils/errors.js';
import {
  APPLIED_TOKEN_HISTORY,
  RETRYABLE_DOCUMENT_STATUSES,
  type BulkOutcome,
  type DocumentFailure,
  type SearchIndexRepository,
} from '../repositories/search-index.repository.js';
import type { IndexClient } from './opensearch-client.js';

const log = createChildLogger('infrastructure:search-index');

export const BULK_REQUEST_TIMEOUT_MS = 5_000;
export const BULK_MAX_RETRIES = 1;

/**
 * Counts an anomaly prediction once per token. The level is derived from the
 * counter after the increment.
 */
export const MARK_ANOMALY_SCRIPT = [
  'if (ctx._source.anomaly_update_tokens == null) { ctx._source.anomaly_update_tokens = []; }',
  'if (ctx._source.anomaly_update_tokens.contains(params.token)) { ctx.op = "none"; } else {',
  'ctx._source.anomaly_update_tokens.add(params.token);',
  'while (ctx._source.anomaly_update_tokens.size() > params.max_tokens) { ctx._source.anomaly_update_tokens.remove(0); }',
  'if (ctx._source.anomaly_predicted_count == null) { ctx._source.anomaly_predicted_count = 0; }',
  'ctx._source.anomaly_predicted_count += 1;',
  'ctx._source.drain_anomaly = true;',
  "ctx._source.anomaly_level = ctx._source.anomaly_predicted_count == 1 ? 'Suspicious' : ctx._source.anomaly_predicted_count == 2 ? 'Anomaly' : 'Normal';",
  '}',
].join(' ');

const BulkItemSchema = z.object({
  update: z.object({
    _id: z.string(),
    status: z.number(),
    error: z
      .object({
        type: z.string(),
        reason: z.string().optional(),
      })
      .passthrough()
      .optional(),
  }),
});

const BulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(BulkItemSchema),
});

function updateHeader(index: string, id: string): Record<string, unknown> {
  return { update: { _index: index, _id: id } };
}

export function buildMarkAnomaliesBody(
  index: string,
  records: readonly ScoredRecord[],
  token: string,
): Record<string, unknown>[] {
  return records.flatMap((record) => [
    updateHeader(index, record.id),
    {
      script: {
        source: MARK_ANOMALY_SCRIPT,
        lang: 'painless',
        params: { token, max_tokens: APPLIED_TOKEN_HISTORY },
      },
    },
  ]);
}

export function buildClusterFieldsBody(
  index: string,
  records: readonly ScoredRecord[],
): Record<string, unknown>[] {
  return records.flatMap((record) => [
    updateHeader(index, record.id),
    {
      doc: {
        drain_matched_template_id: record.clusterId,
        drain_matched_template_support: record.clusterSupport,
      },
    },
  ]);
}

export function parseBulkResponse(body: unknown): BulkOutcome {
  const result = BulkResponseSchema.safeParse(body);
  if (!result.success) {
    throw new IndexRequestError('Unrecognized bulk response from search index');
  }

  const succeeded: string[] = [];
  const failed: DocumentFailure[] = [];
  for (const item of result.data.items) {
    const { _id: id, status, error } = item.update;
    if (!error && status < 300) {
      succeeded.push(id);
      continue;
    }
    failed.push({
      id,
      status,
      reason: error ? `${error.type}: ${error.reason ?? 'no reason given'}` : `status ${String(status)}`,
      retryable: RETRYABLE_DOCUMENT_STATUSES.has(status),
    });
  }
  return { succeeded, failed };
}

export interface OpenSearchSearchIndexDeps {
  /** Opens a fresh client; called once up front and again on every reconnect. */
  readonly connect: () => IndexClient;
}

export function createOpenSearchSearchIndexRepository(
  deps: OpenSearchSearchIndexDeps,
): SearchIndexRepository {
  let client = deps.connect();

  async function send(index: string, body: Record<string, unknown>[]): Promise<BulkOutcome> {
    const response = await client.bulk(
      { index, body },
      { requestTimeout: BULK_REQUEST_TIMEOUT_MS, maxRetries: BULK_MAX_RETRIES },
    );
    return parseBulkResponse(response);
  }

  return {
    async markAnomalies(
      index: string,
      records: readonly ScoredRecord[],
      token: string,
    ): Promise<BulkOutcome> {
      if (records.length === 0) return { succeeded: [], failed: [] };
      return send(index, buildMarkAnomaliesBody(index, records, token));
    },

    async updateClusterFields(index: string, records: readonly ScoredRecord[]): Promise<BulkOutcome> {
      if (records.length === 0) return { succeeded: [], failed: [] };
      return send(index, buildClusterFieldsBody(index, records));
    },

    async reconnect(): Promise<void> {
      const previous = client;
      client = deps.connect();
      try {
        await previous.close();
      } catch (error) {
        log.warn({ error: toError(error).message }, 'Failed to close previous search index client');
      }
      log.info('Search index client reconnected');
    },
  };
}
