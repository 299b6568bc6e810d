import type { ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';

export type AnomalyLevel = 'Suspicious' | 'Anomaly' | 'Normal';

/** How many applied idempotency tokens a document remembers. */
export const APPLIED_TOKEN_HISTORY = 20;

/** Statuses worth another attempt when a single document fails inside a bulk call. */
export const RETRYABLE_DOCUMENT_STATUSES: ReadonlySet<number> = new Set([409, 429, 500, 502, 503, 504]);

export interface DocumentFailure {
  readonly id: string;
  readonly status: number;
  readonly reason: string;
  readonly retryable: boolean;
}

export interface BulkOutcome {
  readonly succeeded: readonly string[];
  readonly failed: readonly DocumentFailure[];
}

/**
 * Bulk updates against log documents that already exist in the index.
 * Call-level failures reject with TransientIndexError, IndexConnectionError
 * or IndexRequestError; document-level failures are reported in the outcome.
 */
export interface SearchIndexRepository {
  /**
   * Bumps the anomaly counter and level of each document once per token:
   * replaying a token on a document that already recorded it changes nothing.
   */
  markAnomalies(index: string, records: readonly ScoredRecord[], token: string): Promise<BulkOutcome>;
  updateClusterFields(index: string, records: readonly ScoredRecord[]): Promise<BulkOutcome>;
  reconnect(): Promise<void>;
}

export function anomalyLevelForCount(count: number): AnomalyLevel {
  if (count === 1) return 'Suspicious';
  if (count === 2) return 'Anomaly';
  return 'Normal';
}
