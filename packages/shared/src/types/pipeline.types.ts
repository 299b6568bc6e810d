export type ChangeKind = 'cluster_created' | 'cluster_template_changed' | 'none';

export const CHANGE_KINDS: readonly ChangeKind[] = [
  'cluster_created',
  'cluster_template_changed',
  'none',
];

export interface LogRecord {
  readonly id: string;
  readonly maskedText: string | null;
}

export interface ClassificationResult {
  readonly id: string;
  readonly changeKind: ChangeKind;
  readonly clusterId: number;
  readonly templateText: string;
  readonly clusterSupport: number;
}

export interface ScoredRecord {
  readonly id: string;
  readonly isAnomalous: boolean;
  readonly clusterId: number;
  readonly clusterSupport: number;
}

/** A scored batch on its way to the search index. */
export interface PersistBatch {
  /** Idempotency token; retried copies of a batch keep it. */
  readonly batchId: string;
  readonly index: string;
  readonly records: readonly ScoredRecord[];
}

/** Epoch nanoseconds. */
export type TimestampNs = bigint;

export interface StablePeriod {
  readonly startTs: TimestampNs;
  readonly endTs: TimestampNs;
}

export interface RetrainEvent {
  readonly modelToTrain: string;
  readonly iteration: number;
  readonly clusterCount: number;
  readonly timeIntervals: readonly StablePeriod[];
}
