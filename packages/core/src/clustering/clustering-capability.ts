import type { ChangeKind } from '@logloom/shared/src/types/pipeline.types.js';

export interface TemplateMatch {
  readonly changeKind: ChangeKind;
  readonly clusterId: number;
  readonly templateText: string;
  readonly clusterSupport: number;
}

/**
 * Mutating side of the clustering engine. Exactly one caller, the scoring
 * stage, may hold it.
 */
export interface TemplateClassifier {
  classify(message: string): TemplateMatch;
}

/** Read-only side, safe to poll while the classifier is in use. */
export interface ClusterCountSource {
  snapshotClusterCount(): number;
}

export interface ClusteringEngine extends TemplateClassifier, ClusterCountSource {}
