import type { ChangeKind } from '@logloom/shared/src/types/pipeline.types.js';
import {
  MINER_STATE_VERSION,
  type TemplateMinerSnapshot,
} from '@logloom/schemas/src/miner-state.schema.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import type { ClusteringEngine, TemplateMatch } from './clustering-capability.js';

const log = createChildLogger('clustering:template-miner');

export const WILDCARD = '<*>';

export interface TemplateMinerOptions {
  /** Minimum share of matching tokens for a message to join a cluster. */
  readonly similarityThreshold?: number;
  /** Distinct leading tokens per length bucket before overflow goes to the wildcard branch. */
  readonly maxChildren?: number;
  /** Clusters learned by an earlier run. */
  readonly state?: TemplateMinerSnapshot;
}

export interface TemplateSummary {
  readonly clusterId: number;
  readonly template: string;
  readonly support: number;
}

export interface TemplateMiner extends ClusteringEngine {
  templates(): TemplateSummary[];
  /** Everything needed to resume learning where this miner stands. */
  snapshot(): TemplateMinerSnapshot;
}

interface Cluster {
  readonly id: number;
  readonly route: string;
  tokens: string[];
  support: number;
}

const DEFAULT_SIMILARITY_THRESHOLD = 0.4;
const DEFAULT_MAX_CHILDREN = 100;

function tokenize(message: string): string[] {
  return message.trim().split(/\s+/).filter((token) => token.length > 0);
}

function hasDigit(token: string): boolean {
  return /\d/.test(token);
}

/** Share of positions where the template carries the message token verbatim. */
function similarity(template: readonly string[], tokens: readonly string[]): {
  score: number;
  wildcards: number;
} {
  if (tokens.length === 0) return { score: 1, wildcards: 0 };

  let same = 0;
  let wildcards = 0;
  for (let i = 0; i < tokens.length; i++) {
    if (template[i] === WILDCARD) {
      wildcards += 1;
    } else if (template[i] === tokens[i]) {
      same += 1;
    }
  }
  return { score: same / tokens.length, wildcards };
}

function mergeTemplate(template: readonly string[], tokens: readonly string[]): string[] {
  return template.map((token, i) => (token === tokens[i] ? token : WILDCARD));
}

/**
 * Drain-style online template miner: messages are bucketed by token count and
 * leading token, then joined to the most similar cluster in the bucket or
 * seeded as a new one. Differing positions of a joined cluster turn into
 * wildcards.
 */
export function createTemplateMiner(options: TemplateMinerOptions = {}): TemplateMiner {
  const similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const maxChildren = options.maxChildren ?? DEFAULT_MAX_CHILDREN;

  // token count -> leading token -> clusters
  const buckets = new Map<number, Map<string, Cluster[]>>();
  const clusters: Cluster[] = [];

  function leadingKey(tokens: readonly string[], branches: Map<string, Cluster[]>): string {
    if (tokens.length === 0) return '';
    const first = tokens[0];
    if (hasDigit(first)) return WILDCARD;
    if (branches.has(first)) return first;
    return branches.size < maxChildren ? first : WILDCARD;
  }

  function branchesFor(length: number): Map<string, Cluster[]> {
    let branches = buckets.get(length);
    if (!branches) {
      branches = new Map();
      buckets.set(length, branches);
    }
    return branches;
  }

  function bucketAt(branches: Map<string, Cluster[]>, route: string): Cluster[] {
    let bucket = branches.get(route);
    if (!bucket) {
      bucket = [];
      branches.set(route, bucket);
    }
    return bucket;
  }

  function place(cluster: Cluster): void {
    bucketAt(branchesFor(cluster.tokens.length), cluster.route).push(cluster);
    clusters.push(cluster);
  }

  for (const saved of options.state?.clusters ?? []) {
    place({ id: saved.id, route: saved.route, tokens: [...saved.tokens], support: saved.support });
  }
  if (clusters.length > 0) {
    log.info({ clusters: clusters.length }, 'Restored template clusters');
  }

  function bestMatch(bucket: readonly Cluster[], tokens: readonly string[]): Cluster | undefined {
    let best: Cluster | undefined;
    let bestScore = -1;
    let bestWildcards = -1;
    for (const cluster of bucket) {
      const { score, wildcards } = similarity(cluster.tokens, tokens);
      if (score > bestScore || (score === bestScore && wildcards > bestWildcards)) {
        best = cluster;
        bestScore = score;
        bestWildcards = wildcards;
      }
    }
    return best && bestScore >= similarityThreshold ? best : undefined;
  }

  function toMatch(cluster: Cluster, changeKind: ChangeKind): TemplateMatch {
    return {
      changeKind,
      clusterId: cluster.id,
      templateText: cluster.tokens.join(' '),
      clusterSupport: cluster.support,
    };
  }

  return {
    classify(message: string): TemplateMatch {
      const tokens = tokenize(message);
      const branches = branchesFor(tokens.length);
      const route = leadingKey(tokens, branches);
      const match = bestMatch(branches.get(route) ?? [], tokens);

      if (!match) {
        const cluster: Cluster = { id: clusters.length + 1, route, tokens, support: 1 };
        place(cluster);
        log.debug({ clusterId: cluster.id, template: tokens.join(' ') }, 'Cluster created');
        return toMatch(cluster, 'cluster_created');
      }

      match.support += 1;
      const merged = mergeTemplate(match.tokens, tokens);
      const changed = merged.some((token, i) => token !== match.tokens[i]);
      if (!changed) {
        return toMatch(match, 'none');
      }

      match.tokens = merged;
      return toMatch(match, 'cluster_template_changed');
    },

    snapshotClusterCount(): number {
      return clusters.length;
    },

    templates(): TemplateSummary[] {
      return clusters.map((cluster) => ({
        clusterId: cluster.id,
        template: cluster.tokens.join(' '),
        support: cluster.support,
      }));
    },

    snapshot(): TemplateMinerSnapshot {
      return {
        version: MINER_STATE_VERSION,
        clusters: clusters.map((cluster) => ({
          id: cluster.id,
          route: cluster.route,
          tokens: [...cluster.tokens],
          support: cluster.support,
        })),
      };
    },
  };
}
