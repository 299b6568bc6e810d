import type { ClassificationResult, ScoredRecord } from '@logloom/shared/src/types/pipeline.types.js';
import { ConfigurationError } from '@logloom/shared/src/utils/errors.js';

/** Templates seen fewer times than this are treated as anomalous. */
export const RARE_TEMPLATE_SUPPORT = 10;

/** Never matches, not even the empty string. */
export const MATCH_NOTHING = /(?!)/;

/**
 * Joins keyword fragments into a single alternation. Fragments are regular
 * expressions in their own right and are not escaped.
 */
export function compileKeywordPattern(keywords: readonly string[]): RegExp {
  const fragments = keywords.filter((keyword) => keyword.length > 0);
  if (fragments.length === 0) {
    return MATCH_NOTHING;
  }

  const source = fragments.map((keyword) => `(${keyword})`).join('|');
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigurationError(`Invalid fail keyword pattern: ${source}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

export function isAnomalous(result: ClassificationResult, keywordPattern: RegExp): boolean {
  return result.clusterSupport < RARE_TEMPLATE_SUPPORT || keywordPattern.test(result.templateText);
}

export function scoreClassifications(
  results: readonly ClassificationResult[],
  keywordPattern: RegExp,
): ScoredRecord[] {
  return results.map((result) => ({
    id: result.id,
    isAnomalous: isAnomalous(result, keywordPattern),
    clusterId: result.clusterId,
    clusterSupport: result.clusterSupport,
  }));
}
