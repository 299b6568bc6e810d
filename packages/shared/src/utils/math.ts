export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) {
    sum += v;
  }
  return sum / values.length;
}

/** Population standard deviation. */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  let squared = 0;
  for (const v of values) {
    squared += (v - avg) * (v - avg);
  }
  return Math.sqrt(squared / values.length);
}

export interface WeightedStats {
  readonly mean: number;
  readonly std: number;
}

export function weightedMeanAndStd(
  values: readonly number[],
  weights: readonly number[],
): WeightedStats {
  const len = Math.min(values.length, weights.length);
  let weightSum = 0;
  let weighted = 0;
  for (let i = 0; i < len; i++) {
    weightSum += weights[i];
    weighted += weights[i] * values[i];
  }
  if (weightSum === 0) return { mean: 0, std: 0 };

  const avg = weighted / weightSum;
  let variance = 0;
  for (let i = 0; i < len; i++) {
    variance += weights[i] * (values[i] - avg) * (values[i] - avg);
  }
  return { mean: avg, std: Math.sqrt(variance / weightSum) };
}

/**
 * Linear decay over a most-recent-first series: the newest sample weighs 1,
 * the oldest 1/n.
 */
export function linearDecayWeights(length: number): number[] {
  const weights: number[] = [];
  for (let i = 0; i < length; i++) {
    weights.push((length - i) / length);
  }
  return weights;
}
