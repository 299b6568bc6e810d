import type {
  RetrainEvent,
  StablePeriod,
  TimestampNs,
} from '@logloom/shared/src/types/pipeline.types.js';
import {
  linearDecayWeights,
  mean,
  standardDeviation,
  weightedMeanAndStd,
} from '@logloom/shared/src/utils/math.js';
import { createRecentWindow } from '@logloom/shared/src/utils/recent-window.js';
import type { RecentWindow } from '@logloom/shared/src/utils/recent-window.js';

export const SAMPLE_WINDOW_SIZE = 50;
export const BASELINE_SAMPLES = 10;
export const MIN_SAMPLES_TO_ACT = 4;

/** At or above: the model is churning, retrain at the next calm. */
export const REARM_VOLATILITY = 0.199;
/** Above: a stable period ends. */
export const UNSTABLE_VOLATILITY = 0.155;
/** At or below: calm enough to retrain. */
export const RETRAIN_VOLATILITY = 0.15;
/** Retrain regardless of the awaiting flag once the cluster count outgrows the last train by this factor. */
export const GROWTH_FACTOR = 2;

export const MODEL_TO_TRAIN = 'nulog';

export interface ControllerState {
  readonly iteration: number;
  readonly numTemplatesAtLastTrain: number;
  readonly awaitingRetrainOpportunity: boolean;
  readonly isStable: boolean;
  readonly currentPeriodStartTs: TimestampNs | null;
  readonly history: readonly StablePeriod[];
  /** Cluster counts, most recent first. */
  readonly samples: RecentWindow;
}

export interface VolatilityMetrics {
  readonly vol: number;
  readonly weightedMean: number;
  readonly weightedVol: number;
}

export type TickResult =
  | { readonly kind: 'skipped'; readonly state: ControllerState }
  | {
      readonly kind: 'sampled';
      readonly state: ControllerState;
      /** Null while the recent baseline is zero. */
      readonly metrics: VolatilityMetrics | null;
      readonly event?: RetrainEvent;
    };

export function createControllerState(
  startTs: TimestampNs,
  windowSize: number = SAMPLE_WINDOW_SIZE,
): ControllerState {
  return {
    iteration: 0,
    numTemplatesAtLastTrain: 0,
    awaitingRetrainOpportunity: true,
    isStable: false,
    currentPeriodStartTs: startTs,
    history: [],
    samples: createRecentWindow(windowSize),
  };
}

/**
 * Volatility of a most-recent-first series relative to the mean of its
 * newest samples. The weighted variant lets recent samples dominate.
 */
export function computeVolatility(samples: readonly number[]): VolatilityMetrics | null {
  const baseline = mean(samples.slice(0, BASELINE_SAMPLES));
  if (samples.length === 0 || baseline === 0) return null;

  const weighted = weightedMeanAndStd(samples, linearDecayWeights(samples.length));
  return {
    vol: standardDeviation(samples) / baseline,
    weightedMean: weighted.mean,
    weightedVol: weighted.std / baseline,
  };
}

/** One sampling tick. The state passed in is left untouched. */
export function advanceController(
  state: ControllerState,
  clusterCount: number,
  now: TimestampNs,
): TickResult {
  if (state.samples.size === 0 && clusterCount === 0) {
    return { kind: 'skipped', state };
  }

  const samples = state.samples.clone();
  samples.push(clusterCount);
  const metrics = computeVolatility(samples.toArray());
  let next: ControllerState = { ...state, samples, iteration: state.iteration + 1 };

  if (metrics === null || samples.size < MIN_SAMPLES_TO_ACT) {
    return { kind: 'sampled', state: next, metrics };
  }
  const { weightedVol } = metrics;

  if (weightedVol >= REARM_VOLATILITY) {
    next = { ...next, awaitingRetrainOpportunity: true };
  } else if (next.currentPeriodStartTs === null && next.awaitingRetrainOpportunity) {
    next = { ...next, currentPeriodStartTs: now };
  }

  if (
    weightedVol > UNSTABLE_VOLATILITY &&
    !next.awaitingRetrainOpportunity &&
    next.isStable &&
    next.currentPeriodStartTs !== null
  ) {
    next = {
      ...next,
      history: [...next.history, { startTs: next.currentPeriodStartTs, endTs: now }],
      isStable: false,
      currentPeriodStartTs: null,
    };
  }

  const outgrown = clusterCount > GROWTH_FACTOR * next.numTemplatesAtLastTrain;
  if (weightedVol <= RETRAIN_VOLATILITY && (next.awaitingRetrainOpportunity || outgrown)) {
    const timeIntervals =
      next.currentPeriodStartTs === null
        ? next.history
        : [...next.history, { startTs: next.currentPeriodStartTs, endTs: now }];
    const event: RetrainEvent = {
      modelToTrain: MODEL_TO_TRAIN,
      iteration: next.iteration,
      clusterCount,
      timeIntervals,
    };
    next = {
      ...next,
      numTemplatesAtLastTrain: clusterCount,
      awaitingRetrainOpportunity: false,
      isStable: true,
      history: [],
      currentPeriodStartTs: now,
    };
    return { kind: 'sampled', state: next, metrics, event };
  }

  return { kind: 'sampled', state: next, metrics };
}
