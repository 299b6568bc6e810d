import type { TimestampNs } from '@logloom/shared/src/types/pipeline.types.js';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { toError } from '@logloom/shared/src/utils/errors.js';
import { encodeTrainSignal } from '@logloom/schemas/src/wire/train-signal.js';
import type { ClusterCountSource } from '../clustering/clustering-capability.js';
import type { MessagePublisher } from '../messaging/message-bus.js';
import {
  advanceController,
  createControllerState,
  type ControllerState,
  type TickResult,
  type VolatilityMetrics,
} from './retrain-controller.js';

const log = createChildLogger('retrain:signal-loop');

export const DEFAULT_SIGNAL_INTERVAL_MS = 20_000;

export function nowNs(): TimestampNs {
  return BigInt(Date.now()) * 1_000_000n;
}

export interface RetrainSignalLoopDeps {
  readonly clusterCounts: ClusterCountSource;
  readonly publisher: MessagePublisher;
  readonly clock?: () => TimestampNs;
}

export interface RetrainSignalLoopConfig {
  readonly trainTopic: string;
  readonly intervalMs?: number;
}

export interface ControllerSnapshot {
  readonly iteration: number;
  readonly numTemplatesAtLastTrain: number;
  readonly awaitingRetrainOpportunity: boolean;
  readonly isStable: boolean;
  readonly currentPeriodStartTs: TimestampNs | null;
  readonly historyLength: number;
  /** Most recent first. */
  readonly samples: number[];
  readonly lastMetrics: VolatilityMetrics | null;
  readonly signalsSent: number;
}

export interface RetrainSignalLoop {
  /** Samples the cluster count once and publishes a train signal when the controller fires. */
  tick(): Promise<TickResult>;
  start(): void;
  stop(): void;
  snapshot(): ControllerSnapshot;
}

export function createRetrainSignalLoop(
  deps: RetrainSignalLoopDeps,
  config: RetrainSignalLoopConfig,
): RetrainSignalLoop {
  const clock = deps.clock ?? nowNs;
  const intervalMs = config.intervalMs ?? DEFAULT_SIGNAL_INTERVAL_MS;
  let state: ControllerState = createControllerState(clock());
  let lastMetrics: VolatilityMetrics | null = null;
  let signalsSent = 0;
  let timer: NodeJS.Timeout | undefined;
  let ticking = false;

  async function tick(): Promise<TickResult> {
    const count = deps.clusterCounts.snapshotClusterCount();
    const result = advanceController(state, count, clock());
    state = result.state;

    if (result.kind === 'skipped') {
      log.info('No templates learned yet');
      return result;
    }

    lastMetrics = result.metrics;
    log.info(
      {
        iteration: state.iteration,
        clusterCount: count,
        vol: result.metrics?.vol,
        weightedVol: result.metrics?.weightedVol,
        stablePeriods: state.history.length,
      },
      'Sampled cluster count',
    );

    if (result.event) {
      log.info(
        { iteration: result.event.iteration, periods: result.event.timeIntervals.length },
        'Sending train signal',
      );
      try {
        await deps.publisher.publish(config.trainTopic, encodeTrainSignal(result.event));
        signalsSent += 1;
      } catch (error) {
        log.error(
          { topic: config.trainTopic, error: toError(error).message },
          'Failed to publish train signal',
        );
      }
    }
    return result;
  }

  async function onInterval(): Promise<void> {
    if (ticking) return;
    ticking = true;
    try {
      await tick();
    } catch (error) {
      log.error({ error: toError(error).message }, 'Retrain signal tick failed');
    } finally {
      ticking = false;
    }
  }

  return {
    tick,

    start(): void {
      if (timer) return;
      timer = setInterval(() => {
        void onInterval();
      }, intervalMs);
      log.info({ intervalMs }, 'Retrain signal loop started');
    },

    stop(): void {
      clearInterval(timer);
      timer = undefined;
    },

    snapshot(): ControllerSnapshot {
      return {
        iteration: state.iteration,
        numTemplatesAtLastTrain: state.numTemplatesAtLastTrain,
        awaitingRetrainOpportunity: state.awaitingRetrainOpportunity,
        isStable: state.isStable,
        currentPeriodStartTs: state.currentPeriodStartTs,
        historyLength: state.history.length,
        samples: state.samples.toArray(),
        lastMetrics,
        signalsSent,
      };
    },
  };
}
