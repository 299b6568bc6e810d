import type { RetrainEvent } from '@logloom/shared/src/types/pipeline.types.js';

/**
 * Serializes a retrain event for the train topic. Timestamps are epoch
 * nanoseconds, which exceed the safe integer range, so they are written as
 * raw integer literals instead of going through JSON.stringify.
 */
export function encodeTrainSignal(event: RetrainEvent): string {
  const intervals = event.timeIntervals
    .map(
      (period) =>
        `{"start_ts":${period.startTs.toString()},"end_ts":${period.endTs.toString()}}`,
    )
    .join(',');

  return `{"model_to_train":${JSON.stringify(event.modelToTrain)},"time_intervals":[${intervals}]}`;
}
