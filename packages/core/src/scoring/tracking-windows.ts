import { CHANGE_KINDS } from '@logloom/shared/src/types/pipeline.types.js';
import type { ChangeKind, ClassificationResult } from '@logloom/shared/src/types/pipeline.types.js';
import { createRecentWindow } from '@logloom/shared/src/utils/recent-window.js';
import type { RecentWindow } from '@logloom/shared/src/utils/recent-window.js';

export const TRACKING_WINDOW_SIZE = 50;

/** Per-batch counts of each change kind, most recent batch first. */
export type TrackingWindows = Readonly<Record<ChangeKind, RecentWindow>>;

export type TrackingSnapshot = Readonly<Record<ChangeKind, number[]>>;

export function createTrackingWindows(capacity: number = TRACKING_WINDOW_SIZE): TrackingWindows {
  return {
    cluster_created: createRecentWindow(capacity),
    cluster_template_changed: createRecentWindow(capacity),
    none: createRecentWindow(capacity),
  };
}

export function countByChangeKind(
  results: readonly ClassificationResult[],
): Record<ChangeKind, number> {
  const counts: Record<ChangeKind, number> = {
    cluster_created: 0,
    cluster_template_changed: 0,
    none: 0,
  };
  for (const result of results) {
    counts[result.changeKind] += 1;
  }
  return counts;
}

/** Kinds absent from the batch leave their window untouched. */
export function recordBatch(
  windows: TrackingWindows,
  results: readonly ClassificationResult[],
): void {
  const counts = countByChangeKind(results);
  for (const kind of CHANGE_KINDS) {
    if (counts[kind] > 0) {
      windows[kind].push(counts[kind]);
    }
  }
}

export function snapshotTrackingWindows(windows: TrackingWindows): TrackingSnapshot {
  return {
    cluster_created: windows.cluster_created.toArray(),
    cluster_template_changed: windows.cluster_template_changed.toArray(),
    none: windows.none.toArray(),
  };
}
