/**
 * @fileoverview Watermark arithmetic.
 *
 * Watermarks order by timestamp, then by message id, because several
 * messages can share one timestamp.
 */

import type { ProcessingState, Watermark } from '../types.js';

export function compareWatermarks(a: Watermark, b: Watermark): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.messageId === b.messageId) return 0;
  return a.messageId < b.messageId ? -1 : 1;
}

export function toWatermark(state: ProcessingState): Watermark | null {
  if (state.lastProcessedTimestamp === null) return null;
  return {
    timestamp: state.lastProcessedTimestamp,
    messageId: state.lastProcessedMessageId ?? '',
  };
}

/**
 * Whether a message is past the watermark: strictly newer, or sharing the
 * timestamp with a different id.
 */
export function isPastWatermark(candidate: Watermark, watermark: Watermark | null): boolean {
  if (!watermark) return true;
  if (candidate.timestamp !== watermark.timestamp) {
    return candidate.timestamp > watermark.timestamp;
  }
  return candidate.messageId !== watermark.messageId;
}

/**
 * Compute the watermark after a run.
 *
 * The result is the newest resolved candidate that is older than every failed
 * candidate, so failures stay selectable on the next run. Returns null when
 * that would not move the watermark forward.
 */
export function advanceWatermark(
  current: Watermark | null,
  resolved: Watermark[],
  failed: Watermark[]
): Watermark | null {
  const oldestFailure = failed.reduce<Watermark | null>(
    (min, w) => (min === null || compareWatermarks(w, min) < 0 ? w : min),
    null
  );

  const eligible = oldestFailure
    ? resolved.filter((w) => compareWatermarks(w, oldestFailure) < 0)
    : resolved;

  const newest = eligible.reduce<Watermark | null>(
    (max, w) => (max === null || compareWatermarks(w, max) > 0 ? w : max),
    null
  );

  if (!newest) return null;
  if (current && compareWatermarks(newest, current) <= 0) return null;
  return newest;
}
