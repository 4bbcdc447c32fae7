// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * Edge capacity: at most two taxis may be on the same road segment at once, in either direction.
 * A third taxi has to wait at the node, re-trying in whole multiples of the wait penalty.
 */

import { Schedule } from './joint-state';

export const EDGE_CAPACITY = 2;

export interface Placement {
  start: number;  // when the taxi actually enters the edge (>= the proposed start).
  postponements: number;  // how many times the wait penalty was applied.
  degraded: boolean;  // gave up waiting; the edge is still over capacity at `start`.
}

/** Number of reservations on edgeKey whose [start, end) intersects [start, end). */
export function countOverlaps(schedule: Schedule, key: string, start: number, end: number): number {
  let count = 0;
  for (const entry of schedule) {
    if (entry.edgeKey === key && !(entry.end <= start || entry.start >= end)) {
      count++;
    }
  }
  return count;
}

/**
 * Find the earliest start time >= proposedStart, in steps of waitPenalty, at which a crossing of
 * the edge lasting `duration` minutes doesn't exceed the edge's capacity.
 *
 * After maxRetries postponements the taxi goes anyway and the placement is marked as degraded.
 * The schedule is not modified.
 */
export function resolveStart(
  schedule: Schedule,
  key: string,
  proposedStart: number,
  duration: number,
  waitPenalty: number,
  maxRetries: number
): Placement {
  let start = proposedStart;
  let postponements = 0;
  while (countOverlaps(schedule, key, start, start + duration) >= EDGE_CAPACITY) {
    if (postponements >= maxRetries) {
      return { start, postponements, degraded: true };
    }
    start += waitPenalty;
    postponements++;
  }
  return { start, postponements, degraded: false };
}
