// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * Defines the joint (all-taxis) search state and the per-branch edge schedule.
 *
 * All of these records are treated as immutable. The scheduler never modifies a TaxiState or a
 * Schedule once it's been pushed onto the frontier; expansion builds new ones. Untouched taxi
 * records are shared between a state and its successors.
 */

import { DominanceMode, TripSpec } from './options';
import TravelTimeOracle from './travel-times';

export type WaitReason = 'capacity';

/** A stretch of time a taxi spent idling at a node. */
export interface WaitEvent {
  node: number;
  fromTime: number;  // minutes
  toTime: number;  // minutes
  reason: WaitReason;
}

export interface TaxiState {
  readonly position: number;
  readonly availableAt: number;  // minutes at which the taxi is free to move again.
  readonly done: boolean;  // sticky: a taxi at its destination never moves again.
  readonly destination: number;
  readonly route: readonly number[];  // nodes visited, starting with the origin.
  readonly waitEvents: readonly WaitEvent[];
}

/** One TaxiState per trip, in trip order. */
export type JointState = readonly TaxiState[];

/** One taxi's reservation of one edge for one crossing. */
export interface ScheduleEntry {
  readonly edgeKey: string;
  readonly start: number;
  readonly end: number;
  readonly taxiIndex: number;
  // Placed past the wait retry cap, while the edge was still over capacity.
  readonly degraded: boolean;
}

export type Schedule = readonly ScheduleEntry[];

/** Canonical key for an undirected edge, e.g. edgeKey(3, 1) === '1-3'. */
export function edgeKey(u: number, v: number): string {
  return u <= v ? `${u}-${v}` : `${v}-${u}`;
}

/** Inverse of edgeKey(). */
export function parseEdgeKey(key: string): [number, number] {
  const [u, v] = key.split('-').map(Number);
  return [u, v];
}

export function initialJointState(trips: TripSpec[]): JointState {
  return trips.map(([origin, destination]) => ({
    position: origin,
    availableAt: 0,
    done: origin === destination,
    destination,
    route: [origin],
    waitEvents: [],
  }));
}

export function isComplete(state: JointState): boolean {
  return state.every(taxi => taxi.done);
}

/**
 * Sum of the remaining shortest travel times for taxis which haven't arrived yet.
 * Capacity conflicts can only add delay, so this never overestimates the remaining cost.
 * This is Infinity if any taxi can't reach its destination.
 */
export function admissibleHeuristic(state: JointState, oracle: TravelTimeOracle): number {
  let total = 0;
  for (const taxi of state) {
    if (taxi.done) continue;
    total += oracle.shortestTime(taxi.position, taxi.destination);
  }
  return total;
}

/**
 * Reduced representation of a state for dominance pruning.
 *
 * This drops the schedule, so two states with the same key may still face different
 * contention in the future. See DominanceMode for the available granularities.
 * Returns null when dominance pruning is disabled.
 */
export function canonicalKey(state: JointState, mode: DominanceMode): string | null {
  switch (mode) {
    case 'rounded':
      return state
          .map(t => `${t.position}:${Math.round(t.availableAt)}:${t.done ? 1 : 0}`)
          .join('|');
    case 'position':
      return state.map(t => `${t.position}:${t.done ? 1 : 0}`).join('|');
    case 'none':
      return null;
  }
}
