// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * This module implements the joint scheduler: a best-first (A*) search over the states of all
 * taxis at once, which decides when each taxi crosses each edge.
 *
 * Each step of the search moves one taxi across one edge. If the edge is already carrying two
 * taxis at that time on this branch, the taxi waits (see conflicts.ts). The cost of a state is the
 * sum of the taxis' completion times so far, and the heuristic is the sum of their remaining
 * uncontended travel times, which never overestimates.
 *
 * The search returns the first state it pops in which every taxi has arrived.
 */

import { resolveStart } from './conflicts';
import BinaryHeap from './heap';
import {
  admissibleHeuristic,
  canonicalKey,
  edgeKey,
  initialJointState,
  isComplete,
  JointState,
  parseEdgeKey,
  Schedule,
  ScheduleEntry,
  TaxiState,
} from './joint-state';
import { QueryOptions, TripSpec } from './options';
import TravelTimeOracle from './travel-times';
import { formatMinutes } from './utils';

export interface SearchNode {
  f: number;  // estimated total cost (g + h).
  g: number;  // sum of completion times so far.
  sequence: number;  // insertion order; breaks ties deterministically.
  state: JointState;
  schedule: Schedule;
}

export interface Solution {
  totalCost: number;  // sum of completion times, in minutes.
  state: JointState;
  schedule: Schedule;
}

/**
 * Why the search stopped.
 * - solved: every taxi reached its destination.
 * - infeasible: there's no plan (e.g. a destination is unreachable).
 * - budget: max_expansions or max_search_ms ran out first.
 */
export type SearchReason = 'solved' | 'infeasible' | 'budget';

export interface SearchOutcome {
  solution: Solution | null;
  reason: SearchReason;
  expanded: number;  // number of search nodes expanded.
  pruned: number;  // number of popped nodes discarded by the dominance check.
  warnings: string[];  // one per degraded placement in the solution.
}

/** Order the frontier by (f, g, sequence). */
export function compareNodes(a: SearchNode, b: SearchNode): number {
  return (a.f - b.f) || (a.g - b.g) || (a.sequence - b.sequence);
}

/** Describe the schedule entries which were placed over capacity. */
export function degradedWarnings(schedule: Schedule): string[] {
  return schedule.filter(entry => entry.degraded).map(entry => {
    const [u, v] = parseEdgeKey(entry.edgeKey);
    return `Taxi ${entry.taxiIndex + 1} entered edge ${u}-${v} at ${formatMinutes(entry.start)} ` +
        `min while it was at capacity (gave up waiting).`;
  });
}

/**
 * Move one taxi across the edge to `neighbor`, returning the resulting search node,
 * or null if that leaves some taxi unable to reach its destination.
 */
export function expandMove(
  node: SearchNode,
  taxiIndex: number,
  neighbor: number,
  km: number,
  oracle: TravelTimeOracle,
  options: QueryOptions,
  sequence: number
): SearchNode | null {
  const taxi = node.state[taxiIndex];
  const duration = oracle.traversalMinutes(km);
  const key = edgeKey(taxi.position, neighbor);
  const placement = resolveStart(
      node.schedule, key, taxi.availableAt, duration,
      options.wait_penalty_mins, options.max_wait_retries);

  const end = placement.start + duration;
  const entry: ScheduleEntry = {
    edgeKey: key,
    start: placement.start,
    end,
    taxiIndex,
    degraded: placement.degraded,
  };

  const moved: TaxiState = {
    position: neighbor,
    availableAt: end,
    done: neighbor === taxi.destination,
    destination: taxi.destination,
    route: [...taxi.route, neighbor],
    waitEvents: placement.start > taxi.availableAt ?
        [...taxi.waitEvents, {
          node: taxi.position,
          fromTime: taxi.availableAt,
          toTime: placement.start,
          reason: 'capacity',
        }] :
        taxi.waitEvents,
  };

  const state = node.state.slice();
  state[taxiIndex] = moved;

  const h = admissibleHeuristic(state, oracle);
  if (h === Infinity) {
    return null;
  }
  const g = node.g + (end - taxi.availableAt);
  return {
    f: g + h,
    g,
    sequence,
    state,
    schedule: [...node.schedule, entry],
  };
}

/**
 * Jointly schedule all the trips, minimizing the sum of completion times.
 * Infeasibility and budget exhaustion are reported through the outcome, not thrown.
 */
export function search(
  trips: TripSpec[],
  oracle: TravelTimeOracle,
  options: QueryOptions
): SearchOutcome {
  const graph = oracle.graph;
  const frontier = new BinaryHeap<SearchNode>(compareNodes);
  const bestG = new Map<string, number>();
  const deadline = Date.now() + options.max_search_ms;
  let sequence = 0;
  let expanded = 0;
  let pruned = 0;

  const outcome = (reason: SearchReason, solution: Solution | null = null): SearchOutcome => ({
    solution,
    reason,
    expanded,
    pruned,
    warnings: solution ? degradedWarnings(solution.schedule) : [],
  });

  const root = initialJointState(trips);
  const h0 = admissibleHeuristic(root, oracle);
  if (h0 === Infinity) {
    return outcome('infeasible');
  }
  frontier.push({ f: h0, g: 0, sequence: sequence++, state: root, schedule: [] });

  let node: SearchNode | undefined;
  while ((node = frontier.pop())) {
    if (isComplete(node.state)) {
      return outcome('solved', {
        totalCost: node.g,
        state: node.state,
        schedule: node.schedule,
      });
    }

    const key = canonicalKey(node.state, options.dominance);
    if (key !== null) {
      const seenG = bestG.get(key);
      if (seenG !== undefined && seenG <= node.g) {
        pruned++;
        continue;
      }
      bestG.set(key, node.g);
    }

    if (expanded >= options.max_expansions || Date.now() > deadline) {
      return outcome('budget');
    }
    expanded++;

    for (let i = 0; i < node.state.length; i++) {
      const taxi = node.state[i];
      if (taxi.done) continue;
      for (const { node: neighbor, km } of graph.neighbors(taxi.position)) {
        const next = expandMove(node, i, neighbor, km, oracle, options, sequence);
        if (next) {
          frontier.push(next);
          sequence++;
        }
      }
    }
  }

  return outcome('infeasible');
}
