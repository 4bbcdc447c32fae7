// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/* eslint-disable camelcase */

import * as _ from 'lodash';

import { ProblemError } from './errors';

/** An undirected road segment: [nodeA, nodeB, distanceKm]. */
export type EdgeSpec = [number, number, number];

/** A taxi's trip: [origin, destination]. */
export type TripSpec = [number, number];

/** These options describe the road network and must be set before any queries. */
export interface LoadingOptions {
  // Nodes are numbered 1..num_nodes.
  num_nodes: number;

  edges: EdgeSpec[];

  // Default trips, used by the command line tool. The server takes trips per request.
  trips?: TripSpec[];

  // Optional coordinates for each node, keyed by node number. These are only used to
  // produce GeoJSON; they play no part in routing (distances come from the edges).
  node_coordinates?: {[node: string]: [number, number]};
}

/**
 * How to key states for dominance pruning.
 * - rounded: (position, availableAt rounded to the minute, done) per taxi.
 * - position: (position, done) per taxi.
 * - none: no dominance pruning at all.
 */
export type DominanceMode = 'rounded' | 'position' | 'none';

export const DOMINANCE_MODES: DominanceMode[] = ['rounded', 'position', 'none'];

export function isDominanceMode(mode: string): mode is DominanceMode {
  return _.includes(DOMINANCE_MODES, mode);
}

/** Configuration options for a single scheduling query. */
export interface QueryOptions {
  // How long a taxi waits before re-trying a full edge.
  wait_penalty_mins: number;

  // Constant driving speed on every edge.
  speed_kph: number;

  // How many times a taxi may be postponed on a full edge before it's placed anyway.
  // Placements past this cap are flagged as degraded in the schedule.
  max_wait_retries: number;

  // Give up after expanding this many search nodes. The joint state space is exponential
  // in the number of taxis, so it's worth setting this for large inputs.
  max_expansions: number;

  // Give up after this much wall clock time.
  max_search_ms: number;

  dominance: DominanceMode;
}

export const defaults: QueryOptions = {
  wait_penalty_mins: 30,
  speed_kph: 40,
  max_wait_retries: 200,
  max_expansions: Infinity,
  max_search_ms: Infinity,
  dominance: 'rounded',
};

interface Options extends LoadingOptions, Partial<QueryOptions> {}

export default Options;

function isNode(x: unknown, numNodes: number): boolean {
  return typeof x === 'number' && Number.isInteger(x) && x >= 1 && x <= numNodes;
}

/** Throws a ProblemError if the network definition is malformed. */
export function validateLoadingOptions(options: LoadingOptions) {
  const numNodes = options.num_nodes;
  if (!Number.isInteger(numNodes) || numNodes < 1) {
    throw new ProblemError(`num_nodes must be a positive integer, got ${numNodes}`);
  }
  if (!Array.isArray(options.edges)) {
    throw new ProblemError('edges must be a list of [nodeA, nodeB, distanceKm]');
  }
  options.edges.forEach((edge, i) => {
    if (!Array.isArray(edge) || edge.length !== 3) {
      throw new ProblemError(`Edge #${i} must be [nodeA, nodeB, distanceKm]`);
    }
    const [a, b, km] = edge;
    if (!isNode(a, numNodes) || !isNode(b, numNodes)) {
      throw new ProblemError(`Edge #${i} (${a}-${b}) references a node outside 1..${numNodes}`);
    }
    if (a === b) {
      throw new ProblemError(`Edge #${i} is a self-loop on node ${a}`);
    }
    if (typeof km !== 'number' || !isFinite(km) || km < 0) {
      throw new ProblemError(`Edge #${i} (${a}-${b}) has invalid distance ${km}`);
    }
  });
  if (options.trips) {
    validateTrips(options.trips, numNodes);
  }
  if (options.node_coordinates) {
    _.forEach(options.node_coordinates, (coord, node) => {
      if (!isNode(Number(node), numNodes)) {
        throw new ProblemError(`Coordinates given for unknown node ${node}`);
      }
      if (!Array.isArray(coord) || coord.length !== 2 || !_.every(coord, _.isFinite)) {
        throw new ProblemError(`Coordinates for node ${node} must be [x, y]`);
      }
    });
  }
}

/** Throws a ProblemError if any trip is malformed. */
export function validateTrips(trips: TripSpec[], numNodes: number) {
  if (!Array.isArray(trips)) {
    throw new ProblemError('trips must be a list of [origin, destination]');
  }
  trips.forEach((trip, i) => {
    if (!Array.isArray(trip) || trip.length !== 2) {
      throw new ProblemError(`Trip #${i} must be [origin, destination]`);
    }
    const [origin, destination] = trip;
    if (!isNode(origin, numNodes) || !isNode(destination, numNodes)) {
      throw new ProblemError(
          `Trip #${i} (${origin} -> ${destination}) references a node outside 1..${numNodes}`);
    }
  });
}

/** Fill in defaults and check the result. Throws a ProblemError on bad values. */
export function resolveQueryOptions(overrides: Partial<QueryOptions> = {}): QueryOptions {
  const options: QueryOptions = _.defaults({}, _.omitBy(overrides, _.isNil), defaults);

  // Budgets may be Infinity; rates and penalties may not.
  const positive = (name: keyof QueryOptions, value: unknown, allowInfinity: boolean) => {
    if (typeof value !== 'number' || isNaN(value) || value <= 0 ||
        (!allowInfinity && !isFinite(value))) {
      throw new ProblemError(`${name} must be a positive number, got ${value}`);
    }
  };
  positive('wait_penalty_mins', options.wait_penalty_mins, false);
  positive('speed_kph', options.speed_kph, false);
  positive('max_expansions', options.max_expansions, true);
  positive('max_search_ms', options.max_search_ms, true);
  if (!Number.isInteger(options.max_wait_retries) || options.max_wait_retries < 0) {
    throw new ProblemError(
        `max_wait_retries must be a non-negative integer, got ${options.max_wait_retries}`);
  }
  if (DOMINANCE_MODES.indexOf(options.dominance) === -1) {
    throw new ProblemError(
        `Invalid dominance mode: ${options.dominance}, expected one of ${DOMINANCE_MODES}`);
  }
  return options;
}
