// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * This module provides a cleaner interface to the joint scheduler.
 *
 * A TaxiRouter is built once per road network. It can then answer any number of scheduling
 * queries (sets of trips, with their own speed and wait penalty) and turns the results into
 * plain objects suitable for JSON output or for client applications.
 */

import * as fs from 'fs';
import * as _ from 'lodash';

import type { Feature, FeatureCollection } from 'geojson';

import { ProblemError } from './errors';
import { Coord, featureCollection, pathFeature, pointFeature } from './geometry';
import { parseEdgeKey } from './joint-state';
import Options, {
  defaults as defaultOptions,
  QueryOptions,
  resolveQueryOptions,
  TripSpec,
  validateLoadingOptions,
  validateTrips,
} from './options';
import RoadGraph from './road-graph';
import { search, SearchOutcome, Solution } from './scheduler';
import TravelTimeOracle from './travel-times';

/** A period a taxi spent waiting for an edge to free up. */
export interface WaitReport {
  node: number;
  from: number;
  to: number;
  reason: string;
}

export interface TaxiReport {
  taxi: number;  // 1-based, in trip order.
  trip: TripSpec;
  route: number[];
  completionTime: number;
  waitEvents: WaitReport[];
}

export interface ScheduleReport {
  edge: [number, number];
  start: number;
  end: number;
  taxiIndex: number;  // 0-based index into the trips.
  degraded: boolean;
}

/** A complete joint plan. */
export interface SolutionReport {
  totalCost: number;
  perTaxi: TaxiReport[];
  schedule: ScheduleReport[];
}

/** Travel times in minutes, keyed by origin then destination node. */
export type TimeMatrix = {[origin: string]: {[destination: string]: number}};

const QUERY_KEYS = Object.keys(defaultOptions);

export default class TaxiRouter {
  private oracles = new Map<number, TravelTimeOracle>();

  constructor(public graph: RoadGraph, public options: Options) {}

  static fromOptions(options: Options): TaxiRouter {
    validateLoadingOptions(options);
    // Check the query options in the file up front, rather than on the first query.
    resolveQueryOptions(_.pick(options, QUERY_KEYS));
    return new TaxiRouter(new RoadGraph(options.num_nodes, options.edges), options);
  }

  /** Load a network (and optionally trips and query options) from a JSON file. */
  static fromFile(filename: string): TaxiRouter {
    const options = JSON.parse(fs.readFileSync(filename, 'utf8')) as Options;
    return TaxiRouter.fromOptions(options);
  }

  /** Query options: overrides, then whatever was in the network file, then the defaults. */
  queryOptions(overrides: Partial<QueryOptions> = {}): QueryOptions {
    return resolveQueryOptions(
        _.defaults({}, _.omitBy(overrides, _.isNil), _.pick(this.options, QUERY_KEYS)));
  }

  /** Travel times only depend on speed, so oracles are shared between queries. */
  oracleFor(speedKph: number): TravelTimeOracle {
    let oracle = this.oracles.get(speedKph);
    if (!oracle) {
      oracle = new TravelTimeOracle(this.graph, speedKph);
      this.oracles.set(speedKph, oracle);
    }
    return oracle;
  }

  /**
   * Jointly schedule a set of trips. If trips is omitted, the trips from the network file are used.
   * Throws a ProblemError for malformed input; an infeasible problem is a normal outcome.
   */
  solve(trips?: TripSpec[], overrides: Partial<QueryOptions> = {}): SearchOutcome {
    const theTrips = trips || this.options.trips;
    if (!theTrips) {
      throw new ProblemError('No trips were given.');
    }
    validateTrips(theTrips, this.graph.numNodes);
    const options = this.queryOptions(overrides);
    return search(theTrips, this.oracleFor(options.speed_kph), options);
  }

  /** Uncontended travel time between two nodes in minutes (Infinity if unreachable). */
  shortestTime(origin: number, destination: number, overrides: Partial<QueryOptions> = {}) {
    for (const node of [origin, destination]) {
      if (!this.graph.hasNode(node)) {
        throw new ProblemError(`Invalid node ${node}, expected 1..${this.graph.numNodes}`);
      }
    }
    const options = this.queryOptions(overrides);
    return this.oracleFor(options.speed_kph).shortestTime(origin, destination);
  }

  allPairsTimes(overrides: Partial<QueryOptions> = {}): TimeMatrix {
    const oracle = this.oracleFor(this.queryOptions(overrides).speed_kph);
    const nodes = _.range(1, this.graph.numNodes + 1);
    const out: TimeMatrix = {};
    for (const origin of nodes) {
      out[origin] = {};
      for (const destination of nodes) {
        out[origin][destination] = oracle.shortestTime(origin, destination);
      }
    }
    return out;
  }

  /** Convert a solution to the output format: per-taxi routes and the edge schedule. */
  toReport(trips: TripSpec[], solution: Solution): SolutionReport {
    return {
      totalCost: solution.totalCost,
      perTaxi: solution.state.map((taxi, i) => ({
        taxi: i + 1,
        trip: trips[i],
        route: taxi.route.slice(),
        completionTime: taxi.availableAt,
        waitEvents: taxi.waitEvents.map(({node, fromTime, toTime, reason}) => ({
          node,
          from: fromTime,
          to: toTime,
          reason,
        })),
      })),
      schedule: solution.schedule.map(entry => ({
        edge: parseEdgeKey(entry.edgeKey),
        start: entry.start,
        end: entry.end,
        taxiIndex: entry.taxiIndex,
        degraded: entry.degraded,
      })),
    };
  }

  /**
   * Produce GeoJSON for a solution: one feature per taxi route, plus a point per node.
   * This requires node_coordinates in the network options.
   */
  solutionToGeojson(trips: TripSpec[], solution: Solution): FeatureCollection {
    const coordinates = this.options.node_coordinates;
    if (!coordinates) {
      throw new ProblemError('GeoJSON output requires node_coordinates.');
    }
    const coordOf = (node: number): Coord => {
      const coord = coordinates[node];
      if (!coord) {
        throw new ProblemError(`No coordinates for node ${node}.`);
      }
      return coord;
    };

    const routes = solution.state.map((taxi, i) => pathFeature(taxi.route.map(coordOf), {
      taxi: i + 1,
      origin: trips[i][0],
      destination: trips[i][1],
      completionTime: taxi.availableAt,
      waits: taxi.waitEvents.length,
    }));
    const nodes: Feature[] = _.sortBy(_.keys(coordinates), Number).map(
        node => pointFeature(coordinates[node], { node: Number(node) }));

    return featureCollection([...routes, ...nodes]);
  }
}
