// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * Travel times over the road graph at a constant driving speed.
 *
 * Shortest times ignore edge capacity, so they're a lower bound on the time it takes a taxi to
 * get anywhere once other taxis are on the road. The scheduler relies on this for its heuristic.
 */

import RoadGraph from './road-graph';

const MINS_PER_HOUR = 60;

class TravelTimeOracle {
  readonly minutesPerKm: number;

  constructor(readonly graph: RoadGraph, readonly speedKph: number) {
    if (!(speedKph > 0) || !isFinite(speedKph)) {
      throw new Error(`Invalid speed: ${speedKph} km/h`);
    }
    this.minutesPerKm = MINS_PER_HOUR / speedKph;
  }

  /** Minutes to drive a stretch of road. */
  traversalMinutes(km: number): number {
    return km * this.minutesPerKm;
  }

  /** Minutes along the shortest path between two nodes, or Infinity if there is none. */
  shortestTime(from: number, to: number): number {
    return this.graph.shortestKm(from, to) * this.minutesPerKm;
  }
}

export default TravelTimeOracle;
