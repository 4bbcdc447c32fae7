// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
import { expect } from 'chai';

import RoadGraph from '../src/road-graph';
import TravelTimeOracle from '../src/travel-times';

describe('RoadGraph', () => {
  // 1 -- 2 -- 3, plus a long way round via 4.
  const graph = new RoadGraph(5, [[1, 2, 10], [2, 3, 10], [1, 4, 15], [4, 3, 15]]);

  it('should list neighbors in edge order', () => {
    expect(graph.neighbors(1)).to.deep.equal([{node: 2, km: 10}, {node: 4, km: 15}]);
    expect(graph.neighbors(3)).to.deep.equal([{node: 2, km: 10}, {node: 4, km: 15}]);
    expect(graph.neighbors(5)).to.deep.equal([]);
  });

  it('should compute shortest distances', () => {
    expect(graph.shortestKm(1, 3)).to.equal(20);
    expect(graph.shortestKm(3, 1)).to.equal(20);
    expect(graph.shortestKm(4, 2)).to.equal(25);
    expect(graph.shortestKm(2, 2)).to.equal(0);
  });

  it('should report unreachable nodes as Infinity', () => {
    expect(graph.shortestKm(1, 5)).to.equal(Infinity);
    expect(graph.shortestKm(5, 1)).to.equal(Infinity);
  });

  it('should reject malformed edges', () => {
    expect(() => new RoadGraph(3, [[1, 4, 10]])).to.throw(/outside 1..3/);
    expect(() => new RoadGraph(3, [[2, 2, 10]])).to.throw(/self-loop on node 2/);
    expect(() => new RoadGraph(3, [[1, 2, -1]])).to.throw(/invalid distance -1/);
    expect(() => new RoadGraph(0, [])).to.throw(/positive integer/);
  });
});

describe('TravelTimeOracle', () => {
  const graph = new RoadGraph(3, [[1, 2, 10], [2, 3, 10]]);

  it('should convert distances to minutes', () => {
    const oracle = new TravelTimeOracle(graph, 40);
    expect(oracle.minutesPerKm).to.equal(1.5);
    expect(oracle.traversalMinutes(10)).to.equal(15);
    expect(oracle.shortestTime(1, 3)).to.equal(30);
    expect(oracle.shortestTime(3, 2)).to.equal(15);
  });

  it('should handle speeds which are not round numbers', () => {
    const oracle = new TravelTimeOracle(graph, 70);
    expect(oracle.shortestTime(1, 3)).to.be.closeTo(120 / 7, 1e-9);
  });

  it('should satisfy the triangle inequality', () => {
    const g = new RoadGraph(4, [[1, 2, 3], [2, 3, 4], [1, 3, 9], [3, 4, 1], [2, 4, 7]]);
    const oracle = new TravelTimeOracle(g, 60);
    for (let u = 1; u <= 4; u++) {
      for (let v = 1; v <= 4; v++) {
        expect(oracle.shortestTime(u, v)).to.equal(oracle.shortestTime(v, u));
        for (let w = 1; w <= 4; w++) {
          expect(oracle.shortestTime(u, v)).to.be.at.most(
              oracle.shortestTime(u, w) + oracle.shortestTime(w, v));
        }
      }
    }
    expect(oracle.shortestTime(1, 4)).to.equal(8);  // 1-2-3-4
  });

  it('should reject non-positive speeds', () => {
    expect(() => new TravelTimeOracle(graph, 0)).to.throw(/Invalid speed/);
  });
});
