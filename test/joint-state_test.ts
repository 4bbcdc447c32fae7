// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
import { expect } from 'chai';

import {
  admissibleHeuristic,
  canonicalKey,
  edgeKey,
  initialJointState,
  isComplete,
  JointState,
  parseEdgeKey,
} from '../src/joint-state';
import RoadGraph from '../src/road-graph';
import TravelTimeOracle from '../src/travel-times';

describe('joint-state', () => {
  const oracle = new TravelTimeOracle(new RoadGraph(4, [[1, 2, 10], [2, 3, 10]]), 40);

  it('should canonicalize undirected edges', () => {
    expect(edgeKey(1, 3)).to.equal('1-3');
    expect(edgeKey(3, 1)).to.equal('1-3');
    expect(edgeKey(12, 4)).to.equal('4-12');
    expect(parseEdgeKey('4-12')).to.deep.equal([4, 12]);
  });

  it('should build the initial state from trips', () => {
    const state = initialJointState([[1, 3], [2, 2]]);
    expect(state).to.deep.equal([
      { position: 1, availableAt: 0, done: false, destination: 3, route: [1], waitEvents: [] },
      { position: 2, availableAt: 0, done: true, destination: 2, route: [2], waitEvents: [] },
    ]);
    expect(isComplete(state)).to.be.false;
    expect(isComplete(initialJointState([[2, 2], [3, 3]]))).to.be.true;
    expect(isComplete(initialJointState([]))).to.be.true;
  });

  it('should sum remaining shortest times for taxis which are not done', () => {
    const state = initialJointState([[1, 3], [3, 2], [2, 2]]);
    expect(admissibleHeuristic(state, oracle)).to.equal(30 + 15);
  });

  it('should make the heuristic infinite for unreachable destinations', () => {
    const state = initialJointState([[1, 3], [1, 4]]);
    expect(admissibleHeuristic(state, oracle)).to.equal(Infinity);
  });

  const state: JointState = [
    { position: 2, availableAt: 14.6, done: false, destination: 3, route: [1, 2], waitEvents: [] },
    { position: 3, availableAt: 30, done: true, destination: 3, route: [2, 3], waitEvents: [] },
  ];

  it('should build rounded canonical keys', () => {
    expect(canonicalKey(state, 'rounded')).to.equal('2:15:0|3:30:1');
  });

  it('should build position-only canonical keys', () => {
    expect(canonicalKey(state, 'position')).to.equal('2:0|3:1');
  });

  it('should skip keys when dominance pruning is disabled', () => {
    expect(canonicalKey(state, 'none')).to.be.null;
  });
});
