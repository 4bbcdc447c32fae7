// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
import { expect } from 'chai';

import { resolveQueryOptions, TripSpec } from '../src/options';
import { formatSolution, formatTimeline } from '../src/report';
import RoadGraph from '../src/road-graph';
import { search } from '../src/scheduler';
import TravelTimeOracle from '../src/travel-times';

describe('report', () => {
  const trips: TripSpec[] = [[1, 2], [1, 2], [1, 2]];
  const oracle = new TravelTimeOracle(new RoadGraph(2, [[1, 2, 40]]), 40);

  it('should summarize a plan per taxi', () => {
    const { solution } = search(trips, oracle, resolveQueryOptions());
    if (!solution) throw new Error('expected a solution');

    expect(formatSolution(trips, solution)).to.deep.equal([
      'Total objective (sum of completion times) = 240.00 minutes',
      '',
      'Taxi 1 (1 -> 2):',
      '  Route: 1 -> 2',
      '  Completion time (min): 60.00',
      '',
      'Taxi 2 (1 -> 2):',
      '  Route: 1 -> 2',
      '  Completion time (min): 60.00',
      '',
      'Taxi 3 (1 -> 2):',
      '  Route: 1 -> 2',
      '  Completion time (min): 120.00',
      '  Wait events:',
      '   - Node 1 from 0.00 to 60.00 (reason: capacity)',
    ]);
  });

  it('should list edge crossings in time order', () => {
    const { solution } = search(trips, oracle, resolveQueryOptions());
    if (!solution) throw new Error('expected a solution');

    expect(formatTimeline(solution.schedule)).to.deep.equal([
      '  taxi 1   1-2        +0:00 ->  +1:00',
      '  taxi 2   1-2        +0:00 ->  +1:00',
      '  taxi 3   1-2        +1:00 ->  +2:00',
    ]);
  });

  it('should mark crossings made over capacity', () => {
    const { solution } = search(trips, oracle, resolveQueryOptions({ max_wait_retries: 0 }));
    if (!solution) throw new Error('expected a solution');

    expect(formatTimeline(solution.schedule)[2]).to.equal(
        '! taxi 3   1-2        +0:00 ->  +1:00');
  });
});
