#!/usr/bin/env node
// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0

import * as _ from 'lodash';

import Flags from './flags';
import { DOMINANCE_MODES, isDominanceMode, QueryOptions } from './options';
import { formatSolution, formatTimeline } from './report';
import TaxiRouter from './taxi-router';
import * as utils from './utils';

const USAGE = `
This command line tool schedules taxis jointly over a road network with limited edge capacity:

  cli.ts [flags] network.json subcommand

network.json holds num_nodes, edges and (for solve) trips. subcommands are:

  solve    plan the trips, minimizing the sum of completion times
  times    print the uncontended travel time between every pair of nodes as CSV
  check    validate network.json and summarize it
`.trim();

const SUBCOMMANDS = ['solve', 'times', 'check'];

function abort(error: string): never {
  console.error(error);
  process.exit(1);
}

const FLAGS = new Flags()
  .description(USAGE)
  .version('1.0.0')
  .addFlag('json', 'Output the plan as JSON rather than text')
  .addFlag('geojson', 'Output GeoJSON of the planned routes (requires node_coordinates)')
  .addValueFlag('wait-penalty', 'Minutes to wait before re-trying a full edge', 'number')
  .addValueFlag('speed', 'Driving speed in km/h', 'number')
  .addValueFlag('max-expansions', 'Give up after expanding this many search nodes', 'number')
  .addValueFlag('dominance', 'Dominance pruning: rounded, position or none');

/** Query options set on the command line. Unset flags fall through to the network file. */
function queryOverrides(): Partial<QueryOptions> {
  const dominance = FLAGS.getString('dominance');
  if (dominance !== undefined && !isDominanceMode(dominance)) {
    abort(`Invalid --dominance=${dominance}, expected one of ${DOMINANCE_MODES}`);
  }
  return {
    wait_penalty_mins: FLAGS.getNumber('wait-penalty'),
    speed_kph: FLAGS.getNumber('speed'),
    max_expansions: FLAGS.getNumber('max-expansions'),
    dominance,
  };
}

function handleSolve(router: TaxiRouter) {
  const trips = router.options.trips;
  if (!trips || trips.length === 0) {
    abort('network.json must list trips to use the solve subcommand.');
  }

  const startMs = Date.now();
  const outcome = router.solve(trips, queryOverrides());
  console.warn(
      `Search ${outcome.reason} in ${Date.now() - startMs} ms: ` +
      `${outcome.expanded} expanded, ${outcome.pruned} pruned.`);
  for (const warning of outcome.warnings) {
    console.warn(`Warning: ${warning}`);
  }

  const { solution } = outcome;
  if (!solution) {
    const error = outcome.reason === 'budget' ?
        'Search budget exhausted before a plan was found.' : 'No feasible plan found.';
    if (FLAGS.get('json')) {
      console.log(JSON.stringify({ trips, error }, null, '  '));
    } else {
      console.log(error);
    }
    return;
  }

  if (FLAGS.get('geojson')) {
    console.log(JSON.stringify(router.solutionToGeojson(trips, solution), null, '  '));
  } else if (FLAGS.get('json')) {
    console.log(JSON.stringify(router.toReport(trips, solution), null, '  '));
  } else {
    for (const line of formatSolution(trips, solution)) {
      console.log(line);
    }
    console.log('\nTimeline:');
    for (const line of formatTimeline(solution.schedule)) {
      console.log(line);
    }
  }
}

function handleTimes(router: TaxiRouter) {
  const times = router.allPairsTimes(queryOverrides());
  console.log('origin,destination,minutes');  // header
  _.forEach(times, (originTimes, originId) => {
    _.forEach(originTimes, (time, destId) => {
      if (originId === destId) return;
      if (time === Infinity) return;
      console.log([originId, destId, utils.formatMinutes(time)].join(','));
    });
  });
}

function handleCheck(router: TaxiRouter) {
  const { graph, options } = router;
  const numTrips = options.trips ? options.trips.length : 0;
  // Fails with a ProblemError if the options in the file are bad.
  router.queryOptions(queryOverrides());
  console.log(
      `OK: ${graph.numNodes} nodes, ${graph.edges.length} edges, ${numTrips} trips.`);
}

function main() {
  FLAGS.parse(process.argv);
  const networkJson = FLAGS.args[0];
  const subcommand = FLAGS.args[1];

  if (!networkJson || !utils.fileExists(networkJson)) {
    abort(`Unable to find network file ${networkJson}\n\n${USAGE}`);
  }
  if (SUBCOMMANDS.indexOf(subcommand) === -1) {
    abort(`Invalid subcommand: ${subcommand}, expected one of ${SUBCOMMANDS}`);
  }

  try {
    const router = TaxiRouter.fromFile(networkJson);
    switch (subcommand) {
      case 'solve':
        return handleSolve(router);
      case 'times':
        return handleTimes(router);
      case 'check':
        return handleCheck(router);
      default:
        throw new Error(`Invalid subcommand: ${subcommand}`);
    }
  } catch (e) {
    abort(e instanceof Error ? e.message : String(e));
  }
}

if (require.main === module) {
  main();
}
