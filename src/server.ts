#!/usr/bin/env node
// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0

/**
 * This brings up an HTTP server which exposes an interface to the taxi router.
 *
 * Start via:
 *
 *   ./server.ts path/to/network.json [port]
 *
 * Endpoints are /solve and /times. See below for request parameters.
 */

import * as bodyParser from 'body-parser';
import express from 'express';
import morgan from 'morgan';

import { ProblemError } from './errors';
import { QueryOptions, TripSpec } from './options';
import TaxiRouter, { SolutionReport } from './taxi-router';

const DEFAULT_PORT = 4567;

// Parameters for the /solve request.
export interface SolveRequest {
  trips: TripSpec[];
  options?: Partial<QueryOptions>;  // scheduling parameters
}

// Parameters for the /times request.
export interface TimesRequest {
  origin: number;
  destination: number;
  options?: Partial<QueryOptions>;
}

export interface SolveResponse {
  plan: SolutionReport | null;  // null if there's no feasible plan (or the budget ran out).
  reason: string;
  expanded: number;
  pruned: number;
  warnings: string[];
}

export function handleSolve(router: TaxiRouter, params: SolveRequest): SolveResponse {
  if (!params || !Array.isArray(params.trips)) {
    throw new ProblemError('Request must include a list of trips.');
  }
  const outcome = router.solve(params.trips, params.options || {});
  const { solution, reason, expanded, pruned, warnings } = outcome;
  return {
    plan: solution ? router.toReport(params.trips, solution) : null,
    reason,
    expanded,
    pruned,
    warnings,
  };
}

export function handleTimes(router: TaxiRouter, params: TimesRequest) {
  if (!params) {
    throw new ProblemError('Request must include an origin and destination.');
  }
  const minutes = router.shortestTime(params.origin, params.destination, params.options || {});
  // JSON has no Infinity.
  return { minutes: isFinite(minutes) ? minutes : null };
}

/** Report bad requests as 400s and everything else as 500s. */
export const errorHandler: express.ErrorRequestHandler = (err, request, response, next) => {
  if (err instanceof ProblemError) {
    console.warn(`[bad request] ${err.message}`);
    response.status(err.status).json({ message: err.message });
    return;
  }
  if (err instanceof Error) {
    console.error(err.stack || err.message);
    response.status(500).json({ message: err.message });
    return;
  }
  next(err);
};

export function createApp(router: TaxiRouter): express.Express {
  const app = express();
  app.use(bodyParser.json({limit: '5mb'}));
  app.use(morgan('dev'));

  app.get('/healthy', (request, response) => {
    response.send('OK');
  });

  app.post('/solve', (request, response) => {
    response.json(handleSolve(router, request.body));
  });

  app.post('/times', (request, response) => {
    response.json(handleTimes(router, request.body));
  });

  app.use(errorHandler);
  return app;
}

function main() {
  const networkFile = process.argv[2];
  if (!networkFile) {
    console.error('Usage: server.ts path/to/network.json [port]');
    process.exit(1);
  }
  const port = process.argv[3] ? Number(process.argv[3]) : DEFAULT_PORT;

  const startMs = Date.now();
  const router = TaxiRouter.fromFile(networkFile);
  const loadSecs = (Date.now() - startMs) / 1000;
  console.log(
      `Loaded network with ${router.graph.numNodes} nodes and ` +
      `${router.graph.edges.length} edges in ${loadSecs} s.`);

  createApp(router).listen(port, () => {
    console.log(`Listening on port ${port}`);
  });
}

if (require.main === module) {
  main();
}
