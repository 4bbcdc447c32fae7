// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
import { expect } from 'chai';
import express from 'express';

import { ProblemError } from '../src/errors';
import { errorHandler, handleSolve, handleTimes } from '../src/server';
import TaxiRouter from '../src/taxi-router';

describe('server', () => {
  const router = TaxiRouter.fromOptions({
    num_nodes: 4,
    edges: [[1, 2, 10], [2, 3, 10]],
  });

  it('should solve trips from a request', () => {
    const response = handleSolve(router, { trips: [[1, 3], [3, 1]] });
    expect(response.reason).to.equal('solved');
    expect(response.warnings).to.deep.equal([]);
    expect(response.plan && response.plan.totalCost).to.equal(60);
    expect(response.plan && response.plan.perTaxi.map(t => t.route)).to.deep.equal([
      [1, 2, 3],
      [3, 2, 1],
    ]);
  });

  it('should report infeasible requests without a plan', () => {
    const response = handleSolve(router, { trips: [[1, 4]] });
    expect(response).to.deep.equal({
      plan: null,
      reason: 'infeasible',
      expanded: 0,
      pruned: 0,
      warnings: [],
    });
  });

  it('should pass query options through', () => {
    const response = handleSolve(router, { trips: [[1, 3]], options: { speed_kph: 60 } });
    expect(response.plan && response.plan.totalCost).to.equal(20);
  });

  it('should reject malformed requests', () => {
    expect(() => handleSolve(router, { trips: [[1, 5]] })).to.throw(ProblemError);
    expect(() => handleSolve(router, JSON.parse('{"options": {}}'))).to.throw(/list of trips/);
  });

  it('should look up travel times', () => {
    expect(handleTimes(router, { origin: 1, destination: 3 })).to.deep.equal({ minutes: 30 });
    expect(handleTimes(router, { origin: 1, destination: 4 })).to.deep.equal({ minutes: null });
    expect(() => handleTimes(router, { origin: 0, destination: 4 })).to.throw(/Invalid node 0/);
  });
});

describe('errorHandler', () => {
  // A response which records what the handler sends instead of writing to a socket.
  function recordingResponse() {
    const sent: {status?: number, body?: unknown} = {};
    const response: express.Response = Object.create(express.response);
    response.status = code => {
      sent.status = code;
      return response;
    };
    response.json = body => {
      sent.body = body;
      return response;
    };
    return { response, sent };
  }
  const request: express.Request = Object.create(express.request);

  it('should report problems with the request as 400s', () => {
    const { response, sent } = recordingResponse();
    let nextCalled = false;
    errorHandler(new ProblemError('Trip #0 (1 -> 9) references a node outside 1..2'),
        request, response, () => { nextCalled = true; });
    expect(sent).to.deep.equal({
      status: 400,
      body: { message: 'Trip #0 (1 -> 9) references a node outside 1..2' },
    });
    expect(nextCalled).to.be.false;
  });

  it('should report other errors as 500s', () => {
    const { response, sent } = recordingResponse();
    errorHandler(new Error('Something broke'), request, response, () => undefined);
    expect(sent).to.deep.equal({ status: 500, body: { message: 'Something broke' } });
  });

  it('should pass along anything which is not an Error', () => {
    const { response, sent } = recordingResponse();
    const passed: unknown[] = [];
    errorHandler('not an error', request, response, (err?: unknown) => {
      passed.push(err);
    });
    expect(passed).to.deep.equal(['not an error']);
    expect(sent).to.deep.equal({});
  });
});
