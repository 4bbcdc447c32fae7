// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0

/**
 * Thrown when a caller supplies a malformed network, trip list or query option.
 * Infeasible (but well-formed) problems are not errors; see SearchOutcome.
 */
export class ProblemError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ProblemError';
    Object.setPrototypeOf(this, ProblemError.prototype);
  }
}
