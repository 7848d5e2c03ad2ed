/**
 * Application Error Models
 *
 * Error types raised by the leaderboard engine and its collaborators.
 * Aggregation errors abort a run; SnapshotUnreadableError is recovered
 * by the snapshot service. The job handler maps these to status codes.
 */

/**
 * Missing input error (404)
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Bad request error (400)
 */
export class BadRequestError extends Error {
  constructor(message: string, public details?: Record<string, string>) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * A score is negative, non-finite or not a number
 */
export class MalformedScoreInputError extends BadRequestError {
  constructor(
    public unitId: string,
    public entityKey: string,
    public value: unknown
  ) {
    super(
      `Malformed score ${String(value)} for entity '${entityKey}' in contest unit '${unitId}'`
    );
    this.name = 'MalformedScoreInputError';
  }
}

/**
 * Aggregation invoked with zero contest units
 */
export class EmptyUnitListError extends BadRequestError {
  constructor() {
    super('At least one contest unit is required');
    this.name = 'EmptyUnitListError';
  }
}

/**
 * Same entity key listed twice within one contest unit
 */
export class DuplicateEntityInUnitError extends BadRequestError {
  constructor(public unitId: string, public entityKey: string) {
    super(`Entity '${entityKey}' appears more than once in contest unit '${unitId}'`);
    this.name = 'DuplicateEntityInUnitError';
  }
}

/**
 * Scores supplied for a unit that is not in the run's unit list
 */
export class UnknownContestUnitError extends BadRequestError {
  constructor(public unitId: string) {
    super(`Scores supplied for unknown contest unit '${unitId}'`);
    this.name = 'UnknownContestUnitError';
  }
}

/**
 * A stored snapshot could not be read or parsed.
 * Never fatal: callers fall back to "no previous snapshot".
 */
export class SnapshotUnreadableError extends Error {
  constructor(public scope: string, message: string) {
    super(`Snapshot for scope '${scope}' is unreadable: ${message}`);
    this.name = 'SnapshotUnreadableError';
  }
}
