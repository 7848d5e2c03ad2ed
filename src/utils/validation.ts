/**
 * Payload Validation Module
 *
 * Validates poll exports, job requests and stored payloads against JSON
 * schemas using ajv. Invalid input raises BadRequestError with
 * field-specific details.
 */

import Ajv, { ErrorObject, JSONSchemaType, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import {
  MarginPoll,
  PlayoffPoll,
  PollAnswer,
  PollType,
  PollUser,
  PollVote,
  WinnerPoll,
} from '../models/poll';
import {
  AwardsJobRequest,
  CombinedJobRequest,
  DetailedJobRequest,
  JobKind,
  LeaderboardJobRequest,
  MatchJobRequest,
  OverallJobRequest,
  PlayoffJobRequest,
  WeeklyJobRequest,
} from '../models/job';
import { BadRequestError } from '../models/errors';

// Initialize ajv with strict mode and format validators
export const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
  verbose: true,
});

// Add format validators (date-time, etc.)
addFormats(ajv);

const answerSchema: JSONSchemaType<PollAnswer> = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
  },
  required: ['id', 'name'],
};

const userSchema: JSONSchemaType<PollUser> = {
  type: 'object',
  properties: {
    id: { type: 'string', nullable: true },
    username: { type: 'string', nullable: true },
    globalName: { type: 'string', nullable: true },
  },
  required: [],
};

const voteSchema: JSONSchemaType<PollVote> = {
  type: 'object',
  properties: {
    answerId: { type: 'integer' },
    user: userSchema,
  },
  required: ['answerId', 'user'],
};

/**
 * "Predict the winner" poll schema
 */
const winnerPollSchema: JSONSchemaType<WinnerPoll> = {
  type: 'object',
  properties: {
    messageId: { type: 'string', nullable: true },
    points: { type: 'number', minimum: 0, nullable: true },
    answers: { type: 'array', items: answerSchema },
    votes: { type: 'array', items: voteSchema },
    winner: { type: 'string' },
  },
  required: ['answers', 'votes', 'winner'],
};

/**
 * "Predict the winning margin" poll schema
 */
const marginPollSchema: JSONSchemaType<MarginPoll> = {
  type: 'object',
  properties: {
    messageId: { type: 'string', nullable: true },
    points: { type: 'number', minimum: 0, nullable: true },
    answers: { type: 'array', items: answerSchema },
    votes: { type: 'array', items: voteSchema },
    margin: { type: 'string', minLength: 1 },
  },
  required: ['answers', 'votes', 'margin'],
};

/**
 * Playoff qualifiers poll schema
 */
const playoffPollSchema: JSONSchemaType<PlayoffPoll> = {
  type: 'object',
  properties: {
    messageId: { type: 'string', nullable: true },
    points: { type: 'number', minimum: 0, nullable: true },
    answers: { type: 'array', items: answerSchema },
    votes: { type: 'array', items: voteSchema },
    qualifiedteams: { type: 'array', items: { type: 'string', minLength: 1 } },
  },
  required: ['answers', 'votes', 'qualifiedteams'],
};

const pollTypeSchema = { type: 'string', enum: Object.values(PollType) };
const weekSchema = { type: 'integer', minimum: 1 };
const matchSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', pattern: '^[A-Za-z0-9_+-]+$' },
    label: { type: 'string' },
    poll: { type: 'object' },
  },
  required: ['id', 'poll'],
  additionalProperties: false,
};

function jobSchema(
  kind: JobKind,
  properties: Record<string, SchemaObject>,
  required: string[]
): SchemaObject {
  return {
    type: 'object',
    properties: { kind: { type: 'string', const: kind }, ...properties },
    required: ['kind', ...required],
    additionalProperties: false,
  };
}

const jobValidators: { [K in JobKind]: ValidateFunction<Extract<LeaderboardJobRequest, { kind: K }>> } = {
  match: ajv.compile<MatchJobRequest>(
    jobSchema('match', { poll_type: pollTypeSchema, week: weekSchema, match: matchSchema }, [
      'poll_type',
      'week',
      'match',
    ])
  ),
  weekly: ajv.compile<WeeklyJobRequest>(
    jobSchema(
      'weekly',
      {
        poll_type: pollTypeSchema,
        week: weekSchema,
        matches: { type: 'array', items: matchSchema, minItems: 1 },
      },
      ['poll_type', 'week', 'matches']
    )
  ),
  overall: ajv.compile<OverallJobRequest>(
    jobSchema(
      'overall',
      { poll_type: pollTypeSchema, week: weekSchema, include_playoffs: { type: 'boolean' } },
      ['poll_type', 'week', 'include_playoffs']
    )
  ),
  combined: ajv.compile<CombinedJobRequest>(
    jobSchema('combined', { week: weekSchema, include_playoffs: { type: 'boolean' } }, [
      'week',
      'include_playoffs',
    ])
  ),
  detailed: ajv.compile<DetailedJobRequest>(
    jobSchema('detailed', { poll_type: pollTypeSchema, week: weekSchema }, ['poll_type', 'week'])
  ),
  playoff: ajv.compile<PlayoffJobRequest>(jobSchema('playoff', { poll: { type: 'object' } }, ['poll'])),
  awards: ajv.compile<AwardsJobRequest>(
    jobSchema(
      'awards',
      {
        week: weekSchema,
        team: { type: 'string', minLength: 1 },
        top_n: { type: 'integer', minimum: 1 },
      },
      ['week']
    )
  ),
};

const validateWinnerPoll = ajv.compile(winnerPollSchema);
const validateMarginPoll = ajv.compile(marginPollSchema);
const validatePlayoffPoll = ajv.compile(playoffPollSchema);

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const field = error.instancePath
      ? error.instancePath.substring(1)
      : error.params.missingProperty || 'payload';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${error.params.missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${error.params.type}, received ${typeof error.data}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${error.params.format}`;
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${error.params.limit}`;
    } else if (error.keyword === 'enum') {
      message = `Must be one of: ${error.params.allowedValues.join(', ')}`;
    } else if (error.keyword === 'const') {
      message = `Must be ${error.params.allowedValue}`;
    } else if (error.keyword === 'additionalProperties') {
      message = `Unknown field: ${error.params.additionalProperty}`;
    }

    details[field] = message;
  }

  return details;
}

/**
 * Run a compiled validator and return the typed value
 *
 * @throws BadRequestError with field-specific details if validation fails
 */
export function assertValid<T>(validator: ValidateFunction<T>, value: unknown, what: string): T {
  if (validator(value)) {
    return value;
  }

  throw new BadRequestError(`Invalid ${what}`, formatValidationErrors(validator.errors ?? []));
}

export function parseWinnerPoll(value: unknown): WinnerPoll {
  return assertValid(validateWinnerPoll, value, 'winner poll');
}

export function parseMarginPoll(value: unknown): MarginPoll {
  return assertValid(validateMarginPoll, value, 'margin poll');
}

export function parsePlayoffPoll(value: unknown): PlayoffPoll {
  return assertValid(validatePlayoffPoll, value, 'playoff poll');
}

/**
 * Check if a job kind is valid
 */
export function isValidJobKind(kind: unknown): kind is JobKind {
  return typeof kind === 'string' && Object.prototype.hasOwnProperty.call(jobValidators, kind);
}

/**
 * Validate a job request
 *
 * @param value - Raw request (e.g., a parsed JSON request file)
 * @returns Typed job request
 * @throws BadRequestError if the kind is unknown or the request is invalid
 */
export function parseJobRequest(value: unknown): LeaderboardJobRequest {
  const kind = typeof value === 'object' && value !== null && 'kind' in value ? value.kind : undefined;

  if (!isValidJobKind(kind)) {
    throw new BadRequestError(`Unknown job kind: ${String(kind)}`);
  }

  const validator: ValidateFunction<LeaderboardJobRequest> = jobValidators[kind];
  return assertValid(validator, value, `${kind} job request`);
}
