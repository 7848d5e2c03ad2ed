/**
 * Payload Validation Tests
 *
 * Validates poll payloads and job requests against their JSON schemas and
 * the field-level error details reported on failure.
 */

import {
  formatValidationErrors,
  isValidJobKind,
  parseJobRequest,
  parsePlayoffPoll,
  parseWinnerPoll,
} from '../../src/utils/validation';
import { BadRequestError } from '../../src/models/errors';

function captureError(fn: () => unknown): BadRequestError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BadRequestError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected BadRequestError to be thrown');
}

const winnerPoll = {
  messageId: '1350000000000000000',
  winner: 'CSK',
  answers: [{ id: 1, name: 'Chennai Super Kings' }],
  votes: [{ answerId: 1, user: { id: '101', username: 'alice', globalName: null } }],
};

describe('Payload Validation', () => {
  describe('parseWinnerPoll', () => {
    it('should accept a valid winner poll', () => {
      expect(parseWinnerPoll(winnerPoll)).toEqual(winnerPoll);
    });

    it('should accept extra export fields', () => {
      expect(() => parseWinnerPoll({ ...winnerPoll, question: 'Who wins?' })).not.toThrow();
    });

    it('should report a missing winner', () => {
      const { winner: _winner, ...withoutWinner } = winnerPoll;
      const error = captureError(() => parseWinnerPoll(withoutWinner));

      expect(error.message).toBe('Invalid winner poll');
      expect(error.details).toEqual({ winner: 'Missing required field: winner' });
    });

    it('should report a vote with a non-integer answer id', () => {
      const error = captureError(() =>
        parseWinnerPoll({ ...winnerPoll, votes: [{ answerId: '1', user: { username: 'alice' } }] })
      );

      expect(error.details).toEqual({ 'votes/0/answerId': 'Expected integer, received string' });
    });

    it('should reject negative points', () => {
      const error = captureError(() => parseWinnerPoll({ ...winnerPoll, points: -1 }));

      expect(error.details).toEqual({ points: 'Must be >= 0' });
    });
  });

  describe('parsePlayoffPoll', () => {
    it('should require the qualified teams', () => {
      const error = captureError(() => parsePlayoffPoll({ answers: [], votes: [] }));

      expect(error.details).toEqual({ qualifiedteams: 'Missing required field: qualifiedteams' });
    });
  });

  describe('parseJobRequest', () => {
    it('should accept a weekly job', () => {
      const request = {
        kind: 'weekly',
        poll_type: 'poll_winner',
        week: 2,
        matches: [{ id: '12-csk-vs-mi', label: 'Match 12', poll: winnerPoll }],
      };

      expect(parseJobRequest(request)).toEqual(request);
    });

    it('should reject an unknown kind', () => {
      expect(() => parseJobRequest({ kind: 'monthly' })).toThrow('Unknown job kind: monthly');
    });

    it('should reject a request that is not an object', () => {
      expect(() => parseJobRequest('weekly')).toThrow('Unknown job kind: undefined');
    });

    it('should report unknown fields', () => {
      const error = captureError(() => parseJobRequest({ kind: 'playoff', poll: {}, extra: true }));

      expect(error.message).toBe('Invalid playoff job request');
      expect(error.details).toEqual({ payload: 'Unknown field: extra' });
    });

    it('should report a missing flag', () => {
      const error = captureError(() => parseJobRequest({ kind: 'overall', poll_type: 'poll_margin', week: 3 }));

      expect(error.details).toEqual({ include_playoffs: 'Missing required field: include_playoffs' });
    });

    it('should reject week 0', () => {
      const error = captureError(() => parseJobRequest({ kind: 'combined', week: 0, include_playoffs: false }));

      expect(error.details).toEqual({ week: 'Must be >= 1' });
    });

    it('should reject an unknown poll type', () => {
      const error = captureError(() => parseJobRequest({ kind: 'detailed', poll_type: 'poll_mvp', week: 1 }));

      expect(error.details).toEqual({ poll_type: 'Must be one of: poll_winner, poll_margin' });
    });

    it('should reject match ids that are not path-safe', () => {
      const error = captureError(() =>
        parseJobRequest({
          kind: 'match',
          poll_type: 'poll_winner',
          week: 1,
          match: { id: '../escape', poll: winnerPoll },
        })
      );

      expect(Object.keys(error.details ?? {})).toEqual(['match/id']);
    });
  });

  describe('isValidJobKind', () => {
    it('should accept known kinds only', () => {
      expect(isValidJobKind('awards')).toBe(true);
      expect(isValidJobKind('toString')).toBe(false);
      expect(isValidJobKind(7)).toBe(false);
    });
  });

  describe('formatValidationErrors', () => {
    it('should fall back to payload for root-level errors', () => {
      expect(
        formatValidationErrors([
          {
            instancePath: '',
            schemaPath: '#/type',
            keyword: 'type',
            params: { type: 'object' },
            message: 'must be object',
            data: 'weekly',
          },
        ])
      ).toEqual({ payload: 'Expected object, received string' });
    });
  });
});
