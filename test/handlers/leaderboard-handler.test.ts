/**
 * Leaderboard Job Handler Tests
 *
 * Runs job requests end to end against file-backed stores in a temporary
 * directory. Metrics are mocked.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createDependencies, handler, JobDependencies } from '../../src/handlers/leaderboard-handler';
import { loadEnvironmentConfig } from '../../src/config/environment';
import { emitLeaderboardGenerationDuration } from '../../src/utils/metrics';

// Mock the metrics module
jest.mock('../../src/utils/metrics');

const winnerPolls = {
  week1: {
    winner: 'CSK',
    answers: [
      { id: 1, name: 'Chennai Super Kings' },
      { id: 2, name: 'Mumbai Indians' },
    ],
    votes: [
      { answerId: 1, user: { id: '101', username: 'alice' } },
      { answerId: 2, user: { id: '102', username: 'bob' } },
    ],
  },
  week2: {
    winner: 'RR',
    answers: [
      { id: 1, name: 'Rajasthan Royals' },
      { id: 2, name: 'Kolkata Knight Riders' },
    ],
    votes: [
      { answerId: 2, user: { id: '101', username: 'alice' } },
      { answerId: 1, user: { id: '102', username: 'bob' } },
    ],
  },
};

const marginPoll = {
  margin: '14 runs',
  answers: [
    { id: 1, name: 'Win by 11-20 runs OR by 7-8 wickets' },
    { id: 2, name: 'Win by 1-10 runs OR by 9-10 wickets' },
  ],
  votes: [
    { answerId: 1, user: { id: '101', username: 'alice' } },
    { answerId: 2, user: { id: '102', username: 'bob' } },
  ],
};

describe('Leaderboard Job Handler', () => {
  let dataDir: string;
  let deps: JobDependencies;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  async function run(event: unknown) {
    const result = await handler(event, deps);
    return { statusCode: result.statusCode, body: JSON.parse(result.body) };
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'jobs-'));
    deps = createDependencies({ ...loadEnvironmentConfig(), dataDir, snapshotStore: 'file' });
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('weekly jobs', () => {
    it('should score the polls, write the leaderboard and return its summary', async () => {
      const { statusCode, body } = await run({
        kind: 'weekly',
        poll_type: 'poll_winner',
        week: 1,
        matches: [{ id: '1-csk-vs-mi', label: 'Match 1', poll: winnerPolls.week1 }],
      });

      expect(statusCode).toBe(200);
      expect(body.data.leaderboard).toEqual({
        kind: 'weekly',
        scope: 'weekly/poll_winner',
        sequence: 1,
        units: ['Match 1'],
        entity_count: 2,
        rows: [
          { dense_rank: 1, standard_rank: 1, username: 'alice', total: 1 },
          { dense_rank: 2, standard_rank: 2, username: 'bob', total: 0 },
        ],
      });

      const stored = JSON.parse(
        await fs.readFile(path.join(dataDir, 'leaderboards', 'weekly', 'poll_winner', '1.json'), 'utf8')
      );
      expect(stored.entries[0].cells).toEqual([{ participated: true, score: 1, selection: 'CSK' }]);
    });

    it('should log the run and time it', async () => {
      await run({
        kind: 'weekly',
        poll_type: 'poll_winner',
        week: 1,
        matches: [{ id: '1-csk-vs-mi', poll: winnerPolls.week1 }],
      });

      const runEntry = consoleLogSpy.mock.calls
        .map((call) => JSON.parse(call[0]))
        .find((entry) => entry.log_type === 'LEADERBOARD_RUN');
      expect(runEntry.success).toBe(true);
      expect(runEntry.scope).toBe('weekly/poll_winner');
      expect(runEntry.entity_count).toBe(2);
      expect(emitLeaderboardGenerationDuration).toHaveBeenCalledWith(
        'weekly',
        'weekly/poll_winner',
        expect.any(Number)
      );
    });

    it('should reject duplicate match ids', async () => {
      const { statusCode, body } = await run({
        kind: 'weekly',
        poll_type: 'poll_winner',
        week: 1,
        matches: [
          { id: '1-csk-vs-mi', poll: winnerPolls.week1 },
          { id: '1-csk-vs-mi', poll: winnerPolls.week1 },
        ],
      });

      expect(statusCode).toBe(400);
      expect(body.error.message).toBe("Duplicate match id in week 1: '1-csk-vs-mi'");
    });

    it('should reject a repeated match id that names an Object.prototype member', async () => {
      const { statusCode, body } = await run({
        kind: 'weekly',
        poll_type: 'poll_winner',
        week: 1,
        matches: [
          { id: '__proto__', poll: winnerPolls.week1 },
          { id: '__proto__', poll: winnerPolls.week1 },
        ],
      });

      expect(statusCode).toBe(400);
      expect(body.error.message).toBe("Duplicate match id in week 1: '__proto__'");
    });

    it('should report invalid poll payloads with details', async () => {
      const { statusCode, body } = await run({
        kind: 'weekly',
        poll_type: 'poll_margin',
        week: 1,
        matches: [{ id: '1-csk-vs-mi', poll: winnerPolls.week1 }],
      });

      expect(statusCode).toBe(400);
      expect(body.error.message).toBe('Invalid margin poll');
      expect(body.error.details).toEqual({ margin: 'Missing required field: margin' });
    });
  });

  describe('invalid requests', () => {
    it('should return 400 and log the failed run', async () => {
      const { statusCode, body } = await run({ kind: 'overall', poll_type: 'poll_winner', week: 0 });

      expect(statusCode).toBe(400);
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.details).toEqual({
        include_playoffs: 'Missing required field: include_playoffs',
        week: 'Must be >= 1',
      });

      const runEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(runEntry.log_type).toBe('LEADERBOARD_RUN');
      expect(runEntry.success).toBe(false);
      expect(runEntry.kind).toBe('overall');
      expect(emitLeaderboardGenerationDuration).toHaveBeenCalledWith('overall', 'overall', expect.any(Number), true);
    });

    it('should return 404 when no weekly leaderboards exist', async () => {
      const { statusCode, body } = await run({
        kind: 'overall',
        poll_type: 'poll_winner',
        week: 3,
        include_playoffs: false,
      });

      expect(statusCode).toBe(404);
      expect(body.error.message).toBe('No weekly poll_winner leaderboards up to week 3');
    });

    it('should return 404 when neither combined source exists', async () => {
      const { statusCode, body } = await run({ kind: 'combined', week: 1, include_playoffs: false });

      expect(statusCode).toBe(404);
      expect(body.error.message).toBe('No overall poll_winner or poll_margin leaderboard for week 1');
    });
  });

  describe('combined jobs', () => {
    it('should count a missing margin leaderboard as 0 and warn', async () => {
      await run({
        kind: 'weekly',
        poll_type: 'poll_winner',
        week: 1,
        matches: [{ id: '1-csk-vs-mi', poll: winnerPolls.week1 }],
      });
      await run({ kind: 'overall', poll_type: 'poll_winner', week: 1, include_playoffs: false });
      consoleLogSpy.mockClear();

      const { statusCode, body } = await run({ kind: 'combined', week: 1, include_playoffs: false });

      expect(statusCode).toBe(200);
      expect(body.data.leaderboard.units).toEqual(['Winner', 'Margin']);
      expect(body.data.leaderboard.rows).toEqual([
        {
          dense_rank: 1,
          standard_rank: 1,
          username: 'alice',
          total: 1,
          dense_movement: 'N',
          standard_movement: 'N',
        },
        {
          dense_rank: 2,
          standard_rank: 2,
          username: 'bob',
          total: 0,
          dense_movement: 'N',
          standard_movement: 'N',
        },
      ]);

      const warning = consoleLogSpy.mock.calls
        .map((call) => JSON.parse(call[0]))
        .find((entry) => entry.level === 'WARN');
      expect(warning.message).toBe('Overall leaderboard missing, combined without it');
      expect(warning.poll_type).toBe('poll_margin');
      expect(warning.week).toBe(1);
    });
  });

  describe('season flow', () => {
    it('should chain weekly, overall, combined and awards jobs', async () => {
      const jobs = [
        {
          kind: 'weekly',
          poll_type: 'poll_winner',
          week: 1,
          matches: [{ id: '1-csk-vs-mi', poll: winnerPolls.week1 }],
        },
        {
          kind: 'weekly',
          poll_type: 'poll_winner',
          week: 2,
          matches: [{ id: '2-rr-vs-kkr', poll: winnerPolls.week2 }],
        },
        {
          kind: 'weekly',
          poll_type: 'poll_margin',
          week: 1,
          matches: [{ id: '1-csk-vs-mi', poll: marginPoll }],
        },
        { kind: 'overall', poll_type: 'poll_winner', week: 1, include_playoffs: false },
        { kind: 'overall', poll_type: 'poll_margin', week: 2, include_playoffs: false },
      ];
      for (const job of jobs) {
        expect((await run(job)).statusCode).toBe(200);
      }

      const overall = await run({ kind: 'overall', poll_type: 'poll_winner', week: 2, include_playoffs: false });
      expect(overall.body.data.leaderboard.rows).toEqual([
        {
          dense_rank: 1,
          standard_rank: 1,
          username: 'alice',
          total: 1,
          dense_movement: '—',
          standard_movement: '—',
        },
        {
          dense_rank: 1,
          standard_rank: 1,
          username: 'bob',
          total: 1,
          dense_movement: '↑1',
          standard_movement: '↑1',
        },
      ]);

      const combined = await run({ kind: 'combined', week: 2, include_playoffs: false });
      expect(combined.body.data.leaderboard.units).toEqual(['Winner', 'Margin']);
      expect(combined.body.data.leaderboard.rows).toEqual([
        {
          dense_rank: 1,
          standard_rank: 1,
          username: 'alice',
          total: 2,
          dense_movement: 'N',
          standard_movement: 'N',
        },
        {
          dense_rank: 2,
          standard_rank: 2,
          username: 'bob',
          total: 1,
          dense_movement: 'N',
          standard_movement: 'N',
        },
      ]);

      const awards = await run({ kind: 'awards', week: 2, top_n: 1 });
      expect(awards.statusCode).toBe(200);
      expect(awards.body.data.awards.margin_winner).toEqual({
        entity_key: 'alice',
        display_name: 'alice',
        total: 1,
      });
      expect(awards.body.data.lines.slice(0, 6)).toEqual([
        'Prize Winners:',
        'Predict the Winner - 1st Place:',
        '  Username: alice',
        '  Display Name: alice',
        '  Details: Total Points: 1',
        '',
      ]);
    });
  });

  describe('dependencies from the environment', () => {
    const originalDataDir = process.env.DATA_DIR;
    const originalStore = process.env.SNAPSHOT_STORE;

    afterEach(() => {
      for (const [key, value] of [
        ['DATA_DIR', originalDataDir],
        ['SNAPSHOT_STORE', originalStore],
      ] as const) {
        if (value === undefined) {
          delete process.env[key];
        } else {
          process.env[key] = value;
        }
      }
    });

    it('should write under DATA_DIR when no dependencies are passed', async () => {
      process.env.DATA_DIR = dataDir;
      delete process.env.SNAPSHOT_STORE;

      const result = await handler({
        kind: 'playoff',
        poll: {
          points: 4,
          qualifiedteams: ['CSK', 'KKR', 'MI', 'RR'],
          answers: [{ id: 1, name: 'Chennai Super Kings' }],
          votes: [{ answerId: 1, user: { username: 'alice' } }],
        },
      });

      expect(result.statusCode).toBe(200);
      await expect(fs.access(path.join(dataDir, 'leaderboards', 'playoff', '0.json'))).resolves.toBeUndefined();
    });

    it('should fail with 500 when the postgres store is not configured', async () => {
      process.env.SNAPSHOT_STORE = 'postgres';
      delete process.env.DB_HOST;
      delete process.env.DB_NAME;

      const result = await handler({ kind: 'awards', week: 1 });

      expect(result.statusCode).toBe(500);
      expect(JSON.parse(result.body).error.code).toBe('INTERNAL_ERROR');
    });
  });
});
