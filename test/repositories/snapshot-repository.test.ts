/**
 * Snapshot Repository Tests
 *
 * Unit tests for PostgresSnapshotRepository. The database module is mocked;
 * tests verify parameterized queries, row decoding and error handling.
 */

import { Client } from 'pg';
import { PostgresSnapshotRepository, mapSnapshotRow } from '../../src/repositories/snapshot-repository';
import { query, transaction } from '../../src/config/database';
import { SnapshotUnreadableError } from '../../src/models/errors';
import { SnapshotRow } from '../../src/models/snapshot';
import { createSnapshot } from '../../src/utils/snapshots';
import { rankRows } from '../../src/utils/ranking';

// Mock the database module
jest.mock('../../src/config/database');

const mockQuery = jest.mocked(query);
const mockTransaction = jest.mocked(transaction);

function snapshotRow(overrides: Partial<SnapshotRow> = {}): SnapshotRow {
  return {
    id: 'snap-1',
    scope: 'weekly/poll_winner',
    sequence: 2,
    run_id: 'run-2',
    generated_at: new Date('2025-04-07T18:30:00.000Z'),
    ranks: { alice: { dense: 1, standard: 1 }, bob: { dense: 2, standard: 2 } },
    ...overrides,
  };
}

describe('PostgresSnapshotRepository', () => {
  let repository: PostgresSnapshotRepository;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    repository = new PostgresSnapshotRepository();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe('loadPreviousSnapshot', () => {
    it('should load the latest snapshot below the sequence', async () => {
      mockQuery.mockResolvedValue({ rows: [snapshotRow()], command: 'SELECT', rowCount: 1, oid: 0, fields: [] });

      const snapshot = await repository.loadPreviousSnapshot('weekly/poll_winner', 3);

      const [sql, params] = mockQuery.mock.calls[0];
      expect(sql).toContain('FROM rank_snapshots');
      expect(sql).toContain('sequence < $2::int');
      expect(sql).toContain('ORDER BY sequence DESC');
      expect(params).toEqual(['weekly/poll_winner', 3]);

      expect(snapshot).toEqual({
        scope: 'weekly/poll_winner',
        sequence: 2,
        run_id: 'run-2',
        generated_at: '2025-04-07T18:30:00.000Z',
        ranks: { alice: { dense: 1, standard: 1 }, bob: { dense: 2, standard: 2 } },
      });
    });

    it('should pass null when no sequence bound is given', async () => {
      mockQuery.mockResolvedValue({ rows: [], command: 'SELECT', rowCount: 0, oid: 0, fields: [] });

      const snapshot = await repository.loadPreviousSnapshot('overall/combined');

      expect(snapshot).toBeUndefined();
      expect(mockQuery.mock.calls[0][1]).toEqual(['overall/combined', null]);
    });

    it('should raise SnapshotUnreadableError and log when the query fails', async () => {
      mockQuery.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

      await expect(repository.loadPreviousSnapshot('weekly/poll_winner', 3)).rejects.toThrow(
        SnapshotUnreadableError
      );

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.log_type).toBe('DATABASE_ERROR');
      expect(logEntry.operation).toBe('loadPreviousSnapshot');
    });

    it('should raise SnapshotUnreadableError for corrupt ranks', async () => {
      mockQuery.mockResolvedValue({
        rows: [snapshotRow({ ranks: { alice: { dense: 'first' } } })],
        command: 'SELECT',
        rowCount: 1,
        oid: 0,
        fields: [],
      });

      await expect(repository.loadPreviousSnapshot('weekly/poll_winner', 3)).rejects.toThrow(
        "Snapshot for scope 'weekly/poll_winner' is unreadable: Invalid ranks in snapshot snap-1"
      );
    });
  });

  describe('savePreviousSnapshot', () => {
    it('should upsert the snapshot inside a transaction', async () => {
      const client = Object.assign(new Client(), { release: jest.fn() });
      const clientQuery = jest.spyOn(client, 'query').mockImplementation(() => undefined);
      mockTransaction.mockImplementation(async (callback) => callback(client));

      const snapshot = createSnapshot(
        'overall/poll_margin',
        4,
        'run-4',
        rankRows([{ entity_key: 'alice', total: 3 }]),
        new Date('2025-04-21T18:30:00.000Z')
      );

      await repository.savePreviousSnapshot('overall/poll_margin', snapshot);

      expect(mockTransaction).toHaveBeenCalledTimes(1);
      const [sql, params] = clientQuery.mock.calls[0];
      expect(sql).toContain('INSERT INTO rank_snapshots');
      expect(sql).toContain('ON CONFLICT (scope, sequence)');
      expect(params).toEqual([
        'overall/poll_margin',
        4,
        'run-4',
        '2025-04-21T18:30:00.000Z',
        '{"alice":{"dense":1,"standard":1}}',
      ]);
    });

    it('should propagate write failures', async () => {
      mockTransaction.mockRejectedValue(new Error('unique violation'));

      const snapshot = createSnapshot('weekly/poll_winner', 1, 'run-1', []);

      await expect(repository.savePreviousSnapshot('weekly/poll_winner', snapshot)).rejects.toThrow(
        'unique violation'
      );
    });
  });

  describe('mapSnapshotRow', () => {
    it('should convert the timestamp to ISO-8601', () => {
      expect(mapSnapshotRow(snapshotRow()).generated_at).toBe('2025-04-07T18:30:00.000Z');
    });
  });
});
