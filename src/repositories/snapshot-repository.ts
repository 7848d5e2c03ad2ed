/**
 * Snapshot Repository
 *
 * Data access layer for rank snapshots stored in PostgreSQL.
 * Each leaderboard lineage (scope) keeps one snapshot per sequence; the
 * previous snapshot of a run is the one with the greatest sequence below
 * the run's own.
 *
 * All queries are parameterized. Ranks are stored as JSONB and validated
 * when read back.
 */

import { PoolClient } from 'pg';
import { query, transaction } from '../config/database';
import { RankSnapshot, SnapshotRow } from '../models/snapshot';
import { SnapshotUnreadableError } from '../models/errors';
import { parseSnapshot } from '../utils/snapshots';
import { logDatabase } from '../utils/logger';

/**
 * Persistence port for rank snapshots
 */
export interface SnapshotStore {
  /**
   * Load the latest snapshot of a lineage
   *
   * @param scope - Leaderboard lineage
   * @param beforeSequence - Only consider snapshots with a lower sequence
   * @returns Snapshot, or undefined if the lineage has none
   * @throws SnapshotUnreadableError if the stored payload cannot be decoded
   */
  loadPreviousSnapshot(scope: string, beforeSequence?: number): Promise<RankSnapshot | undefined>;

  /**
   * Store a snapshot, replacing any snapshot with the same scope and sequence
   */
  savePreviousSnapshot(scope: string, snapshot: RankSnapshot): Promise<void>;
}

/**
 * PostgreSQL-backed snapshot store (rank_snapshots table)
 */
export class PostgresSnapshotRepository implements SnapshotStore {
  async loadPreviousSnapshot(
    scope: string,
    beforeSequence?: number
  ): Promise<RankSnapshot | undefined> {
    const sql = `
      SELECT
        id,
        scope,
        sequence,
        run_id,
        generated_at,
        ranks
      FROM rank_snapshots
      WHERE scope = $1 AND ($2::int IS NULL OR sequence < $2::int)
      ORDER BY sequence DESC
      LIMIT 1
    `;

    let rows: SnapshotRow[];
    try {
      const result = await query<SnapshotRow>(sql, [scope, beforeSequence ?? null]);
      rows = result.rows;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logDatabase({ errorMessage: message, query: sql, operation: 'loadPreviousSnapshot' });
      throw new SnapshotUnreadableError(scope, message);
    }

    if (rows.length === 0) {
      return undefined;
    }

    return mapSnapshotRow(rows[0]);
  }

  /**
   * Upsert a snapshot inside a transaction
   *
   * Uses ON CONFLICT (scope, sequence) DO UPDATE so re-running a week
   * replaces its snapshot.
   */
  async savePreviousSnapshot(scope: string, snapshot: RankSnapshot): Promise<void> {
    const sql = `
      INSERT INTO rank_snapshots (
        scope,
        sequence,
        run_id,
        generated_at,
        ranks
      ) VALUES (
        $1, $2, $3, $4, $5
      )
      ON CONFLICT (scope, sequence)
      DO UPDATE SET
        run_id = EXCLUDED.run_id,
        generated_at = EXCLUDED.generated_at,
        ranks = EXCLUDED.ranks
    `;

    await transaction(async (client: PoolClient) => {
      await client.query(sql, [
        scope,
        snapshot.sequence,
        snapshot.run_id,
        snapshot.generated_at,
        JSON.stringify(snapshot.ranks),
      ]);
    });
  }
}

/**
 * Map a database row to a snapshot
 *
 * @throws SnapshotUnreadableError if the ranks column does not hold a rank map
 */
export function mapSnapshotRow(row: SnapshotRow): RankSnapshot {
  const snapshot = parseSnapshot(
    {
      scope: row.scope,
      sequence: row.sequence,
      run_id: row.run_id,
      generated_at: row.generated_at.toISOString(),
      ranks: row.ranks,
    },
    row.scope,
    row.sequence
  );

  if (!snapshot) {
    throw new SnapshotUnreadableError(row.scope, `Invalid ranks in snapshot ${row.id}`);
  }

  return snapshot;
}
