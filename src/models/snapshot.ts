/**
 * Snapshot Models
 *
 * Type definitions for rank snapshots. A snapshot captures the rank
 * assignments of one completed run and becomes the comparison baseline
 * for the next run in the same lineage.
 */

/**
 * Ranks of one entity in a snapshot
 */
export interface SnapshotRank {
  dense: number;
  standard: number;
}

/**
 * Immutable capture of a ranking pass
 */
export interface RankSnapshot {
  readonly scope: string;                                    // Leaderboard lineage
  readonly sequence: number;                                 // Position in the lineage
  readonly run_id: string;                                   // Run that produced it
  readonly generated_at: string;                             // ISO-8601
  readonly ranks: Readonly<Record<string, Readonly<SnapshotRank>>>;
}

/**
 * Snapshot database row (matches PostgreSQL schema)
 */
export interface SnapshotRow {
  id: string;
  scope: string;
  sequence: number;
  run_id: string;
  generated_at: Date;
  ranks: unknown;                // JSONB, validated on read
}
