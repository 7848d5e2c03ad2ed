/**
 * Leaderboard Models
 *
 * Type definitions for ranked rows, rank movement and the leaderboards
 * produced by a generation run.
 */

import { AggregatedRow, ContestUnit } from './score';

/**
 * Rank numbers assigned by the ranker
 */
export interface RankAssignment {
  dense_rank: number;            // 1..k, no gaps
  standard_rank: number;         // Competition ranking (1, 2, 2, 4, ...)
}

/**
 * Any row that can be ranked: identified by entity key, ordered by total
 */
export interface RankableRow {
  entity_key: string;
  total: number;
}

export type Ranked<T extends RankableRow> = T & RankAssignment;

export type RankedRow = Ranked<AggregatedRow>;

/**
 * Change of one rank discipline between two snapshots
 */
export type RankChange =
  | { kind: 'improved'; by: number }
  | { kind: 'worsened'; by: number }
  | { kind: 'unchanged' }
  | { kind: 'new_entrant' };

/**
 * Movement of one entity under both ranking disciplines
 */
export interface MovementRecord {
  entity_key: string;
  dense: RankChange;
  standard: RankChange;
}

/**
 * Leaderboard views produced by the engine
 */
export enum LeaderboardKind {
  MATCH = 'match',
  WEEKLY = 'weekly',
  OVERALL = 'overall',
  COMBINED = 'combined',
  DETAILED = 'detailed',
  PLAYOFF = 'playoff',
}

/**
 * Explicit configuration of one leaderboard-generation run
 */
export interface RunConfig {
  scope: string;                     // Leaderboard lineage, e.g. "overall/poll_winner"
  sequence: number;                  // Position in the lineage (week number)
  units: ContestUnit[];              // Fixed, ordered contest units
  include_secondary_source: boolean; // Include playoff points (overall views)
}

/**
 * Ranked row with its movement, when the view tracks movement
 */
export interface LeaderboardEntry extends RankedRow {
  movement?: MovementRecord;
}

/**
 * Output of a generation run, handed to the output sink
 */
export interface Leaderboard {
  kind: LeaderboardKind;
  scope: string;
  sequence: number;
  run_id: string;
  units: ContestUnit[];
  entries: LeaderboardEntry[];
  generated_at: string;              // ISO-8601
}
