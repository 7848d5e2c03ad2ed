/**
 * Score Models
 *
 * Type definitions for the data flowing into the aggregation engine:
 * per-unit score records and the aggregated per-entity rows built from them.
 */

/**
 * One scored event (a match, a margin prediction, a playoff pick set,
 * or a whole source leaderboard when combining)
 */
export interface ContestUnit {
  id: string;                    // Unique within a run
  label?: string;                // Human-readable name (e.g., "Match 12", "Week3")
}

/**
 * Score of one entity for one contest unit
 */
export interface ScoreRecord {
  entity_key: string;            // Stable user identifier
  display_name: string;          // Latest known display name
  score: number;                 // Finite, non-negative points
  selection?: string;            // Short label of the pick (e.g., "CSK", "11-20R")
}

/**
 * Score records keyed by contest unit id
 */
export type ScoresByUnit = Record<string, ScoreRecord[]>;

/**
 * One column of an aggregated row.
 * Non-participation is distinguishable from a participated score of 0.
 */
export type UnitCell =
  | { participated: true; score: number; selection?: string }
  | { participated: false; score: 0 };

/**
 * Per-entity aggregate across a fixed, ordered list of contest units
 */
export interface AggregatedRow {
  entity_key: string;
  display_name: string;
  cells: UnitCell[];             // Aligned with the run's unit list
  total: number;                 // Sum of cell scores, missing counts as 0
}

/**
 * Placeholder cell for an entity that did not take part in a unit
 */
export const NO_PARTICIPATION: UnitCell = Object.freeze({ participated: false, score: 0 });
