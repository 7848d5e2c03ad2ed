/**
 * Streak Calculation Utilities
 *
 * Finds the longest run of correct (winning) or incorrect (losing)
 * predictions per voter across an ordered list of matches.
 *
 * Streak Rules:
 * - Washed-out matches (every participant scored 0) are skipped entirely
 * - Not voting in a match ends the current streak
 * - A score above 0 is a win, a participated score of 0 is a loss
 * - A voter's earliest streak of the longest length is reported
 * - Voters are ordered by streak length, then by earliest starting match
 *
 * Examples (W = win, L = loss, - = did not vote):
 * - [W, W, L, W] → win streak 2 from match 1 to match 2
 * - [W, -, W, W] → win streak 2 from match 3 to match 4
 * - [L, L, L, W] → losing streak 3 from match 1 to match 3
 */

import { AggregatedRow, UnitCell } from '../models/score';
import { isWashedOut } from './aggregation';

export type StreakOutcome = 'win' | 'loss';

/**
 * Longest streak of one voter; matches are 1-based positions in the unit list
 */
export interface Streak {
  entity_key: string;
  display_name: string;
  length: number;
  start_match: number;
  end_match: number;
}

/**
 * Flag the units in which every participant scored 0
 *
 * @param rows - Aggregated rows sharing one unit list
 * @param unitCount - Number of units in that list
 */
export function washedOutUnits(rows: AggregatedRow[], unitCount: number): boolean[] {
  const flags: boolean[] = [];

  for (let index = 0; index < unitCount; index++) {
    const records = rows.flatMap((row) => {
      const cell = row.cells[index];
      return cell && cell.participated
        ? [{ entity_key: row.entity_key, display_name: row.display_name, score: cell.score }]
        : [];
    });
    flags.push(isWashedOut(records));
  }

  return flags;
}

function matchesOutcome(cell: UnitCell, outcome: StreakOutcome): boolean {
  if (!cell.participated) {
    return false;
  }
  return outcome === 'win' ? cell.score > 0 : cell.score === 0;
}

/**
 * Find the longest streak in one row of cells
 *
 * @returns 0-based start and end indexes, or undefined if there is no streak
 */
export function longestStreak(
  cells: UnitCell[],
  outcome: StreakOutcome,
  skipped: boolean[]
): { length: number; start: number; end: number } | undefined {
  let best: { length: number; start: number; end: number } | undefined;
  let current = 0;
  let start = 0;

  for (const [index, cell] of cells.entries()) {
    if (skipped[index]) {
      continue;
    }

    if (!matchesOutcome(cell, outcome)) {
      current = 0;
      continue;
    }

    if (current === 0) {
      start = index;
    }
    current++;

    if (!best || current > best.length) {
      best = { length: current, start, end: index };
    }
  }

  return best;
}

/**
 * Rank voters by their longest streak
 *
 * @param rows - Per-match rows (e.g., a detailed leaderboard's entries)
 * @param unitCount - Number of matches
 * @param outcome - Winning or losing streaks
 * @param excluded - Entity keys left out of the ranking
 * @param limit - Maximum number of streaks returned
 */
export function rankStreaks(
  rows: AggregatedRow[],
  unitCount: number,
  outcome: StreakOutcome,
  excluded: ReadonlySet<string>,
  limit: number
): Streak[] {
  const skipped = washedOutUnits(rows, unitCount);
  const streaks: Streak[] = [];

  for (const row of rows) {
    if (excluded.has(row.entity_key)) {
      continue;
    }

    const streak = longestStreak(row.cells, outcome, skipped);
    if (streak) {
      streaks.push({
        entity_key: row.entity_key,
        display_name: row.display_name,
        length: streak.length,
        start_match: streak.start + 1,
        end_match: streak.end + 1,
      });
    }
  }

  return streaks
    .sort((a, b) => b.length - a.length || a.start_match - b.start_match)
    .slice(0, limit);
}
