/**
 * Ranking Utilities
 *
 * Orders rows by total and annotates them with two rank numbers.
 *
 * Ranking Rules:
 * - Sort by total DESC, then entity_key ASC so output order is reproducible
 * - Dense rank: tied totals share a rank, next distinct total gets rank + 1 (1, 2, 2, 3)
 * - Standard rank: tied totals share the position of the first row in the
 *   tie group, next distinct total skips ahead (1, 2, 2, 4)
 */

import { RankableRow, Ranked } from '../models/leaderboard';

/**
 * Compare two rows for leaderboard order
 *
 * Entity keys are compared by code unit so the order does not depend on locale.
 */
export function compareByTotal(a: RankableRow, b: RankableRow): number {
  if (a.total !== b.total) {
    return b.total - a.total;
  }
  if (a.entity_key < b.entity_key) {
    return -1;
  }
  return a.entity_key > b.entity_key ? 1 : 0;
}

/**
 * Rank rows by total
 *
 * Examples (totals → dense / standard):
 * - [10, 10, 5] → [1, 1, 2] / [1, 1, 3]
 * - [7] → [1] / [1]
 * - [] → []
 *
 * @param rows - Rows in any order; not mutated
 * @returns New array sorted by total DESC with dense_rank and standard_rank set
 */
export function rankRows<T extends RankableRow>(rows: T[]): Ranked<T>[] {
  const sorted = [...rows].sort(compareByTotal);
  const ranked: Ranked<T>[] = [];

  let denseRank = 0;
  let standardRank = 0;
  let previousTotal: number | undefined;

  sorted.forEach((row, index) => {
    if (previousTotal === undefined || row.total !== previousTotal) {
      denseRank++;
      standardRank = index + 1;
    }

    ranked.push({ ...row, dense_rank: denseRank, standard_rank: standardRank });
    previousTotal = row.total;
  });

  return ranked;
}
