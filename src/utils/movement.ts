/**
 * Rank Movement Utilities
 *
 * Compares the current ranking with the previous snapshot of the same
 * leaderboard lineage.
 *
 * Movement Rules:
 * - delta = previous rank - current rank (positive = moved toward rank 1)
 * - delta > 0 → improved, delta < 0 → worsened, delta = 0 → unchanged
 * - Entities missing from the previous snapshot are new entrants on both disciplines
 * - Entities only in the previous snapshot are not reported
 */

import { MovementRecord, RankChange, Ranked, RankableRow } from '../models/leaderboard';
import { RankSnapshot } from '../models/snapshot';

const NEW_ENTRANT: RankChange = { kind: 'new_entrant' };

/**
 * Classify the change between two rank numbers
 */
export function rankChange(previousRank: number, currentRank: number): RankChange {
  const delta = previousRank - currentRank;

  if (delta > 0) {
    return { kind: 'improved', by: delta };
  }
  if (delta < 0) {
    return { kind: 'worsened', by: -delta };
  }
  return { kind: 'unchanged' };
}

/**
 * Signed delta of a rank change, undefined for new entrants
 */
export function rankDelta(change: RankChange): number | undefined {
  switch (change.kind) {
    case 'improved':
      return change.by;
    case 'worsened':
      return -change.by;
    case 'unchanged':
      return 0;
    case 'new_entrant':
      return undefined;
  }
}

/**
 * Calculate movement for every entity of the current ranking
 *
 * @param previous - Previous snapshot, undefined on the first run of a lineage
 * @param current - Current ranked rows
 * @returns One movement record per current row, in current order
 */
export function calculateMovement(
  previous: RankSnapshot | undefined,
  current: Ranked<RankableRow>[]
): MovementRecord[] {
  return current.map((row) => {
    const before = previous && Object.prototype.hasOwnProperty.call(previous.ranks, row.entity_key)
      ? previous.ranks[row.entity_key]
      : undefined;

    if (!before) {
      return { entity_key: row.entity_key, dense: NEW_ENTRANT, standard: NEW_ENTRANT };
    }

    return {
      entity_key: row.entity_key,
      dense: rankChange(before.dense, row.dense_rank),
      standard: rankChange(before.standard, row.standard_rank),
    };
  });
}
