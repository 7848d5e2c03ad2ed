/**
 * Leaderboard Lineage Utilities
 *
 * Scope names and contest units shared by the generation runs, and the
 * conversion of persisted leaderboards back into score input.
 *
 * Scopes:
 * - match/<poll_type>/<match_id>   one match, sequence = week
 * - weekly/<poll_type>             sequence = week
 * - detailed/<poll_type>           sequence = last week included
 * - overall/<poll_type>[+playoffs] sequence = week
 * - overall/combined[+playoffs]    sequence = week
 * - playoff                        sequence = 0
 */

import { ContestUnit, ScoreRecord, ScoresByUnit } from '../models/score';
import { Leaderboard } from '../models/leaderboard';
import { PollType } from '../models/poll';
import { SourceTotals } from './aggregation';

export const PLAYOFF_SCOPE = 'playoff';
export const PLAYOFF_SEQUENCE = 0;

export const PLAYOFF_UNIT: ContestUnit = { id: 'playoffs', label: 'Playoffs' };

const SOURCE_LABELS: Record<PollType, string> = {
  [PollType.WINNER]: 'Winner',
  [PollType.MARGIN]: 'Margin',
};

export function matchScope(pollType: PollType, matchId: string): string {
  return `match/${pollType}/${matchId}`;
}

export function weeklyScope(pollType: PollType): string {
  return `weekly/${pollType}`;
}

export function detailedScope(pollType: PollType): string {
  return `detailed/${pollType}`;
}

export function overallScope(source: PollType | 'combined', includePlayoffs: boolean): string {
  return `overall/${source}${includePlayoffs ? '+playoffs' : ''}`;
}

/**
 * Contest unit standing for one week's total
 */
export function weekUnit(week: number): ContestUnit {
  return { id: `week-${week}`, label: `Week${week}` };
}

/**
 * Contest unit standing for one poll type's overall total
 */
export function sourceUnit(pollType: PollType): ContestUnit {
  return { id: pollType, label: SOURCE_LABELS[pollType] };
}

/**
 * Units of an overall leaderboard: one per week, then playoffs
 */
export function overallUnits(weeks: number[], includePlayoffs: boolean): ContestUnit[] {
  const units = weeks.map(weekUnit);
  return includePlayoffs ? [...units, PLAYOFF_UNIT] : units;
}

function detailedUnitId(week: number, unitId: string): string {
  return `week-${week}/${unitId}`;
}

/**
 * Units of a detailed leaderboard
 *
 * Matches of all weeks in order, numbered globally ("Match 1" ... "Match N").
 */
export function detailedUnits(weeklyLeaderboards: Leaderboard[]): ContestUnit[] {
  const units: ContestUnit[] = [];

  for (const weekly of weeklyLeaderboards) {
    for (const unit of weekly.units) {
      units.push({
        id: detailedUnitId(weekly.sequence, unit.id),
        label: `Match ${units.length + 1}`,
      });
    }
  }

  return units;
}

/**
 * Per-match score records of weekly leaderboards, keyed by detailed unit id
 *
 * Only participated cells become records, so non-participation survives
 * the round trip.
 */
export function flattenWeeklyScores(weeklyLeaderboards: Leaderboard[]): ScoresByUnit {
  const scoresByUnit: [string, ScoreRecord[]][] = [];

  for (const weekly of weeklyLeaderboards) {
    for (const [index, unit] of weekly.units.entries()) {
      const records: ScoreRecord[] = [];

      for (const entry of weekly.entries) {
        const cell = entry.cells[index];
        if (!cell || !cell.participated) {
          continue;
        }

        records.push(
          cell.selection === undefined
            ? { entity_key: entry.entity_key, display_name: entry.display_name, score: cell.score }
            : {
                entity_key: entry.entity_key,
                display_name: entry.display_name,
                score: cell.score,
                selection: cell.selection,
              }
        );
      }

      scoresByUnit.push([detailedUnitId(weekly.sequence, unit.id), records]);
    }
  }

  return Object.fromEntries(scoresByUnit);
}

/**
 * Totals of a persisted leaderboard as one source of a combined leaderboard
 */
export function toSourceTotals(source: ContestUnit, leaderboard: Leaderboard): SourceTotals {
  return {
    source,
    rows: leaderboard.entries.map((entry) => ({
      entity_key: entry.entity_key,
      display_name: entry.display_name,
      total: entry.total,
    })),
  };
}
