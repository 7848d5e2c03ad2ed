/**
 * Awards Service
 *
 * Business logic layer for the end-of-season prize list. Reads persisted
 * leaderboards of the winner and margin lineages and picks:
 *
 * - the top N of the overall winner leaderboard
 * - the first place of the overall margin leaderboard
 * - the longest winning streaks (top N overall winners excluded) and the
 *   overall longest winning streak
 * - the longest losing streaks and the overall longest losing streak
 * - the voters who picked a given team most often
 */

import { LeaderboardStore } from '../repositories/leaderboard-repository';
import { Leaderboard } from '../models/leaderboard';
import { AggregatedRow } from '../models/score';
import { PollType } from '../models/poll';
import { NotFoundError } from '../models/errors';
import { aggregateUnitScores } from '../utils/aggregation';
import { rankStreaks, Streak } from '../utils/streaks';
import { detailedUnits, flattenWeeklyScores, overallScope, weeklyScope } from '../utils/lineage';
import { log, LogLevel } from '../utils/logger';

export const DEFAULT_AWARD_COUNT = 3;
export const DEFAULT_AWARD_TEAM = 'CSK';

/**
 * Leaderboard position awarded a prize
 */
export interface PlaceAward {
  entity_key: string;
  display_name: string;
  total: number;
}

/**
 * Voter who picked the award team, with the matches they picked it in
 */
export interface TeamVoterAward {
  entity_key: string;
  display_name: string;
  vote_count: number;
  matches: number[];
}

export interface Awards {
  week: number;
  team: string;
  top_winners: PlaceAward[];
  margin_winner?: PlaceAward;
  winning_streaks: Streak[];
  overall_winning_streak?: Streak;
  losing_streaks: Streak[];
  overall_losing_streak?: Streak;
  top_team_voters: TeamVoterAward[];
}

export interface AwardsOptions {
  week: number;
  team?: string;
  topN?: number;
}

export class AwardsService {
  constructor(private leaderboardStore: LeaderboardStore) {}

  /**
   * Generate the prize list as of a week
   *
   * @throws NotFoundError if the overall winner leaderboard of the week is missing
   */
  async generateAwards(options: AwardsOptions): Promise<Awards> {
    const topN = options.topN ?? DEFAULT_AWARD_COUNT;
    const team = options.team ?? DEFAULT_AWARD_TEAM;

    const overallWinner = await this.leaderboardStore.findByScope(
      overallScope(PollType.WINNER, false),
      options.week
    );
    if (!overallWinner) {
      throw new NotFoundError(`Overall winner leaderboard for week ${options.week} not found`);
    }

    const overallMargin = await this.leaderboardStore.findByScope(
      overallScope(PollType.MARGIN, false),
      options.week
    );
    if (!overallMargin) {
      log(LogLevel.WARN, 'Overall margin leaderboard missing, margin prize skipped', {
        week: options.week,
        operation: 'generateAwards',
      });
    }

    const weeklyWinner = await this.leaderboardStore.findAllByScope(
      weeklyScope(PollType.WINNER),
      options.week
    );

    const awards = buildAwards({
      week: options.week,
      team,
      topN,
      overallWinner,
      overallMargin,
      weeklyWinner,
    });

    log(LogLevel.INFO, 'Awards generated', {
      week: options.week,
      team,
      match_count: weeklyWinner.reduce((count, weekly) => count + weekly.units.length, 0),
      operation: 'generateAwards',
    });

    return awards;
  }
}

/**
 * Pick the prizes from already loaded leaderboards
 */
export function buildAwards(input: {
  week: number;
  team: string;
  topN: number;
  overallWinner: Leaderboard;
  overallMargin?: Leaderboard;
  weeklyWinner: Leaderboard[];
}): Awards {
  const topWinners = input.overallWinner.entries.slice(0, input.topN).map(toPlaceAward);
  const marginLeader = input.overallMargin?.entries[0];

  const units = detailedUnits(input.weeklyWinner);
  const rows = units.length > 0 ? aggregateUnitScores(units, flattenWeeklyScores(input.weeklyWinner)) : [];

  const everyone = new Set<string>();
  const topWinnerKeys = new Set(topWinners.map((winner) => winner.entity_key));

  return {
    week: input.week,
    team: input.team,
    top_winners: topWinners,
    margin_winner: marginLeader ? toPlaceAward(marginLeader) : undefined,
    winning_streaks: rankStreaks(rows, units.length, 'win', topWinnerKeys, input.topN),
    overall_winning_streak: rankStreaks(rows, units.length, 'win', everyone, 1)[0],
    losing_streaks: rankStreaks(rows, units.length, 'loss', everyone, input.topN),
    overall_losing_streak: rankStreaks(rows, units.length, 'loss', everyone, 1)[0],
    top_team_voters: topTeamVoters(rows, input.team, input.topN),
  };
}

function toPlaceAward(entry: { entity_key: string; display_name: string; total: number }): PlaceAward {
  return { entity_key: entry.entity_key, display_name: entry.display_name, total: entry.total };
}

/**
 * Voters ordered by how often they picked a team, ties in first-vote order
 */
function topTeamVoters(
  rows: AggregatedRow[],
  team: string,
  limit: number
): TeamVoterAward[] {
  const voters: TeamVoterAward[] = [];

  for (const row of rows) {
    const matches: number[] = [];
    row.cells.forEach((cell, index) => {
      if (cell.participated && cell.selection === team) {
        matches.push(index + 1);
      }
    });

    if (matches.length > 0) {
      voters.push({
        entity_key: row.entity_key,
        display_name: row.display_name,
        vote_count: matches.length,
        matches,
      });
    }
  }

  return voters.sort((a, b) => b.vote_count - a.vote_count).slice(0, limit);
}
