/**
 * Leaderboard Formatting Utilities
 *
 * Presentation helpers for finished leaderboards and the prize list.
 * The engine only supplies movement state and magnitude; glyphs are
 * chosen here.
 */

import { Leaderboard, RankChange } from '../models/leaderboard';
import { Awards } from '../services/awards-service';
import { Streak } from './streaks';

/**
 * One leaderboard row as reported in a job response
 */
export interface LeaderboardSummaryRow {
  dense_rank: number;
  standard_rank: number;
  username: string;
  total: number;
  dense_movement?: string;
  standard_movement?: string;
}

export interface LeaderboardSummary {
  kind: string;
  scope: string;
  sequence: number;
  units: string[];
  entity_count: number;
  rows: LeaderboardSummaryRow[];
}

/**
 * Render a rank change
 *
 * Examples:
 * - improved by 3 → "↑3"
 * - worsened by 2 → "↓2"
 * - unchanged → "—"
 * - new entrant → "N"
 */
export function formatRankChange(change: RankChange): string {
  switch (change.kind) {
    case 'improved':
      return `↑${change.by}`;
    case 'worsened':
      return `↓${change.by}`;
    case 'unchanged':
      return '—';
    case 'new_entrant':
      return 'N';
  }
}

/**
 * Summarize a leaderboard for a job response
 *
 * Display names are left out; responses are logged.
 *
 * @param limit - Maximum number of rows (all rows if omitted)
 */
export function summarizeLeaderboard(leaderboard: Leaderboard, limit?: number): LeaderboardSummary {
  const entries = limit === undefined ? leaderboard.entries : leaderboard.entries.slice(0, limit);

  return {
    kind: leaderboard.kind,
    scope: leaderboard.scope,
    sequence: leaderboard.sequence,
    units: leaderboard.units.map((unit) => unit.label ?? unit.id),
    entity_count: leaderboard.entries.length,
    rows: entries.map((entry) => {
      const row: LeaderboardSummaryRow = {
        dense_rank: entry.dense_rank,
        standard_rank: entry.standard_rank,
        username: entry.entity_key,
        total: entry.total,
      };

      if (entry.movement) {
        row.dense_movement = formatRankChange(entry.movement.dense);
        row.standard_movement = formatRankChange(entry.movement.standard);
      }

      return row;
    }),
  };
}

/**
 * English ordinal suffix: 1st, 2nd, 3rd, 4th, 11th, 21st
 */
export function ordinal(position: number): string {
  const lastTwo = position % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${position}th`;
  }

  switch (position % 10) {
    case 1:
      return `${position}st`;
    case 2:
      return `${position}nd`;
    case 3:
      return `${position}rd`;
    default:
      return `${position}th`;
  }
}

function winnerBlock(title: string, username: string, displayName: string, details: string): string[] {
  return [
    `${title}:`,
    `  Username: ${username}`,
    `  Display Name: ${displayName}`,
    `  Details: ${details}`,
    '',
  ];
}

function streakDetails(label: string, streak: Streak): string {
  return `${label}: ${streak.length} matches, Starting from Match #${streak.start_match} to Match #${streak.end_match}`;
}

/**
 * Render the prize list as text lines
 */
export function formatAwards(awards: Awards): string[] {
  const lines = ['Prize Winners:'];

  awards.top_winners.forEach((winner, index) => {
    lines.push(
      ...winnerBlock(
        `Predict the Winner - ${ordinal(index + 1)} Place`,
        winner.entity_key,
        winner.display_name,
        `Total Points: ${winner.total}`
      )
    );
  });

  if (awards.margin_winner) {
    lines.push(
      ...winnerBlock(
        'Predict the Winning Margin - 1st Place',
        awards.margin_winner.entity_key,
        awards.margin_winner.display_name,
        `Total Points: ${awards.margin_winner.total}`
      )
    );
  }

  awards.winning_streaks.forEach((streak, index) => {
    lines.push(
      ...winnerBlock(
        `Longest Winning Streak - ${ordinal(index + 1)}`,
        streak.entity_key,
        streak.display_name,
        streakDetails('Winning Streak', streak)
      )
    );
  });

  if (awards.overall_winning_streak) {
    const streak = awards.overall_winning_streak;
    lines.push(
      ...winnerBlock(
        'Overall Longest Winning Streak',
        streak.entity_key,
        streak.display_name,
        streakDetails('Winning Streak', streak)
      )
    );
  }

  awards.losing_streaks.forEach((streak, index) => {
    lines.push(
      ...winnerBlock(
        `Longest Losing Streak - ${ordinal(index + 1)}`,
        streak.entity_key,
        streak.display_name,
        streakDetails('Losing Streak', streak)
      )
    );
  });

  if (awards.overall_losing_streak) {
    const streak = awards.overall_losing_streak;
    lines.push(
      ...winnerBlock(
        'Overall Longest Losing Streak',
        streak.entity_key,
        streak.display_name,
        streakDetails('Losing Streak', streak)
      )
    );
  }

  awards.top_team_voters.forEach((voter, index) => {
    const matches = voter.matches.map((match) => `Match #${match}`).join(', ');
    lines.push(
      ...winnerBlock(
        `Top ${awards.team} Voter - ${ordinal(index + 1)}`,
        voter.entity_key,
        voter.display_name,
        `Voted for ${awards.team} ${voter.vote_count} times: ${matches}`
      )
    );
  });

  return lines;
}
