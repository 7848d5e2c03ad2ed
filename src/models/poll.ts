/**
 * Poll Models
 *
 * Type definitions for exported poll payloads. Field names follow the
 * export format of the chat polls the votes are collected from.
 */

/**
 * Poll answer option
 */
export interface PollAnswer {
  id: number;
  name: string;                  // Full option text (e.g., "Chennai Super Kings")
}

/**
 * Voter as exported with each vote
 */
export interface PollUser {
  id?: string;
  username?: string;
  globalName?: string | null;
}

/**
 * One vote for one answer
 */
export interface PollVote {
  answerId: number;
  user: PollUser;
}

/**
 * Fields common to every poll export
 */
export interface BasePoll {
  messageId?: string;
  points?: number;               // Points per correct vote (default 1)
  answers: PollAnswer[];
  votes: PollVote[];
}

/**
 * "Predict the winner" poll
 */
export interface WinnerPoll extends BasePoll {
  winner: string;                // Short code of the winning team (e.g., "CSK")
}

/**
 * "Predict the winning margin" poll
 */
export interface MarginPoll extends BasePoll {
  margin: string;                // "14 runs", "3 wickets" or "Super Over"
}

/**
 * Playoff qualifiers prediction poll
 */
export interface PlayoffPoll extends BasePoll {
  qualifiedteams: string[];      // Short codes of the qualified teams
}

/**
 * Poll families that feed separate leaderboard lineages
 */
export enum PollType {
  WINNER = 'poll_winner',
  MARGIN = 'poll_margin',
}

/**
 * Parsed winning margin
 */
export type Margin =
  | { unit: 'runs' | 'wickets'; value: number }
  | { unit: 'super_over' };

/**
 * Margin bucket described by an answer option
 */
export interface MarginBucket {
  runs?: { min: number; max?: number; open_ended: boolean };
  wickets?: { min: number; max?: number; open_ended: boolean };
  super_over: boolean;
}
