/**
 * Job Request Models
 *
 * Requests accepted by the leaderboard job handler. Each request runs one
 * leaderboard-generation pass; the poll payloads inside are validated
 * separately against their poll-type schemas.
 */

import { PollType } from './poll';

export interface MatchPollInput {
  id: string;                    // Unit id, unique within the week (e.g., "12-csk-vs-mi")
  label?: string;
  poll: unknown;                 // Winner or margin poll export
}

export interface MatchJobRequest {
  kind: 'match';
  poll_type: PollType;
  week: number;
  match: MatchPollInput;
}

export interface WeeklyJobRequest {
  kind: 'weekly';
  poll_type: PollType;
  week: number;
  matches: MatchPollInput[];
}

export interface OverallJobRequest {
  kind: 'overall';
  poll_type: PollType;
  week: number;
  include_playoffs: boolean;
}

export interface CombinedJobRequest {
  kind: 'combined';
  week: number;
  include_playoffs: boolean;
}

export interface DetailedJobRequest {
  kind: 'detailed';
  poll_type: PollType;
  week: number;
}

export interface PlayoffJobRequest {
  kind: 'playoff';
  poll: unknown;                 // Playoff poll export
}

export interface AwardsJobRequest {
  kind: 'awards';
  week: number;
  team?: string;                 // Team code for the "top voter" prize
  top_n?: number;
}

export type LeaderboardJobRequest =
  | MatchJobRequest
  | WeeklyJobRequest
  | OverallJobRequest
  | CombinedJobRequest
  | DetailedJobRequest
  | PlayoffJobRequest
  | AwardsJobRequest;

export type JobKind = LeaderboardJobRequest['kind'];
