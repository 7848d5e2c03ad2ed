/**
 * pollrank
 *
 * Ranking and aggregation engine for poll-based prediction leaderboards.
 */

export * from './models/score';
export * from './models/leaderboard';
export * from './models/snapshot';
export * from './models/poll';
export * from './models/job';
export * from './models/errors';

export { aggregateUnitScores, combineSourceTotals, validateUnitScores, SourceTotals } from './utils/aggregation';
export { rankRows, compareByTotal } from './utils/ranking';
export { calculateMovement, rankChange, rankDelta } from './utils/movement';
export { createSnapshot, parseSnapshot } from './utils/snapshots';
export {
  scoreWinnerPoll,
  scoreMarginPoll,
  scorePlayoffPoll,
  scorePlayoffPicks,
  parseMargin,
  parseMarginBucket,
  teamCode,
} from './utils/poll-scoring';
export { parseJobRequest, parseWinnerPoll, parseMarginPoll, parsePlayoffPoll } from './utils/validation';
export { formatRankChange, formatAwards, summarizeLeaderboard } from './utils/leaderboard-formatter';
export { rankStreaks, Streak } from './utils/streaks';

export { SnapshotStore, PostgresSnapshotRepository } from './repositories/snapshot-repository';
export { FileSnapshotRepository } from './repositories/file-snapshot-repository';
export { LeaderboardSink, LeaderboardStore, FileLeaderboardRepository } from './repositories/leaderboard-repository';

export { SnapshotService } from './services/snapshot-service';
export { LeaderboardService } from './services/leaderboard-service';
export { AwardsService, Awards, buildAwards } from './services/awards-service';

export { handler, runLeaderboardJob, createDependencies } from './handlers/leaderboard-handler';
export { loadEnvironmentConfig, validateEnvironmentConfig } from './config/environment';
