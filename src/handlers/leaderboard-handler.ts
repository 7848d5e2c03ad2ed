/**
 * Leaderboard Job Handler
 *
 * Entry point for leaderboard-generation jobs. A job request names one
 * view (match, weekly, detailed, overall, combined, playoff or awards);
 * the handler validates it, wires the stores from the environment, runs
 * the view and returns `{ statusCode, body }`.
 *
 * Every job is logged as a LEADERBOARD_RUN entry and timed with the
 * LeaderboardGenerationDuration metric, successful or not.
 */

import * as path from 'path';
import { LeaderboardJobRequest } from '../models/job';
import { Leaderboard, RunConfig } from '../models/leaderboard';
import { PollType } from '../models/poll';
import { ScoreRecord, ScoresByUnit } from '../models/score';
import { BadRequestError, NotFoundError } from '../models/errors';
import { JobResult } from '../models/response';
import { loadEnvironmentConfig, validateEnvironmentConfig, EnvironmentConfig } from '../config/environment';
import { handleError } from '../middleware/error-handler';
import { SnapshotStore, PostgresSnapshotRepository } from '../repositories/snapshot-repository';
import { FileSnapshotRepository } from '../repositories/file-snapshot-repository';
import { FileLeaderboardRepository, LeaderboardStore } from '../repositories/leaderboard-repository';
import { SnapshotService } from '../services/snapshot-service';
import { LeaderboardService } from '../services/leaderboard-service';
import { Awards, AwardsService } from '../services/awards-service';
import { parseJobRequest, parseMarginPoll, parsePlayoffPoll, parseWinnerPoll } from '../utils/validation';
import { scoreMarginPoll, scoreWinnerPoll } from '../utils/poll-scoring';
import { SourceTotals } from '../utils/aggregation';
import {
  detailedScope,
  detailedUnits,
  matchScope,
  overallScope,
  overallUnits,
  PLAYOFF_SCOPE,
  PLAYOFF_SEQUENCE,
  PLAYOFF_UNIT,
  sourceUnit,
  toSourceTotals,
  weeklyScope,
} from '../utils/lineage';
import {
  formatAwards,
  LeaderboardSummary,
  summarizeLeaderboard,
} from '../utils/leaderboard-formatter';
import { generateRunId, successResponse } from '../utils/response-formatter';
import { log, LogLevel, logRun } from '../utils/logger';
import { emitLeaderboardGenerationDuration } from '../utils/metrics';

// Sources of a combined leaderboard, in column order
const COMBINED_POLL_TYPES: PollType[] = [PollType.WINNER, PollType.MARGIN];

/**
 * Services and stores a job runs against
 */
export interface JobDependencies {
  leaderboardService: LeaderboardService;
  awardsService: AwardsService;
  leaderboardStore: LeaderboardStore;
}

/**
 * Result of one job
 */
export type JobOutcome =
  | { kind: LeaderboardJobRequest['kind']; scope: string; sequence: number; leaderboard: LeaderboardSummary; entityCount: number }
  | { kind: 'awards'; scope: string; sequence: number; awards: Awards; lines: string[]; entityCount: number };

/**
 * Build the dependencies of a job from the environment
 *
 * Leaderboards are always files under DATA_DIR/leaderboards; snapshots go
 * to DATA_DIR/snapshots or to PostgreSQL (SNAPSHOT_STORE=postgres).
 */
export function createDependencies(config: EnvironmentConfig): JobDependencies {
  const snapshotStore: SnapshotStore =
    config.snapshotStore === 'postgres'
      ? new PostgresSnapshotRepository()
      : new FileSnapshotRepository(path.join(config.dataDir, 'snapshots'));
  const leaderboardStore = new FileLeaderboardRepository(path.join(config.dataDir, 'leaderboards'));

  return {
    leaderboardService: new LeaderboardService(new SnapshotService(snapshotStore), leaderboardStore),
    awardsService: new AwardsService(leaderboardStore),
    leaderboardStore,
  };
}

/**
 * Score one match poll of the given type
 *
 * @throws BadRequestError if the poll payload is invalid
 */
export function scoreMatchPoll(pollType: PollType, poll: unknown): ScoreRecord[] {
  switch (pollType) {
    case PollType.WINNER:
      return scoreWinnerPoll(parseWinnerPoll(poll));
    case PollType.MARGIN:
      return scoreMarginPoll(parseMarginPoll(poll));
  }
}

async function findWeeklyLeaderboards(
  store: LeaderboardStore,
  pollType: PollType,
  week: number
): Promise<Leaderboard[]> {
  const weeklies = await store.findAllByScope(weeklyScope(pollType), week);
  if (weeklies.length === 0) {
    throw new NotFoundError(`No weekly ${pollType} leaderboards up to week ${week}`);
  }
  return weeklies;
}

/**
 * Overall winner and margin totals of a week as combined sources
 *
 * A missing leaderboard is skipped with a warning and its unit counts 0
 * for everyone.
 *
 * @throws NotFoundError if neither leaderboard exists
 */
async function findCombinedSources(store: LeaderboardStore, week: number): Promise<SourceTotals[]> {
  const sources: SourceTotals[] = [];

  for (const pollType of COMBINED_POLL_TYPES) {
    const overall = await store.findByScope(overallScope(pollType, false), week);
    if (overall) {
      sources.push(toSourceTotals(sourceUnit(pollType), overall));
    } else {
      log(LogLevel.WARN, 'Overall leaderboard missing, combined without it', {
        poll_type: pollType,
        week,
        operation: 'findCombinedSources',
      });
    }
  }

  if (sources.length === 0) {
    throw new NotFoundError(`No overall poll_winner or poll_margin leaderboard for week ${week}`);
  }
  return sources;
}

function leaderboardOutcome(kind: LeaderboardJobRequest['kind'], leaderboard: Leaderboard): JobOutcome {
  return {
    kind,
    scope: leaderboard.scope,
    sequence: leaderboard.sequence,
    leaderboard: summarizeLeaderboard(leaderboard),
    entityCount: leaderboard.entries.length,
  };
}

/**
 * Run one validated job
 */
export async function runLeaderboardJob(
  request: LeaderboardJobRequest,
  deps: JobDependencies
): Promise<JobOutcome> {
  const { leaderboardService, awardsService, leaderboardStore } = deps;

  switch (request.kind) {
    case 'match': {
      const config: RunConfig = {
        scope: matchScope(request.poll_type, request.match.id),
        sequence: request.week,
        units: [{ id: request.match.id, label: request.match.label }],
        include_secondary_source: false,
      };
      const records = scoreMatchPoll(request.poll_type, request.match.poll);
      return leaderboardOutcome(request.kind, await leaderboardService.generateMatchLeaderboard(config, records));
    }

    case 'weekly': {
      const scores = new Map<string, ScoreRecord[]>();
      for (const match of request.matches) {
        if (scores.has(match.id)) {
          throw new BadRequestError(`Duplicate match id in week ${request.week}: '${match.id}'`);
        }
        scores.set(match.id, scoreMatchPoll(request.poll_type, match.poll));
      }
      const scoresByUnit: ScoresByUnit = Object.fromEntries(scores);

      const config: RunConfig = {
        scope: weeklyScope(request.poll_type),
        sequence: request.week,
        units: request.matches.map((match) => ({ id: match.id, label: match.label })),
        include_secondary_source: false,
      };
      return leaderboardOutcome(request.kind, await leaderboardService.generateWeeklyLeaderboard(config, scoresByUnit));
    }

    case 'detailed': {
      const weeklies = await findWeeklyLeaderboards(leaderboardStore, request.poll_type, request.week);
      const config: RunConfig = {
        scope: detailedScope(request.poll_type),
        sequence: request.week,
        units: detailedUnits(weeklies),
        include_secondary_source: false,
      };
      return leaderboardOutcome(request.kind, await leaderboardService.generateDetailedLeaderboard(config, weeklies));
    }

    case 'overall': {
      const weeklies = await findWeeklyLeaderboards(leaderboardStore, request.poll_type, request.week);
      const playoff = request.include_playoffs
        ? await leaderboardStore.findByScope(PLAYOFF_SCOPE, PLAYOFF_SEQUENCE)
        : undefined;
      const config: RunConfig = {
        scope: overallScope(request.poll_type, request.include_playoffs),
        sequence: request.week,
        units: overallUnits(weeklies.map((weekly) => weekly.sequence), request.include_playoffs),
        include_secondary_source: request.include_playoffs,
      };
      return leaderboardOutcome(
        request.kind,
        await leaderboardService.generateOverallLeaderboard(config, weeklies, playoff)
      );
    }

    case 'combined': {
      const sources = await findCombinedSources(leaderboardStore, request.week);
      const units = COMBINED_POLL_TYPES.map(sourceUnit);

      if (request.include_playoffs) {
        const playoff = await leaderboardStore.findByScope(PLAYOFF_SCOPE, PLAYOFF_SEQUENCE);
        if (!playoff) {
          throw new NotFoundError('Playoff leaderboard not found');
        }
        sources.push(toSourceTotals(PLAYOFF_UNIT, playoff));
        units.push(PLAYOFF_UNIT);
      }

      const config: RunConfig = {
        scope: overallScope('combined', request.include_playoffs),
        sequence: request.week,
        units,
        include_secondary_source: request.include_playoffs,
      };
      return leaderboardOutcome(request.kind, await leaderboardService.generateCombinedLeaderboard(config, sources));
    }

    case 'playoff': {
      const poll = parsePlayoffPoll(request.poll);
      return leaderboardOutcome(request.kind, await leaderboardService.generatePlayoffLeaderboard(poll));
    }

    case 'awards': {
      const awards = await awardsService.generateAwards({
        week: request.week,
        team: request.team,
        topN: request.top_n,
      });
      return {
        kind: 'awards',
        scope: 'awards',
        sequence: request.week,
        awards,
        lines: formatAwards(awards),
        entityCount: awards.top_winners.length,
      };
    }
  }
}

function describeRequest(event: unknown): { kind: string; scope: string; sequence: number } {
  if (typeof event === 'object' && event !== null) {
    const kind = 'kind' in event && typeof event.kind === 'string' ? event.kind : 'unknown';
    const sequence = 'week' in event && typeof event.week === 'number' ? event.week : 0;
    return { kind, scope: kind, sequence };
  }
  return { kind: 'unknown', scope: 'unknown', sequence: 0 };
}

/**
 * Job handler
 *
 * @param event - Raw job request (parsed request file or invocation payload)
 * @param deps - Dependencies override; built from the environment if omitted
 */
export async function handler(event: unknown, deps?: JobDependencies): Promise<JobResult> {
  const runId = generateRunId();
  const startTime = Date.now();
  let described = describeRequest(event);

  try {
    const request = parseJobRequest(event);

    let dependencies = deps;
    if (!dependencies) {
      const config = loadEnvironmentConfig();
      validateEnvironmentConfig(config);
      dependencies = createDependencies(config);
    }

    const outcome = await runLeaderboardJob(request, dependencies);
    described = { kind: outcome.kind, scope: outcome.scope, sequence: outcome.sequence };

    const durationMs = Date.now() - startTime;
    logRun({
      runId,
      kind: outcome.kind,
      scope: outcome.scope,
      sequence: outcome.sequence,
      success: true,
      entityCount: outcome.entityCount,
      durationMs,
    });
    await emitLeaderboardGenerationDuration(outcome.kind, outcome.scope, durationMs);

    if ('awards' in outcome) {
      return successResponse({ awards: outcome.awards, lines: outcome.lines }, runId);
    }
    return successResponse({ leaderboard: outcome.leaderboard }, runId);
  } catch (error) {
    const durationMs = Date.now() - startTime;
    logRun({
      runId,
      kind: described.kind,
      scope: described.scope,
      sequence: described.sequence,
      success: false,
      durationMs,
      errorMessage: error instanceof Error ? error.message : String(error),
    });
    await emitLeaderboardGenerationDuration(described.kind, described.scope, durationMs, true);

    return handleError(error, runId);
  }
}
