/**
 * Leaderboard Service
 *
 * Business logic layer for leaderboard generation runs. Each run follows
 * the same sequence:
 *
 * 1. Aggregate per-unit scores into one row per entity
 * 2. Rank rows (dense and standard ranks)
 * 3. Compare with the previous snapshot of the lineage (tracked views only)
 * 4. Hand the leaderboard to the output sink
 * 5. Save the new snapshot (tracked views only)
 *
 * Any failure before step 5 leaves the previous snapshot untouched.
 * Overall and combined leaderboards track movement; match, weekly,
 * detailed and playoff leaderboards do not.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Leaderboard,
  LeaderboardEntry,
  LeaderboardKind,
  RunConfig,
} from '../models/leaderboard';
import { AggregatedRow, ScoreRecord, ScoresByUnit } from '../models/score';
import { PlayoffPoll } from '../models/poll';
import { BadRequestError, UnknownContestUnitError } from '../models/errors';
import { LeaderboardSink } from '../repositories/leaderboard-repository';
import { SnapshotService } from './snapshot-service';
import { aggregateUnitScores, combineSourceTotals, SourceTotals } from '../utils/aggregation';
import { rankRows } from '../utils/ranking';
import { calculateMovement } from '../utils/movement';
import { scorePlayoffPoll } from '../utils/poll-scoring';
import {
  flattenWeeklyScores,
  PLAYOFF_SCOPE,
  PLAYOFF_SEQUENCE,
  PLAYOFF_UNIT,
  weekUnit,
} from '../utils/lineage';
import { log, LogLevel } from '../utils/logger';

export class LeaderboardService {
  constructor(
    private snapshotService: SnapshotService,
    private sink: LeaderboardSink
  ) {}

  /**
   * Rank the voters of a single match
   *
   * @throws BadRequestError unless the config names exactly one unit
   */
  async generateMatchLeaderboard(config: RunConfig, records: ScoreRecord[]): Promise<Leaderboard> {
    if (config.units.length !== 1) {
      throw new BadRequestError(`Match leaderboard needs exactly one unit, got ${config.units.length}`);
    }

    const rows = aggregateUnitScores(config.units, { [config.units[0].id]: records });
    return this.publish(LeaderboardKind.MATCH, config, rows, false);
  }

  /**
   * Aggregate and rank the matches of one week
   */
  async generateWeeklyLeaderboard(config: RunConfig, scoresByUnit: ScoresByUnit): Promise<Leaderboard> {
    const rows = aggregateUnitScores(config.units, scoresByUnit);
    return this.publish(LeaderboardKind.WEEKLY, config, rows, false);
  }

  /**
   * Rank every match of the season side by side
   *
   * Per-match cells of the weekly leaderboards become the units of the
   * run, numbered globally in week order.
   */
  async generateDetailedLeaderboard(config: RunConfig, weeklyLeaderboards: Leaderboard[]): Promise<Leaderboard> {
    const rows = aggregateUnitScores(config.units, flattenWeeklyScores(weeklyLeaderboards));
    return this.publish(LeaderboardKind.DETAILED, config, rows, false);
  }

  /**
   * Sum weekly totals (and playoff points) into the overall leaderboard
   *
   * @param weeklyLeaderboards - Weekly leaderboards of the lineage, one per week
   * @param playoff - Playoff leaderboard, used when the config includes the secondary source
   */
  async generateOverallLeaderboard(
    config: RunConfig,
    weeklyLeaderboards: Leaderboard[],
    playoff?: Leaderboard
  ): Promise<Leaderboard> {
    const scoresByUnit: ScoresByUnit = Object.fromEntries(
      weeklyLeaderboards.map((weekly): [string, ScoreRecord[]] => [weekUnit(weekly.sequence).id, totalsAsRecords(weekly)])
    );

    if (config.include_secondary_source) {
      if (playoff) {
        scoresByUnit[PLAYOFF_UNIT.id] = totalsAsRecords(playoff);
      } else {
        log(LogLevel.WARN, 'Playoff points requested but no playoff leaderboard found', {
          scope: config.scope,
          sequence: config.sequence,
          operation: 'generateOverallLeaderboard',
        });
      }
    }

    const rows = aggregateUnitScores(config.units, scoresByUnit);
    return this.publish(LeaderboardKind.OVERALL, config, rows, true);
  }

  /**
   * Combine independently ranked sources into one leaderboard
   *
   * Sources are matched to the config's units by id; a unit without a
   * source counts 0 for everyone.
   *
   * @throws UnknownContestUnitError if a source is not one of the config's units
   */
  async generateCombinedLeaderboard(config: RunConfig, sources: SourceTotals[]): Promise<Leaderboard> {
    const unitIds = new Set(config.units.map((unit) => unit.id));
    for (const { source } of sources) {
      if (!unitIds.has(source.id)) {
        throw new UnknownContestUnitError(source.id);
      }
    }

    const bySource = new Map(sources.map((entry) => [entry.source.id, entry.rows]));
    const rows = combineSourceTotals(
      config.units.map((unit) => ({ source: unit, rows: bySource.get(unit.id) ?? [] }))
    );

    return this.publish(LeaderboardKind.COMBINED, config, rows, true);
  }

  /**
   * Score and rank the playoff qualifiers poll
   */
  async generatePlayoffLeaderboard(poll: PlayoffPoll): Promise<Leaderboard> {
    const config: RunConfig = {
      scope: PLAYOFF_SCOPE,
      sequence: PLAYOFF_SEQUENCE,
      units: [PLAYOFF_UNIT],
      include_secondary_source: false,
    };

    const rows = aggregateUnitScores(config.units, { [PLAYOFF_UNIT.id]: scorePlayoffPoll(poll) });
    return this.publish(LeaderboardKind.PLAYOFF, config, rows, false);
  }

  /**
   * Rank rows, attach movement, write the leaderboard, then save the snapshot
   */
  private async publish(
    kind: LeaderboardKind,
    config: RunConfig,
    rows: AggregatedRow[],
    trackMovement: boolean
  ): Promise<Leaderboard> {
    const runId = uuidv4();
    const ranked = rankRows(rows);

    let entries: LeaderboardEntry[] = ranked;
    if (trackMovement) {
      const previous = await this.snapshotService.loadPrevious(config.scope, config.sequence);
      const movement = calculateMovement(previous, ranked);
      entries = ranked.map((row, index) => ({ ...row, movement: movement[index] }));
    }

    const leaderboard: Leaderboard = {
      kind,
      scope: config.scope,
      sequence: config.sequence,
      run_id: runId,
      units: config.units,
      entries,
      generated_at: new Date().toISOString(),
    };

    await this.sink.write(leaderboard);

    if (trackMovement) {
      try {
        await this.snapshotService.save(
          this.snapshotService.capture(config.scope, config.sequence, runId, ranked)
        );
      } catch (error) {
        // A run without its snapshot emits nothing
        await this.sink.remove(config.scope, config.sequence);
        log(LogLevel.ERROR, 'Snapshot save failed, leaderboard withdrawn', {
          run_id: runId,
          scope: config.scope,
          sequence: config.sequence,
          error: error instanceof Error ? error.message : String(error),
          operation: 'publish',
        });
        throw error;
      }
    }

    log(LogLevel.INFO, 'Leaderboard generated', {
      run_id: runId,
      kind,
      scope: config.scope,
      sequence: config.sequence,
      entity_count: entries.length,
      operation: 'publish',
    });

    return leaderboard;
  }
}

/**
 * Entry totals of a leaderboard as the score records of one unit
 */
function totalsAsRecords(leaderboard: Leaderboard): ScoreRecord[] {
  return leaderboard.entries.map((entry) => ({
    entity_key: entry.entity_key,
    display_name: entry.display_name,
    score: entry.total,
  }));
}
