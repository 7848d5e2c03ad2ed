/**
 * Snapshot Service
 *
 * Business logic layer for rank snapshots. Loads the comparison baseline
 * of a run and captures the ranks of a completed run.
 *
 * A previous snapshot that cannot be read is treated as absent: every
 * entity of the run then reports as a new entrant. The failure is logged
 * at WARN and counted, never raised.
 */

import { SnapshotStore } from '../repositories/snapshot-repository';
import { RankSnapshot } from '../models/snapshot';
import { Ranked, RankableRow } from '../models/leaderboard';
import { createSnapshot } from '../utils/snapshots';
import { log, LogLevel } from '../utils/logger';
import { emitSnapshotLoadFailure } from '../utils/metrics';

export class SnapshotService {
  constructor(private snapshotStore: SnapshotStore) {}

  /**
   * Load the snapshot preceding a run
   *
   * @param scope - Leaderboard lineage
   * @param sequence - Sequence of the current run
   * @returns Latest snapshot with a lower sequence, or undefined
   */
  async loadPrevious(scope: string, sequence: number): Promise<RankSnapshot | undefined> {
    try {
      return await this.snapshotStore.loadPreviousSnapshot(scope, sequence);
    } catch (error) {
      log(LogLevel.WARN, 'Previous snapshot unreadable', {
        scope,
        sequence,
        operation: 'loadPrevious',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      await emitSnapshotLoadFailure(scope);
      return undefined;
    }
  }

  /**
   * Capture the ranks of a completed ranking pass
   */
  capture(
    scope: string,
    sequence: number,
    runId: string,
    rows: Ranked<RankableRow>[]
  ): RankSnapshot {
    return createSnapshot(scope, sequence, runId, rows);
  }

  /**
   * Persist a snapshot as the baseline for the next run
   *
   * Errors propagate: a run whose snapshot was not saved has failed.
   */
  async save(snapshot: RankSnapshot): Promise<void> {
    await this.snapshotStore.savePreviousSnapshot(snapshot.scope, snapshot);

    log(LogLevel.INFO, 'Snapshot saved', {
      scope: snapshot.scope,
      sequence: snapshot.sequence,
      run_id: snapshot.run_id,
      entity_count: Object.keys(snapshot.ranks).length,
      operation: 'save',
    });
  }
}
