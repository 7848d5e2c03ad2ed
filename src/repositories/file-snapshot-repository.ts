/**
 * File Snapshot Repository
 *
 * Snapshot store that keeps one JSON document per lineage and sequence:
 * `<root>/<scope>/<sequence>.json`.
 */

import * as path from 'path';
import { RankSnapshot } from '../models/snapshot';
import { SnapshotUnreadableError } from '../models/errors';
import { parseSnapshot } from '../utils/snapshots';
import {
  listSequences,
  readJsonFile,
  scopeDirectory,
  sequenceFileName,
  writeJsonFile,
} from '../utils/files';
import { SnapshotStore } from './snapshot-repository';

export class FileSnapshotRepository implements SnapshotStore {
  constructor(private rootDir: string) {}

  async loadPreviousSnapshot(
    scope: string,
    beforeSequence?: number
  ): Promise<RankSnapshot | undefined> {
    const directory = scopeDirectory(this.rootDir, scope);
    const sequences = (await listSequences(directory)).filter(
      (sequence) => beforeSequence === undefined || sequence < beforeSequence
    );

    if (sequences.length === 0) {
      return undefined;
    }

    const sequence = sequences[sequences.length - 1];
    const filePath = path.join(directory, sequenceFileName(sequence));

    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      throw new SnapshotUnreadableError(
        scope,
        error instanceof Error ? error.message : 'Unknown error'
      );
    }

    const snapshot = parseSnapshot(raw, scope, sequence);
    if (!snapshot) {
      throw new SnapshotUnreadableError(scope, `Invalid snapshot document ${filePath}`);
    }

    return snapshot;
  }

  async savePreviousSnapshot(scope: string, snapshot: RankSnapshot): Promise<void> {
    const filePath = path.join(
      scopeDirectory(this.rootDir, scope),
      sequenceFileName(snapshot.sequence)
    );

    await writeJsonFile(filePath, snapshot);
  }
}
