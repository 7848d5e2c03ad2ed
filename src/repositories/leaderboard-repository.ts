/**
 * Leaderboard Repository
 *
 * Output sink for finished leaderboards and the file-backed store that
 * later runs read persisted leaderboards back from.
 *
 * Layout: `<root>/<scope>/<sequence>.json`, e.g.
 * `leaderboards/weekly/poll_winner/3.json`.
 */

import * as path from 'path';
import { SchemaObject } from 'ajv';
import { Leaderboard, LeaderboardKind } from '../models/leaderboard';
import { ajv } from '../utils/validation';
import {
  listSequences,
  readJsonFile,
  scopeDirectory,
  sequenceFileName,
  removeJsonFile,
  writeJsonFile,
} from '../utils/files';

/**
 * Receives the leaderboard of a completed run
 */
export interface LeaderboardSink {
  write(leaderboard: Leaderboard): Promise<void>;
  /** Withdraw a written leaderboard when its run fails afterwards */
  remove(scope: string, sequence: number): Promise<void>;
}

/**
 * Sink that can also read persisted leaderboards back
 */
export interface LeaderboardStore extends LeaderboardSink {
  findByScope(scope: string, sequence: number): Promise<Leaderboard | undefined>;
  findAllByScope(scope: string, upToSequence?: number): Promise<Leaderboard[]>;
}

const rankChangeSchema: SchemaObject = {
  type: 'object',
  properties: {
    kind: { type: 'string', enum: ['improved', 'worsened', 'unchanged', 'new_entrant'] },
    by: { type: 'integer', minimum: 1 },
  },
  required: ['kind'],
  additionalProperties: false,
};

const cellSchema: SchemaObject = {
  type: 'object',
  properties: {
    participated: { type: 'boolean' },
    score: { type: 'number', minimum: 0 },
    selection: { type: 'string' },
  },
  required: ['participated', 'score'],
  additionalProperties: false,
};

const entrySchema: SchemaObject = {
  type: 'object',
  properties: {
    entity_key: { type: 'string' },
    display_name: { type: 'string' },
    cells: { type: 'array', items: cellSchema },
    total: { type: 'number', minimum: 0 },
    dense_rank: { type: 'integer', minimum: 1 },
    standard_rank: { type: 'integer', minimum: 1 },
    movement: {
      type: 'object',
      properties: {
        entity_key: { type: 'string' },
        dense: rankChangeSchema,
        standard: rankChangeSchema,
      },
      required: ['entity_key', 'dense', 'standard'],
      additionalProperties: false,
    },
  },
  required: ['entity_key', 'display_name', 'cells', 'total', 'dense_rank', 'standard_rank'],
  additionalProperties: false,
};

const leaderboardSchema: SchemaObject = {
  type: 'object',
  properties: {
    kind: { type: 'string', enum: Object.values(LeaderboardKind) },
    scope: { type: 'string', minLength: 1 },
    sequence: { type: 'integer' },
    run_id: { type: 'string', minLength: 1 },
    units: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          label: { type: 'string' },
        },
        required: ['id'],
        additionalProperties: false,
      },
    },
    entries: { type: 'array', items: entrySchema },
    generated_at: { type: 'string', format: 'date-time' },
  },
  required: ['kind', 'scope', 'sequence', 'run_id', 'units', 'entries', 'generated_at'],
  additionalProperties: false,
};

const validateLeaderboard = ajv.compile<Leaderboard>(leaderboardSchema);

export class FileLeaderboardRepository implements LeaderboardStore {
  constructor(private rootDir: string) {}

  async write(leaderboard: Leaderboard): Promise<void> {
    await writeJsonFile(this.filePath(leaderboard.scope, leaderboard.sequence), leaderboard);
  }

  async remove(scope: string, sequence: number): Promise<void> {
    await removeJsonFile(this.filePath(scope, sequence));
  }

  /**
   * Find the leaderboard of one lineage and sequence
   *
   * @returns Leaderboard, or undefined if none was written
   * @throws Error if the stored document is not a leaderboard
   */
  async findByScope(scope: string, sequence: number): Promise<Leaderboard | undefined> {
    const filePath = this.filePath(scope, sequence);
    const raw = await readJsonFile(filePath);

    if (raw === undefined) {
      return undefined;
    }

    if (!validateLeaderboard(raw)) {
      throw new Error(`Invalid leaderboard document ${filePath}: ${ajv.errorsText(validateLeaderboard.errors)}`);
    }

    return raw;
  }

  /**
   * Find every leaderboard of a lineage, ascending by sequence
   *
   * @param upToSequence - Only include sequences up to and including this one
   */
  async findAllByScope(scope: string, upToSequence?: number): Promise<Leaderboard[]> {
    const sequences = (await listSequences(scopeDirectory(this.rootDir, scope))).filter(
      (sequence) => upToSequence === undefined || sequence <= upToSequence
    );

    const leaderboards: Leaderboard[] = [];
    for (const sequence of sequences) {
      const leaderboard = await this.findByScope(scope, sequence);
      if (leaderboard) {
        leaderboards.push(leaderboard);
      }
    }

    return leaderboards;
  }

  private filePath(scope: string, sequence: number): string {
    return path.join(scopeDirectory(this.rootDir, scope), sequenceFileName(sequence));
  }
}
