/**
 * Snapshot Utilities
 *
 * Capture, validation and decoding of rank snapshots.
 */

import { SchemaObject } from 'ajv';
import { Ranked, RankableRow } from '../models/leaderboard';
import { RankSnapshot, SnapshotRank } from '../models/snapshot';
import { ajv } from './validation';

const rankSchema: SchemaObject = {
  type: 'object',
  properties: {
    dense: { type: 'integer', minimum: 1 },
    standard: { type: 'integer', minimum: 1 },
  },
  required: ['dense', 'standard'],
  additionalProperties: false,
};

const ranksSchema: SchemaObject = {
  type: 'object',
  additionalProperties: rankSchema,
};

const snapshotSchema: SchemaObject = {
  type: 'object',
  properties: {
    scope: { type: 'string', minLength: 1 },
    sequence: { type: 'integer' },
    run_id: { type: 'string', minLength: 1 },
    generated_at: { type: 'string', format: 'date-time' },
    ranks: ranksSchema,
  },
  required: ['scope', 'sequence', 'run_id', 'generated_at', 'ranks'],
  additionalProperties: false,
};

const validateRanks = ajv.compile<Record<string, SnapshotRank>>(ranksSchema);
const validateSnapshot = ajv.compile<RankSnapshot>(snapshotSchema);

function freezeSnapshot(snapshot: RankSnapshot): RankSnapshot {
  for (const rank of Object.values(snapshot.ranks)) {
    Object.freeze(rank);
  }
  Object.freeze(snapshot.ranks);
  return Object.freeze(snapshot);
}

/**
 * Capture the ranks of a completed ranking pass
 *
 * @returns Frozen snapshot
 */
export function createSnapshot(
  scope: string,
  sequence: number,
  runId: string,
  rows: Ranked<RankableRow>[],
  generatedAt: Date = new Date()
): RankSnapshot {
  const ranks: Record<string, SnapshotRank> = Object.fromEntries(
    rows.map((row): [string, SnapshotRank] => [
      row.entity_key,
      { dense: row.dense_rank, standard: row.standard_rank },
    ])
  );

  return freezeSnapshot({
    scope,
    sequence,
    run_id: runId,
    generated_at: generatedAt.toISOString(),
    ranks,
  });
}

/**
 * Decode a stored snapshot payload
 *
 * Accepts the full snapshot document and the bare legacy form
 * `{ [entity_key]: { dense, standard } }`, whose metadata is filled in
 * from the caller. Anything else yields undefined.
 *
 * @param raw - Parsed JSON payload
 * @param scope - Lineage the payload was read from
 * @param sequence - Sequence the payload was stored under (legacy form only)
 */
export function parseSnapshot(
  raw: unknown,
  scope: string,
  sequence = 0
): RankSnapshot | undefined {
  if (validateSnapshot(raw)) {
    return freezeSnapshot({
      scope: raw.scope,
      sequence: raw.sequence,
      run_id: raw.run_id,
      generated_at: raw.generated_at,
      ranks: copyRanks(raw.ranks),
    });
  }

  if (validateRanks(raw)) {
    return freezeSnapshot({
      scope,
      sequence,
      run_id: 'legacy',
      generated_at: new Date(0).toISOString(),
      ranks: copyRanks(raw),
    });
  }

  return undefined;
}

function copyRanks(ranks: Readonly<Record<string, Readonly<SnapshotRank>>>): Record<string, SnapshotRank> {
  return Object.fromEntries(
    Object.entries(ranks).map(([entityKey, rank]): [string, SnapshotRank] => [
      entityKey,
      { dense: rank.dense, standard: rank.standard },
    ])
  );
}
