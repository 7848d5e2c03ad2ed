/**
 * Rank Snapshots Migration (V001)
 *
 * Creates the table backing the PostgreSQL snapshot store. One row per
 * leaderboard lineage (scope) and sequence; ranks are a JSONB map of
 * entity key to { dense, standard }.
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  // Enable UUID extension
  pgm.createExtension('uuid-ossp', { ifNotExists: true });

  pgm.createTable('rank_snapshots', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    scope: {
      type: 'varchar(255)',
      notNull: true,
    },
    sequence: {
      type: 'integer',
      notNull: true,
    },
    run_id: {
      type: 'varchar(64)',
      notNull: true,
    },
    generated_at: {
      type: 'timestamptz',
      notNull: true,
    },
    ranks: {
      type: 'jsonb',
      notNull: true,
    },
    created_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.addConstraint('rank_snapshots', 'rank_snapshots_scope_sequence_unique', {
    unique: ['scope', 'sequence'],
  });

  // Previous-snapshot lookups scan a scope by descending sequence
  pgm.createIndex('rank_snapshots', ['scope', { name: 'sequence', sort: 'DESC' }], {
    name: 'idx_rank_snapshots_scope_sequence',
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('rank_snapshots');
}
