/**
 * Database Migration Runner
 *
 * Creates the snapshot store schema directly through the connection pool,
 * for environments where the node-pg-migrate CLI is not available.
 * Mirrors migrations/1734000000000_create-rank-snapshots.ts.
 */

import { getPool, closePool } from '../config/database';
import { log, LogLevel } from '../utils/logger';

export interface MigrationResult {
  success: boolean;
  message: string;
  error?: string;
}

/**
 * Run database migrations
 */
export async function runMigrations(): Promise<MigrationResult> {
  try {
    log(LogLevel.INFO, 'Starting database migrations');

    const pool = await getPool();

    // Test connection
    await pool.query('SELECT NOW()');

    await pool.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

    await pool.query(`
      CREATE TABLE IF NOT EXISTS rank_snapshots (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        scope VARCHAR(255) NOT NULL,
        sequence INTEGER NOT NULL,
        run_id VARCHAR(64) NOT NULL,
        generated_at TIMESTAMP WITH TIME ZONE NOT NULL,
        ranks JSONB NOT NULL,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
        CONSTRAINT rank_snapshots_scope_sequence_unique UNIQUE (scope, sequence)
      )
    `);

    await pool.query(
      'CREATE INDEX IF NOT EXISTS idx_rank_snapshots_scope_sequence ON rank_snapshots(scope, sequence DESC)'
    );

    log(LogLevel.INFO, 'Database migrations completed', { table: 'rank_snapshots' });

    return {
      success: true,
      message: 'Database migrations completed successfully',
    };
  } catch (error) {
    log(LogLevel.ERROR, 'Migration failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return {
      success: false,
      message: 'Migration failed',
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

// Allow running directly
if (require.main === module) {
  runMigrations()
    .then(async (result) => {
      await closePool();
      console.log('Result:', result);
      process.exit(result.success ? 0 : 1);
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
