/**
 * Database Connection Pool Module
 *
 * Provides PostgreSQL connection pooling for the snapshot store, with
 * parameterized queries and transaction support for atomic writes.
 * Credentials come from AWS Secrets Manager when DB_SECRET_ARN is set,
 * otherwise from DB_USER / DB_PASSWORD.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { loadEnvironmentConfig } from './environment';
import { logDatabase } from '../utils/logger';

// Process-wide pool instance
let pool: Pool | null = null;
let cachedCredentials: DatabaseCredentials | null = null;

interface DatabaseCredentials {
  username: string;
  password: string;
}

/**
 * Database connection pool configuration
 */
interface PoolConfig {
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

/**
 * Default pool configuration; a batch run needs few connections
 */
const DEFAULT_POOL_CONFIG: PoolConfig = {
  max: 4,
  idleTimeoutMillis: 10000, // 10 seconds
  connectionTimeoutMillis: 5000, // 5 seconds
};

function isCredentials(value: unknown): value is DatabaseCredentials {
  return (
    typeof value === 'object' &&
    value !== null &&
    'username' in value &&
    'password' in value &&
    typeof value.username === 'string' &&
    typeof value.password === 'string'
  );
}

/**
 * Fetch database credentials from AWS Secrets Manager
 */
export async function getCredentialsFromSecretsManager(secretArn: string): Promise<DatabaseCredentials> {
  if (cachedCredentials) {
    return cachedCredentials;
  }

  const client = new SecretsManagerClient({ region: process.env.AWS_REGION || 'us-east-1' });

  try {
    const command = new GetSecretValueCommand({ SecretId: secretArn });
    const response = await client.send(command);

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    const secret: unknown = JSON.parse(response.SecretString);
    if (!isCredentials(secret)) {
      throw new Error('Secret is missing username or password');
    }

    cachedCredentials = { username: secret.username, password: secret.password };
    return cachedCredentials;
  } catch (error) {
    throw new Error(
      `Failed to fetch database credentials: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Get or create the database connection pool
 */
export async function getPool(): Promise<Pool> {
  if (!pool) {
    const config = loadEnvironmentConfig();

    const credentials = config.dbSecretArn
      ? await getCredentialsFromSecretsManager(config.dbSecretArn)
      : { username: config.dbUser, password: config.dbPassword };

    pool = new Pool({
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: credentials.username,
      password: credentials.password,
      max: DEFAULT_POOL_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POOL_CONFIG.connectionTimeoutMillis,
    });

    // Handle pool errors
    pool.on('error', (err) => {
      logDatabase({
        errorMessage: err.message,
        query: 'Pool error',
        operation: 'POOL_ERROR',
      });
    });
  }

  return pool;
}

/**
 * Execute a parameterized query
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Array of parameter values
 * @returns Query result
 */
export async function query<T extends QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const activePool = await getPool();
  return activePool.query<T>(text, params);
}

/**
 * Transaction helper for atomic operations
 * Automatically handles BEGIN, COMMIT, and ROLLBACK
 *
 * @param callback - Function to execute within transaction
 * @returns Result from callback
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const activePool = await getPool();
  const client = await activePool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close the database pool
 * Should be called at the end of a run or during testing cleanup
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Reset pool instance and cached credentials (for testing only)
 * @internal
 */
export function resetPool(): void {
  pool = null;
  cachedCredentials = null;
}
