/**
 * Unit tests for database connection pool module
 *
 * Tests connection pooling, credential lookup, query execution and
 * transaction handling.
 */

import { Pool } from 'pg';
import { mockClient } from 'aws-sdk-client-mock';
import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import {
  getCredentialsFromSecretsManager,
  getPool,
  query,
  transaction,
  closePool,
  resetPool,
} from '../../src/config/database';

// Mock pg module
jest.mock('pg', () => {
  const mockPoolClient = {
    query: jest.fn(),
    release: jest.fn(),
  };
  const mockPool = {
    query: jest.fn(async () => ({ rows: [{ id: 1 }] })),
    connect: jest.fn(async () => mockPoolClient),
    end: jest.fn(),
    on: jest.fn(),
  };

  return {
    Pool: jest.fn(() => mockPool),
  };
});

const secretsManagerMock = mockClient(SecretsManagerClient);
const TEST_SECRET_ARN = 'arn:aws:secretsmanager:us-east-1:000000000000:secret:test-secret';

describe('Database Connection Pool', () => {
  const MockedPool = jest.mocked(Pool);

  beforeEach(() => {
    jest.clearAllMocks();
    secretsManagerMock.reset();
    resetPool();

    process.env.DB_HOST = 'localhost';
    process.env.DB_PORT = '5432';
    process.env.DB_NAME = 'pollrank_test';
    process.env.DB_USER = 'test_user';
    process.env.DB_PASSWORD = 'test-secret';
    delete process.env.DB_SECRET_ARN;
  });

  afterEach(async () => {
    await closePool();
  });

  describe('getPool', () => {
    it('should create the pool from DB_USER and DB_PASSWORD', async () => {
      await getPool();

      expect(MockedPool).toHaveBeenCalledWith({
        host: 'localhost',
        port: 5432,
        database: 'pollrank_test',
        user: 'test_user',
        password: 'test-secret',
        max: 4,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 5000,
      });
    });

    it('should reuse the pool across calls', async () => {
      const first = await getPool();
      const second = await getPool();

      expect(first).toBe(second);
      expect(MockedPool).toHaveBeenCalledTimes(1);
    });

    it('should use Secrets Manager credentials when DB_SECRET_ARN is set', async () => {
      process.env.DB_SECRET_ARN = TEST_SECRET_ARN;
      secretsManagerMock.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ username: 'secret_user', password: 'test-secret' }),
      });

      await getPool();

      expect(MockedPool).toHaveBeenCalledWith(
        expect.objectContaining({ user: 'secret_user', password: 'test-secret' })
      );
    });

    it('should register a pool error listener', async () => {
      const pool = await getPool();

      expect(pool.on).toHaveBeenCalledWith('error', expect.any(Function));
    });
  });

  describe('getCredentialsFromSecretsManager', () => {
    it('should cache credentials', async () => {
      secretsManagerMock.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ username: 'secret_user', password: 'test-secret' }),
      });

      await getCredentialsFromSecretsManager(TEST_SECRET_ARN);
      await getCredentialsFromSecretsManager(TEST_SECRET_ARN);

      expect(secretsManagerMock.commandCalls(GetSecretValueCommand)).toHaveLength(1);
    });

    it('should reject a secret without a password', async () => {
      secretsManagerMock.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ username: 'secret_user' }),
      });

      await expect(getCredentialsFromSecretsManager(TEST_SECRET_ARN)).rejects.toThrow(
        'Failed to fetch database credentials: Secret is missing username or password'
      );
    });

    it('should reject an empty secret', async () => {
      secretsManagerMock.on(GetSecretValueCommand).resolves({});

      await expect(getCredentialsFromSecretsManager(TEST_SECRET_ARN)).rejects.toThrow(
        'Failed to fetch database credentials: Secret value is empty'
      );
    });
  });

  describe('query', () => {
    it('should pass text and parameters to the pool', async () => {
      const pool = await getPool();

      const result = await query('SELECT * FROM rank_snapshots WHERE scope = $1', ['weekly']);

      expect(pool.query).toHaveBeenCalledWith('SELECT * FROM rank_snapshots WHERE scope = $1', ['weekly']);
      expect(result.rows).toEqual([{ id: 1 }]);
    });
  });

  describe('transaction', () => {
    it('should commit and release on success', async () => {
      const pool = await getPool();
      const client = await pool.connect();

      const result = await transaction(async () => 'saved');

      expect(result).toBe('saved');
      expect(jest.mocked(client.query).mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'COMMIT']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and rethrow on failure', async () => {
      const pool = await getPool();
      const client = await pool.connect();

      await expect(
        transaction(async () => {
          throw new Error('unique violation');
        })
      ).rejects.toThrow('unique violation');

      expect(jest.mocked(client.query).mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });
  });

  describe('closePool', () => {
    it('should end the pool and create a new one afterwards', async () => {
      const pool = await getPool();

      await closePool();
      await getPool();

      expect(pool.end).toHaveBeenCalledTimes(1);
      expect(MockedPool).toHaveBeenCalledTimes(2);
    });
  });
});
