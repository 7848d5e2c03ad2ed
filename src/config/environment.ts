/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

export type SnapshotStoreKind = 'file' | 'postgres';

export interface EnvironmentConfig {
  // Storage configuration
  dataDir: string;
  snapshotStore: SnapshotStoreKind;

  // Database configuration
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbUser: string;
  dbPassword: string;
  dbSecretArn: string;

  // Application configuration
  logLevel: string;
  metricsEnabled: boolean;
  nodeEnv: string;
}

/**
 * Load environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dataDir: process.env.DATA_DIR || './data',
    snapshotStore: process.env.SNAPSHOT_STORE === 'postgres' ? 'postgres' : 'file',
    dbHost: process.env.DB_HOST || '',
    dbPort: parseInt(process.env.DB_PORT || '5432', 10),
    dbName: process.env.DB_NAME || '',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSecretArn: process.env.DB_SECRET_ARN || '',
    logLevel: process.env.LOG_LEVEL || 'info',
    metricsEnabled: process.env.METRICS_ENABLED === 'true',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set
 *
 * The database settings are only required by the postgres snapshot store,
 * which needs either a Secrets Manager ARN or a user name.
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = ['dataDir'];

  if (config.snapshotStore === 'postgres') {
    requiredFields.push('dbHost', 'dbName');
    if (!config.dbSecretArn) {
      requiredFields.push('dbUser');
    }
  }

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  if (!Number.isInteger(config.dbPort) || config.dbPort <= 0) {
    throw new Error(`Invalid DB_PORT: ${process.env.DB_PORT}`);
  }
}
