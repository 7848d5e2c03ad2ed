/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * leaderboard runs. All logs include timestamp, level and relevant context.
 * Implements PII sanitization so voter names never reach the logs.
 */

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Log context values
 */
export type LogContext = Record<string, unknown>;

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  run_id?: string;
}

/**
 * Leaderboard run log entry
 */
interface RunLogEntry extends BaseLogEntry {
  log_type: 'LEADERBOARD_RUN';
  kind: string;
  scope: string;
  sequence: number;
  success: boolean;
  entity_count?: number;
  duration_ms: number;
  error_message?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'display_name',
  'displayname',
  'globalname',
  'global_name',
  'full_name',
  'email',
  'phone',
  'password',
  'db_password',
];

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.INFO]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.ERROR]: 2,
};

/**
 * Minimum level from LOG_LEVEL (info, warn, error); defaults to info
 */
function minimumLevel(): LogLevel {
  switch ((process.env.LOG_LEVEL || 'info').toLowerCase()) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    default:
      return LogLevel.INFO;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sanitize string by removing PII patterns
 */
export function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (isRecord(value)) {
    return sanitizeObject(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
export function sanitizeObject(obj: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    // Skip PII fields entirely
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }

    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

/**
 * Write log entry to console
 */
function writeLog(entry: BaseLogEntry & LogContext): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }

  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log the outcome of a leaderboard run
 *
 * @example
 * ```typescript
 * logRun({
 *   runId: '0b6c6f3e-...',
 *   kind: 'overall',
 *   scope: 'overall/poll_winner',
 *   sequence: 6,
 *   success: true,
 *   entityCount: 42,
 *   durationMs: 12
 * });
 * ```
 */
export function logRun(params: {
  runId: string;
  kind: string;
  scope: string;
  sequence: number;
  success: boolean;
  entityCount?: number;
  durationMs: number;
  errorMessage?: string;
}): void {
  const entry: RunLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.ERROR,
    log_type: 'LEADERBOARD_RUN',
    run_id: params.runId,
    kind: params.kind,
    scope: params.scope,
    sequence: params.sequence,
    success: params.success,
    entity_count: params.entityCount,
    duration_ms: params.durationMs,
    error_message: params.errorMessage === undefined ? undefined : sanitizeString(params.errorMessage),
  };

  writeLog({ ...entry });
}

/**
 * Log database error
 *
 * Logs database errors with sanitized query preview and error message.
 */
export function logDatabase(params: {
  runId?: string;
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query);

  // Truncate query for logging (first 200 characters)
  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    run_id: params.runId,
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog({ ...entry });
}

/**
 * Log generic message with context
 *
 * Automatically sanitizes context to remove PII.
 *
 * @example
 * ```typescript
 * log(LogLevel.WARN, 'Previous snapshot unreadable', {
 *   scope: 'overall/poll_winner',
 *   sequence: 6
 * });
 * ```
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  writeLog({
    ...sanitizedContext,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}
