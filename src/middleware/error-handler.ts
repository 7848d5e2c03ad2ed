/**
 * Error Handling Middleware
 *
 * Centralized error handling that maps errors raised by a leaderboard run
 * to standardized job responses with appropriate status codes.
 */

import { NotFoundError, BadRequestError } from '../models/errors';
import { JobResult } from '../models/response';
import {
  notFoundErrorResponse,
  validationErrorResponse,
  internalErrorResponse,
  serviceUnavailableErrorResponse,
} from '../utils/response-formatter';
import { log, LogLevel } from '../utils/logger';

/**
 * Check if error is a database connection error
 *
 * Detects common database connection error patterns:
 * - ECONNREFUSED: Connection refused
 * - ETIMEDOUT: Connection timeout
 * - ENOTFOUND: Host not found
 * - Connection terminated unexpectedly
 */
export function isDatabaseConnectionError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('connection terminated') ||
    message.includes('connection refused') ||
    message.includes('connect timeout')
  );
}

/**
 * Handle error and format appropriate response
 *
 * - Invalid input (malformed scores, duplicates, unknown units, bad payloads) → 400
 * - Missing persisted leaderboards → 404
 * - Database connection errors → 503
 * - Anything else → 500
 *
 * @param error - Error to handle
 * @param runId - Run ID for tracing
 *
 * @example
 * ```typescript
 * try {
 *   // ... run
 * } catch (error) {
 *   return handleError(error, runId);
 * }
 * ```
 */
export function handleError(error: unknown, runId: string): JobResult {
  // Ensure error is an Error object
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof NotFoundError) {
    return notFoundErrorResponse(err.message, runId);
  }

  if (err instanceof BadRequestError) {
    return validationErrorResponse(err.message, err.details, runId);
  }

  if (isDatabaseConnectionError(err)) {
    return serviceUnavailableErrorResponse('Database connection failed', runId);
  }

  log(LogLevel.ERROR, 'Unhandled error', {
    run_id: runId,
    error: err.message,
    error_name: err.name,
  });

  return internalErrorResponse(
    'Internal server error',
    process.env.NODE_ENV === 'development' ? { error: err.message } : undefined,
    runId
  );
}
