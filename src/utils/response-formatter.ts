/**
 * Response Formatting Utilities
 *
 * Provides helper functions for creating standardized job responses.
 * All responses include run_id and timestamp.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  SuccessResponse,
  ErrorResponse,
  ErrorDetails,
  HttpStatus,
  ErrorCode,
  JobResult,
} from '../models/response';

const JSON_HEADERS = {
  'Content-Type': 'application/json',
};

/**
 * Generate a unique run ID
 * Uses UUID v4 for globally unique identifiers
 */
export function generateRunId(): string {
  return uuidv4();
}

/**
 * Generate ISO-8601 timestamp
 */
export function generateTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Create a success response
 *
 * @param data - Response payload
 * @param runId - Run ID (generated if not provided)
 * @param statusCode - Status code (default: 200)
 *
 * @example
 * ```typescript
 * return successResponse({ leaderboard: summary }, runId);
 * ```
 */
export function successResponse<T>(
  data: T,
  runId?: string,
  statusCode: HttpStatus = HttpStatus.OK
): JobResult {
  const response: SuccessResponse<T> = {
    run_id: runId || generateRunId(),
    timestamp: generateTimestamp(),
    data,
  };

  return {
    statusCode,
    headers: { ...JSON_HEADERS },
    body: JSON.stringify(response),
  };
}

/**
 * Create an error response
 *
 * @param code - Machine-readable error code
 * @param message - Human-readable error message
 * @param statusCode - Status code
 * @param details - Optional field-level context
 * @param runId - Run ID (generated if not provided)
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  statusCode: HttpStatus,
  details?: Record<string, string>,
  runId?: string
): JobResult {
  const errorDetails: ErrorDetails = {
    code,
    message,
    run_id: runId || generateRunId(),
  };

  if (details && Object.keys(details).length > 0) {
    errorDetails.details = details;
  }

  const response: ErrorResponse = {
    error: errorDetails,
  };

  return {
    statusCode,
    headers: { ...JSON_HEADERS },
    body: JSON.stringify(response),
  };
}

/**
 * Create a validation error response (400)
 */
export function validationErrorResponse(
  message: string,
  details?: Record<string, string>,
  runId?: string
): JobResult {
  return errorResponse(ErrorCode.VALIDATION_ERROR, message, HttpStatus.BAD_REQUEST, details, runId);
}

/**
 * Create a not found error response (404)
 */
export function notFoundErrorResponse(message: string, runId?: string): JobResult {
  return errorResponse(ErrorCode.NOT_FOUND, message, HttpStatus.NOT_FOUND, undefined, runId);
}

/**
 * Create an internal error response (500)
 *
 * @param details - Optional error details (only outside production)
 */
export function internalErrorResponse(
  message: string = 'Internal server error',
  details?: Record<string, string>,
  runId?: string
): JobResult {
  return errorResponse(ErrorCode.INTERNAL_ERROR, message, HttpStatus.INTERNAL_SERVER_ERROR, details, runId);
}

/**
 * Create a service unavailable error response (503)
 */
export function serviceUnavailableErrorResponse(
  message: string = 'Service temporarily unavailable',
  runId?: string
): JobResult {
  return errorResponse(ErrorCode.SERVICE_UNAVAILABLE, message, HttpStatus.SERVICE_UNAVAILABLE, undefined, runId);
}
