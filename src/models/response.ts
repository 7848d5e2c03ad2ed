/**
 * Job Response Models
 *
 * Type definitions for the responses of the leaderboard job handler.
 * All responses include run_id and timestamp for traceability.
 */

/**
 * Standard success response envelope
 */
export interface SuccessResponse<T> {
  run_id: string;
  timestamp: string;
  data: T;
}

/**
 * Error details object
 */
export interface ErrorDetails {
  code: string;
  message: string;
  run_id: string;
  details?: Record<string, string>;
}

/**
 * Standard error response envelope
 */
export interface ErrorResponse {
  error: ErrorDetails;
}

/**
 * Handler result: status code plus JSON body
 */
export interface JobResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Status codes
 */
export enum HttpStatus {
  OK = 200,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Standard error codes
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}
