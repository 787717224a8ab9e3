import { ErrorCode } from './codes';

/**
 * Context information attached to errors for debugging and logging
 */
export interface ErrorContext {
  /** Request correlation ID for distributed tracing */
  correlationId?: string;
  /** Filesystem path involved in the failure */
  path?: string;
  /** Underlying Node.js error code (ENOENT, EACCES, ...) */
  errno?: string;
  /** Configuration key that failed validation */
  configKey?: string;
  /** Allow additional context fields */
  [key: string]: unknown;
}

/**
 * Structured error response returned by the API
 */
export interface ApiErrorResponse {
  /** Error class name (e.g., "SourceDirectoryError") */
  error: string;
  /** Structured error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** HTTP status code */
  statusCode: number;
  /** Request correlation ID */
  correlationId: string;
  /** ISO 8601 timestamp when error occurred */
  timestamp: string;
  /** Additional context for debugging */
  context?: ErrorContext;
}
