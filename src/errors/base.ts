import { ErrorCode } from './codes';
import { ErrorContext, ApiErrorResponse } from './types';

/**
 * Base error class for all converter service errors
 *
 * Only infrastructure and input problems are raised as errors. A file that
 * fails to convert is reported in the batch summary instead.
 */
export abstract class ConverterError extends Error {
  /** Structured error code for programmatic handling */
  abstract readonly code: ErrorCode;

  /** HTTP status code to return */
  abstract readonly statusCode: number;

  /** Additional context for debugging and logging */
  readonly context: ErrorContext;

  /** ISO 8601 timestamp when error occurred */
  readonly timestamp: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for API response
   *
   * @param correlationId - Request correlation ID for tracing
   */
  toApiResponse(correlationId: string): ApiErrorResponse {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      correlationId,
      timestamp: this.timestamp,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
    };
  }
}
