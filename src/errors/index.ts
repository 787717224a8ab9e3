/**
 * Error Handling Module
 *
 * Usage:
 *
 * ```typescript
 * import { SourceDirectoryError, wrapError } from './errors';
 *
 * throw new SourceDirectoryError('/data/in', 'not found', { correlationId });
 *
 * const converterError = wrapError(error, { correlationId });
 * ```
 */

// Error codes enum
export { ErrorCode } from './codes';

// Types and interfaces
export type { ErrorContext, ApiErrorResponse } from './types';

// Base error class
export { ConverterError } from './base';

// All specialized error classes
export {
  SourceDirectoryError,
  ConverterUnavailableError,
  BatchInProgressError,
  ValidationError,
  FileNotFoundError,
  ConfigurationError,
  UnknownError,
} from './classes';

// Handler utilities
export { wrapError, createErrorHandler, errnoOf } from './handler';
