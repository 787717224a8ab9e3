import { ErrorCode } from './codes';
import { ErrorContext } from './types';
import { ConverterError } from './base';

// =============================================================================
// Source Errors (500 - the whole batch cannot run)
// =============================================================================

/**
 * Source root is missing, not a directory, or unreadable
 */
export class SourceDirectoryError extends ConverterError {
  readonly code = ErrorCode.SOURCE_DIRECTORY_UNAVAILABLE;
  readonly statusCode = 500;

  constructor(sourceRoot: string, reason: string, context: ErrorContext = {}) {
    super(`Source directory unavailable: ${sourceRoot} (${reason})`, { ...context, path: sourceRoot });
  }
}

// =============================================================================
// Converter Errors (503 - infrastructure)
// =============================================================================

/**
 * LibreOffice binary is not installed or not executable
 */
export class ConverterUnavailableError extends ConverterError {
  readonly code = ErrorCode.CONVERTER_UNAVAILABLE;
  readonly statusCode = 503;

  constructor(sofficePath: string, context: ErrorContext = {}) {
    super(`LibreOffice not found or not executable: ${sofficePath}`, { ...context, path: sofficePath });
  }
}

// =============================================================================
// Batch Errors (409 - conflict)
// =============================================================================

/**
 * A batch pass over the same folders is already running
 */
export class BatchInProgressError extends ConverterError {
  readonly code = ErrorCode.BATCH_IN_PROGRESS;
  readonly statusCode = 409;

  constructor(context: ErrorContext = {}) {
    super('A conversion batch is already in progress', context);
  }
}

// =============================================================================
// Request Errors (4xx)
// =============================================================================

/**
 * Request validation failed
 */
export class ValidationError extends ConverterError {
  readonly code = ErrorCode.VALIDATION_ERROR;
  readonly statusCode = 400;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Requested file does not exist in the data folder
 */
export class FileNotFoundError extends ConverterError {
  readonly code = ErrorCode.FILE_NOT_FOUND;
  readonly statusCode = 404;

  constructor(fileName: string, context: ErrorContext = {}) {
    super(`File not found: ${fileName}`, context);
  }
}

// =============================================================================
// Configuration Errors (500)
// =============================================================================

/**
 * Configuration error
 */
export class ConfigurationError extends ConverterError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly statusCode = 500;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Configuration error: ${message}`, context);
  }
}

// =============================================================================
// Fallback (500)
// =============================================================================

/**
 * Unknown/unclassified error (fallback)
 */
export class UnknownError extends ConverterError {
  readonly code = ErrorCode.UNKNOWN_ERROR;
  readonly statusCode = 500;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}
