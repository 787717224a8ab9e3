/**
 * Structured error codes for programmatic error handling
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR
 *
 * Categories:
 * - SOURCE_*      : Source tree access errors
 * - CONVERTER_*   : LibreOffice availability errors
 * - BATCH_*       : Batch scheduling errors
 * - VALIDATION_*  : Request validation errors
 * - FILE_*        : File management errors
 * - CONFIGURATION_*: Start-up configuration errors
 */
export enum ErrorCode {
  // Source tree errors (500 - fatal for the batch)
  SOURCE_DIRECTORY_UNAVAILABLE = 'SOURCE_DIRECTORY_UNAVAILABLE',

  // Converter errors (503 - infrastructure)
  CONVERTER_UNAVAILABLE = 'CONVERTER_UNAVAILABLE',

  // Batch errors (409 - conflict)
  BATCH_IN_PROGRESS = 'BATCH_IN_PROGRESS',

  // Validation errors (400 - bad request)
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // File management errors (404 - not found)
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  // Configuration errors (500)
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Unclassified errors (500)
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}
