import { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { ConverterError } from './base';
import { ErrorContext } from './types';
import { ValidationError, FileNotFoundError, UnknownError } from './classes';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';

/**
 * Check if error is a Fastify schema validation error or a malformed request body
 */
function isFastifyValidationError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  if ('validation' in error) return true;

  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

/**
 * Extract the Node.js errno code (ENOENT, EACCES, ...) from an unknown error
 */
export function errnoOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Wrap a plain Error in the appropriate ConverterError class
 *
 * @param error - The error to wrap
 * @param context - Additional context to attach
 */
export function wrapError(error: Error, context: ErrorContext = {}): ConverterError {
  if (error instanceof ConverterError) {
    return error;
  }

  if (isFastifyValidationError(error)) {
    return new ValidationError(error.message, context);
  }

  const errno = errnoOf(error);
  if (errno === 'ENOENT') {
    const path = 'path' in error && typeof error.path === 'string' ? error.path : 'unknown';
    return new FileNotFoundError(path, { ...context, errno });
  }

  return new UnknownError(error.message, errno ? { ...context, errno } : context);
}

/**
 * Create a Fastify error handler that uses ConverterError
 *
 * This handler:
 * 1. Extracts correlation ID from request
 * 2. Wraps plain errors in ConverterError
 * 3. Logs with full context
 * 4. Returns structured API response
 */
export function createErrorHandler(app: FastifyInstance) {
  return (error: FastifyError | ConverterError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const converterError = wrapError(error, { correlationId });

    app.log.error(
      {
        correlationId,
        code: converterError.code,
        message: converterError.message,
        statusCode: converterError.statusCode,
        context: converterError.context,
        stack: converterError.stack,
      },
      'Request error'
    );

    return reply.status(converterError.statusCode).send(converterError.toApiResponse(correlationId));
  };
}
