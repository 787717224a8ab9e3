import { v4 as uuidv4 } from 'uuid';
import { FastifyRequest, FastifyReply } from 'fastify';

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Extract correlation ID from request
 *
 * Falls back to the request id, which the server generates with
 * generateCorrelationId, so every lookup within one request agrees.
 */
export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers['x-correlation-id'];

  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  return request.id;
}

/**
 * Add correlation ID to response headers
 */
export function setCorrelationId(reply: FastifyReply, correlationId: string): void {
  reply.header('x-correlation-id', correlationId);
}
