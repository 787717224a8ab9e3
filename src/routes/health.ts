import type { FastifyInstance } from 'fastify';
import { HealthStatus, ConverterHealth } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { directoryExists } from '../files';
import type { RouteContext } from './context';

/**
 * Health check routes
 */
export async function healthRoutes(app: FastifyInstance, { config, converter }: RouteContext): Promise<void> {
  /**
   * GET /healthz - Liveness probe
   * Always returns 200 if the service is running
   */
  app.get<{ Reply: HealthStatus }>('/healthz', async (request, reply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);
    return { status: 'ok' };
  });

  /**
   * GET /health - Converter health
   * Returns 200 when the LibreOffice binary resolves to an executable, 503 otherwise.
   * Folder presence is reported but does not affect the status.
   */
  app.get<{ Reply: ConverterHealth }>('/health', async (request, reply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const [converterAvailable, sourceDirExists, destinationDirExists] = await Promise.all([
      converter.checkAvailability(),
      directoryExists(config.sourceDir),
      directoryExists(config.destinationDir),
    ]);

    const health: ConverterHealth = {
      status: converterAvailable ? 'ok' : 'unhealthy',
      converterAvailable,
      sofficePath: converter.getSofficePath(),
      sourceDirExists,
      destinationDirExists,
    };

    if (!converterAvailable) {
      request.log.warn({ correlationId, sofficePath: health.sofficePath }, 'LibreOffice binary not available');
    }

    reply.code(converterAvailable ? 200 : 503);
    return health;
  });
}
