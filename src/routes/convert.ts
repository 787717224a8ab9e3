import type { FastifyInstance } from 'fastify';
import type { BatchSummary, ConversionPoolStats } from '../types';
import { ConverterUnavailableError } from '../errors';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import type { RouteContext } from './context';

export interface ConvertResponse {
  success: boolean;
  message: string;
  correlationId: string;
  summary: BatchSummary;
}

/**
 * Batch conversion routes
 *
 * Per-file failures are reported in the response body with HTTP 200; only a
 * missing binary (503), an inaccessible source folder (500) or an
 * overlapping run (409) produce an error status.
 */
export async function convertRoutes(app: FastifyInstance, { converter, runner }: RouteContext): Promise<void> {
  /**
   * POST /convert
   * Convert every .doc/.xls under the source folder into the destination folder
   */
  app.post<{ Reply: ConvertResponse }>('/convert', async (request, reply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    if (!(await converter.checkAvailability())) {
      throw new ConverterUnavailableError(converter.getSofficePath(), { correlationId });
    }

    const summary = await runner.run(correlationId);
    const success = summary.failedCount === 0;

    return {
      success,
      message: success
        ? 'Conversion completed successfully'
        : `Completed with errors: ${summary.failedCount} of ${summary.totalScanned} files failed`,
      correlationId,
      summary,
    };
  });

  /**
   * GET /converter/stats
   * LibreOffice pool statistics for this instance
   */
  app.get<{ Reply: ConversionPoolStats & { batchRunning: boolean; correlationId: string } }>(
    '/converter/stats',
    async (request, reply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      return { ...converter.getStats(), batchRunning: runner.isRunning(), correlationId };
    }
  );
}
