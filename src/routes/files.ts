import type { FastifyInstance } from 'fastify';
import type { DataArea, FileInfo, FolderStats } from '../types';
import { listFiles, deleteFile, folderStats } from '../files';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import type { RouteContext } from './context';

const areaParam = {
  type: 'string',
  enum: ['source', 'destination'],
} as const;

/**
 * File management routes over the source and destination folders
 */
export async function filesRoutes(app: FastifyInstance, { config }: RouteContext): Promise<void> {
  const folderOf = (area: DataArea): string => (area === 'source' ? config.sourceDir : config.destinationDir);

  /**
   * GET /files/:area?recursive=true
   */
  app.get<{
    Params: { area: DataArea };
    Querystring: { recursive?: boolean };
    Reply: { area: DataArea; files: FileInfo[] };
  }>(
    '/files/:area',
    {
      schema: {
        params: {
          type: 'object',
          required: ['area'],
          properties: { area: areaParam },
        },
        querystring: {
          type: 'object',
          properties: { recursive: { type: 'boolean', default: false } },
        },
      },
    },
    async (request, reply) => {
      setCorrelationId(reply, getCorrelationId(request));
      const { area } = request.params;
      const files = await listFiles(folderOf(area), request.query.recursive === true);
      return { area, files };
    }
  );

  /**
   * DELETE /files/:area/:file
   * Only the base name of :file is honored
   */
  app.delete<{
    Params: { area: DataArea; file: string };
    Reply: { success: boolean; message: string };
  }>(
    '/files/:area/:file',
    {
      schema: {
        params: {
          type: 'object',
          required: ['area', 'file'],
          properties: { area: areaParam, file: { type: 'string', minLength: 1 } },
        },
      },
    },
    async (request, reply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const { area, file } = request.params;
      const deleted = await deleteFile(folderOf(area), file);
      request.log.info({ correlationId, area, file: deleted }, 'File deleted');

      return { success: true, message: `File '${deleted}' deleted from ${area}` };
    }
  );

  /**
   * GET /stats
   * File counts and extensions per folder
   */
  app.get<{ Reply: { source: FolderStats; destination: FolderStats } }>('/stats', async (request, reply) => {
    setCorrelationId(reply, getCorrelationId(request));
    const [source, destination] = await Promise.all([
      folderStats(config.sourceDir),
      folderStats(config.destinationDir),
    ]);
    return { source, destination };
  });
}
