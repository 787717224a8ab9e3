import dotenv from 'dotenv';
import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { healthRoutes } from './routes/health';
import { convertRoutes } from './routes/convert';
import { filesRoutes } from './routes/files';
import type { RouteContext } from './routes/context';
import { loadConfig, validateConfig } from './config';
import { createErrorHandler } from './errors';
import { createLibreOfficeConverter } from './convert';
import { BatchOrchestrator, BatchRunner } from './batch';
import { initializeAppInsights } from './obs';
import { generateCorrelationId, getCorrelationId, setCorrelationId } from './utils/correlation-id';
import type { AppConfig, ManagedConverter } from './types';

// Load environment variables from .env file
dotenv.config();

export interface BuildOptions {
  /** Defaults to loadConfig() */
  config?: AppConfig;
  /** Defaults to a LibreOffice converter built from the config */
  converter?: ManagedConverter;
}

/**
 * Build and configure the Fastify application
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  validateConfig(config);

  const converter = options.converter ?? createLibreOfficeConverter(config);
  const runner = new BatchRunner(new BatchOrchestrator(converter), config);
  const context: RouteContext = { config, converter, runner };

  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
    genReqId: () => generateCorrelationId(),
  });

  // Covers responses no route handles, such as 404s
  app.addHook('onRequest', async (request, reply) => {
    setCorrelationId(reply, getCorrelationId(request));
  });

  app.setErrorHandler(createErrorHandler(app));

  await app.register(cors, {
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    exposedHeaders: ['x-correlation-id'],
  });

  await app.register(healthRoutes, context);
  await app.register(convertRoutes, context);
  await app.register(filesRoutes, context);

  return app;
}

/**
 * Start the server if this file is run directly
 */
if (require.main === module) {
  const config = loadConfig();
  initializeAppInsights(config);

  build({ config })
    .then(async (app) => {
      try {
        await app.listen({
          port: config.port,
          host: '0.0.0.0', // Required for container deployments
        });

        app.log.info(`Source folder: ${config.sourceDir}`);
        app.log.info(`Destination folder: ${config.destinationDir}`);
        app.log.info(`LibreOffice: ${config.sofficePath}`);
      } catch (err) {
        app.log.error(err);
        process.exit(1);
      }

      const shutdown = async (signal: string) => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        try {
          await app.close();
          process.exit(0);
        } catch (err) {
          app.log.error(err, 'Shutdown failed');
          process.exit(1);
        }
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));
    })
    .catch((err) => {
      console.error('Failed to build application:', err);
      process.exit(1);
    });
}
