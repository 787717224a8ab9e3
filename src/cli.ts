#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, validateConfig } from './config';
import { createLibreOfficeConverter } from './convert';
import { BatchOrchestrator, formatSummary } from './batch';
import { ConverterError, ConverterUnavailableError } from './errors';
import { initializeAppInsights } from './obs';
import { createLogger, setLogDestination } from './utils/logger';
import { generateCorrelationId } from './utils/correlation-id';
import type { AppConfig, ManagedConverter } from './types';

const logger = createLogger('cli');

/** Every file converted or skipped */
export const EXIT_OK = 0;
/** At least one file failed to convert */
export const EXIT_FAILURES = 1;
/** The batch could not run at all */
export const EXIT_FATAL = 2;

export interface CliOptions {
  config: AppConfig;
  converter?: ManagedConverter;
  /** Receives the printed summary (defaults to stdout) */
  write?: (text: string) => void;
}

/**
 * One batch pass over the configured folders
 *
 * @returns Process exit code
 */
export async function runCli({ config, converter, write = (text) => process.stdout.write(text) }: CliOptions): Promise<number> {
  const correlationId = generateCorrelationId();

  try {
    validateConfig(config);

    const activeConverter = converter ?? createLibreOfficeConverter(config);
    if (!(await activeConverter.checkAvailability())) {
      throw new ConverterUnavailableError(activeConverter.getSofficePath(), { correlationId });
    }

    const summary = await new BatchOrchestrator(activeConverter).runBatch(config.sourceDir, config.destinationDir, {
      timeout: config.conversionTimeout,
      skipEmpty: config.skipEmpty,
      correlationId,
    });

    write(formatSummary(summary));
    return summary.failedCount === 0 ? EXIT_OK : EXIT_FAILURES;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(
      { correlationId, error: message, code: error instanceof ConverterError ? error.code : undefined },
      'Batch conversion aborted'
    );
    write(`Conversion aborted: ${message}\n`);
    return EXIT_FATAL;
  }
}

if (require.main === module) {
  // stdout carries the summary only
  setLogDestination('stderr');
  dotenv.config();
  const config = loadConfig();
  initializeAppInsights(config);

  runCli({ config }).then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (err) => {
      console.error('Conversion crashed:', err);
      process.exitCode = EXIT_FATAL;
    }
  );
}
