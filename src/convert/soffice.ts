import { promises as fs } from 'fs';
import path from 'path';
import type {
  AppConfig,
  ConversionJob,
  ConversionOptions,
  ConversionPoolStats,
  ConversionResult,
  FailedResult,
  FailureKind,
  ManagedConverter,
} from '../types';
import { createLogger } from '../utils/logger';
import { generateCorrelationId } from '../utils/correlation-id';
import { errnoOf } from '../errors';
import { trackDependency, trackGauge, trackMetric } from '../obs';
import { resolveExecutable } from './binary';
import { runProcess } from './process';

const logger = createLogger('convert:soffice');

const DEFAULT_TIMEOUT = 120000; // 2 minutes
const DEFAULT_MAX_CONCURRENT = 2;
export const MAX_REASON_LENGTH = 500;

export interface LibreOfficeConverterOptions {
  /** soffice binary: absolute path or a name looked up in PATH */
  sofficePath: string;
  /** Pool bound (default 2) */
  maxConcurrent?: number;
  /** Parent of the per-job scratch directories */
  workdir: string;
  /** Timeout used when a call passes none */
  defaultTimeout?: number;
}

/**
 * Result of one soffice process, before the output file is inspected
 */
type ProcessOutcome =
  | { kind: 'exited'; stdout: string; stderr: string }
  | { kind: 'timeout' }
  | { kind: 'exit-code'; reason: string }
  | { kind: 'spawn-error'; reason: string };

/**
 * Collapse whitespace and cap diagnostic text so it fits in a summary line
 */
export function truncateDiagnostic(text: string, maxLength: number = MAX_REASON_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) {
    return flat;
  }
  return `${flat.slice(0, maxLength - 3)}...`;
}

function readField(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

function readText(source: object, key: string): string {
  const value = readField(source, key);
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return '';
}

/**
 * LibreOffice Conversion Pool
 *
 * Converts legacy office documents (doc, xls) to their OOXML successors
 * (docx, xlsx) with soffice --headless, with bounded concurrency.
 *
 * Every call resolves to a ConversionResult; a file that cannot be
 * converted is a FAILED result, never a rejection. The destination path is
 * only written by moving a finished output file into place.
 *
 * @example
 * ```typescript
 * const converter = new LibreOfficeConverter({ sofficePath: 'soffice', workdir: '/tmp', maxConcurrent: 2 });
 * const result = await converter.convert(job, { timeout: 60000, correlationId: 'batch-1' });
 * ```
 */
export class LibreOfficeConverter implements ManagedConverter {
  private readonly sofficePath: string;
  private readonly maxConcurrent: number;
  private readonly workdir: string;
  private readonly defaultTimeout: number;
  private activeJobs: number = 0;
  private queue: Array<() => void> = [];
  private stats: ConversionPoolStats = {
    activeJobs: 0,
    queuedJobs: 0,
    completedJobs: 0,
    failedJobs: 0,
    totalConversions: 0,
  };

  constructor(options: LibreOfficeConverterOptions) {
    this.sofficePath = options.sofficePath;
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
    this.workdir = options.workdir;
    this.defaultTimeout = options.defaultTimeout ?? DEFAULT_TIMEOUT;

    logger.info(
      { maxConcurrent: this.maxConcurrent, sofficePath: this.sofficePath },
      'LibreOfficeConverter initialized'
    );
  }

  /**
   * Convert one legacy document into its destination path
   */
  async convert(job: ConversionJob, options: ConversionOptions = {}): Promise<ConversionResult> {
    const correlationId = options.correlationId || generateCorrelationId();
    const timeout = options.timeout || this.defaultTimeout;

    logger.debug(
      { correlationId, source: job.relativePath, targetFormat: job.targetFormat, timeout },
      'Queued conversion'
    );

    // Acquire slot in the pool (may queue if pool is full)
    await this.acquireSlot(correlationId);

    const startTime = Date.now();

    try {
      this.stats.totalConversions++;

      const result = await this.runConversion(job, timeout, correlationId, startTime);
      const duration = result.durationMs;
      const dependencyName = `${job.sourceFormat} to ${job.targetFormat} conversion`;

      trackMetric('conversion_duration_ms', duration, { format: job.sourceFormat, outcome: result.outcome });

      if (result.outcome === 'FAILED') {
        this.stats.failedJobs++;
        await this.removeStaleDestination(job, correlationId);
        trackMetric('conversion_failures_total', 1, { format: job.sourceFormat, kind: result.failureKind });
        trackDependency({
          type: 'LibreOffice',
          name: dependencyName,
          duration,
          success: false,
          correlationId,
          error: result.failureReason,
        });
        logger.warn(
          {
            correlationId,
            source: job.relativePath,
            failureKind: result.failureKind,
            reason: result.failureReason,
            stats: this.stats,
          },
          'Conversion failed'
        );
      } else {
        this.stats.completedJobs++;
        trackDependency({ type: 'LibreOffice', name: dependencyName, duration, success: true, correlationId });
        logger.info(
          { correlationId, source: job.relativePath, destination: job.destinationPath, duration },
          'Conversion completed successfully'
        );
      }

      return result;
    } finally {
      this.releaseSlot(correlationId);
    }
  }

  /**
   * A failed file must not leave an earlier run's output at its destination
   */
  private async removeStaleDestination(job: ConversionJob, correlationId: string): Promise<void> {
    try {
      await fs.rm(job.destinationPath, { force: true });
    } catch (error) {
      logger.warn(
        { correlationId, destination: job.destinationPath, error: errorMessage(error) },
        'Failed to remove stale destination file'
      );
    }
  }

  /**
   * Whether the configured soffice binary resolves to an executable file
   */
  async checkAvailability(): Promise<boolean> {
    return (await resolveExecutable(this.sofficePath)) !== null;
  }

  getSofficePath(): string {
    return this.sofficePath;
  }

  /**
   * Acquire a slot in the conversion pool
   * If pool is full, the promise will wait in queue until a slot is available
   */
  private async acquireSlot(correlationId: string): Promise<void> {
    if (this.activeJobs < this.maxConcurrent) {
      this.activeJobs++;
      this.stats.activeJobs = this.activeJobs;
      trackGauge('conversion_pool_active', this.activeJobs);
      return;
    }

    this.stats.queuedJobs++;
    trackGauge('conversion_pool_queued', this.stats.queuedJobs);
    logger.debug({ correlationId, queuedJobs: this.stats.queuedJobs }, 'Pool full, waiting in queue');

    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });

    this.stats.queuedJobs--;
    this.stats.activeJobs = this.activeJobs;
    logger.debug({ correlationId, activeJobs: this.activeJobs }, 'Slot acquired from queue');
  }

  /**
   * Release a slot in the conversion pool
   * If queue has waiting jobs, immediately grant slot to next in queue
   */
  private releaseSlot(correlationId: string): void {
    this.activeJobs--;
    this.stats.activeJobs = this.activeJobs;

    logger.debug(
      { correlationId, activeJobs: this.activeJobs, queueLength: this.queue.length },
      'Slot released'
    );

    const next = this.queue.shift();
    if (next) {
      this.activeJobs++;
      next();
    }
    trackGauge('conversion_pool_active', this.activeJobs);
  }

  /**
   * Run the actual conversion using LibreOffice
   *
   * Process:
   * 1. Create a scratch directory for the job
   * 2. Execute soffice --headless --convert-to <target> into it
   * 3. Locate the output file
   * 4. Move it to the destination path
   * 5. Cleanup the scratch directory
   */
  private async runConversion(
    job: ConversionJob,
    timeout: number,
    correlationId: string,
    startTime: number
  ): Promise<ConversionResult> {
    const failed = (failureKind: FailureKind, failureReason: string): FailedResult => ({
      outcome: 'FAILED',
      sourcePath: job.sourcePath,
      relativePath: job.relativePath,
      job,
      failureKind,
      failureReason,
      durationMs: Date.now() - startTime,
    });

    // Random component prevents collisions between concurrent jobs
    const randomSuffix = Math.random().toString(36).substring(2, 15);
    const jobWorkdir = path.join(this.workdir, `office-convert-${Date.now()}-${randomSuffix}`);

    try {
      try {
        await fs.mkdir(jobWorkdir, { recursive: true });
      } catch (error) {
        return failed('io-error', truncateDiagnostic(`cannot create scratch directory: ${errorMessage(error)}`));
      }

      const outcome = await this.executeLibreOffice(job, jobWorkdir, timeout, correlationId);

      if (outcome.kind === 'timeout') {
        return failed('timeout', 'timeout');
      }
      if (outcome.kind !== 'exited') {
        return failed(outcome.kind, outcome.reason);
      }

      let outputPath: string | null;
      try {
        outputPath = await this.findOutput(job, jobWorkdir);
      } catch (error) {
        return failed('io-error', truncateDiagnostic(`cannot read scratch directory: ${errorMessage(error)}`));
      }
      if (!outputPath) {
        const expected = `${path.parse(job.sourcePath).name}.${job.targetFormat}`;
        const diagnostic = outcome.stderr.trim() || outcome.stdout.trim();
        return failed(
          'missing-output',
          truncateDiagnostic(`missing output: ${expected} was not produced${diagnostic ? ` (${diagnostic})` : ''}`)
        );
      }

      try {
        await moveIntoPlace(outputPath, job.destinationPath);
      } catch (error) {
        return failed('io-error', truncateDiagnostic(`cannot write ${job.destinationPath}: ${errorMessage(error)}`));
      }

      return {
        outcome: 'CONVERTED',
        sourcePath: job.sourcePath,
        relativePath: job.relativePath,
        job,
        durationMs: Date.now() - startTime,
      };
    } finally {
      // Always cleanup the scratch directory
      try {
        await fs.rm(jobWorkdir, { recursive: true, force: true });
      } catch (cleanupError) {
        logger.warn(
          { correlationId, jobWorkdir, error: errorMessage(cleanupError) },
          'Failed to cleanup scratch directory'
        );
      }
    }
  }

  /**
   * Execute LibreOffice soffice command
   *
   * Command: soffice --headless --invisible --convert-to <target> --outdir <dir> <inputFile>
   */
  private async executeLibreOffice(
    job: ConversionJob,
    outputDir: string,
    timeout: number,
    correlationId: string
  ): Promise<ProcessOutcome> {
    // Unique user profile directory prevents lock conflicts between concurrent jobs
    const userProfile = path.join(outputDir, '.libreoffice-profile');

    const args = [
      '--headless',
      '--invisible',
      '--convert-to',
      job.targetFormat,
      '--outdir',
      outputDir,
      `-env:UserInstallation=file://${userProfile}`,
      job.sourcePath,
    ];

    logger.debug({ correlationId, command: this.sofficePath, args, timeout }, 'Executing LibreOffice conversion');

    try {
      const { stdout, stderr } = await runProcess(this.sofficePath, args, {
        timeout,
        maxBuffer: 10 * 1024 * 1024, // 10MB buffer for stdout/stderr
        env: { ...process.env, HOME: process.env.HOME || outputDir },
      });

      if (stderr) {
        logger.warn({ correlationId, stderr: truncateDiagnostic(stderr) }, 'LibreOffice produced stderr output');
      }

      return { kind: 'exited', stdout, stderr };
    } catch (error: unknown) {
      return classifyExecError(error, this.sofficePath, timeout, correlationId);
    }
  }

  /**
   * LibreOffice names the output after the source stem; the extension case
   * may differ from what was requested
   */
  private async findOutput(job: ConversionJob, outputDir: string): Promise<string | null> {
    const expected = `${path.parse(job.sourcePath).name}.${job.targetFormat}`.toLowerCase();
    const entries = await fs.readdir(outputDir, { withFileTypes: true });
    const match = entries.find((entry) => entry.isFile() && entry.name.toLowerCase() === expected);
    return match ? path.join(outputDir, match.name) : null;
  }

  /**
   * Get current pool statistics
   */
  getStats(): ConversionPoolStats {
    return { ...this.stats };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a runProcess rejection onto a process outcome
 */
function classifyExecError(
  error: unknown,
  sofficePath: string,
  timeout: number,
  correlationId: string
): ProcessOutcome {
  if (typeof error !== 'object' || error === null) {
    return { kind: 'exit-code', reason: truncateDiagnostic(`LibreOffice execution error: ${String(error)}`) };
  }

  const code = readField(error, 'code');
  const killed = readField(error, 'killed') === true;
  const signal = readField(error, 'signal');
  const stderr = readText(error, 'stderr').trim();
  const stdout = readText(error, 'stdout').trim();
  const message = readText(error, 'message');

  if (code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return { kind: 'exit-code', reason: truncateDiagnostic(`output limit exceeded: ${message}`) };
  }

  if (killed) {
    logger.error({ correlationId, timeout, signal }, 'LibreOffice conversion timed out');
    return { kind: 'timeout' };
  }

  if (typeof code === 'string') {
    logger.error({ correlationId, errno: code, sofficePath }, 'LibreOffice could not be started');
    return { kind: 'spawn-error', reason: truncateDiagnostic(`cannot execute ${sofficePath}: ${code}`) };
  }

  const diagnostic = stderr || stdout;
  const status =
    typeof code === 'number'
      ? `exit code ${code}`
      : typeof signal === 'string'
        ? `terminated by ${signal}`
        : message || 'LibreOffice execution error';

  logger.error({ correlationId, exitCode: code, signal, stderr, stdout }, 'LibreOffice conversion failed');

  return { kind: 'exit-code', reason: truncateDiagnostic(diagnostic ? `${status}: ${diagnostic}` : status) };
}

/**
 * Move a finished output file to its destination
 *
 * Falls back to copy-then-rename through a sibling temp file when the scratch
 * directory is on another device, so the destination never holds a partial file.
 */
async function moveIntoPlace(outputPath: string, destinationPath: string): Promise<void> {
  try {
    await fs.rename(outputPath, destinationPath);
    return;
  } catch (error) {
    if (errnoOf(error) !== 'EXDEV') {
      throw error;
    }
  }

  const partialPath = `${destinationPath}.partial-${process.pid}-${Math.random().toString(36).substring(2, 10)}`;
  try {
    await fs.copyFile(outputPath, partialPath);
    await fs.rename(partialPath, destinationPath);
  } catch (error) {
    await fs.rm(partialPath, { force: true });
    throw error;
  }
}

/**
 * Create a converter from application configuration
 */
export function createLibreOfficeConverter(
  config: Pick<AppConfig, 'sofficePath' | 'conversionPoolSize' | 'conversionWorkdir' | 'conversionTimeout'>
): LibreOfficeConverter {
  return new LibreOfficeConverter({
    sofficePath: config.sofficePath,
    maxConcurrent: config.conversionPoolSize,
    workdir: config.conversionWorkdir,
    defaultTimeout: config.conversionTimeout,
  });
}
