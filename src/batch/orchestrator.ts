import { promises as fs } from 'fs';
import path from 'path';
import type {
  BatchOptions,
  BatchSummary,
  ConversionInvoker,
  ConversionJob,
  ConversionResult,
  FailedResult,
  SkippedResult,
} from '../types';
import { createLogger } from '../utils/logger';
import { generateCorrelationId } from '../utils/correlation-id';
import { trackMetric } from '../obs';
import { assertReadableDirectory, listSourceFiles } from './traverse';
import { TARGET_FORMATS, destinationRelativePath, sourceFormatOf } from './formats';

const logger = createLogger('batch:orchestrator');

/**
 * A scanned file: either a job to dispatch or a result known up front
 */
type PlannedEntry =
  | { kind: 'job'; job: ConversionJob }
  | { kind: 'result'; result: SkippedResult | FailedResult };

function isInside(parent: string, candidate: string): boolean {
  const relative = path.relative(parent, candidate);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Batch Orchestrator
 *
 * Walks a source tree, converts every `.doc`/`.xls` into the mirrored path
 * under the destination root and reports one result per scanned file.
 *
 * Only an inaccessible source root fails the call; everything that goes
 * wrong with an individual file is recorded in the summary.
 */
export class BatchOrchestrator {
  constructor(private readonly invoker: ConversionInvoker) {}

  /**
   * Run one traversal-and-convert pass
   *
   * @throws SourceDirectoryError when sourceRoot is missing, not a directory or unreadable
   */
  async runBatch(sourceRoot: string, destinationRoot: string, options: BatchOptions): Promise<BatchSummary> {
    const correlationId = options.correlationId || generateCorrelationId();
    const sourceDir = path.resolve(sourceRoot);
    const destinationDir = path.resolve(destinationRoot);
    const startedAt = new Date();

    await assertReadableDirectory(sourceDir, correlationId);

    const files = await listSourceFiles(sourceDir, isInside(sourceDir, destinationDir) ? destinationDir : undefined);
    const planned = this.plan(files, sourceDir, destinationDir);
    const jobCount = planned.filter((entry) => entry.kind === 'job').length;

    logger.info(
      { correlationId, sourceDir, destinationDir, scanned: files.length, eligible: jobCount },
      'Starting batch'
    );

    if (jobCount === 0) {
      if (options.skipEmpty) {
        logger.info({ correlationId, sourceDir }, 'No .doc or .xls files found');
      } else {
        logger.warn({ correlationId, sourceDir }, 'No .doc or .xls files found (set SKIP_EMPTY=true to silence)');
      }
    }

    await fs.mkdir(destinationDir, { recursive: true });

    // Promise.all keeps discovery order whatever order the jobs finish in
    let dispatched = 0;
    const results = await Promise.all(
      planned.map((entry): Promise<ConversionResult> | ConversionResult => {
        if (entry.kind === 'result') {
          return entry.result;
        }
        dispatched++;
        logger.info(
          { correlationId, progress: `${dispatched}/${jobCount}`, source: entry.job.relativePath },
          'Dispatching conversion'
        );
        return this.dispatch(entry.job, options.timeout, correlationId);
      })
    );

    const summary = summarize(sourceDir, destinationDir, results, startedAt);

    trackMetric('batch_runs_total', 1, { failed: summary.failedCount > 0 ? 'true' : 'false' });
    trackMetric('batch_duration_ms', summary.durationMs);

    const level = summary.failedCount === 0 ? 'info' : 'warn';
    logger[level](
      {
        correlationId,
        totalScanned: summary.totalScanned,
        converted: summary.convertedCount,
        skipped: summary.skippedCount,
        failed: summary.failedCount,
        durationMs: summary.durationMs,
      },
      'Batch finished'
    );

    return summary;
  }

  /**
   * Classify scanned files, rejecting a second source that would land on an
   * already claimed destination (e.g. `a.doc` next to `a.DOC`)
   */
  private plan(files: string[], sourceDir: string, destinationDir: string): PlannedEntry[] {
    const claimed = new Map<string, string>();

    return files.map((relativePath): PlannedEntry => {
      const sourcePath = path.join(sourceDir, ...relativePath.split('/'));
      const sourceFormat = sourceFormatOf(relativePath);

      if (!sourceFormat) {
        return {
          kind: 'result',
          result: { outcome: 'SKIPPED', sourcePath, relativePath, skipReason: 'unsupported extension', durationMs: 0 },
        };
      }

      const targetFormat = TARGET_FORMATS[sourceFormat];
      const targetRelative = destinationRelativePath(relativePath, targetFormat);
      const job: ConversionJob = {
        sourcePath,
        relativePath,
        destinationPath: path.join(destinationDir, ...targetRelative.split('/')),
        sourceFormat,
        targetFormat,
      };

      const owner = claimed.get(targetRelative);
      if (owner !== undefined) {
        return {
          kind: 'result',
          result: {
            outcome: 'FAILED',
            sourcePath,
            relativePath,
            job,
            failureKind: 'io-error',
            failureReason: `destination ${targetRelative} already produced by ${owner}`,
            durationMs: 0,
          },
        };
      }
      claimed.set(targetRelative, relativePath);

      return { kind: 'job', job };
    });
  }

  private async dispatch(job: ConversionJob, timeout: number, correlationId: string): Promise<ConversionResult> {
    const startTime = Date.now();
    try {
      await fs.mkdir(path.dirname(job.destinationPath), { recursive: true });
      return await this.invoker.convert(job, { timeout, correlationId });
    } catch (error) {
      // Contain anything the invoker did not classify so sibling jobs keep running
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ correlationId, source: job.relativePath, error: message }, 'Conversion raised unexpectedly');
      return {
        outcome: 'FAILED',
        sourcePath: job.sourcePath,
        relativePath: job.relativePath,
        job,
        failureKind: 'io-error',
        failureReason: message || 'conversion raised an error',
        durationMs: Date.now() - startTime,
      };
    }
  }
}

/**
 * Fold per-file results into a BatchSummary
 */
export function summarize(
  sourceRoot: string,
  destinationRoot: string,
  results: ConversionResult[],
  startedAt: Date,
  finishedAt: Date = new Date()
): BatchSummary {
  const summary: BatchSummary = {
    sourceRoot,
    destinationRoot,
    totalScanned: results.length,
    convertedCount: 0,
    skippedCount: 0,
    failedCount: 0,
    convertedByFormat: { doc: 0, xls: 0 },
    results,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };

  for (const result of results) {
    switch (result.outcome) {
      case 'CONVERTED':
        summary.convertedCount++;
        summary.convertedByFormat[result.job.sourceFormat]++;
        break;
      case 'SKIPPED':
        summary.skippedCount++;
        break;
      case 'FAILED':
        summary.failedCount++;
        break;
    }
  }

  return summary;
}
