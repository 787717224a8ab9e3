import type { AppConfig, BatchSummary } from '../types';
import { BatchInProgressError } from '../errors';
import { BatchOrchestrator } from './orchestrator';

export type BatchRunnerConfig = Pick<AppConfig, 'sourceDir' | 'destinationDir' | 'conversionTimeout' | 'skipEmpty'>;

/**
 * Runs batches over the configured folder pair, one at a time
 *
 * Two overlapping passes would write the same destination files, so a
 * trigger that arrives while a pass is running is rejected.
 */
export class BatchRunner {
  private running = false;

  constructor(
    private readonly orchestrator: BatchOrchestrator,
    private readonly config: BatchRunnerConfig
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * @throws BatchInProgressError when a pass is already running
   */
  async run(correlationId?: string): Promise<BatchSummary> {
    if (this.running) {
      throw new BatchInProgressError({ correlationId });
    }

    this.running = true;
    try {
      return await this.orchestrator.runBatch(this.config.sourceDir, this.config.destinationDir, {
        timeout: this.config.conversionTimeout,
        skipEmpty: this.config.skipEmpty,
        correlationId,
      });
    } finally {
      this.running = false;
    }
  }
}
