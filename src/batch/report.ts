import type { BatchSummary, ConversionResult } from '../types';
import { destinationRelativePath } from './formats';

function describeResult(result: ConversionResult): string {
  switch (result.outcome) {
    case 'CONVERTED':
      return `  converted  ${result.relativePath} -> ${destinationRelativePath(result.relativePath, result.job.targetFormat)}`;
    case 'SKIPPED':
      return `  skipped    ${result.relativePath} (${result.skipReason})`;
    case 'FAILED':
      return `  FAILED     ${result.relativePath}: ${result.failureReason}`;
  }
}

/**
 * Render a BatchSummary for the terminal: one line per file, then totals
 */
export function formatSummary(summary: BatchSummary): string {
  const lines = [`Conversion ${summary.sourceRoot} -> ${summary.destinationRoot}`];

  for (const result of summary.results) {
    lines.push(describeResult(result));
  }

  lines.push(
    `Scanned: ${summary.totalScanned} | ` +
      `Converted: ${summary.convertedCount} (doc: ${summary.convertedByFormat.doc}, xls: ${summary.convertedByFormat.xls}) | ` +
      `Skipped: ${summary.skippedCount} | ` +
      `Failed: ${summary.failedCount}`
  );

  return `${lines.join('\n')}\n`;
}
