import { promises as fs } from 'fs';
import path from 'path';
import { BatchOrchestrator, summarize } from '../../src/batch';
import { SourceDirectoryError } from '../../src/errors';
import type { BatchSummary, ConversionInvoker } from '../../src/types';
import { FakeConverter } from '../helpers/fake-converter';
import { exists, makeTempDir, readTree, removeTempDir, writeTree } from '../helpers/fs';

const OPTIONS = { timeout: 1000, correlationId: 'batch-test' };

function outcomes(summary: BatchSummary): Array<[string, string]> {
  return summary.results.map((result) => [result.relativePath, result.outcome]);
}

describe('BatchOrchestrator', () => {
  let root: string;
  let sourceDir: string;
  let destinationDir: string;
  let converter: FakeConverter;
  let orchestrator: BatchOrchestrator;

  beforeEach(async () => {
    root = await makeTempDir('batch-test-');
    sourceDir = path.join(root, 'source');
    destinationDir = path.join(root, 'destination');
    await fs.mkdir(sourceDir);
    converter = new FakeConverter();
    orchestrator = new BatchOrchestrator(converter);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should convert eligible files into the mirrored tree and skip the rest', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A', 'b/c.xls': 'C', 'b/d.txt': 'D' });

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.totalScanned).toBe(3);
    expect(summary.convertedCount).toBe(2);
    expect(summary.skippedCount).toBe(1);
    expect(summary.failedCount).toBe(0);
    expect(summary.convertedByFormat).toEqual({ doc: 1, xls: 1 });
    expect(outcomes(summary)).toEqual([
      ['a.doc', 'CONVERTED'],
      ['b/c.xls', 'CONVERTED'],
      ['b/d.txt', 'SKIPPED'],
    ]);
    expect(await readTree(destinationDir)).toEqual(['a.docx', 'b/c.xlsx']);
    expect(await fs.readFile(path.join(destinationDir, 'b', 'c.xlsx'), 'utf8')).toBe('converted:b/c.xls');
  });

  it('should record a failed conversion without affecting its siblings', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A', 'b/c.xls': 'C', 'b/d.txt': 'D' });
    converter.failures.set('a.doc', { kind: 'exit-code', reason: 'exit code 1: general error' });

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.convertedCount).toBe(1);
    expect(summary.failedCount).toBe(1);
    expect(summary.skippedCount).toBe(1);
    expect(summary.results[0]).toEqual(
      expect.objectContaining({
        outcome: 'FAILED',
        relativePath: 'a.doc',
        failureKind: 'exit-code',
        failureReason: 'exit code 1: general error',
      })
    );
    expect(await exists(path.join(destinationDir, 'a.docx'))).toBe(false);
    expect(await readTree(destinationDir)).toEqual(['b/c.xlsx']);
  });

  it('should keep discovery order whatever order jobs finish in', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A', 'b.doc': 'B', 'c.xls': 'C' });
    converter.delays.set('a.doc', 40);
    converter.delays.set('c.xls', 10);

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.results.map((result) => result.relativePath)).toEqual(['a.doc', 'b.doc', 'c.xls']);
  });

  it('should order results lexicographically by relative path', async () => {
    await writeTree(sourceDir, { 'z.doc': 'Z', 'B/x.doc': 'X', 'a/y.xls': 'Y', 'a.doc': 'A' });

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.results.map((result) => result.relativePath)).toEqual(['B/x.doc', 'a.doc', 'a/y.xls', 'z.doc']);
  });

  it('should produce the same summary when run twice', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A', 'b/c.xls': 'C', 'b/d.txt': 'D' });

    const first = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);
    const second = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(outcomes(second)).toEqual(outcomes(first));
    expect(second.convertedCount).toBe(first.convertedCount);
    expect(second.skippedCount).toBe(first.skippedCount);
    expect(second.failedCount).toBe(first.failedCount);
    expect(await readTree(destinationDir)).toEqual(['a.docx', 'b/c.xlsx']);
  });

  it('should match extensions case-insensitively and write lower-case targets', async () => {
    await writeTree(sourceDir, { 'REPORT.DOC': 'R', 'Budget.Xls': 'B' });

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.convertedCount).toBe(2);
    expect(await readTree(destinationDir)).toEqual(['Budget.xlsx', 'REPORT.docx']);
  });

  it('should walk hidden directories', async () => {
    await writeTree(sourceDir, { '.archive/old.doc': 'O' });

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.convertedCount).toBe(1);
    expect(await readTree(destinationDir)).toEqual(['.archive/old.docx']);
  });

  it('should neither follow nor count symbolic links', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A', 'outside/b.doc': 'B' });
    await fs.symlink(path.join(sourceDir, 'a.doc'), path.join(sourceDir, 'link.doc'));
    await fs.symlink(path.join(sourceDir, 'outside'), path.join(sourceDir, 'linked-dir'));

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.results.map((result) => result.relativePath)).toEqual(['a.doc', 'outside/b.doc']);
  });

  it('should not walk a destination nested inside the source', async () => {
    const nested = path.join(sourceDir, 'converted');
    await writeTree(sourceDir, { 'a.doc': 'A', 'converted/old.doc': 'O' });

    const first = await orchestrator.runBatch(sourceDir, nested, OPTIONS);
    const second = await orchestrator.runBatch(sourceDir, nested, OPTIONS);

    expect(first.results.map((result) => result.relativePath)).toEqual(['a.doc']);
    expect(second.totalScanned).toBe(1);
    expect(await readTree(nested)).toEqual(['a.docx', 'old.doc']);
  });

  it('should fail a second source that maps onto an already claimed destination', async () => {
    await writeTree(sourceDir, { 'a.DOC': 'upper', 'a.doc': 'lower' });

    const summary = await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.convertedCount).toBe(1);
    expect(summary.results[1]).toEqual(
      expect.objectContaining({
        outcome: 'FAILED',
        relativePath: 'a.doc',
        failureKind: 'io-error',
        failureReason: 'destination a.docx already produced by a.DOC',
      })
    );
    expect(converter.calls.map((job) => job.relativePath)).toEqual(['a.DOC']);
  });

  it('should return an empty summary for a tree without files', async () => {
    const summary = await orchestrator.runBatch(sourceDir, destinationDir, { ...OPTIONS, skipEmpty: true });

    expect(summary.totalScanned).toBe(0);
    expect(summary.results).toEqual([]);
    expect(await exists(destinationDir)).toBe(true);
  });

  it('should pass the timeout and correlation id to the invoker', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A' });

    await orchestrator.runBatch(sourceDir, destinationDir, OPTIONS);

    expect(converter.options).toEqual([{ timeout: 1000, correlationId: 'batch-test' }]);
    expect(converter.calls[0]).toEqual({
      sourcePath: path.join(sourceDir, 'a.doc'),
      relativePath: 'a.doc',
      destinationPath: path.join(destinationDir, 'a.docx'),
      sourceFormat: 'doc',
      targetFormat: 'docx',
    });
  });

  it('should record an invoker exception as an io error', async () => {
    await writeTree(sourceDir, { 'a.doc': 'A', 'b.doc': 'B' });
    const throwing: ConversionInvoker = {
      convert: async (job) => {
        if (job.relativePath === 'a.doc') {
          throw new Error('disk unavailable');
        }
        return converter.convert(job);
      },
    };

    const summary = await new BatchOrchestrator(throwing).runBatch(sourceDir, destinationDir, OPTIONS);

    expect(summary.results[0]).toEqual(
      expect.objectContaining({ outcome: 'FAILED', failureKind: 'io-error', failureReason: 'disk unavailable' })
    );
    expect(summary.results[1].outcome).toBe('CONVERTED');
  });

  it('should reject a missing source root', async () => {
    const missing = path.join(root, 'missing');

    await expect(orchestrator.runBatch(missing, destinationDir, OPTIONS)).rejects.toThrow(SourceDirectoryError);
    await expect(orchestrator.runBatch(missing, destinationDir, OPTIONS)).rejects.toThrow(
      `Source directory unavailable: ${missing} (not found)`
    );
    expect(await exists(destinationDir)).toBe(false);
  });

  it('should reject a source root that is a file', async () => {
    const file = path.join(root, 'file.doc');
    await fs.writeFile(file, 'not a folder');

    await expect(orchestrator.runBatch(file, destinationDir, OPTIONS)).rejects.toThrow(
      `Source directory unavailable: ${file} (not a directory)`
    );
  });
});

describe('summarize', () => {
  it('should count outcomes and keep the counts consistent', () => {
    const job = {
      sourcePath: '/src/a.doc',
      relativePath: 'a.doc',
      destinationPath: '/dst/a.docx',
      sourceFormat: 'doc' as const,
      targetFormat: 'docx' as const,
    };
    const startedAt = new Date('2024-01-01T00:00:00.000Z');
    const finishedAt = new Date('2024-01-01T00:00:02.500Z');

    const summary = summarize(
      '/src',
      '/dst',
      [
        { outcome: 'CONVERTED', sourcePath: '/src/a.doc', relativePath: 'a.doc', job, durationMs: 10 },
        {
          outcome: 'FAILED',
          sourcePath: '/src/a.doc',
          relativePath: 'a.doc',
          job,
          failureKind: 'timeout',
          failureReason: 'timeout',
          durationMs: 20,
        },
        {
          outcome: 'SKIPPED',
          sourcePath: '/src/n.txt',
          relativePath: 'n.txt',
          skipReason: 'unsupported extension',
          durationMs: 0,
        },
      ],
      startedAt,
      finishedAt
    );

    expect(summary).toEqual(
      expect.objectContaining({
        totalScanned: 3,
        convertedCount: 1,
        failedCount: 1,
        skippedCount: 1,
        convertedByFormat: { doc: 1, xls: 0 },
        startedAt: '2024-01-01T00:00:00.000Z',
        finishedAt: '2024-01-01T00:00:02.500Z',
        durationMs: 2500,
      })
    );
  });
});
