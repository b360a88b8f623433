import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, InputNotFoundError } from '@codecorpus/shared';
import {
  makeTempDir,
  readIndex,
  RecordingLogger,
  wordTokenizer,
  writeTree,
} from '../__fixtures__/tree';
import { readCheckpoint, writeCheckpoint } from './checkpoint';
import { MetadataExtractor, type ExtractOptions } from './extractor';

const sha256 = (content: string) => createHash('sha256').update(content).digest('hex');

describe('MetadataExtractor', () => {
  let root: string;
  let reposDir: string;
  let outputDir: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    root = await makeTempDir('extract');
    reposDir = path.join(root, 'repos');
    outputDir = path.join(root, 'chunks');
    logger = new RecordingLogger();
    await writeTree(reposDir, {
      'acme_app/main.py': 'import os\nos.exit()',
      'acme_app/lib/util.py': 'x = 1',
      'acme_app/README.md': 'docs are not extracted',
      'acme_app/bad.py': Buffer.from([0x61, 0xff, 0xfe]),
      'acme_app/big.py': 'x '.repeat(50),
      'acme_app/data.py': Buffer.from([0x61, 0x00, 0x62]),
      'acme_app/.git/hooks/hook.py': 'never read',
      'zed_tool/tool.py': 'print()',
      '.trash/old.py': 'not a project',
    });
    await fs.mkdir(path.join(reposDir, 'octo_empty'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function extractor(overrides: Partial<ExtractOptions> = {}) {
    return new MetadataExtractor({
      reposDir,
      outputDir,
      tokenizer: wordTokenizer,
      extensions: ['.py'],
      maxFileSizeBytes: 64,
      batchSize: 2,
      concurrency: 2,
      logger,
      runId: 'test-run',
      ...overrides,
    });
  }

  it('writes fixed-size batches in project and path order', async () => {
    const report = await extractor().run();

    expect((await fs.readdir(outputDir)).sort()).toEqual([
      'batch_000000.parquet',
      'batch_000001.parquet',
      'extract_progress.json',
    ]);
    expect(await readIndex(path.join(outputDir, 'batch_000000.parquet'))).toEqual([
      {
        projectName: 'acme/app',
        filePath: 'lib/util.py',
        tokens: 3,
        size: 5,
        sha256: sha256('x = 1'),
        shardId: null,
      },
      {
        projectName: 'acme/app',
        filePath: 'main.py',
        tokens: 3,
        size: 19,
        sha256: sha256('import os\nos.exit()'),
        shardId: null,
      },
    ]);
    expect(await readIndex(path.join(outputDir, 'batch_000001.parquet'))).toEqual([
      {
        projectName: 'zed/tool',
        filePath: 'tool.py',
        tokens: 1,
        size: 7,
        sha256: sha256('print()'),
        shardId: null,
      },
    ]);

    expect(report).toMatchObject({
      projects: 3,
      projectsProcessed: 3,
      projectsFailed: 0,
      filesSeen: 6,
      records: 3,
      skipped: { 'too-large': 1, 'null-byte': 1, 'invalid-utf8': 1, unreadable: 0 },
      batchesWritten: 2,
      totalBatches: 2,
      totalRows: 3,
      bytes: 31,
      tokens: 7,
      resumed: false,
      alreadyComplete: false,
    });
    expect(await readCheckpoint(outputDir)).toEqual({
      batchSize: 2,
      batchesWritten: 2,
      rowsWritten: 3,
      projectsCompleted: 3,
      filesIntoProject: 0,
      complete: true,
    });
    expect(logger.eventTypes()).toEqual([
      'StageStarted',
      'BatchWritten',
      'BatchWritten',
      'StageFinished',
    ]);
  });

  it('does nothing when a complete checkpoint exists', async () => {
    await extractor().run();
    const before = await fs.stat(path.join(outputDir, 'batch_000000.parquet'));

    const report = await extractor().run();

    expect(report.alreadyComplete).toBe(true);
    expect(report.batchesWritten).toBe(0);
    expect(report.totalRows).toBe(3);
    const after = await fs.stat(path.join(outputDir, 'batch_000000.parquet'));
    expect(after.mtimeMs).toBe(before.mtimeMs);
  });

  it('resumes after the last flushed batch', async () => {
    await extractor().run();
    const expected = await readIndex(path.join(outputDir, 'batch_000001.parquet'));

    // State after the first batch: acme_app's five .py files are covered.
    await fs.rm(path.join(outputDir, 'batch_000001.parquet'));
    await writeCheckpoint(outputDir, {
      batchSize: 2,
      batchesWritten: 1,
      rowsWritten: 2,
      projectsCompleted: 0,
      filesIntoProject: 5,
      complete: false,
    });

    const report = await extractor().run();

    expect(report).toMatchObject({
      resumed: true,
      records: 1,
      batchesWritten: 1,
      totalBatches: 2,
      totalRows: 3,
    });
    expect(await readIndex(path.join(outputDir, 'batch_000001.parquet'))).toEqual(expected);
    expect((await readCheckpoint(outputDir))?.complete).toBe(true);
  });

  it('rejects a checkpoint written with another batch size', async () => {
    await extractor().run();
    await expect(extractor({ batchSize: 5 }).run()).rejects.toBeInstanceOf(ConfigError);
  });

  it('starts over with force', async () => {
    await extractor().run();
    await fs.writeFile(path.join(outputDir, 'batch_000007.parquet'), 'stale');

    const report = await extractor({ force: true, batchSize: 10 }).run();

    expect(report.resumed).toBe(false);
    expect(report.batchesWritten).toBe(1);
    expect((await fs.readdir(outputDir)).sort()).toEqual(['batch_000000.parquet', 'extract_progress.json']);
    expect(await readIndex(path.join(outputDir, 'batch_000000.parquet'))).toHaveLength(3);
  });

  it('produces identical batches on repeated runs', async () => {
    await extractor().run();
    const first = await fs.readFile(path.join(outputDir, 'batch_000000.parquet'));

    await extractor({ force: true, concurrency: 1 }).run();
    const second = await fs.readFile(path.join(outputDir, 'batch_000000.parquet'));

    expect(second.equals(first)).toBe(true);
  });

  it('reports progress once per project', async () => {
    const seen: number[] = [];
    await extractor({ onProgress: (p) => seen.push(p.projectsDone) }).run();
    expect(seen).toEqual([1, 2, 3]);
  });

  it('writes only a checkpoint for a tree without matching files', async () => {
    const report = await extractor({ extensions: ['.rs'] }).run();
    expect(report.records).toBe(0);
    expect((await fs.readdir(outputDir)).sort()).toEqual(['extract_progress.json']);
  });

  it('fails when the repositories directory is missing', async () => {
    await expect(
      extractor({ reposDir: path.join(root, 'absent') }).run(),
    ).rejects.toBeInstanceOf(InputNotFoundError);
  });
});
