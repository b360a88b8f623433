import * as fs from 'fs/promises';
import * as path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { InputNotFoundError, writeIndexFile } from '@codecorpus/shared';
import {
  makeTempDir,
  readIndex,
  readTar,
  record,
  RecordingLogger,
  writeTree,
} from '../__fixtures__/tree';
import { ShardBuilder, type ShardBuildOptions } from './builder';

describe('ShardBuilder', () => {
  let root: string;
  let reposDir: string;
  let shardsDir: string;
  let shardMetaDir: string;
  let globalIndex: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    root = await makeTempDir('shard');
    reposDir = path.join(root, 'repos');
    shardsDir = path.join(root, 'shards');
    shardMetaDir = path.join(root, 'shard_metadata');
    globalIndex = path.join(root, 'global_index.parquet');
    logger = new RecordingLogger();

    await writeTree(reposDir, {
      'acme_app/a.py': 'aaaaaa',
      'acme_app/pkg/b.py': 'bbbbbb',
      'zed_tool/c.py': 'ccc',
    });
    await writeIndexFile(globalIndex, [
      record({ projectName: 'acme/app', filePath: 'a.py', size: 6 }),
      record({ projectName: 'acme/app', filePath: 'pkg/b.py', size: 6 }),
      record({ projectName: 'zed/tool', filePath: 'c.py', size: 3 }),
      record({ projectName: 'zed/tool', filePath: 'gone.py', size: 2 }),
    ]);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  function builder(overrides: Partial<ShardBuildOptions> = {}) {
    return new ShardBuilder({
      globalIndex,
      reposDir,
      shardsDir,
      shardMetaDir,
      targetBytes: 10,
      minBytes: 5,
      maxBytes: 20,
      maxFileSizeBytes: 1024,
      compressionLevel: 6,
      concurrency: 2,
      logger,
      runId: 'test-run',
      ...overrides,
    });
  }

  it('packs planned rows into archives with matching metadata', async () => {
    const report = await builder().run();

    expect(report).toMatchObject({
      planned: 2,
      created: 2,
      skipped: 0,
      failed: 0,
      filesPacked: 3,
      filesMissing: 1,
      filesOversized: 0,
      bytes: 15,
    });
    expect((await fs.readdir(shardsDir)).sort()).toEqual(['shard_00000.tar.gz', 'shard_00001.tar.gz']);

    const entries = await readTar(path.join(shardsDir, 'shard_00000.tar.gz'));
    expect(entries.map((e) => [e.name, e.content])).toEqual([
      ['acme/app/a.py', 'aaaaaa'],
      ['acme/app/pkg/b.py', 'bbbbbb'],
    ]);
    expect(entries[0]?.mode).toBe(0o644);
    expect(entries[0]?.mtime?.getTime()).toBe(0);

    expect(await readIndex(path.join(shardMetaDir, 'shard_00001_metadata.parquet'))).toEqual([
      record({ projectName: 'zed/tool', filePath: 'c.py', size: 3, shardId: '00001' }),
    ]);
    expect(logger.warnings).toEqual([
      `Shard 00001: source file missing: ${path.join(reposDir, 'zed_tool', 'gone.py')}`,
    ]);
  });

  it('leaves complete shards untouched on a re-run', async () => {
    await builder().run();
    const archive = path.join(shardsDir, 'shard_00000.tar.gz');
    const before = (await fs.stat(archive)).mtimeMs;

    const report = await builder().run();

    expect(report).toMatchObject({ planned: 2, created: 0, skipped: 2 });
    expect((await fs.stat(archive)).mtimeMs).toBe(before);
  });

  it('rebuilds a shard whose metadata is missing', async () => {
    await builder().run();
    await fs.rm(path.join(shardMetaDir, 'shard_00001_metadata.parquet'));

    const report = await builder().run();

    expect(report.shards.map((s) => [s.shardId, s.status])).toEqual([
      ['00000', 'skipped'],
      ['00001', 'created'],
    ]);
  });

  it('produces byte-identical archives from identical inputs', async () => {
    await builder().run();
    const first = await fs.readFile(path.join(shardsDir, 'shard_00000.tar.gz'));

    const otherShards = path.join(root, 'shards-again');
    await builder({ shardsDir: otherShards, shardMetaDir: path.join(root, 'meta-again') }).run();
    const second = await fs.readFile(path.join(otherShards, 'shard_00000.tar.gz'));

    expect(second.equals(first)).toBe(true);
  });

  it('leaves out files that grew past the size limit', async () => {
    const report = await builder({ maxFileSizeBytes: 5 }).run();

    expect(report.filesOversized).toBe(2);
    expect(report.shards[0]).toMatchObject({ status: 'created', files: 0, oversized: 2 });
    expect(await readIndex(path.join(shardMetaDir, 'shard_00000_metadata.parquet'))).toEqual([]);
  });

  it('records a failed shard and carries on with the rest', async () => {
    await fs.mkdir(path.join(shardsDir, 'shard_00000.tar.gz'), { recursive: true });

    const report = await builder().run();

    expect(report.shards.map((s) => s.status)).toEqual(['failed', 'created']);
    expect(report.failed).toBe(1);
    expect(await fs.readdir(shardMetaDir)).toEqual(['shard_00001_metadata.parquet']);
    expect(logger.eventTypes()).toContain('ShardFailed');
  });

  it('reads sources whose names contain a backslash', async () => {
    await writeTree(reposDir, { 'acme_app/a\\b.py': 'xy' });
    await writeIndexFile(globalIndex, [
      record({ projectName: 'acme/app', filePath: 'a.py', size: 6 }),
      record({ projectName: 'acme/app', filePath: 'a\\b.py', size: 2 }),
    ]);

    const report = await builder().run();

    expect(report.shards).toEqual([
      expect.objectContaining({ status: 'created', files: 2, missing: 0, unreadable: 0, bytes: 8 }),
    ]);
    expect(logger.warnings).toEqual([]);
    const entries = await readTar(path.join(shardsDir, 'shard_00000.tar.gz'));
    expect(entries.map((e) => e.content)).toEqual(['aaaaaa', 'xy']);
    const rows = await readIndex(path.join(shardMetaDir, 'shard_00000_metadata.parquet'));
    expect(rows.map((r) => r.filePath)).toEqual(['a.py', 'a\\b.py']);
  });

  it('skips an unreadable source and still creates the shard', async () => {
    const unreadable = path.join(reposDir, 'acme_app', 'pkg', 'b.py');
    const report = await builder({
      fs: {
        stat: (file) => fs.stat(file),
        readFile: async (file) => {
          if (file === unreadable) {
            throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
          }
          return fs.readFile(file);
        },
      },
    }).run();

    expect(report).toMatchObject({ created: 2, failed: 0, filesPacked: 2, filesUnreadable: 1 });
    expect(report.shards[0]).toMatchObject({ status: 'created', files: 1, unreadable: 1, bytes: 6 });
    expect(logger.warnings).toContain(
      `Shard 00000: cannot read ${unreadable}: EACCES: permission denied`,
    );
    const entries = await readTar(path.join(shardsDir, 'shard_00000.tar.gz'));
    expect(entries.map((e) => [e.name, e.content])).toEqual([['acme/app/a.py', 'aaaaaa']]);
    expect(await readIndex(path.join(shardMetaDir, 'shard_00000_metadata.parquet'))).toEqual([
      record({ projectName: 'acme/app', filePath: 'a.py', size: 6, shardId: '00000' }),
    ]);
  });

  it('counts a file that vanishes between stat and read as missing', async () => {
    const vanishing = path.join(reposDir, 'zed_tool', 'c.py');
    const report = await builder({
      fs: {
        stat: (file) => fs.stat(file),
        readFile: async (file) => {
          if (file === vanishing) {
            await fs.rm(file);
          }
          return fs.readFile(file);
        },
      },
    }).run();

    expect(report.shards[1]).toMatchObject({ status: 'created', files: 0, missing: 2, unreadable: 0 });
    expect(report.filesMissing).toBe(2);
    expect(logger.warnings).toContain(`Shard 00001: ${vanishing} disappeared while archiving`);
    expect(await readTar(path.join(shardsDir, 'shard_00001.tar.gz'))).toEqual([]);
    expect(await readIndex(path.join(shardMetaDir, 'shard_00001_metadata.parquet'))).toEqual([]);
  });

  it('builds no more shards at once than the concurrency allows', async () => {
    const names = Array.from({ length: 6 }, (_, i) => `f${i}.py`);
    await writeTree(
      reposDir,
      Object.fromEntries(names.map((name) => [`many_files/${name}`, '0123456789'])),
    );
    await writeIndexFile(
      globalIndex,
      names.map((name) => record({ projectName: 'many/files', filePath: name, size: 10 })),
    );

    const shardBuilder = builder({ concurrency: 2 });
    const build = shardBuilder.buildShard.bind(shardBuilder);
    let active = 0;
    let peak = 0;
    vi.spyOn(shardBuilder, 'buildShard').mockImplementation(async (plan, context) => {
      active++;
      peak = Math.max(peak, active);
      try {
        await sleep(20);
        return await build(plan, context);
      } finally {
        active--;
      }
    });

    const report = await shardBuilder.run();

    expect(report).toMatchObject({ planned: 6, created: 6, filesPacked: 6 });
    expect(peak).toBe(2);
  });

  it('fails when the global index is missing', async () => {
    await fs.rm(globalIndex);
    await expect(builder().run()).rejects.toBeInstanceOf(InputNotFoundError);
  });
});
