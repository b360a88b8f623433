import { promises as fs } from 'fs';
import path from 'path';
import pMap from 'p-map';
import {
  eventBase,
  IndexReader,
  InputNotFoundError,
  isFileNotFound,
  pathExists,
  remove,
  ShardError,
  toError,
  writeIndexFile,
  type FileRecord,
  type Logger,
} from '@codecorpus/shared';
import { escapeProjectName } from '@codecorpus/repo';
import { resolveStageContext, type StageContext, type StageOptions } from '../stage';
import { TarGzWriter } from './archive';
import { planShards, type ShardLimits, type ShardPlan } from './planner';

export interface ShardBuildOptions extends StageOptions, ShardLimits {
  globalIndex: string;
  reposDir: string;
  shardsDir: string;
  shardMetaDir: string;
  /** Files that grew beyond this since extraction are left out */
  maxFileSizeBytes: number;
  compressionLevel: number;
  concurrency?: number;
  onShard?: (result: ShardResult) => void;
  /** Where source files are read from; defaults to the real filesystem */
  fs?: ShardSourceFs;
}

export interface ShardSourceFs {
  stat(path: string): Promise<{ size: number }>;
  readFile(path: string): Promise<Buffer>;
}

export type ShardStatus = 'created' | 'skipped' | 'failed';

export type ShardResult = {
  shardId: string;
  status: ShardStatus;
  planned: number;
  files: number;
  missing: number;
  oversized: number;
  /** Files present on disk that could not be read */
  unreadable: number;
  /** Source bytes of the packed files */
  bytes: number;
  archiveBytes: number;
  error?: string;
};

export type ShardReport = {
  planned: number;
  created: number;
  skipped: number;
  failed: number;
  filesPacked: number;
  filesMissing: number;
  filesOversized: number;
  filesUnreadable: number;
  bytes: number;
  archiveBytes: number;
  shards: ShardResult[];
  durationMs: number;
};

export function shardArchiveName(shardId: string): string {
  return `shard_${shardId}.tar.gz`;
}

export function shardMetadataName(shardId: string): string {
  return `shard_${shardId}_metadata.parquet`;
}

/**
 * Packs the files referenced by the global index into size-bounded tar.gz
 * shards, each with a metadata file listing exactly the files it holds.
 * Shards whose archive and metadata already exist are left untouched.
 */
export class ShardBuilder {
  constructor(private readonly options: ShardBuildOptions) {}

  async run(): Promise<ShardReport> {
    const started = Date.now();
    const context = resolveStageContext('shard', this.options);
    const { logger, runId } = context;
    const { globalIndex, shardsDir, shardMetaDir } = this.options;

    if (!(await pathExists(globalIndex))) {
      throw new InputNotFoundError(globalIndex);
    }
    const reader = await IndexReader.open(globalIndex);
    await fs.mkdir(shardsDir, { recursive: true });
    await fs.mkdir(shardMetaDir, { recursive: true });
    await logger.log({
      ...eventBase(runId),
      type: 'StageStarted',
      payload: { stage: 'shard', input: globalIndex, output: shardsDir },
    });
    logger.info(`Planning shards over ${reader.numRows} indexed files`);

    // p-map pulls the next plan only when a worker is free
    const shards = await pMap(
      planShards(reader.records(), this.options),
      (plan) => this.buildShard(plan, context),
      { concurrency: this.options.concurrency ?? 16 },
    );

    const report: ShardReport = {
      planned: shards.length,
      created: 0,
      skipped: 0,
      failed: 0,
      filesPacked: 0,
      filesMissing: 0,
      filesOversized: 0,
      filesUnreadable: 0,
      bytes: 0,
      archiveBytes: 0,
      shards,
      durationMs: Date.now() - started,
    };
    for (const shard of shards) {
      report[shard.status]++;
      report.filesPacked += shard.files;
      report.filesMissing += shard.missing;
      report.filesOversized += shard.oversized;
      report.filesUnreadable += shard.unreadable;
      report.bytes += shard.bytes;
      report.archiveBytes += shard.archiveBytes;
    }

    const { shards: _perShard, ...summary } = report;
    await logger.log({
      ...eventBase(runId),
      type: 'StageFinished',
      payload: { stage: 'shard', durationMs: report.durationMs, summary },
    });
    return report;
  }

  /** Builds one planned shard; failures are reported in the result, never thrown. */
  async buildShard(plan: ShardPlan, { logger, runId }: StageContext): Promise<ShardResult> {
    const { shardId } = plan;
    const archivePath = path.join(this.options.shardsDir, shardArchiveName(shardId));
    const metadataPath = path.join(this.options.shardMetaDir, shardMetadataName(shardId));
    const result: ShardResult = {
      shardId,
      status: 'skipped',
      planned: plan.records.length,
      files: 0,
      missing: 0,
      oversized: 0,
      unreadable: 0,
      bytes: 0,
      archiveBytes: 0,
    };

    if ((await pathExists(archivePath)) && (await pathExists(metadataPath))) {
      logger.debug(`Shard ${shardId} already exists`);
      await logger.log({ ...eventBase(runId), type: 'ShardSkipped', payload: { shardId } });
      this.options.onShard?.(result);
      return result;
    }

    const writer = new TarGzWriter(archivePath, {
      compressionLevel: this.options.compressionLevel,
    });
    try {
      const rows: FileRecord[] = [];
      for (const record of plan.records) {
        const content = await this.readSource(shardId, record, result, logger);
        if (content === undefined) continue;
        await writer.add(`${record.projectName}/${record.filePath}`, content);
        rows.push({ ...record, shardId });
      }
      result.archiveBytes = await writer.finish();
      await writeIndexFile(metadataPath, rows);

      result.status = 'created';
      result.files = rows.length;
      result.bytes = rows.reduce((sum, row) => sum + row.size, 0);
      await logger.log({
        ...eventBase(runId),
        type: 'ShardCreated',
        payload: {
          shardId,
          files: result.files,
          bytes: result.bytes,
          archiveBytes: result.archiveBytes,
          missing: result.missing,
        },
      });
    } catch (cause) {
      writer.abort();
      await remove(archivePath);
      const error = new ShardError(shardId, 'archive could not be completed', { cause });
      result.status = 'failed';
      result.archiveBytes = 0;
      result.error = cause instanceof Error ? cause.message : String(cause);
      logger.warn(`${error.message}: ${result.error}`);
      await logger.log({
        ...eventBase(runId),
        type: 'ShardFailed',
        payload: { shardId, error: result.error },
      });
    }

    this.options.onShard?.(result);
    return result;
  }

  /**
   * Reads one row's source file. Missing, oversized and unreadable files are
   * counted on `result` and give undefined.
   */
  private async readSource(
    shardId: string,
    record: FileRecord,
    result: ShardResult,
    logger: Logger,
  ): Promise<Buffer | undefined> {
    const sourceFs: ShardSourceFs = this.options.fs ?? fs;
    const sourcePath = path.join(
      this.options.reposDir,
      escapeProjectName(record.projectName),
      record.filePath,
    );

    let size: number;
    try {
      size = (await sourceFs.stat(sourcePath)).size;
    } catch (error) {
      if (isFileNotFound(error)) {
        result.missing++;
        logger.warn(`Shard ${shardId}: source file missing: ${sourcePath}`);
      } else {
        result.unreadable++;
        logger.warn(`Shard ${shardId}: cannot read ${sourcePath}: ${toError(error).message}`);
      }
      return undefined;
    }
    if (size > this.options.maxFileSizeBytes) {
      result.oversized++;
      logger.warn(`Shard ${shardId}: ${sourcePath} is now ${size} bytes, over the limit`);
      return undefined;
    }

    try {
      return await sourceFs.readFile(sourcePath);
    } catch (error) {
      if (isFileNotFound(error)) {
        result.missing++;
        logger.warn(`Shard ${shardId}: ${sourcePath} disappeared while archiving`);
      } else {
        result.unreadable++;
        logger.warn(`Shard ${shardId}: cannot read ${sourcePath}: ${toError(error).message}`);
      }
      return undefined;
    }
  }
}
