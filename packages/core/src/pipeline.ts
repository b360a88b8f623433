import type { PipelineConfig, PipelinePaths, StageName } from '@codecorpus/shared';
import type { Tokenizer } from '@codecorpus/repo';
import { MetadataExtractor, type ExtractProgress, type ExtractReport } from './extract';
import { mergeBatches, type MergeProgress, type MergeReport } from './merge';
import { ShardBuilder, type ShardReport, type ShardResult } from './shard';
import { finalizeMetadata, type FinalizeReport } from './finalize';
import type { StageOptions } from './stage';

export interface PipelineOptions extends StageOptions {
  config: PipelineConfig;
  paths: PipelinePaths;
  tokenizer: Tokenizer;
  /** Restart extraction instead of resuming it */
  force?: boolean;
  onStage?: (stage: StageName) => void;
  onExtractProgress?: (progress: ExtractProgress) => void;
  onMergeProgress?: (progress: MergeProgress) => void;
  onShard?: (result: ShardResult) => void;
}

export interface PipelineReport {
  extract: ExtractReport;
  merge: MergeReport;
  shard: ShardReport;
  finalize: FinalizeReport;
}

/**
 * Runs extract, merge, shard and finalize in sequence over the configured paths.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineReport> {
  const { config, paths, logger } = options;
  const runId = options.runId || Date.now().toString();

  options.onStage?.('extract');
  const extract = await new MetadataExtractor({
    reposDir: paths.reposDir,
    outputDir: paths.chunksDir,
    tokenizer: options.tokenizer,
    extensions: config.extract.extensions,
    excludes: config.extract.excludes,
    maxFileSizeBytes: config.extract.maxFileSizeBytes,
    batchSize: config.extract.batchSize,
    concurrency: config.extract.concurrency,
    force: options.force,
    onProgress: options.onExtractProgress,
    logger,
    runId,
  }).run();

  options.onStage?.('merge');
  const merge = await mergeBatches({
    inputDir: paths.chunksDir,
    outputFile: paths.globalIndex,
    rowGroupSize: config.merge.rowGroupSize,
    onBatch: options.onMergeProgress,
    logger,
    runId,
  });

  options.onStage?.('shard');
  const shard = await new ShardBuilder({
    globalIndex: paths.globalIndex,
    reposDir: paths.reposDir,
    shardsDir: paths.shardsDir,
    shardMetaDir: paths.shardMetaDir,
    targetBytes: config.shard.targetBytes,
    minBytes: config.shard.minBytes,
    maxBytes: config.shard.maxBytes,
    maxFileSizeBytes: config.extract.maxFileSizeBytes,
    compressionLevel: config.shard.compressionLevel,
    concurrency: config.shard.concurrency,
    onShard: options.onShard,
    logger,
    runId,
  }).run();

  options.onStage?.('finalize');
  const finalize = await finalizeMetadata({
    inputDir: paths.shardMetaDir,
    outputFile: paths.finalIndex,
    countsFile: paths.countsFile,
    updateCounts: config.finalize.updateCounts,
    rowGroupSize: config.merge.rowGroupSize,
    logger,
    runId,
  });

  return { extract, merge, shard, finalize };
}
