import * as path from 'path';
import { z } from 'zod';

const GiB = 1024 ** 3;

const positiveInt = z.number().int().positive();

export const PathsConfigSchema = z.object({
  /** Acquisition root: one directory per project */
  reposDir: z.string().min(1).default('cloned_repos'),
  /** Root of every dataset artifact */
  outputDir: z.string().min(1).default('dataset'),
  /** Independent count record used for verification */
  countsFile: z.string().min(1).default('token_counts.json'),
});

export const ExtractConfigSchema = z.object({
  extensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'expected an extension such as ".py"'))
    .min(1)
    .default(['.py']),
  /** gitignore-style patterns excluded in addition to `.git` */
  excludes: z.array(z.string()).default([]),
  maxFileSizeBytes: positiveInt.default(5 * 1024 * 1024),
  batchSize: positiveInt.default(10_000),
  concurrency: positiveInt.default(32),
});

export const MergeConfigSchema = z.object({
  rowGroupSize: positiveInt.default(100_000),
});

export const ShardConfigSchema = z
  .object({
    targetBytes: positiveInt.default(10 * GiB),
    minBytes: positiveInt.default(5 * GiB),
    maxBytes: positiveInt.default(20 * GiB),
    concurrency: positiveInt.default(16),
    compressionLevel: z.number().int().min(0).max(9).default(6),
  })
  .refine((shard) => shard.minBytes <= shard.targetBytes && shard.targetBytes <= shard.maxBytes, {
    message: 'expected minBytes <= targetBytes <= maxBytes',
    path: ['targetBytes'],
  });

export const FinalizeConfigSchema = z.object({
  /** Overwrite the count record with computed totals when verification mismatches */
  updateCounts: z.boolean().default(false),
});

export const TokenizerConfigSchema = z.object({
  encoding: z.enum(['cl100k_base', 'o200k_base', 'p50k_base', 'r50k_base']).default('cl100k_base'),
});

export const PipelineConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  paths: PathsConfigSchema.default({}),
  extract: ExtractConfigSchema.default({}),
  merge: MergeConfigSchema.default({}),
  shard: ShardConfigSchema.default({}),
  finalize: FinalizeConfigSchema.default({}),
  tokenizer: TokenizerConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type ExtractConfig = z.infer<typeof ExtractConfigSchema>;
export type ShardConfig = z.infer<typeof ShardConfigSchema>;
export type TokenizerEncoding = z.infer<typeof TokenizerConfigSchema>['encoding'];

export interface PipelinePaths {
  reposDir: string;
  outputDir: string;
  countsFile: string;
  chunksDir: string;
  globalIndex: string;
  shardsDir: string;
  shardMetaDir: string;
  finalIndex: string;
}

/**
 * Resolves configured and derived artifact locations to absolute paths.
 */
export function resolvePipelinePaths(config: PipelineConfig, cwd: string = process.cwd()): PipelinePaths {
  const outputDir = path.resolve(cwd, config.paths.outputDir);
  return {
    reposDir: path.resolve(cwd, config.paths.reposDir),
    outputDir,
    countsFile: path.resolve(cwd, config.paths.countsFile),
    chunksDir: path.join(outputDir, 'metadata_chunks'),
    globalIndex: path.join(outputDir, 'global_index.parquet'),
    shardsDir: path.join(outputDir, 'shards'),
    shardMetaDir: path.join(outputDir, 'shard_metadata'),
    finalIndex: path.join(outputDir, 'final_metadata.parquet'),
  };
}
