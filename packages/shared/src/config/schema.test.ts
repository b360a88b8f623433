import * as path from 'path';
import { PipelineConfigSchema, resolvePipelinePaths } from './schema';

describe('PipelineConfigSchema', () => {
  it('fills every default from an empty document', () => {
    const config = PipelineConfigSchema.parse({});
    expect(config.paths).toEqual({
      reposDir: 'cloned_repos',
      outputDir: 'dataset',
      countsFile: 'token_counts.json',
    });
    expect(config.extract).toEqual({
      extensions: ['.py'],
      excludes: [],
      maxFileSizeBytes: 5242880,
      batchSize: 10000,
      concurrency: 32,
    });
    expect(config.merge.rowGroupSize).toBe(100000);
    expect(config.shard).toEqual({
      targetBytes: 10737418240,
      minBytes: 5368709120,
      maxBytes: 21474836480,
      concurrency: 16,
      compressionLevel: 6,
    });
    expect(config.finalize.updateCounts).toBe(false);
    expect(config.tokenizer.encoding).toBe('cl100k_base');
  });

  it('keeps defaults for fields a section leaves out', () => {
    const config = PipelineConfigSchema.parse({ extract: { batchSize: 50 } });
    expect(config.extract.batchSize).toBe(50);
    expect(config.extract.extensions).toEqual(['.py']);
  });

  it('requires min <= target <= max shard bytes', () => {
    const result = PipelineConfigSchema.safeParse({
      shard: { minBytes: 10, targetBytes: 5, maxBytes: 20 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['shard', 'targetBytes']);
      expect(result.error.issues[0]?.message).toBe('expected minBytes <= targetBytes <= maxBytes');
    }
  });

  it('rejects extensions without a leading dot', () => {
    const result = PipelineConfigSchema.safeParse({ extract: { extensions: ['py'] } });
    expect(result.success).toBe(false);
  });

  it('rejects a non-positive batch size', () => {
    expect(PipelineConfigSchema.safeParse({ extract: { batchSize: 0 } }).success).toBe(false);
  });
});

describe('resolvePipelinePaths', () => {
  it('derives artifact locations under the output directory', () => {
    const cwd = path.resolve('/work');
    const paths = resolvePipelinePaths(
      PipelineConfigSchema.parse({ paths: { outputDir: 'out' } }),
      cwd,
    );
    expect(paths).toEqual({
      reposDir: path.join(cwd, 'cloned_repos'),
      outputDir: path.join(cwd, 'out'),
      countsFile: path.join(cwd, 'token_counts.json'),
      chunksDir: path.join(cwd, 'out', 'metadata_chunks'),
      globalIndex: path.join(cwd, 'out', 'global_index.parquet'),
      shardsDir: path.join(cwd, 'out', 'shards'),
      shardMetaDir: path.join(cwd, 'out', 'shard_metadata'),
      finalIndex: path.join(cwd, 'out', 'final_metadata.parquet'),
    });
  });

  it('keeps absolute paths as given', () => {
    const repos = path.resolve('/data/repos');
    const paths = resolvePipelinePaths(
      PipelineConfigSchema.parse({ paths: { reposDir: repos } }),
      path.resolve('/work'),
    );
    expect(paths.reposDir).toBe(repos);
  });
});
