import type { Command } from 'commander';
import { ShardBuilder } from '@codecorpus/core';
import { createContext } from '../context';
import { shardProgressLine, shardSummary } from '../output';
import type { CliEnvironment } from '../types';

interface ShardCommandOptions {
  globalIndex?: string;
  shardsDir?: string;
  shardMetaDir?: string;
  reposDir?: string;
}

export function registerShardCommand(program: Command, env: CliEnvironment) {
  program
    .command('shard')
    .description('Pack the files of the global index into size-bounded tar.gz shards')
    .option('--global-index <path>', 'Global index to read')
    .option('--shards-dir <path>', 'Directory for shard archives')
    .option('--shard-meta-dir <path>', 'Directory for per-shard metadata')
    .option('--repos-dir <path>', 'Root of the acquired repositories')
    .action(async (options: ShardCommandOptions, command: Command) => {
      const ctx = createContext(command, env, { paths: { reposDir: options.reposDir } });
      const { paths, config } = ctx;

      const report = await new ShardBuilder({
        globalIndex: options.globalIndex ? ctx.resolvePath(options.globalIndex) : paths.globalIndex,
        reposDir: paths.reposDir,
        shardsDir: options.shardsDir ? ctx.resolvePath(options.shardsDir) : paths.shardsDir,
        shardMetaDir: options.shardMetaDir ? ctx.resolvePath(options.shardMetaDir) : paths.shardMetaDir,
        targetBytes: config.shard.targetBytes,
        minBytes: config.shard.minBytes,
        maxBytes: config.shard.maxBytes,
        maxFileSizeBytes: config.extract.maxFileSizeBytes,
        compressionLevel: config.shard.compressionLevel,
        concurrency: config.shard.concurrency,
        onShard: (result) => ctx.renderer.progress(shardProgressLine(result)),
        logger: ctx.logger,
        runId: ctx.runId,
      }).run();

      ctx.renderer.render('Shard', report, shardSummary(report));
    });
}
