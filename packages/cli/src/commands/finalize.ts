import type { Command } from 'commander';
import { finalizeMetadata } from '@codecorpus/core';
import { createContext } from '../context';
import { finalizeSummary } from '../output';
import type { CliEnvironment } from '../types';

interface FinalizeCommandOptions {
  shardMetaDir?: string;
  outputFile?: string;
  tokenCounts?: string;
  updateCounts?: boolean;
}

export function registerFinalizeCommand(program: Command, env: CliEnvironment) {
  program
    .command('finalize')
    .description('Combine shard metadata into the final index and verify it against the token counts')
    .option('--shard-meta-dir <path>', 'Directory of per-shard metadata')
    .option('--output-file <path>', 'Final index to write')
    .option('--token-counts <path>', 'Count record to verify against')
    .option('--update-counts', 'Rewrite the count record with the computed totals on mismatch')
    .action(async (options: FinalizeCommandOptions, command: Command) => {
      const ctx = createContext(command, env, {
        paths: { countsFile: options.tokenCounts },
        finalize: { updateCounts: options.updateCounts },
      });

      const report = await finalizeMetadata({
        inputDir: options.shardMetaDir ? ctx.resolvePath(options.shardMetaDir) : ctx.paths.shardMetaDir,
        outputFile: options.outputFile ? ctx.resolvePath(options.outputFile) : ctx.paths.finalIndex,
        countsFile: ctx.paths.countsFile,
        updateCounts: ctx.config.finalize.updateCounts,
        rowGroupSize: ctx.config.merge.rowGroupSize,
        logger: ctx.logger,
        runId: ctx.runId,
      });

      ctx.renderer.render('Finalize', report, finalizeSummary(report));
      ctx.renderer.verification(report.verification);
    });
}
