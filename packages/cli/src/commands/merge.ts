import type { Command } from 'commander';
import { mergeBatches } from '@codecorpus/core';
import { createContext } from '../context';
import { mergeProgressLine, mergeSummary } from '../output';
import type { CliEnvironment } from '../types';

interface MergeCommandOptions {
  chunksDir?: string;
  outputFile?: string;
}

export function registerMergeCommand(program: Command, env: CliEnvironment) {
  program
    .command('merge')
    .description('Merge metadata batches into the global index')
    .option('--chunks-dir <path>', 'Directory of batch files')
    .option('--output-file <path>', 'Global index to write')
    .action(async (options: MergeCommandOptions, command: Command) => {
      const ctx = createContext(command, env);

      const report = await mergeBatches({
        inputDir: options.chunksDir ? ctx.resolvePath(options.chunksDir) : ctx.paths.chunksDir,
        outputFile: options.outputFile ? ctx.resolvePath(options.outputFile) : ctx.paths.globalIndex,
        rowGroupSize: ctx.config.merge.rowGroupSize,
        onBatch: (progress) => ctx.renderer.progress(mergeProgressLine(progress)),
        logger: ctx.logger,
        runId: ctx.runId,
      });

      ctx.renderer.render('Merge', report, mergeSummary(report));
    });
}
