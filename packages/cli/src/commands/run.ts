import type { Command } from 'commander';
import { runPipeline } from '@codecorpus/core';
import { createContext } from '../context';
import {
  extractProgressLine,
  extractSummary,
  finalizeSummary,
  mergeProgressLine,
  mergeSummary,
  shardProgressLine,
  shardSummary,
} from '../output';
import type { CliEnvironment } from '../types';

interface RunCommandOptions {
  reposDir?: string;
  outputDir?: string;
  force?: boolean;
}

export function registerRunCommand(program: Command, env: CliEnvironment) {
  program
    .command('run')
    .description('Run extract, merge, shard and finalize in sequence')
    .option('--repos-dir <path>', 'Root of the acquired repositories')
    .option('--output-dir <path>', 'Dataset root for every stage output')
    .option('--force', 'Restart extraction instead of resuming it', false)
    .action(async (options: RunCommandOptions, command: Command) => {
      const ctx = createContext(command, env, {
        paths: { reposDir: options.reposDir, outputDir: options.outputDir },
      });
      const { renderer } = ctx;

      const report = await runPipeline({
        config: ctx.config,
        paths: ctx.paths,
        tokenizer: ctx.createTokenizer(),
        force: options.force,
        onStage: (stage) => renderer.progress(`== ${stage} ==`),
        onExtractProgress: (progress) => renderer.progress(extractProgressLine(progress)),
        onMergeProgress: (progress) => renderer.progress(mergeProgressLine(progress)),
        onShard: (result) => renderer.progress(shardProgressLine(result)),
        logger: ctx.logger,
        runId: ctx.runId,
      });

      if (renderer.json) {
        renderer.render('Pipeline', report, []);
        return;
      }
      renderer.table('Extract', extractSummary(report.extract));
      renderer.table('Merge', mergeSummary(report.merge));
      renderer.table('Shard', shardSummary(report.shard));
      renderer.table('Finalize', finalizeSummary(report.finalize));
      renderer.verification(report.finalize.verification);
    });
}
