import type { Command } from 'commander';
import { countTokens } from '@codecorpus/repo';
import { eventBase, writeCountRecord } from '@codecorpus/shared';
import { createContext } from '../context';
import { countSummary } from '../output';
import type { CliEnvironment } from '../types';

interface CountCommandOptions {
  reposDir?: string;
  outputFile?: string;
}

export function registerCountCommand(program: Command, env: CliEnvironment) {
  program
    .command('count')
    .description('Count tokens and files in the acquired repositories independently of extraction')
    .option('--repos-dir <path>', 'Root of the acquired repositories')
    .option('--output-file <path>', 'Count record to write')
    .action(async (options: CountCommandOptions, command: Command) => {
      const ctx = createContext(command, env, {
        paths: { reposDir: options.reposDir, countsFile: options.outputFile },
      });
      const logger = ctx.logger.child({ stage: 'count' });
      const started = Date.now();
      await logger.log({
        ...eventBase(ctx.runId),
        type: 'StageStarted',
        payload: { stage: 'count', input: ctx.paths.reposDir, output: ctx.paths.countsFile },
      });

      let done = 0;
      const record = await countTokens({
        reposDir: ctx.paths.reposDir,
        extensions: ctx.config.extract.extensions,
        excludes: ctx.config.extract.excludes,
        maxFileSizeBytes: ctx.config.extract.maxFileSizeBytes,
        tokenizer: ctx.createTokenizer(),
        concurrency: ctx.config.extract.concurrency,
        logger,
        onProject: (name) => ctx.renderer.progress(`Counted ${name} (${++done})`),
      });
      await writeCountRecord(ctx.paths.countsFile, record);
      logger.info(`Wrote ${ctx.paths.countsFile}`);

      const durationMs = Date.now() - started;
      await logger.log({
        ...eventBase(ctx.runId),
        type: 'StageFinished',
        payload: {
          stage: 'count',
          durationMs,
          summary: {
            totalRepos: record.total_repos,
            totalFiles: record.total_files,
            totalTokens: record.total_tokens,
          },
        },
      });

      ctx.renderer.render('Count', record, countSummary(record, durationMs));
    });
}
