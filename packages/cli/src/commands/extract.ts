import type { Command } from 'commander';
import { MetadataExtractor } from '@codecorpus/core';
import { createContext } from '../context';
import { extractProgressLine, extractSummary } from '../output';
import type { CliEnvironment } from '../types';

interface ExtractCommandOptions {
  reposDir?: string;
  outputDir?: string;
  force?: boolean;
}

export function registerExtractCommand(program: Command, env: CliEnvironment) {
  program
    .command('extract')
    .description('Extract per-file metadata from the acquired repositories into batch files')
    .option('--repos-dir <path>', 'Root of the acquired repositories')
    .option('--output-dir <path>', 'Directory for batch files (default: <outputDir>/metadata_chunks)')
    .option('--force', 'Discard existing batches and start over', false)
    .action(async (options: ExtractCommandOptions, command: Command) => {
      const ctx = createContext(command, env, { paths: { reposDir: options.reposDir } });
      const outputDir = options.outputDir ? ctx.resolvePath(options.outputDir) : ctx.paths.chunksDir;

      const report = await new MetadataExtractor({
        reposDir: ctx.paths.reposDir,
        outputDir,
        tokenizer: ctx.createTokenizer(),
        extensions: ctx.config.extract.extensions,
        excludes: ctx.config.extract.excludes,
        maxFileSizeBytes: ctx.config.extract.maxFileSizeBytes,
        batchSize: ctx.config.extract.batchSize,
        concurrency: ctx.config.extract.concurrency,
        force: options.force,
        onProgress: (progress) => ctx.renderer.progress(extractProgressLine(progress)),
        logger: ctx.logger,
        runId: ctx.runId,
      }).run();

      ctx.renderer.render('Extract', report, extractSummary(report));
    });
}
