import path from 'node:path';
import type { Command } from 'commander';
import { ConfigLoader } from '@codecorpus/core';
import { TiktokenTokenizer, type Tokenizer } from '@codecorpus/repo';
import {
  ConsoleLogger,
  JsonlLogger,
  resolvePipelinePaths,
  type Logger,
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelinePaths,
} from '@codecorpus/shared';
import { OutputRenderer } from './output';
import type { CliEnvironment, GlobalOptions } from './types';

export interface CommandContext {
  options: GlobalOptions;
  config: PipelineConfig;
  paths: PipelinePaths;
  logger: Logger;
  renderer: OutputRenderer;
  runId: string;
  /** Resolves a path flag against the working directory */
  resolvePath(value: string): string;
  createTokenizer(): Tokenizer;
}

/**
 * Loads configuration for a subcommand, with `flags` as the highest-precedence
 * layer, and builds the logger and renderer the global options ask for.
 */
export function createContext(
  command: Command,
  env: CliEnvironment,
  flags: PipelineConfigInput = {},
): CommandContext {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = ConfigLoader.load({
    configPath: options.config ? path.resolve(env.cwd, options.config) : undefined,
    flags,
    cwd: env.cwd,
    homeDir: env.homeDir,
  });

  const loggerOptions = { verbose: !!options.verbose, quiet: !!options.json };
  const logger: Logger = options.events
    ? new JsonlLogger(path.resolve(env.cwd, options.events), {}, loggerOptions)
    : new ConsoleLogger(loggerOptions);

  return {
    options,
    config,
    paths: resolvePipelinePaths(config, env.cwd),
    logger,
    renderer: new OutputRenderer(!!options.json),
    runId: Date.now().toString(),
    resolvePath: (value) => path.resolve(env.cwd, value),
    createTokenizer: () => new TiktokenTokenizer(config.tokenizer.encoding),
  };
}
