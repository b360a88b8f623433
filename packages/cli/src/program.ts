import { readFileSync } from 'node:fs';
import os from 'node:os';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { AppError, exitCodeFor } from '@codecorpus/shared';
import { registerExtractCommand } from './commands/extract';
import { registerMergeCommand } from './commands/merge';
import { registerShardCommand } from './commands/shard';
import { registerFinalizeCommand } from './commands/finalize';
import { registerCountCommand } from './commands/count';
import { registerRunCommand } from './commands/run';
import type { CliEnvironment, GlobalOptions } from './types';

export const name = '@codecorpus/cli';

const PackageManifestSchema = z.object({ version: z.string() });

function readVersion(): string {
  const manifest = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  return PackageManifestSchema.parse(JSON.parse(manifest)).version;
}

export function createProgram(env: CliEnvironment = { cwd: process.cwd(), homeDir: os.homedir() }) {
  const program = new Command();

  program
    .name('codecorpus')
    .description('Build a sharded code dataset from a tree of acquired repositories')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--events <path>', 'Append pipeline events to a JSONL file')
    .exitOverride();

  registerExtractCommand(program, env);
  registerMergeCommand(program, env);
  registerShardCommand(program, env);
  registerFinalizeCommand(program, env);
  registerCountCommand(program, env);
  registerRunCommand(program, env);

  return program;
}

/**
 * Writes a fatal error the way the global options ask for and returns the
 * process exit code.
 */
export function reportError(error: unknown, opts: GlobalOptions): number {
  if (opts.json) {
    if (error instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: error.code,
            message: error.message,
            details: error.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: error instanceof Error ? error.message : String(error),
          },
        }),
      );
    }
  } else {
    console.error(`❌ Error: ${(error instanceof Error && error.message) || String(error)}`);
    if (error instanceof AppError && error.details) {
      console.error(
        `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
      );
    }
    if (opts.verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }
  return exitCodeFor(error);
}

export async function main(argv: string[] = process.argv, env?: CliEnvironment): Promise<number> {
  const program = createProgram(env);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed its own output.
      return e.exitCode === 0 ? 0 : 2;
    }
    return reportError(e, program.opts<GlobalOptions>());
  }
}
