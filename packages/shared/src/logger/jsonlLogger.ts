import * as fs from 'fs/promises';
import type { PipelineEvent } from '../types/events';
import { formatBindings, type Logger, type LoggerOptions } from './types';

/**
 * Appends events to a JSONL file; human-readable messages still go to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: LoggerOptions = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
  }

  async log(event: PipelineEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // An unwritable event log must not fail the stage.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    if (this.verbose && !this.quiet) {
      console.debug(formatBindings(this.bindings, message));
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.info(formatBindings(this.bindings, message));
    }
  }

  warn(message: string): void {
    console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, {
      verbose: this.verbose,
      quiet: this.quiet,
    });
  }
}
