import type { PipelineEvent } from '../types/events';
import { formatBindings, type Logger, type LoggerOptions } from './types';

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
  }

  log(event: PipelineEvent): void {
    if (this.verbose) {
      console.debug(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.verbose && !this.quiet) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.info(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PipelineEvent): void | Promise<void> {
    return this.base.log(event);
  }

  debug(message: string): void {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
