import type { PipelineEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout the pipeline.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase(runId), type: 'ShardCreated', payload: { ... } });
 *
 * // Standard logging
 * logger.info('Merged 12 batches');
 * logger.error(new Error('Failed'), 'Shard 3 failed');
 *
 * // Create a child logger with additional context
 * const shardLogger = logger.child({ stage: 'shard' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured pipeline event.
   * @param event - The event to log
   */
  log(event: PipelineEvent): MaybePromise<void>;

  /** Log a debug message (only shown with --verbose on the console) */
  debug(message: string): void;

  /** Log an informational message */
  info(message: string): void;

  /** Log a warning message */
  warn(message: string): void;

  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Drop info and debug messages; warnings and errors still reach stderr */
  quiet?: boolean;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
