/**
 * Error codes used throughout the pipeline.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'InputNotFoundError'
  | 'OutputError'
  | 'SchemaError'
  | 'ShardError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all pipeline errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('OutputError', 'Cannot open global index for writing', {
 *   cause: originalError,
 *   details: { path: '/data/global_index.parquet' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a stage's required input path does not exist.
 */
export class InputNotFoundError extends AppError {
  /** The missing path */
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('InputNotFoundError', `Input path does not exist: ${path}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when a stage cannot open or commit its own output.
 */
export class OutputError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('OutputError', message, options);
  }
}

/**
 * Error thrown when a columnar file does not match any known layout,
 * or its rows cannot be cast to the canonical types.
 */
export class SchemaError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SchemaError', message, options);
  }
}

/**
 * Error thrown when a single shard cannot be built.
 */
export class ShardError extends AppError {
  /** Sequence number of the failed shard */
  public readonly shardId: string;

  constructor(shardId: string, message: string, options: AppErrorOptions = {}) {
    super('ShardError', `Shard ${shardId}: ${message}`, options);
    this.shardId = shardId;
  }
}

/**
 * Exit code for an error reaching the top of the CLI.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * True for the error fs raises when a path does not exist.
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
