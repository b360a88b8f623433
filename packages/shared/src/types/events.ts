/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the CLI invocation that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export type StageName = 'extract' | 'merge' | 'shard' | 'finalize' | 'count';

/** Emitted when a stage starts consuming its input */
export interface StageStarted extends BaseEvent {
  type: 'StageStarted';
  payload: {
    stage: StageName;
    input: string;
    output: string;
  };
}

/** Emitted when a stage finishes, with the stage's report */
export interface StageFinished extends BaseEvent {
  type: 'StageFinished';
  payload: {
    stage: StageName;
    durationMs: number;
    summary: Record<string, unknown>;
  };
}

/** Emitted when the extractor flushes a batch to disk */
export interface BatchWritten extends BaseEvent {
  type: 'BatchWritten';
  payload: {
    batchId: number;
    path: string;
    rows: number;
  };
}

/** Emitted when the merger or finalizer rejects an input file */
export interface BatchSkipped extends BaseEvent {
  type: 'BatchSkipped';
  payload: {
    path: string;
    reason: string;
  };
}

export interface ShardCreated extends BaseEvent {
  type: 'ShardCreated';
  payload: {
    shardId: string;
    files: number;
    bytes: number;
    archiveBytes: number;
    missing: number;
  };
}

/** Emitted when a shard already exists on disk and is left untouched */
export interface ShardSkipped extends BaseEvent {
  type: 'ShardSkipped';
  payload: {
    shardId: string;
  };
}

export interface ShardFailed extends BaseEvent {
  type: 'ShardFailed';
  payload: {
    shardId: string;
    error: string;
  };
}

export interface VerificationCompleted extends BaseEvent {
  type: 'VerificationCompleted';
  payload: {
    passed: boolean;
    checks: {
      name: string;
      expected: number;
      actual: number;
      diff: number;
    }[];
    reconciled: boolean;
  };
}

export type PipelineEvent =
  | StageStarted
  | StageFinished
  | BatchWritten
  | BatchSkipped
  | ShardCreated
  | ShardSkipped
  | ShardFailed
  | VerificationCompleted;

export type PipelineEventType = PipelineEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common fields for a new event; spread into the event literal.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
