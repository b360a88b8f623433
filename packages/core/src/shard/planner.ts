import type { FileRecord } from '@codecorpus/shared';

export interface ShardLimits {
  targetBytes: number;
  minBytes: number;
  maxBytes: number;
}

export interface ShardPlan {
  /** Zero-padded sequence number, e.g. `00003` */
  shardId: string;
  records: FileRecord[];
  bytes: number;
}

export function formatShardId(sequence: number): string {
  return String(sequence).padStart(5, '0');
}

/**
 * Groups index rows, in order, into shards by source byte size.
 *
 * A shard is cut before a row that would push it past `maxBytes` once it
 * already holds `minBytes`, and after the row that brings it to `targetBytes`.
 * Rows are never split, so one oversized row becomes a shard on its own.
 */
export class ShardPlanner {
  private pending: FileRecord[] = [];
  private total = 0;
  private sequence = 0;

  constructor(private readonly limits: ShardLimits) {}

  /** Adds a row and returns the shards it completed (zero, one or two). */
  push(record: FileRecord): ShardPlan[] {
    const completed: ShardPlan[] = [];
    if (
      this.pending.length > 0 &&
      this.total + record.size > this.limits.maxBytes &&
      this.total >= this.limits.minBytes
    ) {
      completed.push(this.cut());
    }
    this.pending.push(record);
    this.total += record.size;
    if (this.total >= this.limits.targetBytes) {
      completed.push(this.cut());
    }
    return completed;
  }

  /** The final shard, whatever its size, if any rows are pending. */
  finish(): ShardPlan | undefined {
    return this.pending.length > 0 ? this.cut() : undefined;
  }

  private cut(): ShardPlan {
    const plan: ShardPlan = {
      shardId: formatShardId(this.sequence++),
      records: this.pending,
      bytes: this.total,
    };
    this.pending = [];
    this.total = 0;
    return plan;
  }
}

/**
 * Lazily plans shards from a row stream; the next shard is only planned when
 * the consumer asks for it.
 */
export async function* planShards(
  records: AsyncIterable<FileRecord> | Iterable<FileRecord>,
  limits: ShardLimits,
): AsyncGenerator<ShardPlan> {
  const planner = new ShardPlanner(limits);
  for await (const record of records) {
    yield* planner.push(record);
  }
  const last = planner.finish();
  if (last) {
    yield last;
  }
}
