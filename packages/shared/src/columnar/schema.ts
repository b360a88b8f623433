import type { SchemaElement } from 'hyparquet';
import { z } from 'zod';
import type { FileRecord } from '../types/records';

/** Column names of the canonical index layout, in storage order. */
export const INDEX_COLUMNS = [
  'project_name',
  'file_path',
  'tokens',
  'size',
  'sha256',
  'shard_id',
] as const;

export type IndexColumn = (typeof INDEX_COLUMNS)[number];

/**
 * Parquet schema shared by batches, the global index, shard metadata and the final index.
 */
export const INDEX_SCHEMA: SchemaElement[] = [
  { name: 'root', num_children: INDEX_COLUMNS.length },
  { name: 'project_name', type: 'BYTE_ARRAY', converted_type: 'UTF8', repetition_type: 'REQUIRED' },
  { name: 'file_path', type: 'BYTE_ARRAY', converted_type: 'UTF8', repetition_type: 'REQUIRED' },
  { name: 'tokens', type: 'INT64', repetition_type: 'REQUIRED' },
  { name: 'size', type: 'INT64', repetition_type: 'REQUIRED' },
  { name: 'sha256', type: 'BYTE_ARRAY', converted_type: 'UTF8', repetition_type: 'REQUIRED' },
  { name: 'shard_id', type: 'BYTE_ARRAY', converted_type: 'UTF8', repetition_type: 'OPTIONAL' },
];

// INT64 columns decode as bigint; older writers may have produced plain numbers.
const count = z
  .union([z.bigint(), z.number()])
  .transform((value) => Number(value))
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

/**
 * Casts one row in canonical column naming to a FileRecord.
 */
export const CanonicalRowSchema = z
  .object({
    project_name: z.string().min(1),
    file_path: z.string().min(1),
    tokens: count,
    size: count,
    sha256: z.string().regex(/^[0-9a-f]{64}$/, 'expected 64 lowercase hex characters'),
    shard_id: z.string().nullish(),
  })
  .transform(
    (row): FileRecord => ({
      projectName: row.project_name,
      filePath: row.file_path,
      tokens: row.tokens,
      size: row.size,
      sha256: row.sha256,
      shardId: row.shard_id ?? null,
    }),
  );

export interface ColumnSource {
  name: IndexColumn;
  data: (string | bigint | null)[];
}

/**
 * Splits records into the column arrays the parquet writer consumes.
 */
export function toColumnData(records: readonly FileRecord[]): ColumnSource[] {
  return [
    { name: 'project_name', data: records.map((r) => r.projectName) },
    { name: 'file_path', data: records.map((r) => r.filePath) },
    { name: 'tokens', data: records.map((r) => BigInt(r.tokens)) },
    { name: 'size', data: records.map((r) => BigInt(r.size)) },
    { name: 'sha256', data: records.map((r) => r.sha256) },
    { name: 'shard_id', data: records.map((r) => r.shardId) },
  ];
}
