import { SchemaError } from '../errors';
import type { FileRecord } from '../types/records';
import { CanonicalRowSchema } from './schema';

export type RawRow = Record<string, unknown>;

/**
 * A stored column layout and how to map its rows onto the canonical columns.
 * Layouts are matched by column name, so column order never matters.
 */
export interface SchemaMigration {
  id: string;
  /** Columns a file must contain for this migration to apply */
  required: readonly string[];
  toCanonical(row: RawRow): RawRow;
}

const indexV2: SchemaMigration = {
  id: 'index-v2',
  required: ['project_name', 'file_path', 'tokens', 'size', 'sha256'],
  toCanonical: (row) => ({
    project_name: row.project_name,
    file_path: row.file_path,
    tokens: row.tokens,
    size: row.size,
    sha256: row.sha256,
    shard_id: row.shard_id ?? null,
  }),
};

// First-generation extraction output; absolute_path is not carried forward.
const extractV1: SchemaMigration = {
  id: 'extract-v1',
  required: ['project_name', 'relative_path', 'file_size', 'sha256', 'token_count'],
  toCanonical: (row) => ({
    project_name: row.project_name,
    file_path: row.relative_path,
    tokens: row.token_count,
    size: row.file_size,
    sha256: row.sha256,
    shard_id: null,
  }),
};

/** Known layouts, newest first. */
export const MIGRATIONS: readonly SchemaMigration[] = [indexV2, extractV1];

export function resolveMigration(columns: readonly string[], source: string): SchemaMigration {
  const present = new Set(columns);
  const migration = MIGRATIONS.find((m) => m.required.every((column) => present.has(column)));
  if (!migration) {
    throw new SchemaError(`Unrecognized column layout in ${source}`, {
      details: { columns: [...columns] },
    });
  }
  return migration;
}

/**
 * Maps and casts raw rows. The first row that fails the cast rejects the whole set.
 *
 * @param offset - Row number of `rows[0]` within the file, for error messages.
 */
export function decodeRows(
  rows: readonly RawRow[],
  migration: SchemaMigration,
  source: string,
  offset = 0,
): FileRecord[] {
  return rows.map((row, i) => {
    const result = CanonicalRowSchema.safeParse(migration.toCanonical(row));
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new SchemaError(`Row ${offset + i} of ${source} cannot be cast: ${issues}`, {
        details: { migration: migration.id },
      });
    }
    return result.data;
  });
}
