import { z } from 'zod';

/**
 * One source file's identity, size, hash and token count.
 * Constructed once by the extractor; later stages only stamp `shardId`.
 */
export interface FileRecord {
  /** Qualified project identifier, e.g. `owner/repo` */
  projectName: string;
  /** POSIX path relative to the project root */
  filePath: string;
  tokens: number;
  size: number;
  /** Lowercase hex SHA-256 of the file bytes */
  sha256: string;
  /** Zero-padded shard sequence number, null until sharded */
  shardId: string | null;
}

export const ProjectCountsSchema = z.object({
  tokens: z.number().int().nonnegative(),
  files_processed: z.number().int().nonnegative(),
});

/**
 * Independently computed token/file counts for the acquisition tree.
 * Stored as JSON with snake_case keys.
 */
export const CountRecordSchema = z.object({
  total_tokens: z.number().int().nonnegative(),
  total_files: z.number().int().nonnegative(),
  total_repos: z.number().int().nonnegative(),
  repos: z.record(ProjectCountsSchema).default({}),
});

export type ProjectCounts = z.infer<typeof ProjectCountsSchema>;
export type CountRecord = z.infer<typeof CountRecordSchema>;
