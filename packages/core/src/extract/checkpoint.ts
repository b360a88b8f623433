import { promises as fs } from 'fs';
import { z } from 'zod';
import { atomicWrite, join, pathExists, SchemaError } from '@codecorpus/shared';

export const CHECKPOINT_FILE = 'extract_progress.json';

const count = z.number().int().nonnegative();

export const ExtractCheckpointSchema = z.object({
  batchSize: z.number().int().positive(),
  batchesWritten: count,
  rowsWritten: count,
  /** Projects, in listing order, whose records are all in flushed batches */
  projectsCompleted: count,
  /** Scanned files of the next project already covered by flushed batches */
  filesIntoProject: count,
  complete: z.boolean(),
});

export type ExtractCheckpoint = z.infer<typeof ExtractCheckpointSchema>;

export function checkpointPath(outputDir: string): string {
  return join(outputDir, CHECKPOINT_FILE);
}

export async function readCheckpoint(outputDir: string): Promise<ExtractCheckpoint | undefined> {
  const file = checkpointPath(outputDir);
  if (!(await pathExists(file))) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (error) {
    throw new SchemaError(`Checkpoint ${file} is not valid JSON; rerun with --force`, {
      cause: error,
    });
  }
  const result = ExtractCheckpointSchema.safeParse(parsed);
  if (!result.success) {
    throw new SchemaError(`Checkpoint ${file} is malformed; rerun with --force`);
  }
  return result.data;
}

export async function writeCheckpoint(outputDir: string, checkpoint: ExtractCheckpoint): Promise<void> {
  await atomicWrite(checkpointPath(outputDir), `${JSON.stringify(checkpoint, null, 2)}\n`);
}
