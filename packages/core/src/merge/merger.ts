import {
  eventBase,
  IndexReader,
  IndexWriter,
  InputNotFoundError,
  isDirectory,
  listFiles,
  OutputError,
  withAtomicFile,
  type FileRecord,
} from '@codecorpus/shared';
import { resolveStageContext, type StageOptions } from '../stage';

export interface MergeOptions extends StageOptions {
  /** Directory of batch files */
  inputDir: string;
  outputFile: string;
  rowGroupSize?: number;
  onBatch?: (progress: MergeProgress) => void;
}

export type MergeProgress = {
  batchesDone: number;
  batchesTotal: number;
  rows: number;
};

export type MergeReport = {
  batchesFound: number;
  batchesMerged: number;
  batchesSkipped: { path: string; reason: string }[];
  rows: number;
  durationMs: number;
};

/**
 * Concatenates every readable batch into the global index, in file-name
 * order, with `shard_id` cleared. A batch that cannot be read or cast is
 * skipped whole; the merge itself only fails when the output cannot be written.
 */
export async function mergeBatches(options: MergeOptions): Promise<MergeReport> {
  const started = Date.now();
  const { logger, runId } = resolveStageContext('merge', options);
  const { inputDir, outputFile } = options;

  if (!(await isDirectory(inputDir))) {
    throw new InputNotFoundError(inputDir);
  }
  const batches = await listFiles(inputDir, (name) => name.endsWith('.parquet'));
  await logger.log({
    ...eventBase(runId),
    type: 'StageStarted',
    payload: { stage: 'merge', input: inputDir, output: outputFile },
  });
  if (batches.length === 0) {
    logger.warn(`No batch files in ${inputDir}; writing an empty index`);
  }

  const report: MergeReport = {
    batchesFound: batches.length,
    batchesMerged: 0,
    batchesSkipped: [],
    rows: 0,
    durationMs: 0,
  };

  try {
    await withAtomicFile(outputFile, async (tempPath) => {
      const writer = new IndexWriter(tempPath, { rowGroupSize: options.rowGroupSize });
      const progress = () =>
        options.onBatch?.({
          batchesDone: report.batchesMerged + report.batchesSkipped.length,
          batchesTotal: batches.length,
          rows: report.rows,
        });
      for (const batch of batches) {
        let records: FileRecord[];
        try {
          // Buffer the whole batch so a bad row never leaves half a batch in the index.
          const reader = await IndexReader.open(batch);
          records = await reader.readAll();
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          report.batchesSkipped.push({ path: batch, reason });
          logger.warn(`Skipping ${batch}: ${reason}`);
          await logger.log({
            ...eventBase(runId),
            type: 'BatchSkipped',
            payload: { path: batch, reason },
          });
          progress();
          continue;
        }
        writer.write(records.map((record) => ({ ...record, shardId: null })));
        report.batchesMerged++;
        report.rows += records.length;
        progress();
      }
      writer.close();
    });
  } catch (error) {
    throw new OutputError(`Cannot write global index ${outputFile}`, { cause: error });
  }

  report.durationMs = Date.now() - started;
  await logger.log({
    ...eventBase(runId),
    type: 'StageFinished',
    payload: { stage: 'merge', durationMs: report.durationMs, summary: report },
  });
  return report;
}
