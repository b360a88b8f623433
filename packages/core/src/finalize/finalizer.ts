import {
  eventBase,
  IndexReader,
  IndexWriter,
  InputNotFoundError,
  isDirectory,
  listFiles,
  OutputError,
  readCountRecord,
  withAtomicFile,
  writeCountRecord,
  type CountRecord,
  type FileRecord,
} from '@codecorpus/shared';
import { resolveStageContext, type StageOptions } from '../stage';

const SHARD_METADATA_FILE = /^shard_(\d+)_metadata\.parquet$/;

export interface FinalizeOptions extends StageOptions {
  /** Directory of shard metadata files */
  inputDir: string;
  outputFile: string;
  /** Count record to verify against; verification is skipped without one */
  countsFile?: string;
  /** Overwrite the count record with computed totals on mismatch */
  updateCounts?: boolean;
  rowGroupSize?: number;
}

export type ProjectRollup = { tokens: number; filesProcessed: number };

export type VerificationCheck = {
  name: 'tokens' | 'files';
  expected: number;
  actual: number;
  /** actual - expected */
  diff: number;
  passed: boolean;
};

export type CheckedVerification = {
  status: 'passed' | 'failed';
  checks: VerificationCheck[];
  notes: string[];
};

export type Verification = { status: 'skipped'; reason: string } | CheckedVerification;

export type FinalizeReport = {
  filesFound: number;
  filesMerged: number;
  filesSkipped: { path: string; reason: string }[];
  totalFiles: number;
  totalTokens: number;
  totalSize: number;
  projects: Record<string, ProjectRollup>;
  verification: Verification;
  reconciled: boolean;
  durationMs: number;
};

function shardIdFromFileName(file: string): string | undefined {
  const name = file.slice(file.lastIndexOf('/') + 1);
  return SHARD_METADATA_FILE.exec(name)?.[1];
}

function check(name: VerificationCheck['name'], expected: number, actual: number): VerificationCheck {
  return { name, expected, actual, diff: actual - expected, passed: actual === expected };
}

/**
 * Compares computed totals with a count record. Mismatches are reported,
 * never thrown.
 */
export function verifyTotals(
  counts: CountRecord,
  totals: { tokens: number; files: number },
): CheckedVerification {
  const checks = [
    check('tokens', counts.total_tokens, totals.tokens),
    check('files', counts.total_files, totals.files),
  ];
  const notes: string[] = [];
  if (totals.files < counts.total_files) {
    notes.push(
      'Actual file count is lower; extraction skips binary and non-UTF-8 files the counter accepts.',
    );
  }
  return {
    status: checks.every((c) => c.passed) ? 'passed' : 'failed',
    checks,
    notes,
  };
}

export function toCountRecord(report: Pick<FinalizeReport, 'totalTokens' | 'totalFiles' | 'projects'>): CountRecord {
  const repos: CountRecord['repos'] = Object.fromEntries(
    Object.entries(report.projects).map(([name, rollup]) => [
      name,
      { tokens: rollup.tokens, files_processed: rollup.filesProcessed },
    ]),
  );
  return {
    total_tokens: report.totalTokens,
    total_files: report.totalFiles,
    total_repos: Object.keys(repos).length,
    repos,
  };
}

/**
 * Concatenates shard metadata into the final index, totals it per project,
 * and checks the totals against an independent count record.
 */
export async function finalizeMetadata(options: FinalizeOptions): Promise<FinalizeReport> {
  const started = Date.now();
  const { logger, runId } = resolveStageContext('finalize', options);
  const { inputDir, outputFile } = options;

  if (!(await isDirectory(inputDir))) {
    throw new InputNotFoundError(inputDir);
  }
  const files = await listFiles(inputDir, (name) => SHARD_METADATA_FILE.test(name));
  await logger.log({
    ...eventBase(runId),
    type: 'StageStarted',
    payload: { stage: 'finalize', input: inputDir, output: outputFile },
  });
  if (files.length === 0) {
    logger.warn(`No shard metadata files in ${inputDir}; writing an empty index`);
  }

  const report: FinalizeReport = {
    filesFound: files.length,
    filesMerged: 0,
    filesSkipped: [],
    totalFiles: 0,
    totalTokens: 0,
    totalSize: 0,
    projects: {},
    verification: { status: 'skipped', reason: 'no count record given' },
    reconciled: false,
    durationMs: 0,
  };

  // keyed by project name, which may be any string, `constructor` included
  const projects = new Map<string, ProjectRollup>();
  try {
    await withAtomicFile(outputFile, async (tempPath) => {
      const writer = new IndexWriter(tempPath, { rowGroupSize: options.rowGroupSize });
      for (const file of files) {
        let records: FileRecord[];
        try {
          records = await (await IndexReader.open(file)).readAll();
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          report.filesSkipped.push({ path: file, reason });
          logger.warn(`Skipping ${file}: ${reason}`);
          await logger.log({ ...eventBase(runId), type: 'BatchSkipped', payload: { path: file, reason } });
          continue;
        }

        const shardId = shardIdFromFileName(file) ?? null;
        const rows = records.map((record) => ({ ...record, shardId: record.shardId ?? shardId }));
        writer.write(rows);
        report.filesMerged++;
        for (const row of rows) {
          report.totalFiles++;
          report.totalTokens += row.tokens;
          report.totalSize += row.size;
          let rollup = projects.get(row.projectName);
          if (!rollup) {
            rollup = { tokens: 0, filesProcessed: 0 };
            projects.set(row.projectName, rollup);
          }
          rollup.tokens += row.tokens;
          rollup.filesProcessed++;
        }
      }
      writer.close();
    });
  } catch (error) {
    throw new OutputError(`Cannot write final index ${outputFile}`, { cause: error });
  }
  report.projects = Object.fromEntries(projects);

  let counts: CountRecord | undefined;
  if (options.countsFile) {
    try {
      counts = await readCountRecord(options.countsFile);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Skipping verification: ${reason}`);
      report.verification = { status: 'skipped', reason };
    }
  }

  if (counts) {
    const verification = verifyTotals(counts, {
      tokens: report.totalTokens,
      files: report.totalFiles,
    });
    report.verification = verification;
    if (verification.status === 'failed') {
      for (const c of verification.checks.filter((c) => !c.passed)) {
        logger.warn(`${c.name} mismatch: expected ${c.expected}, actual ${c.actual} (diff ${c.diff})`);
      }
      if (options.updateCounts && options.countsFile) {
        await writeCountRecord(options.countsFile, toCountRecord(report));
        report.reconciled = true;
        logger.info(`Updated ${options.countsFile} with computed totals`);
      }
    }
    await logger.log({
      ...eventBase(runId),
      type: 'VerificationCompleted',
      payload: {
        passed: verification.status === 'passed',
        checks: verification.checks.map(({ name, expected, actual, diff }) => ({
          name,
          expected,
          actual,
          diff,
        })),
        reconciled: report.reconciled,
      },
    });
  }

  report.durationMs = Date.now() - started;
  await logger.log({
    ...eventBase(runId),
    type: 'StageFinished',
    payload: {
      stage: 'finalize',
      durationMs: report.durationMs,
      summary: {
        filesMerged: report.filesMerged,
        filesSkipped: report.filesSkipped.length,
        totalFiles: report.totalFiles,
        totalTokens: report.totalTokens,
        totalSize: report.totalSize,
        projects: Object.keys(report.projects).length,
        verification: report.verification.status,
        reconciled: report.reconciled,
      },
    },
  });
  return report;
}
