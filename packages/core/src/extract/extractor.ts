import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { pMapIterable } from 'p-map';
import {
  ConfigError,
  eventBase,
  join,
  listFiles,
  remove,
  writeIndexFile,
  type FileRecord,
} from '@codecorpus/shared';
import {
  decodeStrict,
  listProjects,
  ProjectScanner,
  type ProjectDir,
  type ScannedFile,
  type Tokenizer,
} from '@codecorpus/repo';
import { resolveStageContext, type StageContext, type StageOptions } from '../stage';
import {
  checkpointPath,
  readCheckpoint,
  writeCheckpoint,
  type ExtractCheckpoint,
} from './checkpoint';

export const SKIP_REASONS = ['too-large', 'null-byte', 'invalid-utf8', 'unreadable'] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export interface ExtractOptions extends StageOptions {
  reposDir: string;
  /** Directory receiving batch files and the checkpoint */
  outputDir: string;
  tokenizer: Tokenizer;
  extensions: readonly string[];
  excludes?: readonly string[];
  maxFileSizeBytes: number;
  batchSize: number;
  concurrency?: number;
  /** Discard existing batches and checkpoint */
  force?: boolean;
  onProgress?: (progress: ExtractProgress) => void;
}

export type ExtractProgress = {
  projectsDone: number;
  projectsTotal: number;
  records: number;
  bytes: number;
  tokens: number;
  elapsedMs: number;
};

export type ExtractReport = {
  projects: number;
  projectsProcessed: number;
  projectsFailed: number;
  filesSeen: number;
  /** Records written by this run */
  records: number;
  skipped: Record<SkipReason, number>;
  batchesWritten: number;
  /** Totals across resumed runs */
  totalBatches: number;
  totalRows: number;
  bytes: number;
  tokens: number;
  resumed: boolean;
  alreadyComplete: boolean;
  durationMs: number;
};

type FileOutcome = { record: FileRecord } | { skipped: SkipReason; detail: string };

interface ExtractedProject {
  index: number;
  project: ProjectDir;
  files: number;
  records: { ordinal: number; record: FileRecord }[];
  skipped: Record<SkipReason, number>;
  warnings: string[];
  failed: boolean;
}

interface PendingRow {
  projectIndex: number;
  ordinal: number;
  record: FileRecord;
}

const BATCH_FILE = /^batch_\d+\.parquet$/;

export function batchFileName(batchId: number): string {
  return `batch_${String(batchId).padStart(6, '0')}.parquet`;
}

function emptySkipCounts(): Record<SkipReason, number> {
  return { 'too-large': 0, 'null-byte': 0, 'invalid-utf8': 0, unreadable: 0 };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Walks the acquisition tree and writes one FileRecord per eligible file into
 * fixed-size parquet batches. Projects are processed concurrently but consumed
 * in listing order, so batch contents depend only on the tree.
 */
export class MetadataExtractor {
  private readonly scanner = new ProjectScanner();

  constructor(private readonly options: ExtractOptions) {}

  async run(): Promise<ExtractReport> {
    const started = Date.now();
    const { reposDir, outputDir, batchSize } = this.options;
    const context = resolveStageContext('extract', this.options);
    const { logger, runId } = context;
    const concurrency = this.options.concurrency ?? 32;

    const projects = await listProjects(reposDir);
    await fs.mkdir(outputDir, { recursive: true });
    await logger.log({
      ...eventBase(runId),
      type: 'StageStarted',
      payload: { stage: 'extract', input: reposDir, output: outputDir },
    });

    let checkpoint: ExtractCheckpoint | undefined;
    if (this.options.force) {
      await this.clearOutput(true);
    } else {
      checkpoint = await readCheckpoint(outputDir);
      if (!checkpoint) {
        await this.clearOutput(false);
      }
    }
    if (checkpoint && checkpoint.batchSize !== batchSize) {
      throw new ConfigError(
        `Checkpoint in ${outputDir} was written with batchSize ${checkpoint.batchSize}, not ${batchSize}; rerun with --force to start over`,
      );
    }

    const report: ExtractReport = {
      projects: projects.length,
      projectsProcessed: 0,
      projectsFailed: 0,
      filesSeen: 0,
      records: 0,
      skipped: emptySkipCounts(),
      batchesWritten: 0,
      totalBatches: checkpoint?.batchesWritten ?? 0,
      totalRows: checkpoint?.rowsWritten ?? 0,
      bytes: 0,
      tokens: 0,
      resumed: checkpoint !== undefined,
      alreadyComplete: checkpoint?.complete ?? false,
      durationMs: 0,
    };

    if (checkpoint?.complete) {
      logger.info(`Extraction in ${outputDir} is already complete; use --force to start over`);
      return this.finish(report, started, context);
    }

    let state: ExtractCheckpoint = checkpoint ?? {
      batchSize,
      batchesWritten: 0,
      rowsWritten: 0,
      projectsCompleted: 0,
      filesIntoProject: 0,
      complete: false,
    };
    if (checkpoint) {
      logger.info(
        `Resuming after batch ${state.batchesWritten} (${state.projectsCompleted}/${projects.length} projects done)`,
      );
    }

    const resumeProject = state.projectsCompleted;
    const resumeOrdinal = state.filesIntoProject;
    const pending = projects
      .slice(resumeProject)
      .map((project, i) => ({ project, index: resumeProject + i }));

    const extractProject = async (entry: {
      project: ProjectDir;
      index: number;
    }): Promise<ExtractedProject> => {
      const result: ExtractedProject = {
        index: entry.index,
        project: entry.project,
        files: 0,
        records: [],
        skipped: emptySkipCounts(),
        warnings: [],
        failed: false,
      };
      try {
        const snapshot = await this.scanner.scan(entry.project.path, {
          extensions: this.options.extensions,
          excludes: this.options.excludes,
        });
        result.warnings.push(...snapshot.warnings);
        const startAt = entry.index === resumeProject ? resumeOrdinal : 0;
        for (const [ordinal, file] of snapshot.files.entries()) {
          if (ordinal < startAt) continue;
          result.files++;
          const outcome = await this.extractFile(entry.project.name, file);
          if ('skipped' in outcome) {
            result.skipped[outcome.skipped]++;
            logger.debug(`${entry.project.name}: skipped ${file.path} (${outcome.detail})`);
          } else {
            result.records.push({ ordinal, record: outcome.record });
          }
        }
      } catch (error) {
        result.failed = true;
        result.records = [];
        result.warnings.push(`project failed: ${describe(error)}`);
      }
      return result;
    };

    const accumulator: PendingRow[] = [];
    const flush = async (): Promise<void> => {
      const rows = accumulator.splice(0, accumulator.length);
      const last = rows[rows.length - 1];
      if (!last) return;
      const batchId = state.batchesWritten;
      const path = join(outputDir, batchFileName(batchId));
      await writeIndexFile(
        path,
        rows.map((row) => row.record),
      );
      state = {
        ...state,
        batchesWritten: batchId + 1,
        rowsWritten: state.rowsWritten + rows.length,
        projectsCompleted: last.projectIndex,
        filesIntoProject: last.ordinal + 1,
      };
      await writeCheckpoint(outputDir, state);
      report.batchesWritten++;
      await logger.log({
        ...eventBase(runId),
        type: 'BatchWritten',
        payload: { batchId, path, rows: rows.length },
      });
      logger.debug(`Wrote ${path} (${rows.length} rows)`);
    };

    for await (const extracted of pMapIterable(pending, extractProject, {
      concurrency,
      backpressure: concurrency * 2,
    })) {
      report.projectsProcessed++;
      report.filesSeen += extracted.files;
      if (extracted.failed) report.projectsFailed++;
      for (const reason of SKIP_REASONS) {
        report.skipped[reason] += extracted.skipped[reason];
      }
      for (const warning of extracted.warnings) {
        logger.warn(`${extracted.project.name}: ${warning}`);
      }

      for (const { ordinal, record } of extracted.records) {
        accumulator.push({ projectIndex: extracted.index, ordinal, record });
        report.records++;
        report.bytes += record.size;
        report.tokens += record.tokens;
        if (accumulator.length >= batchSize) {
          await flush();
        }
      }

      this.options.onProgress?.({
        projectsDone: extracted.index + 1,
        projectsTotal: projects.length,
        records: report.records,
        bytes: report.bytes,
        tokens: report.tokens,
        elapsedMs: Date.now() - started,
      });
    }

    await flush();
    state = { ...state, projectsCompleted: projects.length, filesIntoProject: 0, complete: true };
    await writeCheckpoint(outputDir, state);

    report.totalBatches = state.batchesWritten;
    report.totalRows = state.rowsWritten;
    return this.finish(report, started, context);
  }

  private async extractFile(projectName: string, file: ScannedFile): Promise<FileOutcome> {
    const maxBytes = this.options.maxFileSizeBytes;
    if (file.sizeBytes > maxBytes) {
      return { skipped: 'too-large', detail: `${file.sizeBytes} bytes` };
    }
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(file.absPath);
    } catch (error) {
      return { skipped: 'unreadable', detail: describe(error) };
    }
    // The file may have grown since it was scanned
    if (bytes.length > maxBytes) {
      return { skipped: 'too-large', detail: `${bytes.length} bytes` };
    }
    const decoded = decodeStrict(bytes);
    if (decoded.kind === 'binary') {
      return { skipped: 'null-byte', detail: 'contains a NUL byte' };
    }
    if (decoded.kind === 'invalid-utf8') {
      return { skipped: 'invalid-utf8', detail: 'not valid UTF-8' };
    }
    return {
      record: {
        projectName,
        filePath: file.path,
        tokens: this.options.tokenizer.count(decoded.text),
        size: bytes.length,
        sha256: createHash('sha256').update(bytes).digest('hex'),
        shardId: null,
      },
    };
  }

  /** Removes batch files, and the checkpoint when `includeCheckpoint` is set. */
  private async clearOutput(includeCheckpoint: boolean): Promise<void> {
    const stale = await listFiles(this.options.outputDir, (name) => BATCH_FILE.test(name));
    for (const file of stale) {
      await remove(file);
    }
    if (includeCheckpoint) {
      await remove(checkpointPath(this.options.outputDir));
    }
  }

  private async finish(
    report: ExtractReport,
    started: number,
    { logger, runId }: StageContext,
  ): Promise<ExtractReport> {
    report.durationMs = Date.now() - started;
    await logger.log({
      ...eventBase(runId),
      type: 'StageFinished',
      payload: { stage: 'extract', durationMs: report.durationMs, summary: report },
    });
    return report;
  }
}
