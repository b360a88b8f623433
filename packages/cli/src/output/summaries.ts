import type {
  ExtractProgress,
  ExtractReport,
  FinalizeReport,
  MergeProgress,
  MergeReport,
  ShardReport,
  ShardResult,
} from '@codecorpus/core';
import type { CountRecord } from '@codecorpus/shared';
import { formatBytes, formatCount, formatDuration, formatRate } from '@codecorpus/shared';
import type { SummaryRow } from './renderer';

export function extractSummary(report: ExtractReport): SummaryRow[] {
  if (report.alreadyComplete) {
    return [
      ['Status', 'already complete'],
      ['Batches', formatCount(report.totalBatches)],
      ['Rows', formatCount(report.totalRows)],
    ];
  }
  const skipped = Object.entries(report.skipped)
    .filter(([, n]) => n > 0)
    .map(([reason, n]) => `${reason} ${formatCount(n)}`)
    .join(', ');
  return [
    ['Projects', `${formatCount(report.projectsProcessed)} / ${formatCount(report.projects)}`],
    ['Projects failed', formatCount(report.projectsFailed)],
    ['Files seen', formatCount(report.filesSeen)],
    ['Records', formatCount(report.records)],
    ['Skipped', skipped || 'none'],
    ['Bytes', formatBytes(report.bytes)],
    ['Tokens', formatCount(report.tokens)],
    ['Batches written', formatCount(report.batchesWritten)],
    ['Total rows', formatCount(report.totalRows)],
    ['Resumed', report.resumed ? 'yes' : 'no'],
    ['Duration', formatDuration(report.durationMs)],
    ['Rate', formatRate(report.records, report.durationMs)],
  ];
}

export function mergeSummary(report: MergeReport): SummaryRow[] {
  return [
    ['Batches', `${formatCount(report.batchesMerged)} / ${formatCount(report.batchesFound)}`],
    ['Batches skipped', formatCount(report.batchesSkipped.length)],
    ['Rows', formatCount(report.rows)],
    ['Duration', formatDuration(report.durationMs)],
    ['Rate', formatRate(report.rows, report.durationMs)],
  ];
}

export function shardSummary(report: ShardReport): SummaryRow[] {
  return [
    ['Shards planned', formatCount(report.planned)],
    ['Created', formatCount(report.created)],
    ['Skipped (existing)', formatCount(report.skipped)],
    ['Failed', formatCount(report.failed)],
    ['Files packed', formatCount(report.filesPacked)],
    ['Files missing', formatCount(report.filesMissing)],
    ['Files oversized', formatCount(report.filesOversized)],
    ['Files unreadable', formatCount(report.filesUnreadable)],
    ['Source bytes', formatBytes(report.bytes)],
    ['Archive bytes', formatBytes(report.archiveBytes)],
    ['Duration', formatDuration(report.durationMs)],
  ];
}

export function finalizeSummary(report: FinalizeReport): SummaryRow[] {
  return [
    ['Metadata files', `${formatCount(report.filesMerged)} / ${formatCount(report.filesFound)}`],
    ['Metadata skipped', formatCount(report.filesSkipped.length)],
    ['Projects', formatCount(Object.keys(report.projects).length)],
    ['Files', formatCount(report.totalFiles)],
    ['Tokens', formatCount(report.totalTokens)],
    ['Size', formatBytes(report.totalSize)],
    ['Counts updated', report.reconciled ? 'yes' : 'no'],
    ['Duration', formatDuration(report.durationMs)],
  ];
}

export function countSummary(record: CountRecord, durationMs: number): SummaryRow[] {
  return [
    ['Projects', formatCount(record.total_repos)],
    ['Files', formatCount(record.total_files)],
    ['Tokens', formatCount(record.total_tokens)],
    ['Duration', formatDuration(durationMs)],
  ];
}

export function extractProgressLine(progress: ExtractProgress): string {
  return [
    `Projects ${formatCount(progress.projectsDone)}/${formatCount(progress.projectsTotal)}`,
    `${formatCount(progress.records)} files`,
    formatBytes(progress.bytes),
    `${formatCount(progress.tokens)} tokens`,
    formatRate(progress.records, progress.elapsedMs),
  ].join(' | ');
}

export function mergeProgressLine(progress: MergeProgress): string {
  return `Batches ${formatCount(progress.batchesDone)}/${formatCount(progress.batchesTotal)} | ${formatCount(progress.rows)} rows`;
}

export function shardProgressLine(result: ShardResult): string {
  switch (result.status) {
    case 'created':
      return `Shard ${result.shardId}: ${formatCount(result.files)} files, ${formatBytes(result.bytes)} -> ${formatBytes(result.archiveBytes)}`;
    case 'skipped':
      return `Shard ${result.shardId}: already built`;
    case 'failed':
      return `Shard ${result.shardId}: failed (${result.error ?? 'unknown error'})`;
  }
}
