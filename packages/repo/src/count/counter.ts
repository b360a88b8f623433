import { promises as fs } from 'fs';
import pMap from 'p-map';
import type { CountRecord, Logger, ProjectCounts } from '@codecorpus/shared';
import { listProjects, type ProjectDir } from '../project';
import { decodeLenient, ProjectScanner } from '../scanner';
import type { Tokenizer } from '../tokenizer';

export interface CountOptions {
  reposDir: string;
  extensions: readonly string[];
  excludes?: readonly string[];
  maxFileSizeBytes: number;
  tokenizer: Tokenizer;
  concurrency?: number;
  logger?: Logger;
  /** Called once per project, in completion order */
  onProject?: (name: string, counts: ProjectCounts) => void;
}

/**
 * Produces a CountRecord for an acquisition tree independently of the
 * extractor. Decoding is lenient and there is no binary check, so totals can
 * differ slightly from the extracted index; files that decode to zero tokens
 * are not counted.
 */
export async function countTokens(options: CountOptions): Promise<CountRecord> {
  const projects = await listProjects(options.reposDir);
  const scanner = new ProjectScanner();

  const countProject = async (project: ProjectDir): Promise<ProjectCounts> => {
    const snapshot = await scanner.scan(project.path, {
      extensions: options.extensions,
      excludes: options.excludes,
    });
    for (const warning of snapshot.warnings) {
      options.logger?.warn(`${project.name}: ${warning}`);
    }

    const counts: ProjectCounts = { tokens: 0, files_processed: 0 };
    for (const file of snapshot.files) {
      if (file.sizeBytes > options.maxFileSizeBytes) continue;
      let bytes: Buffer;
      try {
        bytes = await fs.readFile(file.absPath);
      } catch (error) {
        options.logger?.warn(
          `${project.name}: cannot read ${file.path}: ${error instanceof Error ? error.message : String(error)}`,
        );
        continue;
      }
      const tokens = options.tokenizer.count(decodeLenient(bytes));
      if (tokens > 0) {
        counts.tokens += tokens;
        counts.files_processed++;
      }
    }
    options.onProject?.(project.name, counts);
    return counts;
  };

  const results = await pMap(projects, countProject, { concurrency: options.concurrency ?? 4 });

  const record: CountRecord = { total_tokens: 0, total_files: 0, total_repos: projects.length, repos: {} };
  projects.forEach((project, i) => {
    const counts = results[i];
    if (!counts) return;
    record.repos[project.name] = counts;
    record.total_tokens += counts.tokens;
    record.total_files += counts.files_processed;
  });
  return record;
}
