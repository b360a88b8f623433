import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import type { ProjectSnapshot, ScannedFile, ScanOptions } from './types';
import { DEFAULT_IGNORES, matchesExtension } from './utils';

export * from './types';
export * from './utils';

type Fs = Pick<typeof nodeFs, 'readdir' | 'stat'>;

/**
 * Walks one project directory and returns the files that pass the ignore
 * rules and extension filter, sorted by POSIX path.
 */
export class ProjectScanner {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async scan(projectRoot: string, options: ScanOptions = {}): Promise<ProjectSnapshot> {
    const ig = ignore();
    ig.add(DEFAULT_IGNORES);
    if (options.excludes && options.excludes.length > 0) {
      ig.add([...options.excludes]);
    }
    const extensions = options.extensions
      ? new Set(options.extensions.map((ext) => ext.toLowerCase()))
      : undefined;

    const files: ScannedFile[] = [];
    const warnings: string[] = [];

    const walk = async (dir: string, relativeDir: string): Promise<void> => {
      let entries;
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        warnings.push(`Cannot read directory ${relativeDir || '.'}: ${describe(error)}`);
        return;
      }

      for (const entry of entries) {
        const relativePath = relativeDir ? path.posix.join(relativeDir, entry.name) : entry.name;

        if (entry.isDirectory()) {
          // Trailing slash so directory-only patterns match
          if (ig.ignores(relativePath + '/')) continue;
          await walk(path.join(dir, entry.name), relativePath);
        } else if (entry.isFile()) {
          if (ig.ignores(relativePath)) continue;
          if (extensions && !matchesExtension(entry.name, extensions)) continue;

          const absPath = path.join(dir, entry.name);
          try {
            const stats = await this.fs.stat(absPath);
            files.push({ path: relativePath, absPath, sizeBytes: stats.size });
          } catch (error) {
            warnings.push(`Cannot stat ${relativePath}: ${describe(error)}`);
          }
        }
      }
    };

    await walk(projectRoot, '');

    // Code-unit order, independent of locale
    files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    return { projectRoot, files, warnings };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
