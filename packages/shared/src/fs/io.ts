// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, pathExists, remove } from 'fs-extra';
import { join } from './path';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await withAtomicFile(path, (tempPath) => fs.writeFile(tempPath, content));
}

/**
 * Runs `write` against a temporary sibling of `path` and renames it into place
 * once `write` resolves. The temporary file is removed if `write` rejects, so
 * `path` either holds the complete new content or is untouched.
 */
export async function withAtomicFile<T>(
  path: string,
  write: (tempPath: string) => Promise<T>,
): Promise<T> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    const result = await write(tempPath);
    await fs.rename(tempPath, path);
    return result;
  } catch (error) {
    await remove(tempPath);
    throw error;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Lists the regular files directly inside `dir` whose names satisfy `accept`,
 * as absolute paths sorted by file name.
 */
export async function listFiles(dir: string, accept: (name: string) => boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && accept(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

export { pathExists, remove };
