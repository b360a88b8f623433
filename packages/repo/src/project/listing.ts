import { promises as fs } from 'fs';
import path from 'path';
import { InputNotFoundError, isDirectory } from '@codecorpus/shared';
import { unescapeProjectName } from './names';

export interface ProjectDir {
  /** Qualified name, e.g. `owner/repo` */
  name: string;
  dirName: string;
  path: string;
}

/**
 * Lists the project directories of an acquisition root in directory-name order.
 * Hidden entries and plain files are not projects.
 */
export async function listProjects(reposDir: string): Promise<ProjectDir[]> {
  if (!(await isDirectory(reposDir))) {
    throw new InputNotFoundError(reposDir);
  }
  const entries = await fs.readdir(reposDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort()
    .map((dirName) => ({
      name: unescapeProjectName(dirName),
      dirName,
      path: path.join(reposDir, dirName),
    }));
}
