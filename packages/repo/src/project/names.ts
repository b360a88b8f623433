/**
 * Directory name for a qualified project name: the first `/` becomes `_`.
 * `octo/my_repo` is stored as `octo_my_repo`.
 */
export function escapeProjectName(projectName: string): string {
  return projectName.replace('/', '_');
}

/**
 * Inverse of {@link escapeProjectName}: the first `_` becomes `/`.
 * Owners cannot contain `_`, so the first one always separates owner and repository.
 */
export function unescapeProjectName(dirName: string): string {
  return dirName.replace('_', '/');
}
