import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, which is the form stored in every index file.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 *
 * @param paths A sequence of path segments.
 * @returns The normalized joined path.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

