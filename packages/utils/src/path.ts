/**
 * Path Utilities
 * 
 * Remote paths inside a repository are always '/'-separated, whatever the
 * local platform.
 */

import { basename } from 'node:path';

/**
 * Normalize a remote path to '/a/b/c' form
 */
export function normalizeRepoPath(pathInRepo: string): string {
  const segments = pathInRepo.split('/').filter((segment) => segment.length > 0 && segment !== '.');
  return '/' + segments.join('/');
}

/**
 * Split a remote path into segments, without empty or '.' parts
 */
export function getRepoPathSegments(pathInRepo: string): string[] {
  return normalizeRepoPath(pathInRepo).split('/').filter((segment) => segment.length > 0);
}

/**
 * Get the parent of a remote path ('/' for top-level entries)
 */
export function getParentPath(pathInRepo: string): string {
  const segments = getRepoPathSegments(pathInRepo);
  segments.pop();
  return '/' + segments.join('/');
}

/**
 * Get the last component of a local or remote path
 */
export function getBaseName(filePath: string): string {
  return basename(filePath);
}

/**
 * Join a remote parent path and a file name
 */
export function joinRepoPath(parentPath: string, name: string): string {
  return normalizeRepoPath(`${parentPath}/${name}`);
}
