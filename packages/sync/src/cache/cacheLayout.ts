/**
 * Cache Layout
 * 
 * On-disk layout of the file cache under one data directory:
 * 
 *   <dataDir>/file-cache/<repoId>/<path in repo>   live cache content
 *   <dataDir>/file-cache-tmp/                      transient, only during teardown
 *   <dataDir>/file-cache.db                        cache metadata store
 */

import { join, resolve } from 'node:path';
import { ValidationError } from '@cache-mirror/core';
import { getRepoPathSegments, isNonEmptyString } from '@cache-mirror/utils';

export const FILE_CACHE_DIR_NAME = 'file-cache';
export const FILE_CACHE_TEMP_DIR_NAME = 'file-cache-tmp';
export const FILE_CACHE_DB_FILE_NAME = 'file-cache.db';

export class CacheLayout {
  readonly dataDir: string;
  readonly fileCacheDir: string;
  readonly fileCacheTempDir: string;
  readonly fileCacheDbFile: string;

  constructor(dataDir: string) {
    this.dataDir = resolve(dataDir);
    this.fileCacheDir = join(this.dataDir, FILE_CACHE_DIR_NAME);
    this.fileCacheTempDir = join(this.dataDir, FILE_CACHE_TEMP_DIR_NAME);
    this.fileCacheDbFile = join(this.dataDir, FILE_CACHE_DB_FILE_NAME);
  }

  /**
   * Resolve where the cached copy of a remote file lives
   */
  localCachePath(repoId: string, pathInRepo: string): string {
    if (!isNonEmptyString(repoId) || /[/\\]/.test(repoId) || repoId === '.' || repoId === '..') {
      throw new ValidationError('repoId', `"${repoId}" is not a valid repo id`);
    }

    const segments = getRepoPathSegments(pathInRepo);
    if (segments.length === 0) {
      throw new ValidationError('pathInRepo', 'must name a file');
    }
    if (segments.includes('..')) {
      throw new ValidationError('pathInRepo', 'must not contain ".." segments');
    }

    return join(this.fileCacheDir, repoId, ...segments);
  }
}
