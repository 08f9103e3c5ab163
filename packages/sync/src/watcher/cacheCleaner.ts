/**
 * Cached Files Cleaner
 * 
 * Removes the on-disk file cache on account switch or logout. The live cache
 * directory is first renamed to the temp name and only then deleted, so an
 * interrupted run never leaves a half-deleted directory under the live name;
 * the next run removes the leftover temp directory first.
 */

import PQueue from 'p-queue';
import {
  createLogger,
  getErrorMessage,
  isDirectory,
  pathExists,
  removeDirRecursive,
  removeFile,
  renamePath,
} from '@cache-mirror/utils';
import type { CacheLayout } from '../cache/cacheLayout.js';

const logger = createLogger({ component: 'cache-cleaner' });

export interface CleanupReport {
  removedDbFile: boolean;
  removedLeftoverTempDir: boolean;
  removedCacheDir: boolean;
  // Steps that failed and were skipped
  failures: string[];
}

export interface CleanupJob {
  run(): Promise<unknown>;
}

export class CachedFilesCleaner implements CleanupJob {
  private readonly layout: CacheLayout;

  constructor(layout: CacheLayout) {
    this.layout = layout;
  }

  /**
   * Best-effort teardown; failing steps are logged and skipped, never thrown
   */
  async run(): Promise<CleanupReport> {
    const { fileCacheDbFile, fileCacheTempDir, fileCacheDir } = this.layout;
    const report: CleanupReport = {
      removedDbFile: false,
      removedLeftoverTempDir: false,
      removedCacheDir: false,
      failures: [],
    };

    logger.info({ dataDir: this.layout.dataDir }, 'Removing cached files');

    await this.step(report, 'remove metadata store', async () => {
      if (await pathExists(fileCacheDbFile)) {
        await removeFile(fileCacheDbFile);
        report.removedDbFile = true;
      }
    });

    await this.step(report, 'remove leftover temp directory', async () => {
      if (await isDirectory(fileCacheTempDir)) {
        await removeDirRecursive(fileCacheTempDir);
        report.removedLeftoverTempDir = true;
      }
    });

    await this.step(report, 'remove cache directory', async () => {
      if (await isDirectory(fileCacheDir)) {
        await renamePath(fileCacheDir, fileCacheTempDir);
        await removeDirRecursive(fileCacheTempDir);
        report.removedCacheDir = true;
      }
    });

    return report;
  }

  private async step(report: CleanupReport, name: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      report.failures.push(name);
      logger.warn({ step: name, error: getErrorMessage(error) }, 'Cache teardown step failed');
    }
  }
}

/**
 * Background pool for teardown jobs. Submitting never waits for the job.
 */
export class CleanupWorkerPool {
  private queue: PQueue;

  constructor(concurrency: number = 1) {
    this.queue = new PQueue({ concurrency });
  }

  submit(job: CleanupJob): void {
    void this.queue.add(() => job.run()).catch((error: unknown) => {
      logger.error({ error: getErrorMessage(error) }, 'Cleanup job failed');
    });
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }
}
