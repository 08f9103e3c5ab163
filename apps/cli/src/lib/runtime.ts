/**
 * Runtime Wiring
 * 
 * Builds the auto-update manager and its collaborators from the CLI
 * configuration.
 */

import {
  AutoUpdateManager,
  CacheLayout,
  createPlatformQuirkFilter,
  type AutoUpdateManagerOptions,
} from '@cache-mirror/sync';
import { MinioUploader, RemoteUploadTaskFactory } from '@cache-mirror/upload';
import { createLogger } from '@cache-mirror/utils';
import type { CliConfig } from '../config/index.js';
import { TerminalNotificationSink } from './notifications.js';

const logger = createLogger({ component: 'cli' });

/**
 * The MinIO target, or null when none is configured
 */
export function createUploader(config: CliConfig): MinioUploader | null {
  return config.minio ? new MinioUploader(config.minio) : null;
}

export function createAutoUpdateManager(
  config: CliConfig,
  overrides: Partial<AutoUpdateManagerOptions> = {}
): AutoUpdateManager {
  const uploader = createUploader(config);

  return new AutoUpdateManager({
    layout: new CacheLayout(config.dataDir),
    uploads: new RemoteUploadTaskFactory(() => uploader ?? undefined),
    notifications: new TerminalNotificationSink(),
    accounts: { currentAccount: () => config.account },
    // The CLI runs no downloads and keeps no in-memory cache index
    downloads: {
      cancelAllDownloadTasks: () => logger.debug('No download tasks to cancel'),
    },
    cacheIndex: {
      cleanCurrentAccountCache: () => logger.debug('No cache index to clear'),
    },
    quirkFilter: createPlatformQuirkFilter(config.autoUpdate.openQuirkFilter, {
      windowMs: config.autoUpdate.openQuirkWindowMs,
    }),
    recreateCheckDelayMs: config.autoUpdate.recreateCheckDelayMs,
    recheckOrder: config.autoUpdate.recheckOrder,
    ...overrides,
  });
}
