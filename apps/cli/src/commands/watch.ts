/**
 * Watch Command
 * 
 * Watch cached files of one repo and re-upload them when they are edited,
 * until interrupted.
 */

import type { AutoUpdateManager, AutoUpdateManagerOptions, WatchResult } from '@cache-mirror/sync';
import { getErrorMessage } from '@cache-mirror/utils';
import type { CliConfig } from '../config/index.js';
import { createAutoUpdateManager } from '../lib/runtime.js';
import { printError, printInfo, printSuccess, printWarning } from '../lib/output.js';

const resultMessages: Record<WatchResult, (file: string) => string> = {
  'watching': (file) => `Watching ${file}`,
  'already-watching': (file) => `Already watching ${file}`,
  'missing-file': (file) => `Not in the cache: ${file}`,
  'deferred': (file) => `Waiting for ${file} to be recreated`,
};

/**
 * Set up the manager and register the files. Returns null when there is no
 * account to upload as.
 */
export function startWatching(
  config: CliConfig,
  repoId: string,
  paths: string[],
  overrides: Partial<AutoUpdateManagerOptions> = {}
): AutoUpdateManager | null {
  const account = config.account;
  if (!account) {
    printError('No account configured, set ACCOUNT_SERVER_URL and ACCOUNT_USERNAME');
    return null;
  }
  if (!config.minio) {
    printWarning('No upload target configured, uploads will fail');
  }

  const manager = createAutoUpdateManager(config, overrides);
  manager.onFileUpdated((updatedRepoId, pathInRepo) => {
    printInfo(`Updated ${pathInRepo} in ${updatedRepoId}`);
  });

  for (const pathInRepo of paths) {
    const file = `${repoId}:${pathInRepo}`;
    try {
      const result = manager.watch(account, repoId, pathInRepo);
      const message = resultMessages[result](file);
      if (result === 'watching' || result === 'already-watching') {
        printSuccess(message);
      } else {
        printWarning(message);
      }
    } catch (error) {
      printError(`${file}: ${getErrorMessage(error)}`);
    }
  }

  return manager;
}

function waitForShutdown(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export async function watchCommand(repoId: string, paths: string[], config: CliConfig): Promise<void> {
  const manager = startWatching(config, repoId, paths);
  if (!manager) {
    process.exitCode = 1;
    return;
  }

  if (manager.watchedCount === 0) {
    printWarning('Nothing to watch');
    await manager.stop();
    process.exitCode = 1;
    return;
  }

  printInfo(`Watching ${manager.watchedCount} file(s). Press Ctrl+C to stop.`);
  await waitForShutdown();

  printInfo('Waiting for uploads in flight...');
  await manager.stop();
  printSuccess('Stopped');
}
