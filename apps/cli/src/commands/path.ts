/**
 * Path Command
 * 
 * Print where the cached copy of a remote file lives.
 */

import { CacheLayout } from '@cache-mirror/sync';
import { getErrorMessage } from '@cache-mirror/utils';
import type { CliConfig } from '../config/index.js';
import { printError } from '../lib/output.js';

export function pathCommand(repoId: string, pathInRepo: string, config: CliConfig): void {
  try {
    const layout = new CacheLayout(config.dataDir);
    console.log(layout.localCachePath(repoId, pathInRepo));
  } catch (error) {
    printError(getErrorMessage(error));
    process.exitCode = 1;
  }
}
