/**
 * Clean Command
 * 
 * Remove the file cache and its metadata store from disk.
 */

import ora from 'ora';
import { CacheLayout, CachedFilesCleaner, type CleanupReport } from '@cache-mirror/sync';
import type { CliConfig } from '../config/index.js';
import { printHeader, printKeyValue, printWarning } from '../lib/output.js';

export async function cleanCommand(config: CliConfig): Promise<CleanupReport> {
  const spinner = ora('Removing cached files...').start();

  const report = await new CachedFilesCleaner(new CacheLayout(config.dataDir)).run();

  if (report.failures.length === 0) {
    spinner.succeed('Cached files removed');
  } else {
    spinner.warn('Cached files partially removed');
  }

  printHeader(`Cache: ${config.dataDir}`);
  printKeyValue('Metadata store', report.removedDbFile ? 'removed' : 'not present');
  printKeyValue('Leftover temp directory', report.removedLeftoverTempDir ? 'removed' : 'not present');
  printKeyValue('Cache directory', report.removedCacheDir ? 'removed' : 'not present');

  for (const step of report.failures) {
    printWarning(`Failed to ${step}`);
  }
  if (report.failures.length > 0) {
    process.exitCode = 1;
  }

  return report;
}
