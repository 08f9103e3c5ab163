/**
 * Health Command
 * 
 * Show the effective configuration and check the upload target.
 */

import ora from 'ora';
import chalk from 'chalk';
import { describeAccount } from '@cache-mirror/core';
import type { MinioUploader } from '@cache-mirror/upload';
import type { CliConfig } from '../config/index.js';
import { createUploader } from '../lib/runtime.js';
import { printError, printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export type HealthCheckTarget = Pick<MinioUploader, 'healthCheck'>;

export async function healthCommand(
  config: CliConfig,
  target: HealthCheckTarget | null = createUploader(config)
): Promise<boolean> {
  printHeader('cache-mirror');

  printKeyValue('Data directory', config.dataDir);
  printKeyValue('Account', config.account ? describeAccount(config.account) : chalk.dim('none'));
  printKeyValue('Recreation check delay', `${config.autoUpdate.recreateCheckDelayMs}ms`);
  printKeyValue('Recheck order', config.autoUpdate.recheckOrder);
  printKeyValue(
    'Open quirk filter',
    `${config.autoUpdate.openQuirkFilter} (${config.autoUpdate.openQuirkWindowMs}ms, ` +
      'applies only to opens reported by an embedding application)'
  );
  console.log();

  if (!target) {
    printWarning('No upload target configured, uploads will fail');
    return false;
  }

  const spinner = ora('Checking upload target...').start();
  const healthy = await target.healthCheck();
  spinner.stop();

  if (healthy) {
    printSuccess('Upload target reachable');
  } else {
    printError('Upload target unreachable');
    process.exitCode = 1;
  }
  return healthy;
}
