#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for cache-mirror.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getErrorMessage } from '@cache-mirror/utils';
import { loadConfig, type CliConfig } from './config/index.js';
import { printError } from './lib/output.js';
import { watchCommand } from './commands/watch.js';
import { cleanCommand } from './commands/clean.js';
import { pathCommand } from './commands/path.js';
import { healthCommand } from './commands/health.js';

/**
 * Run a command with the loaded configuration; failures end up as output
 */
function withConfig<Args extends unknown[]>(
  action: (config: CliConfig, ...args: Args) => unknown
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(loadConfig(), ...args);
    } catch (error) {
      printError(getErrorMessage(error));
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('cache-mirror')
  .description('Re-upload cached remote files when they are edited locally')
  .version('0.1.0');

program
  .command('watch <repoId> <paths...>')
  .description('Watch cached files of a repo and upload every saved edit')
  .action(withConfig((config: CliConfig, repoId: string, paths: string[]) => watchCommand(repoId, paths, config)));

program
  .command('clean')
  .description('Remove the file cache and its metadata store')
  .action(withConfig((config: CliConfig) => cleanCommand(config)));

program
  .command('path <repoId> <pathInRepo>')
  .description('Print the local cache path of a remote file')
  .action(withConfig((config: CliConfig, repoId: string, pathInRepo: string) => pathCommand(repoId, pathInRepo, config)));

program
  .command('health')
  .description('Show configuration and check the upload target')
  .action(withConfig((config: CliConfig) => healthCommand(config)));

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('cache-mirror --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
