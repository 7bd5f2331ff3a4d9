#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * `run` (the default) keeps dropsort running in the foreground; the other
 * commands inspect or reset the delivery history.
 */

// Loads .env before any logger is created
import './config/env.js';

import { Command } from 'commander';
import chalk from 'chalk';
import { getErrorMessage } from '@dropsort/core';
import { runCommand } from './commands/run.js';
import { scanCommand } from './commands/scan.js';
import { historyCommand } from './commands/history.js';
import { clearCommand } from './commands/clear.js';
import { printError } from './lib/output.js';

const program = new Command();

program
  .name('dropsort')
  .description('Copy files beside marker files to the destination they name')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Scan, then watch or poll for changes until interrupted')
  .action(runCommand);

program
  .command('scan')
  .description('Run a single full scan and exit')
  .action(scanCommand);

program
  .command('history')
  .description('Show the delivery history')
  .option('-d, --detailed', 'Show full paths and timestamps')
  .option('--json', 'Output in JSON format')
  .action(historyCommand);

program
  .command('clear')
  .description('Clear the delivery history')
  .action(clearCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('dropsort --help'), 'for available commands');
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  printError(getErrorMessage(error));
  process.exit(1);
});
