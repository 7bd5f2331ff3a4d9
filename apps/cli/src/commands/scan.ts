/**
 * Scan Command
 *
 * One reconcile-and-scan pass, then exit.
 */

import ora from 'ora';
import chalk from 'chalk';
import { Orchestrator } from '@dropsort/delivery';
import { getErrorMessage } from '@dropsort/core';
import { formatDuration } from '@dropsort/utils';
import { loadCliConfig } from '../config/index.js';
import { printError, printKeyValue, printWarning } from '../lib/output.js';

export async function scanCommand(): Promise<void> {
  const config = loadCliConfig();
  const spinner = ora('Scanning for marker files...').start();

  const startedAt = Date.now();

  try {
    const report = await new Orchestrator(config).runOnce();
    spinner.succeed(
      `Scanned ${report.directories.length} marker directories in ${formatDuration(Date.now() - startedAt)}`
    );

    printKeyValue('Copied', chalk.green(report.copied));
    printKeyValue('Unchanged', report.unchanged);
    printKeyValue('Vanished', report.vanished);
    printKeyValue('Failed', report.failed > 0 ? chalk.red(report.failed) : report.failed);
    printKeyValue('Pruned', report.pruned);

    if (report.failed > 0) {
      printWarning(`${report.failed} items could not be copied, see the log for details`);
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail('Scan failed');
    printError(getErrorMessage(error));
    process.exit(1);
  }
}
