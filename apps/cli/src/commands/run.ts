/**
 * Run Command
 *
 * Initial scan, then watch (local) or poll (remote) until interrupted.
 */

import chalk from 'chalk';
import { Orchestrator } from '@dropsort/delivery';
import { getErrorMessage } from '@dropsort/core';
import { loadCliConfig } from '../config/index.js';
import { printError, printInfo } from '../lib/output.js';

export async function runCommand(): Promise<void> {
  const config = loadCliConfig();
  const orchestrator = new Orchestrator(config);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    printInfo(`Received ${signal}, finishing in-flight work...`);
    orchestrator
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        printError(getErrorMessage(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const source = config.source.kind === 'remote'
    ? `s3://${config.source.bucket}/${config.source.prefix}`
    : config.source.root;
  printInfo(`Delivering from ${chalk.cyan(source)} to ${chalk.cyan(config.destination.root)}`);

  await orchestrator.start();
}
