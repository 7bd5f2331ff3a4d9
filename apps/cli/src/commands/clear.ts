/**
 * Clear Command
 *
 * Forget every delivery so the next scan copies everything again.
 */

import { Ledger } from '@dropsort/delivery';
import { logger } from '@dropsort/utils';
import { loadCliConfig } from '../config/index.js';
import { printError, printSuccess } from '../lib/output.js';

export async function clearCommand(): Promise<void> {
  const config = loadCliConfig();
  const ledger = new Ledger(config.historyFile, logger.child({ component: 'cli' }, { level: 'warn' }));
  await ledger.load();

  const count = ledger.size;
  if (!(await ledger.clear())) {
    printError(`Could not write ${config.historyFile}`);
    process.exit(1);
  }

  printSuccess(`Cleared history for ${count} files`);
}
