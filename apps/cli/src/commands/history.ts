/**
 * History Command
 *
 * Show what has been delivered so far.
 */

import { Ledger } from '@dropsort/delivery';
import { logger } from '@dropsort/utils';
import { loadCliConfig } from '../config/index.js';
import { formatHistory, historyToJson } from '../lib/history.js';
import { printJson, printLines } from '../lib/output.js';

interface HistoryOptions {
  detailed?: boolean;
  json?: boolean;
}

export async function historyCommand(options: HistoryOptions): Promise<void> {
  const config = loadCliConfig();
  const ledger = new Ledger(config.historyFile, logger.child({ component: 'cli' }, { level: 'warn' }));
  await ledger.load();

  if (options.json) {
    printJson(historyToJson(ledger.entries(), ledger.stats()));
    return;
  }

  printLines(formatHistory(ledger.entries(), ledger.stats(), options.detailed ?? false));
}
