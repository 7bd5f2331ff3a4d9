/**
 * Delivery Engine
 *
 * Copies the items sitting beside a marker file into the directory the
 * marker names, at most once per unchanged source state.
 *
 * Per directory:
 * 1. Read and trim the marker (absent: nothing to do)
 * 2. Resolve and create the target directory
 * 3. For every item beside the marker: fingerprint it, skip it when the
 *    ledger already holds the same fingerprint, otherwise copy it and
 *    record the delivery
 *
 * One bad item never aborts the rest of the directory.
 */

import { join } from 'node:path';
import { createLogger, ensureDir, hasErrorCode, type Logger } from '@dropsort/utils';
import { getErrorMessage, isDropsortError } from '@dropsort/core';
import type { ItemIdentity, SourceItem } from '@dropsort/core';
import type { DestinationResolver, ResolvedTarget } from '../destination/destinationResolver.js';
import type { Ledger } from '../ledger/ledger.js';
import type { SourceProvider } from '../sources/sourceProvider.js';

export type DirectoryOutcome =
  | 'no-marker'
  | 'invalid-marker'
  | 'unresolvable'
  | 'target-failed'
  | 'source-failed'
  | 'processed';

export interface DirectoryReport {
  directory: string;
  outcome: DirectoryOutcome;
  target: string | null;
  copied: number;
  unchanged: number;
  vanished: number;
  failed: number;
}

export interface ScanReport {
  directories: DirectoryReport[];
  pruned: number;
  copied: number;
  unchanged: number;
  vanished: number;
  failed: number;
}

export interface DeliveryEngineOptions {
  forceRecopy?: boolean;
  now?: () => Date;
  logger?: Logger;
}

// Error codes meaning the item disappeared between listing and copying
const VANISHED_CODES = ['ENOENT', 'NoSuchKey', 'NotFound'];

type ItemOutcome = 'copied' | 'unchanged' | 'vanished' | 'failed';

export class DeliveryEngine {
  private forceRecopy: boolean;
  private now: () => Date;
  private logger: Logger;

  constructor(
    private readonly source: SourceProvider,
    private readonly ledger: Ledger,
    private readonly resolver: DestinationResolver,
    options: DeliveryEngineOptions = {}
  ) {
    this.forceRecopy = options.forceRecopy ?? false;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ component: 'delivery-engine' });
  }

  async processDirectory(directory: string): Promise<DirectoryReport> {
    const report: DirectoryReport = {
      directory,
      outcome: 'processed',
      target: null,
      copied: 0,
      unchanged: 0,
      vanished: 0,
      failed: 0,
    };

    let content: string | null;
    try {
      content = await this.source.readMarker(directory);
    } catch (error) {
      this.logger.warn({ directory, error: getErrorMessage(error) }, 'Cannot read marker');
      return { ...report, outcome: 'invalid-marker' };
    }

    if (content === null) {
      return { ...report, outcome: 'no-marker' };
    }

    const markerDestination = content.trim();
    if (markerDestination.length === 0) {
      this.logger.warn({ directory }, 'Empty destination in marker');
      return { ...report, outcome: 'invalid-marker' };
    }

    let target: ResolvedTarget;
    try {
      target = this.resolver.resolve(markerDestination);
    } catch (error) {
      if (!isDropsortError(error)) throw error;
      this.logger.error({ directory, code: error.code }, error.message);
      return { ...report, outcome: 'unresolvable' };
    }

    for (const warning of target.warnings) {
      this.logger.warn({ directory }, warning);
    }
    if (target.year) {
      this.logger.debug({ directory, year: target.year }, 'Using year prefix');
    }
    report.target = target.path;

    try {
      await ensureDir(target.path);
    } catch (error) {
      this.logger.error({ directory, target: target.path, error: getErrorMessage(error) }, 'Invalid target directory path');
      return { ...report, outcome: 'target-failed' };
    }

    let items: SourceItem[];
    try {
      items = await this.source.enumerateChildren(directory);
    } catch (error) {
      this.logger.error({ directory, error: getErrorMessage(error) }, 'Cannot enumerate directory');
      return { ...report, outcome: 'source-failed' };
    }

    this.logger.debug({ directory, target: target.path, items: items.length }, 'Processing directory');

    for (const item of items) {
      const outcome = await this.deliverItem(item, target.path);
      report[outcome]++;
    }

    if (report.copied > 0 || report.failed > 0) {
      this.logger.info(
        { directory, target: target.path, copied: report.copied, unchanged: report.unchanged, failed: report.failed },
        'Directory processed'
      );
    }

    return report;
  }

  private async deliverItem(item: SourceItem, targetDirectory: string): Promise<ItemOutcome> {
    let state: ItemIdentity | null;
    try {
      state = await this.source.statIdentity(item);
    } catch (error) {
      this.logger.error({ sourceKey: item.key, error: getErrorMessage(error) }, 'Cannot fingerprint item');
      return 'failed';
    }

    if (!state) {
      this.logger.warn({ sourceKey: item.key }, 'Item vanished before it could be copied');
      return 'vanished';
    }

    const existing = this.ledger.get(item.key);
    if (existing && existing.identity === state.identity && !this.forceRecopy) {
      this.logger.debug({ sourceKey: item.key }, 'Unchanged since last delivery');
      return 'unchanged';
    }

    const destinationPath = join(targetDirectory, item.name);
    try {
      await this.source.fetch(item, destinationPath, state);
    } catch (error) {
      if (hasErrorCode(error, ...VANISHED_CODES)) {
        this.logger.warn({ sourceKey: item.key }, 'Item vanished during copy');
        return 'vanished';
      }
      this.logger.error(
        { sourceKey: item.key, destinationPath, error: getErrorMessage(error) },
        'Copy failed'
      );
      return 'failed';
    }

    await this.ledger.put({
      sourceKey: item.key,
      destinationPath,
      identity: state.identity,
      sizeBytes: state.sizeBytes,
      deliveredAt: this.now(),
    });

    this.logger.info({ sourceKey: item.key, destinationPath }, `Copied: ${item.name} to ${targetDirectory}/`);
    return 'copied';
  }

  /**
   * Drop ledger entries whose source item no longer exists
   */
  async reconcile(): Promise<number> {
    const removed = await this.ledger.prune(sourceKey => this.source.exists(sourceKey));
    return removed.length;
  }

  /**
   * Reconcile, then process every directory holding a marker
   */
  async scanAll(): Promise<ScanReport> {
    this.logger.info({ source: this.source.describe() }, 'Scanning for marker files');

    const scan: ScanReport = {
      directories: [],
      pruned: await this.reconcile(),
      copied: 0,
      unchanged: 0,
      vanished: 0,
      failed: 0,
    };

    let directories: string[];
    try {
      directories = await this.source.listMarkers();
    } catch (error) {
      this.logger.error({ source: this.source.describe(), error: getErrorMessage(error) }, 'Scan failed');
      return scan;
    }

    for (const directory of directories) {
      const report = await this.processDirectory(directory);
      scan.directories.push(report);
      scan.copied += report.copied;
      scan.unchanged += report.unchanged;
      scan.vanished += report.vanished;
      scan.failed += report.failed;
    }

    this.logger.info(
      {
        directories: scan.directories.length,
        copied: scan.copied,
        unchanged: scan.unchanged,
        failed: scan.failed,
        pruned: scan.pruned,
      },
      'Scan complete'
    );

    return scan;
  }
}
