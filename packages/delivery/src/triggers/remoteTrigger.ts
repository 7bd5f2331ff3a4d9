/**
 * Remote Trigger
 *
 * Polls the full listing of the remote prefix and diffs it against the
 * previous one; directories holding new or modified objects are processed
 * once each. An independent timer re-walks every marker directory in case
 * a diff was missed. Both run through the serial queue and neither starts
 * while its previous run is still pending.
 */

import { createLogger, type Logger } from '@dropsort/utils';
import { getErrorMessage } from '@dropsort/core';
import type { DeliveryEngine, DirectoryReport, ScanReport } from '../engine/deliveryEngine.js';
import type { SerialQueue } from '../engine/serialQueue.js';
import type { RemoteSource } from '../sources/remoteSource.js';
import {
  changedDirectories,
  diffListings,
  toListing,
  type Listing,
  type ListingDiff,
} from './listingDiff.js';

export interface RemoteTriggerOptions {
  pollIntervalMs: number;
  rescanIntervalMs: number;
  logger?: Logger;
}

export interface PollResult {
  diff: ListingDiff;
  reports: DirectoryReport[];
}

export class RemoteTrigger {
  private lastKnownListing: Listing = new Map();
  private polling = false;
  private rescanning = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private rescanTimer: NodeJS.Timeout | null = null;
  private logger: Logger;

  constructor(
    private readonly engine: DeliveryEngine,
    private readonly source: RemoteSource,
    private readonly queue: SerialQueue,
    private readonly options: RemoteTriggerOptions
  ) {
    this.logger = options.logger ?? createLogger({ component: 'remote-trigger' });
  }

  async start(): Promise<void> {
    this.pollTimer = setInterval(() => {
      this.poll().catch((error: unknown) => {
        this.logger.error({ error: getErrorMessage(error) }, 'Poll failed');
      });
    }, this.options.pollIntervalMs);

    this.rescanTimer = setInterval(() => {
      this.rescan().catch((error: unknown) => {
        this.logger.error({ error: getErrorMessage(error) }, 'Rescan failed');
      });
    }, this.options.rescanIntervalMs);

    this.logger.info(
      { source: this.source.describe(), pollIntervalMs: this.options.pollIntervalMs },
      'Polling for changes'
    );
  }

  async stop(): Promise<void> {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.rescanTimer) {
      clearInterval(this.rescanTimer);
      this.rescanTimer = null;
    }
  }

  knownKeys(): string[] {
    return [...this.lastKnownListing.keys()];
  }

  /**
   * One poll tick. Returns null when skipped or when the listing failed;
   * a failed listing leaves the previous one in place.
   */
  async poll(): Promise<PollResult | null> {
    if (this.polling) {
      this.logger.debug('Previous poll still running, skipping');
      return null;
    }

    this.polling = true;
    try {
      return await this.queue.run(() => this.pollOnce());
    } finally {
      this.polling = false;
    }
  }

  private async pollOnce(): Promise<PollResult | null> {
    let current: Listing;
    try {
      current = toListing(await this.source.listing());
    } catch (error) {
      this.logger.error({ source: this.source.describe(), error: getErrorMessage(error) }, 'Listing failed, skipping tick');
      return null;
    }

    const diff = diffListings(this.lastKnownListing, current);
    if (diff.deleted.length > 0) {
      this.logger.debug({ deleted: diff.deleted.length }, 'Objects removed from source');
    }

    const reports: DirectoryReport[] = [];
    for (const directory of changedDirectories(diff)) {
      reports.push(await this.engine.processDirectory(directory));
    }

    this.lastKnownListing = current;
    return { diff, reports };
  }

  async rescan(): Promise<ScanReport | null> {
    if (this.rescanning) {
      this.logger.debug('Previous rescan still running, skipping');
      return null;
    }

    this.rescanning = true;
    try {
      return await this.queue.run(() => this.engine.scanAll());
    } finally {
      this.rescanning = false;
    }
  }
}
