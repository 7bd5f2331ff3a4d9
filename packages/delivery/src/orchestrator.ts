/**
 * Orchestrator
 *
 * Wires the configured source, ledger, engine and trigger together and
 * owns the single work loop. Local sources are watched, remote sources
 * polled; the two modes never run in the same process.
 */

import { basename, dirname } from 'node:path';
import { createLogger, type Logger } from '@dropsort/utils';
import type { AppConfig, DeliveryStats } from '@dropsort/core';
import { DestinationResolver } from './destination/destinationResolver.js';
import { DeliveryEngine, type ScanReport } from './engine/deliveryEngine.js';
import { SerialQueue } from './engine/serialQueue.js';
import { Ledger } from './ledger/ledger.js';
import { LocalSource } from './sources/localSource.js';
import { MinioObjectStore, type ObjectStore } from './sources/objectStore.js';
import { RemoteSource } from './sources/remoteSource.js';
import { LocalTrigger } from './triggers/localTrigger.js';
import { RemoteTrigger } from './triggers/remoteTrigger.js';
import { FolderWatcher } from './watcher/folderWatcher.js';

export interface OrchestratorOverrides {
  // Replaces the MinIO client for remote sources
  objectStore?: ObjectStore;
  logger?: Logger;
}

interface Trigger {
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Matches the history file and the temp sibling it is written through
 */
export function isLedgerFile(historyFile: string): (absolutePath: string) => boolean {
  const directory = dirname(historyFile);
  const tempPrefix = `.${basename(historyFile)}.`;
  return (absolutePath) =>
    absolutePath === historyFile ||
    (dirname(absolutePath) === directory && basename(absolutePath).startsWith(tempPrefix));
}

export class Orchestrator {
  readonly ledger: Ledger;
  readonly engine: DeliveryEngine;
  readonly queue = new SerialQueue();
  private source: LocalSource | RemoteSource;
  private trigger: Trigger | null = null;
  private statsTimer: NodeJS.Timeout | null = null;
  private logger: Logger;

  constructor(
    private readonly config: AppConfig,
    overrides: OrchestratorOverrides = {}
  ) {
    this.logger = overrides.logger ?? createLogger({ component: 'orchestrator' });
    this.ledger = new Ledger(config.historyFile);

    if (config.source.kind === 'remote') {
      this.source = new RemoteSource({
        store: overrides.objectStore ?? new MinioObjectStore(config.source),
        prefix: config.source.prefix,
        markerFilename: config.markerFilename,
      });
    } else {
      this.source = new LocalSource({
        root: config.source.root,
        markerFilename: config.markerFilename,
        ignore: isLedgerFile(config.historyFile),
      });
    }

    this.engine = new DeliveryEngine(
      this.source,
      this.ledger,
      new DestinationResolver(config.destination),
      { forceRecopy: config.forceRecopy }
    );
  }

  /**
   * Load history and run a single full scan
   */
  async runOnce(): Promise<ScanReport> {
    await this.ledger.load();
    return this.queue.run(() => this.engine.scanAll());
  }

  /**
   * Initial scan, then watch or poll until stop() is called
   */
  async start(): Promise<ScanReport> {
    if (this.trigger) {
      throw new Error('Orchestrator is already running');
    }

    this.logger.info(
      { source: this.source.describe(), destination: this.config.destination.root, kind: this.source.kind },
      'dropsort starting'
    );
    if (this.config.destination.yearPrefix) {
      this.logger.info('Year prefix feature is enabled');
    }

    const initial = await this.runOnce();
    this.logStats();

    this.trigger = this.createTrigger();
    await this.trigger.start();

    this.statsTimer = setInterval(() => this.logStats(), this.config.intervals.statsMs);
    return initial;
  }

  async stop(): Promise<void> {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }

    await this.trigger?.stop();
    this.trigger = null;

    // Work already queued runs to completion; nothing is aborted mid-copy
    await this.queue.onIdle();

    this.logger.info('Stopping dropsort');
    this.logStats('Final statistics');
  }

  stats(): DeliveryStats {
    return this.ledger.stats();
  }

  logStats(message: string = 'Copy statistics'): void {
    const stats = this.ledger.stats();
    if (stats.totalFiles === 0) {
      return;
    }
    this.logger.info(
      { totalFiles: stats.totalFiles, totalSizeMb: stats.totalSizeMb, degraded: this.ledger.degraded },
      message
    );
  }

  private createTrigger(): Trigger {
    const { intervals } = this.config;

    if (this.source.kind === 'remote') {
      return new RemoteTrigger(this.engine, this.source, this.queue, {
        pollIntervalMs: intervals.remotePollMs,
        rescanIntervalMs: intervals.remoteRescanMs,
      });
    }

    const watcher = new FolderWatcher({
      root: this.source.root,
      ignore: isLedgerFile(this.config.historyFile),
    });
    return new LocalTrigger(this.engine, this.source, this.queue, watcher, {
      quietMs: intervals.debounceQuietMs,
      drainIntervalMs: intervals.drainMs,
      rescanIntervalMs: intervals.localRescanMs,
    });
  }
}
