/**
 * Local Trigger
 *
 * Drives the engine from filesystem events. A marker create/modify is
 * processed right away; any other file event queues the nearest ancestor
 * directory holding a marker, and a periodic drain step processes the
 * queued directories in one pass once the quiet interval has passed since
 * the previous drain. A separate timer runs full rescans.
 *
 * Pending directory lifecycle: idle -> queued -> processing -> idle
 */

import { basename, dirname, relative, isAbsolute, sep } from 'node:path';
import { createLogger, type Logger } from '@dropsort/utils';
import { getErrorMessage } from '@dropsort/core';
import type { DeliveryEngine, DirectoryReport, ScanReport } from '../engine/deliveryEngine.js';
import type { SerialQueue } from '../engine/serialQueue.js';
import type { LocalSource } from '../sources/localSource.js';
import type { FolderWatcher, WatchEvent } from '../watcher/folderWatcher.js';

export interface LocalTriggerOptions {
  quietMs: number;
  drainIntervalMs: number;
  rescanIntervalMs: number;
  now?: () => number;
  logger?: Logger;
}

export class LocalTrigger {
  private pending = new Set<string>();
  private lastDrainAt: number;
  private draining = false;
  private rescanning = false;
  private drainTimer: NodeJS.Timeout | null = null;
  private rescanTimer: NodeJS.Timeout | null = null;
  private now: () => number;
  private logger: Logger;

  constructor(
    private readonly engine: DeliveryEngine,
    private readonly source: LocalSource,
    private readonly queue: SerialQueue,
    private readonly watcher: FolderWatcher,
    private readonly options: LocalTriggerOptions
  ) {
    this.now = options.now ?? Date.now;
    this.lastDrainAt = this.now();
    this.logger = options.logger ?? createLogger({ component: 'local-trigger' });
  }

  async start(): Promise<void> {
    this.watcher.on('event', (event) => {
      this.handleEvent(event).catch((error: unknown) => {
        this.logger.error({ path: event.path, error: getErrorMessage(error) }, 'Failed to handle file event');
      });
    });
    this.watcher.on('error', ({ path, error }) => {
      this.logger.error({ path, error: getErrorMessage(error) }, 'Watcher error');
    });

    await this.watcher.start();

    this.drainTimer = setInterval(() => {
      this.drain().catch((error: unknown) => {
        this.logger.error({ error: getErrorMessage(error) }, 'Drain failed');
      });
    }, this.options.drainIntervalMs);

    this.rescanTimer = setInterval(() => {
      this.rescan().catch((error: unknown) => {
        this.logger.error({ error: getErrorMessage(error) }, 'Rescan failed');
      });
    }, this.options.rescanIntervalMs);

    this.logger.info({ root: this.source.root }, 'Watching for changes');
  }

  async stop(): Promise<void> {
    if (this.drainTimer) {
      clearInterval(this.drainTimer);
      this.drainTimer = null;
    }
    if (this.rescanTimer) {
      clearInterval(this.rescanTimer);
      this.rescanTimer = null;
    }
    await this.watcher.stop();
  }

  /**
   * Directories currently waiting for the next drain
   */
  pendingDirectories(): string[] {
    return [...this.pending];
  }

  async handleEvent(event: WatchEvent): Promise<DirectoryReport | null> {
    if (!this.isInsideRoot(event.path)) {
      return null;
    }

    if (!event.isDirectory && basename(event.path) === this.source.markerFilename) {
      return this.handleMarkerEvent(event);
    }

    if (event.type === 'deleted') {
      return null;
    }

    if (event.isDirectory) {
      // A directory moved in whole may carry markers of its own
      for (const directory of await this.source.listMarkers(event.path)) {
        this.enqueue(directory);
      }
    }

    const owner = await this.findMarkerDirectory(event.isDirectory ? event.path : dirname(event.path));
    if (owner) {
      this.enqueue(owner);
    }
    return null;
  }

  private async handleMarkerEvent(event: WatchEvent): Promise<DirectoryReport | null> {
    const directory = dirname(event.path);

    if (event.type === 'deleted') {
      this.logger.info({ directory }, 'Marker file removed');
      return null;
    }

    this.logger.info({ directory }, event.type === 'created' ? 'New marker file detected' : 'Modified marker file detected');
    this.pending.delete(directory);
    return this.queue.run(() => this.engine.processDirectory(directory));
  }

  private enqueue(directory: string): void {
    if (!this.pending.has(directory)) {
      this.logger.debug({ directory }, 'Directory queued');
      this.pending.add(directory);
    }
  }

  /**
   * Process every queued directory once the quiet interval has elapsed
   */
  async drain(): Promise<DirectoryReport[]> {
    if (this.draining || this.pending.size === 0) {
      return [];
    }

    const now = this.now();
    if (now - this.lastDrainAt < this.options.quietMs) {
      return [];
    }

    this.draining = true;
    this.lastDrainAt = now;
    const directories = [...this.pending];
    this.pending.clear();

    try {
      const reports: DirectoryReport[] = [];
      for (const directory of directories) {
        reports.push(await this.queue.run(() => this.engine.processDirectory(directory)));
      }
      return reports;
    } finally {
      this.draining = false;
    }
  }

  /**
   * Full reconcile + scan; skipped while a previous one is still queued
   */
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

  /**
   * Walk upward from a directory to the watched root, looking for a marker
   */
  async findMarkerDirectory(startDirectory: string): Promise<string | null> {
    let directory = startDirectory;

    while (this.isInsideRoot(directory)) {
      if (await this.source.hasMarker(directory)) {
        return directory;
      }
      if (directory === this.source.root) {
        break;
      }
      directory = dirname(directory);
    }

    return null;
  }

  private isInsideRoot(path: string): boolean {
    const rel = relative(this.source.root, path);
    return rel === '' || !(rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel));
  }
}
