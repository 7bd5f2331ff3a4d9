/**
 * Folder Watcher
 * 
 * Recursive fs.watch subscription that turns raw notifications into
 * created / modified / deleted events. Notifications for the same path
 * are coalesced over a short debounce window.
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { join, resolve } from 'node:path';
import { statOrNull } from '@dropsort/utils';

export type WatchEventType = 'created' | 'modified' | 'deleted';

export interface WatchEvent {
  type: WatchEventType;
  path: string;
  isDirectory: boolean;
  timestamp: Date;
}

export interface WatcherConfig {
  root: string;

  // Coalescing window per path in ms
  debounceMs?: number;

  // Absolute paths never reported
  ignore?: (absolutePath: string) => boolean;
}

export interface WatchFailure {
  path: string;
  error: unknown;
}

export declare interface FolderWatcher {
  on(event: 'event', listener: (event: WatchEvent) => void): this;
  on(event: 'error', listener: (failure: WatchFailure) => void): this;
  on(event: 'ready', listener: (root: string) => void): this;
  on(event: 'close', listener: () => void): this;
}

export class FolderWatcher extends EventEmitter {
  private root: string;
  private debounceMs: number;
  private ignore: (absolutePath: string) => boolean;
  private watcher: FSWatcher | null = null;
  private debounceTimers: Map<string, NodeJS.Timeout> = new Map();
  private notified: Map<string, string> = new Map();

  constructor(config: WatcherConfig) {
    super();
    this.root = resolve(config.root);
    this.debounceMs = config.debounceMs ?? 100;
    this.ignore = config.ignore ?? (() => false);
  }

  /**
   * Start watching the root directory tree
   */
  async start(): Promise<void> {
    if (this.watcher) {
      throw new Error('Watcher is already running');
    }

    this.watcher = watch(this.root, { recursive: true }, (eventType, filename) => {
      if (filename) {
        this.handleNotification(eventType, join(this.root, filename.toString()));
      }
    });

    this.watcher.on('error', (error) => {
      this.emit('error', { path: this.root, error });
    });

    this.emit('ready', this.root);
  }

  /**
   * Stop watching and drop pending notifications
   */
  async stop(): Promise<void> {
    this.watcher?.close();
    this.watcher = null;

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
    this.notified.clear();

    this.emit('close');
  }

  get running(): boolean {
    return this.watcher !== null;
  }

  private handleNotification(eventType: string, fullPath: string): void {
    if (this.ignore(fullPath)) {
      return;
    }

    // A rename seen anywhere in the window wins over a plain change
    const previous = this.notified.get(fullPath);
    this.notified.set(fullPath, previous === 'rename' ? previous : eventType);

    const existingTimer = this.debounceTimers.get(fullPath);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(fullPath);
      const notifiedAs = this.notified.get(fullPath) ?? eventType;
      this.notified.delete(fullPath);
      this.classify(notifiedAs, fullPath).catch((error: unknown) => {
        this.emit('error', { path: fullPath, error });
      });
    }, this.debounceMs);

    this.debounceTimers.set(fullPath, timer);
  }

  private async classify(eventType: string, fullPath: string): Promise<void> {
    const stats = await statOrNull(fullPath);

    let type: WatchEventType;
    if (!stats) {
      type = 'deleted';
    } else if (eventType === 'rename') {
      type = 'created';
    } else {
      type = 'modified';
    }

    this.emit('event', {
      type,
      path: fullPath,
      isDirectory: stats?.isDirectory() ?? false,
      timestamp: new Date(),
    });
  }
}
