/**
 * Local Source
 *
 * Directory-tree source. Marker discovery walks the tree through an
 * explicit work queue instead of recursion.
 */

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  copyFilePreservingMetadata,
  createLogger,
  hasErrorCode,
  safeReadFile,
  statOrNull,
  type Logger,
} from '@dropsort/utils';
import { SourceUnavailableError, getErrorMessage } from '@dropsort/core';
import type { ItemIdentity, SourceItem } from '@dropsort/core';
import { identifyLocalFile } from '../identity/identityComputer.js';
import type { SourceProvider } from './sourceProvider.js';

export interface LocalSourceOptions {
  root: string;
  markerFilename: string;
  // Paths that are never deliverable, e.g. the history file
  ignore?: (absolutePath: string) => boolean;
  logger?: Logger;
}

export class LocalSource implements SourceProvider {
  readonly kind = 'local' as const;
  readonly root: string;
  readonly markerFilename: string;
  private ignore: (absolutePath: string) => boolean;
  private logger: Logger;

  constructor(options: LocalSourceOptions) {
    this.root = resolve(options.root);
    this.markerFilename = options.markerFilename;
    this.ignore = options.ignore ?? (() => false);
    this.logger = options.logger ?? createLogger({ component: 'local-source' });
  }

  describe(): string {
    return this.root;
  }

  markerPath(directory: string): string {
    return join(directory, this.markerFilename);
  }

  async listMarkers(startDirectory: string = this.root): Promise<string[]> {
    const found: string[] = [];
    const queue: string[] = [resolve(startDirectory)];

    while (queue.length > 0) {
      const directory = queue.shift();
      if (directory === undefined) break;

      let entries: Dirent[];
      try {
        entries = await readdir(directory, { withFileTypes: true });
      } catch (error) {
        if (directory === this.root) {
          throw new SourceUnavailableError(this.root, 'listMarkers', error);
        }
        if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
          this.logger.debug({ directory }, 'Directory vanished during scan');
        } else {
          this.logger.warn({ directory, error }, 'Cannot read directory, skipping subtree');
        }
        continue;
      }

      for (const entry of entries) {
        if (entry.isDirectory()) {
          queue.push(join(directory, entry.name));
        } else if (entry.name === this.markerFilename && (await this.isRegularFile(directory, entry))) {
          found.push(directory);
        }
      }
    }

    return found;
  }

  async hasMarker(directory: string): Promise<boolean> {
    const stats = await statOrNull(this.markerPath(directory));
    return stats !== null && stats.isFile();
  }

  async readMarker(directory: string): Promise<string | null> {
    return safeReadFile(this.markerPath(directory));
  }

  async enumerateChildren(directory: string): Promise<SourceItem[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    const items: SourceItem[] = [];

    for (const entry of entries) {
      if (entry.name === this.markerFilename) continue;
      const key = join(directory, entry.name);
      if (this.ignore(key) || !(await this.isRegularFile(directory, entry))) continue;
      items.push({ key, name: entry.name });
    }

    return items.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Regular files, and symlinks that resolve to one
   */
  private async isRegularFile(directory: string, entry: Dirent): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;

    const linkPath = join(directory, entry.name);
    try {
      const target = await statOrNull(linkPath);
      return target !== null && target.isFile();
    } catch (error) {
      this.logger.warn({ path: linkPath, error: getErrorMessage(error) }, 'Cannot resolve symlink, skipping');
      return false;
    }
  }

  async statIdentity(item: SourceItem): Promise<ItemIdentity | null> {
    return identifyLocalFile(item.key);
  }

  async fetch(item: SourceItem, destinationPath: string): Promise<void> {
    await copyFilePreservingMetadata(item.key, destinationPath);
  }

  async exists(sourceKey: string): Promise<boolean> {
    return (await statOrNull(sourceKey)) !== null;
  }
}
