/**
 * Remote Source
 *
 * Bucket source on top of an ObjectStore. Directories are key prefixes
 * under the configured base prefix.
 */

import { utimes } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger, ensureDir, type Logger } from '@dropsort/utils';
import { SourceUnavailableError } from '@dropsort/core';
import type { ItemIdentity, SourceItem } from '@dropsort/core';
import { identifyRemoteObject } from '../identity/identityComputer.js';
import type { ObjectStore, ObjectSummary } from './objectStore.js';
import type { SourceProvider } from './sourceProvider.js';

export interface RemoteSourceOptions {
  store: ObjectStore;
  // Without leading or trailing slashes
  prefix: string;
  markerFilename: string;
  logger?: Logger;
}

/**
 * Parent prefix of an object key; '' for keys at the bucket root
 */
export function parentPrefix(key: string): string {
  const index = key.lastIndexOf('/');
  return index === -1 ? '' : key.slice(0, index);
}

export function keyName(key: string): string {
  return key.slice(key.lastIndexOf('/') + 1);
}

function childPrefix(directory: string): string {
  return directory === '' ? '' : `${directory}/`;
}

export class RemoteSource implements SourceProvider {
  readonly kind = 'remote' as const;
  readonly prefix: string;
  readonly markerFilename: string;
  private store: ObjectStore;
  private logger: Logger;

  constructor(options: RemoteSourceOptions) {
    this.store = options.store;
    this.prefix = options.prefix;
    this.markerFilename = options.markerFilename;
    this.logger = options.logger ?? createLogger({ component: 'remote-source' });
  }

  describe(): string {
    return `s3://${this.store.bucket}/${this.prefix}`;
  }

  markerKey(directory: string): string {
    return `${childPrefix(directory)}${this.markerFilename}`;
  }

  /**
   * Full listing under the configured prefix
   */
  async listing(): Promise<ObjectSummary[]> {
    try {
      return await this.store.list(childPrefix(this.prefix));
    } catch (error) {
      throw new SourceUnavailableError(this.describe(), 'list', error);
    }
  }

  async listMarkers(): Promise<string[]> {
    const objects = await this.listing();
    const directories = objects
      .filter(object => keyName(object.key) === this.markerFilename)
      .map(object => parentPrefix(object.key));
    return [...new Set(directories)];
  }

  async readMarker(directory: string): Promise<string | null> {
    return this.store.readText(this.markerKey(directory));
  }

  async enumerateChildren(directory: string): Promise<SourceItem[]> {
    const objects = await this.store.list(childPrefix(directory), { recursive: false });

    return objects
      .filter(object => parentPrefix(object.key) === directory)
      .map(object => ({ key: object.key, name: keyName(object.key) }))
      .filter(item => item.name !== this.markerFilename && item.name !== '')
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async statIdentity(item: SourceItem): Promise<ItemIdentity | null> {
    return identifyRemoteObject(this.store, item.key);
  }

  async fetch(item: SourceItem, destinationPath: string, state: ItemIdentity): Promise<void> {
    await ensureDir(dirname(destinationPath));
    await this.store.download(item.key, destinationPath);
    await utimes(destinationPath, state.modifiedAt, state.modifiedAt);
    this.logger.debug({ key: item.key, destinationPath }, 'Downloaded object');
  }

  async exists(sourceKey: string): Promise<boolean> {
    return (await this.store.head(sourceKey)) !== null;
  }
}
