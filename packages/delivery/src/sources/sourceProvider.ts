/**
 * Source Provider
 *
 * The capability interface the delivery engine is written against. A
 * "directory" is an absolute path for local sources and a key prefix
 * (no trailing slash, '' for the bucket root) for remote ones.
 */

import type { ItemIdentity, SourceItem, SourceKind } from '@dropsort/core';

export interface SourceProvider {
  readonly kind: SourceKind;

  /**
   * Human-readable location for logs
   */
  describe(): string;

  /**
   * Every directory that directly contains a marker file
   */
  listMarkers(): Promise<string[]>;

  /**
   * Raw marker content, or null when the directory has no marker
   */
  readMarker(directory: string): Promise<string | null>;

  /**
   * Items directly inside the directory, marker excluded, not recursive
   */
  enumerateChildren(directory: string): Promise<SourceItem[]>;

  /**
   * Current fingerprint of an item, or null when it has vanished
   */
  statIdentity(item: SourceItem): Promise<ItemIdentity | null>;

  /**
   * Copy an item to an absolute local destination path
   */
  fetch(item: SourceItem, destinationPath: string, state: ItemIdentity): Promise<void>;

  /**
   * Whether the item behind a ledger key still exists
   */
  exists(sourceKey: string): Promise<boolean>;
}
