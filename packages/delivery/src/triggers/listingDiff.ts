/**
 * Listing Diff
 *
 * Compares two full listings of a remote prefix.
 */

import type { ObjectSummary } from '../sources/objectStore.js';
import { parentPrefix } from '../sources/remoteSource.js';

export interface ListingEntry {
  sizeBytes: number;
  tag: string;
}

export type Listing = Map<string, ListingEntry>;

export interface ListingDiff {
  added: string[];
  modified: string[];
  deleted: string[];
}

export function toListing(objects: ObjectSummary[]): Listing {
  return new Map(objects.map(object => [object.key, { sizeBytes: object.sizeBytes, tag: object.etag }]));
}

export function diffListings(previous: Listing, current: Listing): ListingDiff {
  const added: string[] = [];
  const modified: string[] = [];
  const deleted: string[] = [];

  for (const [key, entry] of current) {
    const before = previous.get(key);
    if (!before) {
      added.push(key);
    } else if (before.tag !== entry.tag) {
      modified.push(key);
    }
  }

  for (const key of previous.keys()) {
    if (!current.has(key)) {
      deleted.push(key);
    }
  }

  return { added, modified, deleted };
}

/**
 * Distinct parent prefixes of every added or modified key, in first-seen order
 */
export function changedDirectories(diff: ListingDiff): string[] {
  return [...new Set([...diff.added, ...diff.modified].map(parentPrefix))];
}
