/**
 * Identity Computer
 *
 * Derives a stable fingerprint for a source item from its location plus
 * the attributes that change when its content does: size and modification
 * time for local files, object key and ETag for remote objects.
 */

import { fnv1a64Hex, statOrNull } from '@dropsort/utils';
import type { ItemIdentity } from '@dropsort/core';
import type { ObjectStore } from '../sources/objectStore.js';

export type IdentitySubject =
  | { kind: 'local'; path: string; sizeBytes: number; modifiedMs: number }
  | { kind: 'remote'; key: string; contentTag: string };

export function computeIdentity(subject: IdentitySubject): string {
  switch (subject.kind) {
    case 'local':
      return fnv1a64Hex(`${subject.path}:${subject.sizeBytes}:${subject.modifiedMs}`);
    case 'remote':
      return fnv1a64Hex(`${subject.key}:${subject.contentTag}`);
  }
}

/**
 * Fingerprint a local file, or null when it no longer exists
 */
export async function identifyLocalFile(absolutePath: string): Promise<ItemIdentity | null> {
  const stats = await statOrNull(absolutePath);
  if (!stats || !stats.isFile()) {
    return null;
  }

  return {
    identity: computeIdentity({
      kind: 'local',
      path: absolutePath,
      sizeBytes: stats.size,
      modifiedMs: stats.mtimeMs,
    }),
    sizeBytes: stats.size,
    modifiedAt: stats.mtime,
  };
}

/**
 * Fingerprint a remote object from a metadata probe, or null when it is gone
 */
export async function identifyRemoteObject(store: ObjectStore, key: string): Promise<ItemIdentity | null> {
  const head = await store.head(key);
  if (!head) {
    return null;
  }

  return {
    identity: computeIdentity({ kind: 'remote', key, contentTag: head.etag }),
    sizeBytes: head.sizeBytes,
    modifiedAt: head.lastModified,
  };
}
