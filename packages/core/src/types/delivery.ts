/**
 * Delivery Types
 */

export type SourceKind = 'local' | 'remote';

/**
 * One delivered source item, keyed by `sourceKey` in the ledger
 */
export interface DeliveryRecord {
  // Absolute local path or remote object key
  sourceKey: string;
  destinationPath: string;
  identity: string;
  sizeBytes: number;
  deliveredAt: Date;
}

/**
 * A file (local) or object (remote) sitting beside a marker
 */
export interface SourceItem {
  // Absolute local path or remote object key
  key: string;
  // Last path segment, used as the destination file name
  name: string;
}

/**
 * Mutable state of a source item at the moment it was examined
 */
export interface ItemIdentity {
  identity: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface DeliveryStats {
  totalFiles: number;
  totalSizeBytes: number;
  totalSizeMb: number;
}
