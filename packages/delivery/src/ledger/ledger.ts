/**
 * Delivery Ledger
 *
 * Persisted mapping from source key to delivery record. The whole mapping
 * is rewritten after every mutation, so an unexpected stop loses at most
 * the copy that was in flight.
 *
 * Persisted form (one JSON document):
 *   { "<sourceKey>": { destination, timestamp, size, identity }, ... }
 */

import { z } from 'zod';
import {
  createLogger,
  isObject,
  safeReadFile,
  toMegabytes,
  writeFileAtomic,
  type Logger,
} from '@dropsort/utils';
import { LedgerPersistenceError, getErrorMessage } from '@dropsort/core';
import type { DeliveryRecord, DeliveryStats } from '@dropsort/core';

const persistedRecordSchema = z.object({
  destination: z.string().min(1),
  timestamp: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'not a timestamp'),
  size: z.number().int().nonnegative(),
  // Older history files carry no fingerprint; '' never matches a computed one
  identity: z.string().default(''),
});

type PersistedRecord = z.infer<typeof persistedRecordSchema>;

export type ExistenceCheck = (sourceKey: string) => boolean | Promise<boolean>;

export class Ledger {
  private records = new Map<string, DeliveryRecord>();
  private persistFailed = false;
  private logger: Logger;

  constructor(
    readonly filePath: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ component: 'ledger' });
  }

  /**
   * Read persisted state. A missing file starts empty; a corrupt one is
   * reported and also starts empty.
   */
  async load(): Promise<void> {
    this.records.clear();

    let raw: string | null;
    try {
      raw = await safeReadFile(this.filePath);
    } catch (error) {
      this.logger.error({ filePath: this.filePath, error: getErrorMessage(error) }, 'Error loading history, starting empty');
      return;
    }

    if (raw === null) {
      this.logger.info({ filePath: this.filePath }, 'No history file, starting empty');
      return;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.logger.error({ filePath: this.filePath, error: getErrorMessage(error) }, 'History file is corrupt, starting empty');
      return;
    }

    if (!isObject(document)) {
      this.logger.error({ filePath: this.filePath }, 'History file is not an object, starting empty');
      return;
    }

    let dropped = 0;
    for (const [sourceKey, value] of Object.entries(document)) {
      const parsed = persistedRecordSchema.safeParse(value);
      if (!parsed.success) {
        dropped++;
        this.logger.warn({ sourceKey, issues: parsed.error.issues.length }, 'Dropping malformed history entry');
        continue;
      }
      this.records.set(sourceKey, fromPersisted(sourceKey, parsed.data));
    }

    this.logger.info({ files: this.records.size, dropped }, `Loaded history for ${this.records.size} files`);
  }

  get(sourceKey: string): DeliveryRecord | undefined {
    return this.records.get(sourceKey);
  }

  has(sourceKey: string): boolean {
    return this.records.has(sourceKey);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * True while the in-memory mapping is ahead of the file on disk
   */
  get degraded(): boolean {
    return this.persistFailed;
  }

  entries(): DeliveryRecord[] {
    return [...this.records.values()];
  }

  /**
   * Replace-or-insert, then write through
   */
  async put(record: DeliveryRecord): Promise<boolean> {
    this.records.set(record.sourceKey, { ...record });
    return this.save();
  }

  /**
   * Delete an entry; the caller persists afterward
   */
  remove(sourceKey: string): boolean {
    return this.records.delete(sourceKey);
  }

  /**
   * Remove every entry whose source item is gone, persisting once at the end.
   * Entries whose check throws are kept.
   */
  async prune(existenceCheck: ExistenceCheck): Promise<string[]> {
    const removed: string[] = [];

    for (const sourceKey of [...this.records.keys()]) {
      let exists: boolean;
      try {
        exists = await existenceCheck(sourceKey);
      } catch (error) {
        this.logger.warn({ sourceKey, error: getErrorMessage(error) }, 'Existence check failed, keeping entry');
        continue;
      }

      if (!exists) {
        this.records.delete(sourceKey);
        removed.push(sourceKey);
      }
    }

    if (removed.length > 0) {
      this.logger.info({ removed: removed.length }, 'Pruned stale history entries');
      await this.save();
    }

    return removed;
  }

  async clear(): Promise<boolean> {
    this.records.clear();
    return this.save();
  }

  /**
   * Write the full mapping. Failures are logged, never thrown: the in-memory
   * ledger stays authoritative until the next successful write.
   */
  async save(): Promise<boolean> {
    // fromEntries defines own properties, so a key such as __proto__ survives
    const document: Record<string, PersistedRecord> = Object.fromEntries(
      [...this.records].map(([sourceKey, record]) => [sourceKey, toPersisted(record)])
    );

    try {
      await writeFileAtomic(this.filePath, JSON.stringify(document, null, 2));
    } catch (error) {
      this.persistFailed = true;
      const failure = new LedgerPersistenceError(this.filePath, error);
      this.logger.error({ code: failure.code, filePath: this.filePath }, failure.message);
      return false;
    }

    if (this.persistFailed) {
      this.logger.info({ filePath: this.filePath }, 'History file is consistent again');
      this.persistFailed = false;
    }
    return true;
  }

  stats(): DeliveryStats {
    let totalSizeBytes = 0;
    for (const record of this.records.values()) {
      totalSizeBytes += record.sizeBytes;
    }

    return {
      totalFiles: this.records.size,
      totalSizeBytes,
      totalSizeMb: toMegabytes(totalSizeBytes),
    };
  }
}

function fromPersisted(sourceKey: string, persisted: PersistedRecord): DeliveryRecord {
  return {
    sourceKey,
    destinationPath: persisted.destination,
    identity: persisted.identity,
    sizeBytes: persisted.size,
    deliveredAt: new Date(persisted.timestamp),
  };
}

function toPersisted(record: DeliveryRecord): PersistedRecord {
  return {
    destination: record.destinationPath,
    timestamp: record.deliveredAt.toISOString(),
    size: record.sizeBytes,
    identity: record.identity,
  };
}
