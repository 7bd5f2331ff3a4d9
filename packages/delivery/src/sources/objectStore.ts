/**
 * Object Store
 * 
 * Listing, probing and fetching of remote objects, plus the MinIO-backed
 * implementation used against any S3-compatible endpoint.
 */

import { Client } from 'minio';
import { isNumber, isObject, isString, hasErrorCode } from '@dropsort/utils';
import type { RemoteSourceConfig } from '@dropsort/core';

export interface ObjectSummary {
  key: string;
  sizeBytes: number;
  etag: string;
  lastModified: Date;
}

export interface ListOptions {
  // Default true
  recursive?: boolean;
}

export interface ObjectStore {
  readonly bucket: string;

  /**
   * Every object under the prefix, all pages. Non-recursive listings stop
   * at the next '/' and return direct children only.
   */
  list(prefix: string, options?: ListOptions): Promise<ObjectSummary[]>;

  /**
   * Metadata probe; null when the object does not exist
   */
  head(key: string): Promise<ObjectSummary | null>;

  /**
   * UTF-8 body of an object; null when it does not exist
   */
  readText(key: string): Promise<string | null>;

  download(key: string, destinationPath: string): Promise<void>;
}

const NOT_FOUND_CODES = ['NotFound', 'NoSuchKey'];

export function isObjectNotFound(error: unknown): boolean {
  return hasErrorCode(error, ...NOT_FOUND_CODES);
}

/**
 * ETags come back quoted from some calls and bare from others
 */
export function normalizeEtag(etag: string): string {
  return etag.replace(/^"+|"+$/g, '');
}

function toSummary(item: unknown): ObjectSummary | null {
  if (!isObject(item) || !isString(item['name']) || item['name'].endsWith('/')) {
    return null;
  }

  const lastModified = item['lastModified'];
  return {
    key: item['name'],
    sizeBytes: isNumber(item['size']) ? item['size'] : 0,
    etag: isString(item['etag']) ? normalizeEtag(item['etag']) : '',
    lastModified: lastModified instanceof Date ? lastModified : new Date(0),
  };
}

export class MinioObjectStore implements ObjectStore {
  private client: Client;
  readonly bucket: string;

  constructor(config: RemoteSourceConfig) {
    this.client = new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
      region: config.region,
    });
    this.bucket = config.bucket;
  }

  async list(prefix: string, options: ListOptions = {}): Promise<ObjectSummary[]> {
    // listObjectsV2 follows continuation tokens internally; common prefixes
    // of a non-recursive listing carry no name and are skipped
    const stream = this.client.listObjectsV2(this.bucket, prefix, options.recursive ?? true);
    const objects: ObjectSummary[] = [];

    for await (const item of stream) {
      const summary = toSummary(item);
      if (summary) {
        objects.push(summary);
      }
    }

    return objects;
  }

  async head(key: string): Promise<ObjectSummary | null> {
    try {
      const stat = await this.client.statObject(this.bucket, key);
      return {
        key,
        sizeBytes: stat.size,
        etag: normalizeEtag(stat.etag),
        lastModified: stat.lastModified,
      };
    } catch (error) {
      if (isObjectNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async readText(key: string): Promise<string | null> {
    try {
      const stream = await this.client.getObject(this.bucket, key);
      const chunks: Buffer[] = [];
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks).toString('utf8');
    } catch (error) {
      if (isObjectNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async download(key: string, destinationPath: string): Promise<void> {
    await this.client.fGetObject(this.bucket, key, destinationPath);
  }
}
