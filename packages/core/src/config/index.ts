/**
 * Application Configuration
 *
 * Environment-style settings validated once at startup into a frozen
 * AppConfig that is passed explicitly into every component.
 */

import { resolve, join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const TRUE_VALUES = ['true', 'yes', '1'];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const flag = (defaultValue: 'true' | 'false') =>
  z.string().default(defaultValue).transform(v => TRUE_VALUES.includes(v.trim().toLowerCase()));

const intervalMs = (defaultValue: string) =>
  z.string().default(defaultValue).transform(Number).pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Paths
  SOURCE_DIR: z.string().min(1).default('source'),
  DEST_DIR: z.string().min(1).default('destination'),
  HISTORY_FILE: z.string().min(1).optional(),
  HISTORY_DIR: z.string().min(1).optional(),
  MARKER_FILENAME: z.string().min(1).default('.dropsort'),

  // Destination templating
  ENABLE_YEAR_PREFIX: flag('false'),
  ENABLE_DRIVE_SUFFIX: flag('false'),
  DRIVE_SUFFIX: z.string().min(1).default('incoming'),
  FORCE_RECOPY: flag('false'),

  // Remote source
  USE_S3_SOURCE: flag('false'),
  S3_ENDPOINT: z.string().min(1).default('http://localhost:9000'),
  S3_ACCESS_KEY: z.string().optional(),
  S3_SECRET_KEY: z.string().optional(),
  S3_BUCKET: z.string().min(1).default('dropsort-source'),
  S3_REGION: z.string().min(1).default('us-east-1'),
  S3_PATH_PREFIX: z.string().default(''),

  // Timers
  LOCAL_RESCAN_INTERVAL_MS: intervalMs('300000'),
  REMOTE_POLL_INTERVAL_MS: intervalMs('30000'),
  REMOTE_RESCAN_INTERVAL_MS: intervalMs('300000'),
  DEBOUNCE_QUIET_MS: intervalMs('2000'),
  DRAIN_INTERVAL_MS: intervalMs('500'),
  STATS_INTERVAL_MS: intervalMs('300000'),
});

export const DEFAULT_HISTORY_FILENAME = 'dropsort_history.json';

export interface LocalSourceConfig {
  readonly kind: 'local';
  readonly root: string;
}

export interface RemoteSourceConfig {
  readonly kind: 'remote';
  readonly endPoint: string;
  readonly port: number;
  readonly useSSL: boolean;
  readonly accessKey: string;
  readonly secretKey: string;
  readonly bucket: string;
  readonly region: string;
  // Key prefix without leading or trailing slashes; '' for the whole bucket
  readonly prefix: string;
}

export type SourceConfig = LocalSourceConfig | RemoteSourceConfig;

export interface DriveSuffixConfig {
  readonly enabled: boolean;
  readonly segment: string;
}

export interface DestinationConfig {
  readonly root: string;
  readonly yearPrefix: boolean;
  readonly driveSuffix: DriveSuffixConfig;
}

export interface IntervalConfig {
  readonly localRescanMs: number;
  readonly remotePollMs: number;
  readonly remoteRescanMs: number;
  readonly debounceQuietMs: number;
  readonly drainMs: number;
  readonly statsMs: number;
}

export interface AppConfig {
  readonly logLevel: LogLevel;
  readonly source: SourceConfig;
  readonly destination: DestinationConfig;
  readonly historyFile: string;
  readonly markerFilename: string;
  readonly forceRecopy: boolean;
  readonly intervals: IntervalConfig;
}

/**
 * Split an endpoint URL into the host/port/TLS triple the S3 client takes
 */
export function parseEndpoint(endpoint: string): { endPoint: string; port: number; useSSL: boolean } {
  const withScheme = /^[a-z]+:\/\//i.test(endpoint) ? endpoint : `http://${endpoint}`;
  const url = new URL(withScheme);
  const useSSL = url.protocol === 'https:';
  return {
    endPoint: url.hostname,
    port: url.port ? Number(url.port) : (useSSL ? 443 : 80),
    useSSL,
  };
}

export function normalizePrefix(prefix: string): string {
  return prefix.trim().replace(/^\/+|\/+$/g, '');
}

/**
 * Build the application configuration from environment variables
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigurationError(
      parseResult.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = parseResult.data;

  let source: SourceConfig;
  if (parsed.USE_S3_SOURCE) {
    const issues: string[] = [];
    if (!parsed.S3_ACCESS_KEY) issues.push('S3_ACCESS_KEY: required when USE_S3_SOURCE is enabled');
    if (!parsed.S3_SECRET_KEY) issues.push('S3_SECRET_KEY: required when USE_S3_SOURCE is enabled');

    let endpoint: ReturnType<typeof parseEndpoint> | null = null;
    try {
      endpoint = parseEndpoint(parsed.S3_ENDPOINT);
    } catch {
      issues.push(`S3_ENDPOINT: not a valid URL (${parsed.S3_ENDPOINT})`);
    }

    if (issues.length > 0 || !endpoint || !parsed.S3_ACCESS_KEY || !parsed.S3_SECRET_KEY) {
      throw new ConfigurationError(issues);
    }

    source = Object.freeze({
      kind: 'remote',
      ...endpoint,
      accessKey: parsed.S3_ACCESS_KEY,
      secretKey: parsed.S3_SECRET_KEY,
      bucket: parsed.S3_BUCKET,
      region: parsed.S3_REGION,
      prefix: normalizePrefix(parsed.S3_PATH_PREFIX),
    });
  } else {
    source = Object.freeze({ kind: 'local', root: resolve(cwd, parsed.SOURCE_DIR) });
  }

  const historyFile = parsed.HISTORY_FILE
    ?? (parsed.HISTORY_DIR ? join(parsed.HISTORY_DIR, DEFAULT_HISTORY_FILENAME) : DEFAULT_HISTORY_FILENAME);

  return Object.freeze({
    logLevel: parsed.LOG_LEVEL,
    source,
    destination: Object.freeze({
      root: resolve(cwd, parsed.DEST_DIR),
      yearPrefix: parsed.ENABLE_YEAR_PREFIX,
      driveSuffix: Object.freeze({
        enabled: parsed.ENABLE_DRIVE_SUFFIX,
        segment: parsed.DRIVE_SUFFIX,
      }),
    }),
    historyFile: resolve(cwd, historyFile),
    markerFilename: parsed.MARKER_FILENAME,
    forceRecopy: parsed.FORCE_RECOPY,
    intervals: Object.freeze({
      localRescanMs: parsed.LOCAL_RESCAN_INTERVAL_MS,
      remotePollMs: parsed.REMOTE_POLL_INTERVAL_MS,
      remoteRescanMs: parsed.REMOTE_RESCAN_INTERVAL_MS,
      debounceQuietMs: parsed.DEBOUNCE_QUIET_MS,
      drainMs: parsed.DRAIN_INTERVAL_MS,
      statsMs: parsed.STATS_INTERVAL_MS,
    }),
  });
}
