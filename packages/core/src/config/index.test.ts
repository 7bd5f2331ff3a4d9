import { describe, it, expect } from 'vitest';
import { loadConfig, parseEndpoint, normalizePrefix } from './index.js';
import { ConfigurationError } from '../errors/index.js';

describe('loadConfig', () => {
  it('applies defaults for a local source', () => {
    const config = loadConfig({}, '/srv');

    expect(config.source).toEqual({ kind: 'local', root: '/srv/source' });
    expect(config.destination).toEqual({
      root: '/srv/destination',
      yearPrefix: false,
      driveSuffix: { enabled: false, segment: 'incoming' },
    });
    expect(config.historyFile).toBe('/srv/dropsort_history.json');
    expect(config.markerFilename).toBe('.dropsort');
    expect(config.forceRecopy).toBe(false);
    expect(config.intervals.remotePollMs).toBe(30000);
  });

  it('accepts yes/1/TRUE as enabled flags', () => {
    const config = loadConfig(
      { ENABLE_YEAR_PREFIX: 'yes', ENABLE_DRIVE_SUFFIX: '1', FORCE_RECOPY: 'TRUE', DRIVE_SUFFIX: '1_DRIVE' },
      '/srv'
    );

    expect(config.destination.yearPrefix).toBe(true);
    expect(config.destination.driveSuffix).toEqual({ enabled: true, segment: '1_DRIVE' });
    expect(config.forceRecopy).toBe(true);
  });

  it('places the history file inside HISTORY_DIR when no file is given', () => {
    const config = loadConfig({ HISTORY_DIR: '/app/history' }, '/srv');
    expect(config.historyFile).toBe('/app/history/dropsort_history.json');
  });

  it('prefers HISTORY_FILE over HISTORY_DIR', () => {
    const config = loadConfig({ HISTORY_DIR: '/app/history', HISTORY_FILE: 'state/h.json' }, '/srv');
    expect(config.historyFile).toBe('/srv/state/h.json');
  });

  it('builds a remote source from the S3 settings', () => {
    const config = loadConfig({
      USE_S3_SOURCE: 'true',
      S3_ENDPOINT: 'http://minio:9000',
      S3_ACCESS_KEY: 'test-access',
      S3_SECRET_KEY: 'test-secret',
      S3_BUCKET: 'drops',
      S3_PATH_PREFIX: '/inbox/',
    });

    expect(config.source).toEqual({
      kind: 'remote',
      endPoint: 'minio',
      port: 9000,
      useSSL: false,
      accessKey: 'test-access',
      secretKey: 'test-secret',
      bucket: 'drops',
      region: 'us-east-1',
      prefix: 'inbox',
    });
  });

  it('rejects a remote source without credentials', () => {
    expect(() => loadConfig({ USE_S3_SOURCE: 'true' })).toThrow(ConfigurationError);
  });

  it('rejects a non-numeric interval', () => {
    expect(() => loadConfig({ REMOTE_POLL_INTERVAL_MS: 'soon' })).toThrow(ConfigurationError);
  });

  it('reads the log level and rejects unknown ones', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug' }, '/srv').logLevel).toBe('debug');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });

  it('returns a frozen value', () => {
    const config = loadConfig({}, '/srv');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.destination)).toBe(true);
  });
});

describe('parseEndpoint', () => {
  it('defaults the port from the scheme', () => {
    expect(parseEndpoint('https://s3.example.test')).toEqual({ endPoint: 's3.example.test', port: 443, useSSL: true });
  });

  it('accepts a bare host:port', () => {
    expect(parseEndpoint('minio:9000')).toEqual({ endPoint: 'minio', port: 9000, useSSL: false });
  });
});

describe('normalizePrefix', () => {
  it('strips surrounding slashes', () => {
    expect(normalizePrefix('//a/b//')).toBe('a/b');
    expect(normalizePrefix('')).toBe('');
  });
});
