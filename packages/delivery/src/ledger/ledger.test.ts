import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DeliveryRecord } from '@dropsort/core';
import { isObject } from '@dropsort/utils';
import { Ledger } from './ledger.js';

function record(sourceKey: string, overrides: Partial<DeliveryRecord> = {}): DeliveryRecord {
  return {
    sourceKey,
    destinationPath: `/dest/${sourceKey.split('/').pop() ?? sourceKey}`,
    identity: 'aaaaaaaaaaaaaaaa',
    sizeBytes: 100,
    deliveredAt: new Date('2024-05-01T00:00:00.000Z'),
    ...overrides,
  };
}

describe('Ledger', () => {
  let dir: string;
  let historyFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dropsort-ledger-'));
    historyFile = join(dir, 'history.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function readDocument(): Promise<unknown> {
    return JSON.parse(await readFile(historyFile, 'utf8'));
  }

  async function readKeys(): Promise<string[]> {
    const document = await readDocument();
    return isObject(document) ? Object.keys(document) : [];
  }

  it('starts empty when the history file is missing', async () => {
    const ledger = new Ledger(historyFile);
    await ledger.load();
    expect(ledger.size).toBe(0);
  });

  it('starts empty when the history file is corrupt and recovers on the next write', async () => {
    await writeFile(historyFile, '{not json');
    const ledger = new Ledger(historyFile);
    await ledger.load();

    expect(ledger.size).toBe(0);

    await ledger.put(record('/src/a.txt'));
    expect(await readDocument()).toEqual({
      '/src/a.txt': {
        destination: '/dest/a.txt',
        timestamp: '2024-05-01T00:00:00.000Z',
        size: 100,
        identity: 'aaaaaaaaaaaaaaaa',
      },
    });
  });

  it('starts empty when the document is not an object', async () => {
    await writeFile(historyFile, '[1, 2, 3]');
    const ledger = new Ledger(historyFile);
    await ledger.load();
    expect(ledger.size).toBe(0);
  });

  it('loads entries written without a fingerprint', async () => {
    await writeFile(historyFile, JSON.stringify({
      '/src/legacy.txt': { destination: '/dest/legacy.txt', timestamp: '2024-01-01T12:00:00.123', size: 5 },
    }));
    const ledger = new Ledger(historyFile);
    await ledger.load();

    expect(ledger.get('/src/legacy.txt')?.identity).toBe('');
    expect(ledger.get('/src/legacy.txt')?.sizeBytes).toBe(5);
  });

  it('drops malformed entries and keeps the rest', async () => {
    await writeFile(historyFile, JSON.stringify({
      '/src/bad.txt': { destination: 5 },
      '/src/good.txt': { destination: '/dest/good.txt', timestamp: '2024-05-01T00:00:00.000Z', size: 7, identity: 'x' },
    }));
    const ledger = new Ledger(historyFile);
    await ledger.load();

    expect(ledger.size).toBe(1);
    expect(ledger.has('/src/good.txt')).toBe(true);
  });

  it('round-trips records through the history file', async () => {
    const first = new Ledger(historyFile);
    await first.put(record('/src/a.txt', { sizeBytes: 42, identity: 'bbbbbbbbbbbbbbbb' }));

    const second = new Ledger(historyFile);
    await second.load();

    expect(second.get('/src/a.txt')).toEqual(record('/src/a.txt', { sizeBytes: 42, identity: 'bbbbbbbbbbbbbbbb' }));
  });

  it('persists and reloads an object key named __proto__', async () => {
    const first = new Ledger(historyFile);
    await first.put(record('__proto__', { sizeBytes: 7 }));

    expect(await readKeys()).toEqual(['__proto__']);

    const second = new Ledger(historyFile);
    await second.load();
    expect(second.get('__proto__')?.sizeBytes).toBe(7);
    expect(second.size).toBe(1);
  });

  it('replaces a record in place on redelivery', async () => {
    const ledger = new Ledger(historyFile);
    await ledger.put(record('/src/a.txt', { identity: '1111111111111111' }));
    await ledger.put(record('/src/a.txt', { identity: '2222222222222222' }));

    expect(ledger.size).toBe(1);
    expect(ledger.get('/src/a.txt')?.identity).toBe('2222222222222222');
    expect(await readKeys()).toEqual(['/src/a.txt']);
  });

  it('prunes entries whose source is gone and persists the result', async () => {
    const ledger = new Ledger(historyFile);
    await ledger.put(record('/src/a.txt'));
    await ledger.put(record('/src/b.txt'));
    await ledger.put(record('/src/c.txt'));

    const removed = await ledger.prune(key => key !== '/src/b.txt');

    expect(removed).toEqual(['/src/a.txt', '/src/c.txt']);
    expect(ledger.entries().map(entry => entry.sourceKey)).toEqual(['/src/b.txt']);
    expect(await readKeys()).toEqual(['/src/b.txt']);
  });

  it('keeps entries whose existence check fails', async () => {
    const ledger = new Ledger(historyFile);
    await ledger.put(record('/src/a.txt'));

    const removed = await ledger.prune(async () => {
      throw new Error('probe timed out');
    });

    expect(removed).toEqual([]);
    expect(ledger.has('/src/a.txt')).toBe(true);
  });

  it('stays authoritative in memory when the history file cannot be written', async () => {
    await writeFile(join(dir, 'blocker'), 'not a directory');
    const ledger = new Ledger(join(dir, 'blocker', 'history.json'));

    const persisted = await ledger.put(record('/src/a.txt'));

    expect(persisted).toBe(false);
    expect(ledger.degraded).toBe(true);
    expect(ledger.has('/src/a.txt')).toBe(true);
  });

  it('removes without persisting until saved', async () => {
    const ledger = new Ledger(historyFile);
    await ledger.put(record('/src/a.txt'));

    expect(ledger.remove('/src/a.txt')).toBe(true);
    expect(await readKeys()).toEqual(['/src/a.txt']);

    await ledger.save();
    expect(await readDocument()).toEqual({});
  });

  it('clears every entry', async () => {
    const ledger = new Ledger(historyFile);
    await ledger.put(record('/src/a.txt'));
    await ledger.clear();

    expect(ledger.size).toBe(0);
    expect(await readDocument()).toEqual({});
  });

  it('computes copy statistics', async () => {
    const ledger = new Ledger(historyFile);
    expect(ledger.stats()).toEqual({ totalFiles: 0, totalSizeBytes: 0, totalSizeMb: 0 });

    await ledger.put(record('/src/a.txt', { sizeBytes: 1048576 }));
    await ledger.put(record('/src/b.txt', { sizeBytes: 524288 }));

    expect(ledger.stats()).toEqual({ totalFiles: 2, totalSizeBytes: 1572864, totalSizeMb: 1.5 });
  });
});
