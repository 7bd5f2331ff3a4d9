import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryObjectStore } from '../testing/memoryObjectStore.js';
import { RemoteSource, keyName, parentPrefix } from './remoteSource.js';

describe('parentPrefix / keyName', () => {
  it('splits a key at its last slash', () => {
    expect(parentPrefix('inbox/acme/a.txt')).toBe('inbox/acme');
    expect(keyName('inbox/acme/a.txt')).toBe('a.txt');
  });

  it('treats root-level keys as children of the empty prefix', () => {
    expect(parentPrefix('a.txt')).toBe('');
    expect(keyName('a.txt')).toBe('a.txt');
  });
});

describe('RemoteSource', () => {
  let store: MemoryObjectStore;
  let source: RemoteSource;

  beforeEach(() => {
    store = new MemoryObjectStore();
    source = new RemoteSource({ store, prefix: 'inbox', markerFilename: '.dropsort' });
  });

  it('describes itself as a bucket URL', () => {
    expect(source.describe()).toBe('s3://test-bucket/inbox');
  });

  it('lists every prefix holding a marker, once each', async () => {
    store.put('inbox/acme/.dropsort', 'Clients/Acme');
    store.put('inbox/acme/a.txt', 'a');
    store.put('inbox/acme/deep/.dropsort', 'Deep');
    store.put('inbox/plain/b.txt', 'b');
    store.put('outbox/other/.dropsort', 'Ignored');

    expect(await source.listMarkers()).toEqual(['inbox/acme', 'inbox/acme/deep']);
  });

  it('reads marker content, or null without one', async () => {
    store.put('inbox/acme/.dropsort', 'Clients/Acme\n');

    expect(await source.readMarker('inbox/acme')).toBe('Clients/Acme\n');
    expect(await source.readMarker('inbox/plain')).toBeNull();
  });

  it('enumerates direct children only, marker excluded', async () => {
    store.put('inbox/acme/.dropsort', 'Clients/Acme');
    store.put('inbox/acme/b.txt', 'b');
    store.put('inbox/acme/a.txt', 'a');
    store.put('inbox/acme/deep/c.txt', 'c');
    store.put('inbox/acme-other/d.txt', 'd');

    expect(await source.enumerateChildren('inbox/acme')).toEqual([
      { key: 'inbox/acme/a.txt', name: 'a.txt' },
      { key: 'inbox/acme/b.txt', name: 'b.txt' },
    ]);
  });

  it('lists only one level when enumerating a directory', async () => {
    store.put('inbox/acme/a.txt', 'a');
    store.put('inbox/acme/deep/b.txt', 'b');

    await source.enumerateChildren('inbox/acme');
    await source.listMarkers();

    expect(store.listRequests).toEqual([
      { prefix: 'inbox/acme/', recursive: false },
      { prefix: 'inbox/', recursive: true },
    ]);
  });

  it('wraps listing failures in a source error', async () => {
    store.failNextList();

    await expect(source.listMarkers()).rejects.toMatchObject({ code: 'SOURCE_UNAVAILABLE' });
  });

  it('reports existence through a metadata probe', async () => {
    store.put('inbox/acme/a.txt', 'a');

    expect(await source.exists('inbox/acme/a.txt')).toBe(true);
    expect(await source.exists('inbox/acme/missing.txt')).toBe(false);
  });

  describe('fetch', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'dropsort-remote-source-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('downloads the object and stamps its modification time', async () => {
      const lastModified = new Date('2023-07-04T12:00:00.000Z');
      store.put('inbox/acme/a.txt', 'remote body', lastModified);
      const item = { key: 'inbox/acme/a.txt', name: 'a.txt' };
      const state = await source.statIdentity(item);
      const destinationPath = join(directory, 'nested', 'a.txt');

      expect(state).not.toBeNull();
      if (!state) return;
      await source.fetch(item, destinationPath, state);

      expect(await readFile(destinationPath, 'utf8')).toBe('remote body');
      expect((await stat(destinationPath)).mtime.getTime()).toBe(lastModified.getTime());
    });
  });
});
