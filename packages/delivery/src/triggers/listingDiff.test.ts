import { describe, it, expect } from 'vitest';
import { changedDirectories, diffListings, type Listing } from './listingDiff.js';

function listing(entries: Array<[string, string]>): Listing {
  return new Map(entries.map(([key, tag]) => [key, { sizeBytes: 1, tag }]));
}

describe('diffListings', () => {
  it('classifies new, modified and deleted keys', () => {
    const previous = listing([
      ['inbox/acme/a.txt', 't1'],
      ['inbox/acme/b.txt', 't2'],
      ['inbox/old/c.txt', 't3'],
    ]);
    const current = listing([
      ['inbox/acme/a.txt', 't1'],
      ['inbox/acme/b.txt', 't9'],
      ['inbox/new/d.txt', 't4'],
    ]);

    expect(diffListings(previous, current)).toEqual({
      added: ['inbox/new/d.txt'],
      modified: ['inbox/acme/b.txt'],
      deleted: ['inbox/old/c.txt'],
    });
  });

  it('treats every key as new against an empty listing', () => {
    const current = listing([['a.txt', 't1']]);
    expect(diffListings(new Map(), current)).toEqual({ added: ['a.txt'], modified: [], deleted: [] });
  });
});

describe('changedDirectories', () => {
  it('returns each parent prefix once', () => {
    expect(
      changedDirectories({
        added: ['inbox/acme/a.txt', 'inbox/acme/.dropsort', 'top.txt'],
        modified: ['inbox/beta/b.txt', 'inbox/acme/c.txt'],
        deleted: ['inbox/gone/x.txt'],
      })
    ).toEqual(['inbox/acme', '', 'inbox/beta']);
  });
});
