import { describe, it, expect } from 'vitest';
import { fnv1a64, fnv1a64Hex } from './hash.js';

describe('fnv1a64', () => {
  it('returns the offset basis for empty input', () => {
    expect(fnv1a64('')).toBe(0xcbf29ce484222325n);
  });

  it('matches published test vectors', () => {
    expect(fnv1a64Hex('a')).toBe('af63dc4c8601ec8c');
    expect(fnv1a64Hex('foobar')).toBe('85944171f73967e8');
  });

  it('is stable across calls and sensitive to single-character changes', () => {
    const first = fnv1a64Hex('/src/a.txt:10:1700000000000');
    expect(fnv1a64Hex('/src/a.txt:10:1700000000000')).toBe(first);
    expect(fnv1a64Hex('/src/a.txt:11:1700000000000')).not.toBe(first);
  });

  it('always renders 16 hex characters', () => {
    for (const input of ['', 'x', 'dropsort', '日本語']) {
      expect(fnv1a64Hex(input)).toMatch(/^[0-9a-f]{16}$/);
    }
  });
});
