import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('keeps known level names', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to info for missing or unknown names', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});
