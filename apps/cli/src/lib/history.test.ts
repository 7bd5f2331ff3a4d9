import { describe, it, expect } from 'vitest';
import type { DeliveryRecord } from '@dropsort/core';
import { formatHistory, historyToJson } from './history.js';

const records: DeliveryRecord[] = [
  {
    sourceKey: '/data/source/acme/invoice.pdf',
    destinationPath: '/data/destination/Clients/Acme/invoice.pdf',
    identity: 'abc',
    sizeBytes: 2048,
    deliveredAt: new Date('2024-05-01T09:30:00.000Z'),
  },
  {
    sourceKey: 'inbox/reports/q1.csv',
    destinationPath: '/data/destination/Reports/q1.csv',
    identity: 'def',
    sizeBytes: 512,
    deliveredAt: new Date('2024-05-02T10:00:00.000Z'),
  },
];

const stats = { totalFiles: 2, totalSizeBytes: 2560, totalSizeMb: 0 };

describe('formatHistory', () => {
  it('reports an empty history', () => {
    expect(formatHistory([], { totalFiles: 0, totalSizeBytes: 0, totalSizeMb: 0 })).toEqual([
      'No files have been copied yet.',
    ]);
  });

  it('renders one table row per delivery', () => {
    const lines = formatHistory(records, stats);

    expect(lines[2]).toBe('dropsort copy history - 2 files');
    expect(lines[4]).toBe(`${'Source'.padEnd(40)} | ${'Destination'.padEnd(40)} | Size      `);
    expect(lines[6]).toBe(`${'invoice.pdf'.padEnd(40)} | ${'invoice.pdf'.padEnd(40)} | ${'2'.padEnd(10)} KB`);
    expect(lines[7]).toBe(`${'q1.csv'.padEnd(40)} | ${'q1.csv'.padEnd(40)} | ${'0.5'.padEnd(10)} KB`);
    expect(lines.at(-3)).toBe('Total: 2 files, 0 MB');
  });

  it('renders full paths and timestamps in detailed mode', () => {
    const lines = formatHistory(records, stats, true);

    expect(lines.slice(4, 11)).toEqual([
      '',
      'Source: /data/source/acme/invoice.pdf',
      'Destination: /data/destination/Clients/Acme/invoice.pdf',
      'Timestamp: 2024-05-01T09:30:00.000Z',
      'Identity: abc',
      'Size: 2048 bytes (2 KB)',
      '-'.repeat(70),
    ]);
  });
});

describe('historyToJson', () => {
  it('mirrors the history file layout', () => {
    expect(historyToJson(records.slice(1), { totalFiles: 1, totalSizeBytes: 512, totalSizeMb: 0 })).toEqual({
      files: {
        'inbox/reports/q1.csv': {
          destination: '/data/destination/Reports/q1.csv',
          timestamp: '2024-05-02T10:00:00.000Z',
          size: 512,
          identity: 'def',
        },
      },
      stats: { totalFiles: 1, totalSizeBytes: 512, totalSizeMb: 0 },
    });
  });
});
