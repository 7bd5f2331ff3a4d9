/**
 * History rendering for the `history` command
 */

import { basename } from 'node:path';
import type { DeliveryRecord, DeliveryStats } from '@dropsort/core';
import { toKilobytes } from '@dropsort/utils';

const RULE_WIDTH = 70;
const COLUMN_WIDTH = 40;

export function formatHistory(
  records: DeliveryRecord[],
  stats: DeliveryStats,
  detailed = false
): string[] {
  if (records.length === 0) {
    return ['No files have been copied yet.'];
  }

  const lines = [
    '',
    '='.repeat(RULE_WIDTH),
    `dropsort copy history - ${records.length} files`,
    '='.repeat(RULE_WIDTH),
  ];

  if (detailed) {
    for (const record of records) {
      lines.push(
        '',
        `Source: ${record.sourceKey}`,
        `Destination: ${record.destinationPath}`,
        `Timestamp: ${record.deliveredAt.toISOString()}`,
        `Identity: ${record.identity || '(none)'}`,
        `Size: ${record.sizeBytes} bytes (${toKilobytes(record.sizeBytes)} KB)`,
        '-'.repeat(RULE_WIDTH)
      );
    }
  } else {
    lines.push(
      `${'Source'.padEnd(COLUMN_WIDTH)} | ${'Destination'.padEnd(COLUMN_WIDTH)} | ${'Size'.padEnd(10)}`,
      `${'-'.repeat(COLUMN_WIDTH)}-+-${'-'.repeat(COLUMN_WIDTH)}-+-${'-'.repeat(10)}`
    );
    for (const record of records) {
      const source = basename(record.sourceKey).padEnd(COLUMN_WIDTH);
      const destination = basename(record.destinationPath).padEnd(COLUMN_WIDTH);
      const size = String(toKilobytes(record.sizeBytes)).padEnd(10);
      lines.push(`${source} | ${destination} | ${size} KB`);
    }
  }

  lines.push('', `Total: ${stats.totalFiles} files, ${stats.totalSizeMb} MB`, '='.repeat(RULE_WIDTH), '');
  return lines;
}

/**
 * JSON view of the history, in the same shape as the history file
 */
export function historyToJson(records: DeliveryRecord[], stats: DeliveryStats) {
  return {
    files: Object.fromEntries(
      records.map(record => [
        record.sourceKey,
        {
          destination: record.destinationPath,
          timestamp: record.deliveredAt.toISOString(),
          size: record.sizeBytes,
          identity: record.identity,
        },
      ])
    ),
    stats,
  };
}
