/**
 * @dropsort/utils
 * 
 * Shared utilities package containing:
 * - Structured logger
 * - File operations
 * - Change-detection digest
 * - Type guards
 * - Time and size formatting
 */

// File operations
export {
  ensureDir,
  safeReadFile,
  statOrNull,
  writeFileAtomic,
  copyFilePreservingMetadata,
} from './file.js';

// Hashing
export { fnv1a64, fnv1a64Hex } from './hash.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  hasErrorCode,
} from './guards.js';

// Time and size utilities
export {
  formatDuration,
  toKilobytes,
  toMegabytes,
} from './time.js';

// Logger
export { logger, createLogger, resolveLogLevel, type Logger } from './logger.js';
