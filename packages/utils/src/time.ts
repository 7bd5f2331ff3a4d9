/**
 * Time and Size Formatting
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Bytes to kilobytes, two decimals
 */
export function toKilobytes(bytes: number): number {
  return Math.round((bytes / 1024) * 100) / 100;
}

/**
 * Bytes to megabytes, two decimals; 0 for an empty total
 */
export function toMegabytes(bytes: number): number {
  if (bytes <= 0) return 0;
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}
