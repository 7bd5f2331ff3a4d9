/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { 
  mkdir, 
  writeFile, 
  readFile, 
  stat, 
  rename, 
  chmod,
  utimes,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, basename, join } from 'node:path';
import { hasErrorCode } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/**
 * stat() that returns null when the path is gone
 */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/**
 * Write a file through a temporary sibling and rename it into place,
 * so readers never observe a half-written document
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await ensureDir(dir);
  const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.tmp`);
  await writeFile(tempPath, content, 'utf8');
  await rename(tempPath, filePath);
}

/**
 * Copy a file, keeping permission bits and access/modification times
 */
export async function copyFilePreservingMetadata(
  source: string,
  destination: string
): Promise<Stats> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);

  const sourceStats = await stat(source);
  await chmod(destination, sourceStats.mode & 0o7777);
  await utimes(destination, sourceStats.atime, sourceStats.mtime);
  return sourceStats;
}
