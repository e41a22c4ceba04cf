/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { 
  mkdir, 
  writeFile, 
  stat, 
  rename, 
  rm,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { dirname } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a file readable only by the current user, ensuring the directory exists
 */
export async function writePrivateFile(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, { encoding: 'utf8', mode: 0o600 });
}

/**
 * Get file size in bytes, or null when the file does not exist
 */
export async function getFileSizeBytes(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check whether a regular file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  return (await getFileSizeBytes(filePath)) !== null;
}

/**
 * Remove a file, returning whether anything was removed
 */
export async function removeFile(filePath: string): Promise<boolean> {
  const existed = await fileExists(filePath);
  await rm(filePath, { force: true });
  return existed;
}

/**
 * Move a file to a new location
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  try {
    await rename(source, destination);
  } catch (error) {
    // rename cannot cross devices
    if (isErrnoException(error) && error.code === 'EXDEV') {
      await fsCopyFile(source, destination);
      await rm(source, { force: true });
      return;
    }
    throw error;
  }
}
