/**
 * Path Utilities
 */

import { join, resolve, sep } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    // Limit length (preserve extension)
    .substring(0, 200);
}

/**
 * Whether a storage key is a plain file name (no directories, no traversal)
 */
export function isSafeStorageKey(key: string): boolean {
  return key.length > 0
    && key.length <= 255
    && !key.includes('..')
    && !key.includes('/')
    && !key.includes('\\')
    && sanitizeFilename(key) === key;
}

/**
 * Resolve a storage key inside a root directory, refusing anything that escapes it
 */
export function resolveInside(root: string, key: string): string {
  const absoluteRoot = resolve(root);
  const target = resolve(join(absoluteRoot, key));
  if (!target.startsWith(absoluteRoot + sep)) {
    throw new Error(`Path escapes storage root: ${key}`);
  }
  return target;
}
