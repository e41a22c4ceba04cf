/**
 * Local Blob Store
 * 
 * Artifacts as plain files in one directory. Storage keys are file names and
 * are never allowed to resolve outside that directory.
 */

import { resolve } from 'node:path';
import type { BlobStore } from '@reelvault/core';
import { ensureDir, getFileSizeBytes, isSafeStorageKey, moveFile, removeFile, resolveInside } from '@reelvault/utils';
import { logger } from '../logger.js';

export class LocalBlobStore implements BlobStore {
  readonly name = 'local';
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async init(): Promise<void> {
    await ensureDir(this.root);
  }

  /**
   * Path a storage key maps to, whether or not the file exists
   */
  pathFor(storageKey: string): string {
    if (!isSafeStorageKey(storageKey)) {
      throw new Error(`Invalid storage key: ${storageKey}`);
    }
    return resolveInside(this.root, storageKey);
  }

  /**
   * Take ownership of a file. A file already at its final path is left alone.
   */
  async put(storageKey: string, localPath: string): Promise<void> {
    const destination = this.pathFor(storageKey);
    if (resolve(localPath) === destination) {
      return;
    }
    await moveFile(localPath, destination);
    logger.debug({ storageKey, from: localPath }, 'Blob stored locally');
  }

  async delete(storageKey: string): Promise<void> {
    const removed = await removeFile(this.pathFor(storageKey));
    if (removed) {
      logger.debug({ storageKey }, 'Local blob removed');
    }
  }

  async exists(storageKey: string): Promise<boolean> {
    return (await this.size(storageKey)) !== null;
  }

  async size(storageKey: string): Promise<number | null> {
    if (!isSafeStorageKey(storageKey)) {
      return null;
    }
    return getFileSizeBytes(this.pathFor(storageKey));
  }

  /**
   * Local files are streamed by the server, there is no URL to hand out
   */
  async urlFor(): Promise<string | null> {
    return null;
  }

  async localPath(storageKey: string): Promise<string | null> {
    return (await this.exists(storageKey)) ? this.pathFor(storageKey) : null;
  }
}
