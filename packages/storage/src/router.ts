/**
 * Storage Router
 * 
 * Combines the local directory with an optional remote bucket. Artifacts are
 * always kept locally; when a remote is configured they are also uploaded and
 * clients are redirected to it.
 */

import { StorageFailureError, type BlobStore } from '@reelvault/core';
import { errorMessage, retry, type RetryOptions } from '@reelvault/utils';
import type { LocalBlobStore } from './targets/local.js';
import { logger } from './logger.js';

export interface StorageRouterOptions {
  /** Backoff for remote uploads */
  retry?: Partial<RetryOptions>;
}

export class StorageRouter implements BlobStore {
  readonly name: string;
  private readonly local: LocalBlobStore;
  private readonly remote: BlobStore | null;
  private readonly retryOptions: Partial<RetryOptions>;

  constructor(local: LocalBlobStore, remote: BlobStore | null = null, options: StorageRouterOptions = {}) {
    this.local = local;
    this.remote = remote;
    this.name = remote ? `${local.name}+${remote.name}` : local.name;
    this.retryOptions = options.retry ?? { maxAttempts: 3, initialDelay: 500 };
  }

  /**
   * Store locally, then upload to the remote if there is one
   * 
   * @throws StorageFailureError when the upload keeps failing; the local copy stays
   */
  async put(storageKey: string, localPath: string): Promise<void> {
    await this.local.put(storageKey, localPath);

    const remote = this.remote;
    if (!remote) {
      return;
    }

    const stored = this.local.pathFor(storageKey);
    try {
      await retry(() => remote.put(storageKey, stored), {
        ...this.retryOptions,
        onRetry: (error, attempt) => {
          logger.warn({ storageKey, attempt, error: errorMessage(error) }, 'Remote upload failed, retrying');
        },
      });
    } catch (error) {
      throw new StorageFailureError('put', storageKey, errorMessage(error));
    }
  }

  /**
   * Remove from every target. Both are attempted even if one fails.
   */
  async delete(storageKey: string): Promise<void> {
    const targets: BlobStore[] = this.remote ? [this.local, this.remote] : [this.local];
    const results = await Promise.allSettled(targets.map((target) => target.delete(storageKey)));

    const failures = results.flatMap((result, index) =>
      result.status === 'rejected' ? [`${targets[index]?.name ?? 'unknown'}: ${errorMessage(result.reason)}`] : []
    );
    if (failures.length > 0) {
      throw new StorageFailureError('delete', storageKey, failures.join('; '));
    }
  }

  async exists(storageKey: string): Promise<boolean> {
    return (await this.size(storageKey)) !== null;
  }

  /**
   * Size from the remote when it has the object, else from the local copy.
   * An unreachable remote falls back to local.
   */
  async size(storageKey: string): Promise<number | null> {
    const remoteSize = await this.remoteSize(storageKey);
    if (remoteSize !== null) {
      return remoteSize;
    }
    return this.local.size(storageKey);
  }

  async urlFor(storageKey: string, ttlSeconds: number): Promise<string | null> {
    if (!this.remote) {
      return null;
    }
    try {
      return await this.remote.urlFor(storageKey, ttlSeconds);
    } catch (error) {
      logger.warn({ storageKey, error: errorMessage(error) }, 'Could not presign remote URL, serving locally');
      return null;
    }
  }

  async localPath(storageKey: string): Promise<string | null> {
    return this.local.localPath(storageKey);
  }

  private async remoteSize(storageKey: string): Promise<number | null> {
    if (!this.remote) {
      return null;
    }
    try {
      return await this.remote.size(storageKey);
    } catch (error) {
      logger.warn({ storageKey, target: this.remote.name, error: errorMessage(error) }, 'Remote stat failed');
      return null;
    }
  }
}
