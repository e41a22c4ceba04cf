/**
 * Garbage Collector
 * 
 * Releases assets no tenant references any more. `sweep` only touches the
 * registry; `collect` also purges the released keys from the blob store.
 */

import { errorMessage } from '@reelvault/utils';
import type { AssetRepository } from '../db/repositories/assetRepository.js';
import type { BlobStore } from '../types/blobStore.js';
import type { JobRegistry } from './jobRegistry.js';
import { logger } from '../logger.js';

export interface PurgeFailure {
  storageKey: string;
  error: string;
}

export interface CollectionReport {
  deleted: string[];
  purgeFailures: PurgeFailure[];
}

export class GarbageCollector {
  private readonly assets: AssetRepository;
  private readonly blobs: BlobStore;
  private readonly jobs: JobRegistry;

  constructor(assets: AssetRepository, blobs: BlobStore, jobs: JobRegistry) {
    this.assets = assets;
    this.blobs = blobs;
    this.jobs = jobs;
  }

  /**
   * Delete zero-reference assets, sparing keys of jobs still in flight
   * 
   * @returns storage keys whose bytes the caller may now purge
   */
  async sweep(): Promise<string[]> {
    const released = await this.assets.sweepOrphans(this.jobs.inFlightStorageKeys());
    if (released.length > 0) {
      logger.info({ count: released.length, storageKeys: released }, 'Orphaned assets released');
    }
    return released;
  }

  async collect(): Promise<CollectionReport> {
    const deleted = await this.sweep();
    const purgeFailures: PurgeFailure[] = [];

    for (const storageKey of deleted) {
      try {
        await this.blobs.delete(storageKey);
      } catch (error) {
        logger.error({ storageKey, error: errorMessage(error) }, 'Failed to purge released blob');
        purgeFailures.push({ storageKey, error: errorMessage(error) });
      }
    }

    return { deleted, purgeFailures };
  }
}
