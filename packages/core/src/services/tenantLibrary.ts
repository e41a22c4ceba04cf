/**
 * Tenant Library Service
 * 
 * A tenant's view of the shared registry: which assets it references and the
 * metadata it keeps for each. Listing only shows entries whose bytes are
 * actually present, so the view heals itself after blobs go missing.
 */

import { isSafeStorageKey } from '@reelvault/utils';
import type { AssetRepository } from '../db/repositories/assetRepository.js';
import type { LibraryRepository } from '../db/repositories/libraryRepository.js';
import type { BlobStore } from '../types/blobStore.js';
import type { LibraryMetadata } from '../types/asset.js';
import { NotFoundError, ValidationError } from '../errors/index.js';
import { logger } from '../logger.js';

export type LibraryListing = Record<string, LibraryMetadata>;

export class TenantLibrary {
  private readonly library: LibraryRepository;
  private readonly assets: AssetRepository;
  private readonly blobs: BlobStore;

  constructor(library: LibraryRepository, assets: AssetRepository, blobs: BlobStore) {
    this.library = library;
    this.assets = assets;
    this.blobs = blobs;
  }

  /**
   * @returns false when the asset is gone
   */
  async attach(tenantId: string, assetId: number, metadata: LibraryMetadata): Promise<boolean> {
    return this.library.attach(tenantId, assetId, metadata);
  }

  async list(tenantId: string): Promise<LibraryListing> {
    const items = await this.library.listForTenant(tenantId);
    const present = await Promise.all(items.map((item) => this.blobs.exists(item.asset.storageKey)));

    const listing: LibraryListing = {};
    items.forEach((item, index) => {
      if (present[index]) {
        listing[item.asset.storageKey] = item.entry.metadata;
      } else {
        logger.warn({ tenantId, storageKey: item.asset.storageKey }, 'Library entry has no bytes, hiding it');
      }
    });
    return listing;
  }

  async detach(tenantId: string, storageKey: string): Promise<boolean> {
    return this.library.detach(tenantId, storageKey);
  }

  /**
   * Store a tenant's metadata for a file. A file that exists in the blob store
   * but was never registered (copied in by hand) is registered on the spot.
   * 
   * @throws NotFoundError when no such file exists
   */
  async save(tenantId: string, storageKey: string, metadata: LibraryMetadata): Promise<void> {
    if (!isSafeStorageKey(storageKey)) {
      throw new ValidationError('filename', 'not a valid file name');
    }

    if (await this.library.updateMetadata(tenantId, storageKey, metadata)) {
      return;
    }

    let asset = await this.assets.findByStorageKey(storageKey);
    if (!asset) {
      if (!(await this.blobs.exists(storageKey))) {
        throw new NotFoundError('Video', storageKey);
      }
      asset = await this.assets.register({
        storageKey,
        sourceIdentity: null,
        title: metadata.title,
        byteSize: await this.blobs.size(storageKey),
      });
      logger.info({ tenantId, storageKey }, 'Registered untracked file from the blob store');
    }

    if (!(await this.library.attach(tenantId, asset.id, metadata))) {
      throw new NotFoundError('Video', storageKey);
    }
  }
}
