/**
 * Library Repository
 * 
 * Per-tenant references into the shared asset table. At most one entry per
 * (tenant, asset); attaching again only refreshes the metadata.
 */

import { and, eq } from 'drizzle-orm';
import { BaseRepository } from '../baseRepository.js';
import type { ReelVaultDatabase } from '../client.js';
import { assets, libraryEntries, tenants, type LibraryEntryRow } from '../schema.js';
import { toAsset } from './assetRepository.js';
import type { LibraryEntry, LibraryItem, LibraryMetadata } from '../../types/asset.js';
import { logger } from '../../logger.js';

function toEntry(row: LibraryEntryRow): LibraryEntry {
  return {
    id: row.id,
    tenantId: row.tenantId,
    assetId: row.assetId,
    metadata: row.metadata,
  };
}

export class LibraryRepository extends BaseRepository {
  constructor(db: ReelVaultDatabase) {
    super(db, 'LibraryEntry');
  }

  /**
   * Reference an asset from a tenant's library
   * 
   * @returns false when the asset no longer exists (it was collected)
   */
  async attach(tenantId: string, assetId: number, metadata: LibraryMetadata): Promise<boolean> {
    return this.execute('attach', { tenantId, assetId }, (db) =>
      db.transaction((tx) => {
        const asset = tx.select({ id: assets.id }).from(assets).where(eq(assets.id, assetId)).get();
        if (!asset) {
          return false;
        }

        tx.insert(tenants).values({ id: tenantId }).onConflictDoNothing().run();
        tx.insert(libraryEntries)
          .values({ tenantId, assetId, metadata })
          .onConflictDoUpdate({
            target: [libraryEntries.tenantId, libraryEntries.assetId],
            set: { metadata },
          })
          .run();

        logger.debug({ tenantId, assetId }, 'Library entry attached');
        return true;
      })
    );
  }

  async listForTenant(tenantId: string): Promise<LibraryItem[]> {
    return this.execute('listForTenant', { tenantId }, (db) =>
      db
        .select({ entry: libraryEntries, asset: assets })
        .from(libraryEntries)
        .innerJoin(assets, eq(libraryEntries.assetId, assets.id))
        .where(eq(libraryEntries.tenantId, tenantId))
        .orderBy(libraryEntries.id)
        .all()
        .map((row) => ({ entry: toEntry(row.entry), asset: toAsset(row.asset) }))
    );
  }

  async findByStorageKey(tenantId: string, storageKey: string): Promise<LibraryItem | null> {
    return this.execute('findByStorageKey', { tenantId, storageKey }, (db) => {
      const row = db
        .select({ entry: libraryEntries, asset: assets })
        .from(libraryEntries)
        .innerJoin(assets, eq(libraryEntries.assetId, assets.id))
        .where(and(eq(libraryEntries.tenantId, tenantId), eq(assets.storageKey, storageKey)))
        .get();
      return row ? { entry: toEntry(row.entry), asset: toAsset(row.asset) } : null;
    });
  }

  /**
   * Replace the metadata of an existing entry
   * 
   * @returns false when the tenant has no entry for the storage key
   */
  async updateMetadata(tenantId: string, storageKey: string, metadata: LibraryMetadata): Promise<boolean> {
    return this.execute('updateMetadata', { tenantId, storageKey }, (db) =>
      db.transaction((tx) => {
        const asset = tx
          .select({ id: assets.id })
          .from(assets)
          .where(eq(assets.storageKey, storageKey))
          .get();
        if (!asset) {
          return false;
        }

        const updated = tx
          .update(libraryEntries)
          .set({ metadata })
          .where(and(eq(libraryEntries.tenantId, tenantId), eq(libraryEntries.assetId, asset.id)))
          .returning({ id: libraryEntries.id })
          .all();
        return updated.length > 0;
      })
    );
  }

  /**
   * Remove a tenant's reference. The asset itself is left for the collector.
   * 
   * @returns whether an entry was removed
   */
  async detach(tenantId: string, storageKey: string): Promise<boolean> {
    return this.execute('detach', { tenantId, storageKey }, (db) =>
      db.transaction((tx) => {
        const asset = tx
          .select({ id: assets.id })
          .from(assets)
          .where(eq(assets.storageKey, storageKey))
          .get();
        if (!asset) {
          return false;
        }

        const removed = tx
          .delete(libraryEntries)
          .where(and(eq(libraryEntries.tenantId, tenantId), eq(libraryEntries.assetId, asset.id)))
          .returning({ id: libraryEntries.id })
          .all();

        if (removed.length > 0) {
          logger.debug({ tenantId, storageKey }, 'Library entry detached');
        }
        return removed.length > 0;
      })
    );
  }
}
