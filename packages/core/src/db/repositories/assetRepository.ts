/**
 * Asset Repository
 * 
 * The shared, tenant-independent side of the registry. Assets are unique by
 * storage key and by source identity; their reference count is the number of
 * library entries pointing at them.
 */

import { and, eq, or, count, isNull, inArray } from 'drizzle-orm';
import { BaseRepository } from '../baseRepository.js';
import type { ReelVaultDatabase } from '../client.js';
import { assets, libraryEntries, type AssetRow } from '../schema.js';
import type { Asset, RegisterAssetInput, SourceIdentity } from '../../types/asset.js';
import { RegistrationConflictError } from '../../errors/index.js';
import { logger } from '../../logger.js';

export function toAsset(row: AssetRow): Asset {
  return {
    id: row.id,
    sourceIdentity: row.sourceIdentity,
    title: row.title,
    storageKey: row.storageKey,
    byteSize: row.byteSize,
    createdAt: row.createdAt,
  };
}

export class AssetRepository extends BaseRepository {
  constructor(db: ReelVaultDatabase) {
    super(db, 'Asset');
  }

  async findById(id: number): Promise<Asset | null> {
    return this.execute('findById', { id }, (db) => {
      const row = db.select().from(assets).where(eq(assets.id, id)).get();
      return row ? toAsset(row) : null;
    });
  }

  async findBySource(sourceIdentity: SourceIdentity): Promise<Asset | null> {
    return this.execute('findBySource', { sourceIdentity }, (db) => {
      const row = db.select().from(assets).where(eq(assets.sourceIdentity, sourceIdentity)).get();
      return row ? toAsset(row) : null;
    });
  }

  async findByStorageKey(storageKey: string): Promise<Asset | null> {
    return this.execute('findByStorageKey', { storageKey }, (db) => {
      const row = db.select().from(assets).where(eq(assets.storageKey, storageKey)).get();
      return row ? toAsset(row) : null;
    });
  }

  /**
   * Insert an asset, or return the one already registered under the same
   * storage key or source identity. Concurrent registrations of one source
   * converge on a single row.
   */
  async register(input: RegisterAssetInput): Promise<Asset> {
    const sourceIdentity = input.sourceIdentity ?? null;

    return this.execute('register', { storageKey: input.storageKey, sourceIdentity }, (db) =>
      db.transaction((tx) => {
        const matchExisting = or(
          eq(assets.storageKey, input.storageKey),
          sourceIdentity !== null ? eq(assets.sourceIdentity, sourceIdentity) : undefined
        );

        const existing = tx.select().from(assets).where(matchExisting).get();
        if (existing) {
          return toAsset(existing);
        }

        const inserted = tx
          .insert(assets)
          .values({
            storageKey: input.storageKey,
            sourceIdentity,
            title: input.title ?? null,
            byteSize: input.byteSize ?? null,
          })
          .onConflictDoNothing()
          .returning()
          .all();

        const created = inserted[0];
        if (created) {
          logger.info({ assetId: created.id, storageKey: created.storageKey }, 'Asset registered');
          return toAsset(created);
        }

        // Lost a race with another writer; read its row back
        const winner = tx.select().from(assets).where(matchExisting).get();
        if (winner) {
          return toAsset(winner);
        }

        throw new RegistrationConflictError(input.storageKey, sourceIdentity);
      })
    );
  }

  /**
   * Record the byte size of an asset that was registered without one
   */
  async backfillSize(id: number, byteSize: number): Promise<void> {
    await this.execute('backfillSize', { id, byteSize }, (db) =>
      db
        .update(assets)
        .set({ byteSize })
        .where(and(eq(assets.id, id), isNull(assets.byteSize)))
        .run()
    );
  }

  /**
   * Remove an asset together with every library entry pointing at it
   */
  async delete(id: number): Promise<boolean> {
    return this.execute('delete', { id }, (db) => {
      const removed = db.delete(assets).where(eq(assets.id, id)).returning({ id: assets.id }).all();
      if (removed.length > 0) {
        logger.info({ assetId: id }, 'Asset deleted');
      }
      return removed.length > 0;
    });
  }

  async referenceCount(id: number): Promise<number> {
    return this.execute('referenceCount', { id }, (db) => {
      const row = db
        .select({ value: count() })
        .from(libraryEntries)
        .where(eq(libraryEntries.assetId, id))
        .get();
      return row?.value ?? 0;
    });
  }

  /**
   * Assets with no library entry, oldest first
   */
  async findOrphans(): Promise<Asset[]> {
    return this.execute('findOrphans', {}, (db) =>
      db
        .select({ asset: assets })
        .from(assets)
        .leftJoin(libraryEntries, eq(libraryEntries.assetId, assets.id))
        .where(isNull(libraryEntries.id))
        .orderBy(assets.id)
        .all()
        .map((row) => toAsset(row.asset))
    );
  }

  /**
   * Delete every zero-reference asset whose storage key is not pinned, in one
   * transaction, and return the storage keys that were released.
   */
  async sweepOrphans(pinnedKeys: ReadonlySet<string> = new Set()): Promise<string[]> {
    return this.execute('sweepOrphans', { pinned: pinnedKeys.size }, (db) =>
      db.transaction((tx) => {
        const orphans = tx
          .select({ id: assets.id, storageKey: assets.storageKey })
          .from(assets)
          .leftJoin(libraryEntries, eq(libraryEntries.assetId, assets.id))
          .where(isNull(libraryEntries.id))
          .orderBy(assets.id)
          .all()
          .filter((row) => !pinnedKeys.has(row.storageKey));

        if (orphans.length === 0) {
          return [];
        }

        tx.delete(assets)
          .where(inArray(assets.id, orphans.map((row) => row.id)))
          .run();

        return orphans.map((row) => row.storageKey);
      })
    );
  }
}
