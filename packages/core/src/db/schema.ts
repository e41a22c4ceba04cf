/**
 * Drizzle schema for the shared content registry.
 * 
 * - `assets` is tenant independent, unique per storage key and per source identity
 * - `library_entries` is a tenant's reference into `assets`; the number of rows
 *   pointing at an asset is its reference count
 * - `tenants` carries the optional acquisition credential
 */

import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';
import type { LibraryMetadata } from '../types/asset.js';

export const tenants = sqliteTable('tenants', {
  id: text('id').primaryKey(),
  credentialData: text('credential_data'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull().$defaultFn(() => new Date()),
});

export const assets = sqliteTable('assets', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sourceIdentity: text('source_identity').unique(),
  title: text('title'),
  storageKey: text('storage_key').notNull().unique(),
  byteSize: integer('byte_size'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull().$defaultFn(() => new Date()),
});

export const libraryEntries = sqliteTable('library_entries', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  tenantId: text('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
  assetId: integer('asset_id').notNull().references(() => assets.id, { onDelete: 'cascade' }),
  metadata: text('metadata', { mode: 'json' }).$type<LibraryMetadata>().notNull(),
}, (table) => ({
  tenantAssetIdx: uniqueIndex('library_entries_tenant_asset_idx').on(table.tenantId, table.assetId),
  assetIdx: index('library_entries_asset_idx').on(table.assetId),
}));

export type TenantRow = typeof tenants.$inferSelect;
export type AssetRow = typeof assets.$inferSelect;
export type LibraryEntryRow = typeof libraryEntries.$inferSelect;
