/**
 * Database Layer Index
 */

export {
  openDatabase,
  checkDatabaseHealth,
  type DatabaseHandle,
  type ReelVaultDatabase,
} from './client.js';

export { runMigrations } from './migrations.js';
export { BaseRepository } from './baseRepository.js';
export * as schema from './schema.js';

export {
  AssetRepository,
  LibraryRepository,
  TenantRepository,
  toAsset,
} from './repositories/index.js';
