/**
 * Schema migrations
 * 
 * Plain DDL kept in step with schema.ts. Every statement is idempotent so the
 * migrations can run on every start.
 */

import type Database from 'better-sqlite3';
import { logger } from '../logger.js';

interface Migration {
  version: string;
  statements: string[];
}

const migrations: Migration[] = [
  {
    version: '001_content_registry',
    statements: [
      `CREATE TABLE IF NOT EXISTS tenants (
        id TEXT PRIMARY KEY NOT NULL,
        credential_data TEXT,
        created_at INTEGER NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS assets (
        id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
        source_identity TEXT UNIQUE,
        title TEXT,
        storage_key TEXT NOT NULL UNIQUE,
        byte_size INTEGER,
        created_at INTEGER NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS library_entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
        tenant_id TEXT NOT NULL REFERENCES tenants(id) ON DELETE CASCADE,
        asset_id INTEGER NOT NULL REFERENCES assets(id) ON DELETE CASCADE,
        metadata TEXT NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS library_entries_tenant_asset_idx
        ON library_entries (tenant_id, asset_id)`,
      `CREATE INDEX IF NOT EXISTS library_entries_asset_idx
        ON library_entries (asset_id)`,
    ],
  },
];

export function runMigrations(sqlite: Database.Database): void {
  sqlite.exec(`CREATE TABLE IF NOT EXISTS schema_migrations (
    version TEXT PRIMARY KEY NOT NULL,
    applied_at INTEGER NOT NULL
  )`);

  const applied = new Set(
    sqlite.prepare('SELECT version FROM schema_migrations').pluck().all().map(String)
  );

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    const apply = sqlite.transaction(() => {
      for (const statement of migration.statements) {
        sqlite.exec(statement);
      }
      sqlite
        .prepare('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)')
        .run(migration.version, Date.now());
    });
    apply();

    logger.info({ version: migration.version }, 'Migration applied');
  }
}
