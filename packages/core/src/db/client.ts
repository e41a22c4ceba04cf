/**
 * Database client
 * 
 * Opens the SQLite file, enables foreign keys and applies migrations.
 * One handle is created at start-up and injected wherever it is needed.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { runMigrations } from './migrations.js';
import { errorMessage } from '@reelvault/utils';
import { logger } from '../logger.js';

export type ReelVaultDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: ReelVaultDatabase;
  sqlite: Database.Database;
  close(): void;
}

const IN_MEMORY = ':memory:';

/**
 * Open (and migrate) a database. Pass ':memory:' for a throwaway instance.
 */
export function openDatabase(path: string = IN_MEMORY): DatabaseHandle {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  if (path !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  runMigrations(sqlite);

  const db = drizzle(sqlite, { schema });
  logger.debug({ path }, 'Database opened');

  return {
    db,
    sqlite,
    close: () => {
      sqlite.close();
      logger.debug({ path }, 'Database closed');
    },
  };
}

/**
 * Health check for the database connection
 */
export function checkDatabaseHealth(handle: DatabaseHandle): boolean {
  try {
    handle.sqlite.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Database health check failed');
    return false;
  }
}
