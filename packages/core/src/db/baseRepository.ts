/**
 * Base Repository
 * 
 * Shared plumbing for the drizzle repositories: the injected database handle
 * and uniform error logging around every statement.
 */

import { errorMessage } from '@reelvault/utils';
import type { ReelVaultDatabase } from './client.js';
import { logger } from '../logger.js';

export abstract class BaseRepository {
  protected readonly modelName: string;
  protected readonly db: ReelVaultDatabase;

  constructor(db: ReelVaultDatabase, modelName: string) {
    this.db = db;
    this.modelName = modelName;
  }

  /**
   * Run a statement (or a synchronous transaction), logging and rethrowing
   * anything the driver raises
   */
  protected async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: (db: ReelVaultDatabase) => T
  ): Promise<T> {
    try {
      return fn(this.db);
    } catch (error) {
      logger.error(
        { model: this.modelName, operation, ...context, error: errorMessage(error) },
        'Repository operation failed'
      );
      throw error;
    }
  }
}
