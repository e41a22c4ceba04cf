/**
 * Tenant Repository
 * 
 * Tenants are created lazily, the first time anything is stored for them.
 */

import { and, eq, isNotNull } from 'drizzle-orm';
import { BaseRepository } from '../baseRepository.js';
import type { ReelVaultDatabase } from '../client.js';
import { tenants } from '../schema.js';
import type { Tenant } from '../../types/tenant.js';

export class TenantRepository extends BaseRepository {
  constructor(db: ReelVaultDatabase) {
    super(db, 'Tenant');
  }

  async findById(id: string): Promise<Tenant | null> {
    return this.execute('findById', { tenantId: id }, (db) => {
      const row = db.select().from(tenants).where(eq(tenants.id, id)).get();
      return row ?? null;
    });
  }

  async getCredential(id: string): Promise<string | null> {
    return this.execute('getCredential', { tenantId: id }, (db) => {
      const row = db
        .select({ credentialData: tenants.credentialData })
        .from(tenants)
        .where(eq(tenants.id, id))
        .get();
      return row?.credentialData ?? null;
    });
  }

  async setCredential(id: string, credentialData: string): Promise<void> {
    await this.execute('setCredential', { tenantId: id }, (db) =>
      db
        .insert(tenants)
        .values({ id, credentialData })
        .onConflictDoUpdate({ target: tenants.id, set: { credentialData } })
        .run()
    );
  }

  /**
   * @returns whether the tenant had a credential to clear
   */
  async clearCredential(id: string): Promise<boolean> {
    return this.execute('clearCredential', { tenantId: id }, (db) => {
      const result = db
        .update(tenants)
        .set({ credentialData: null })
        .where(and(eq(tenants.id, id), isNotNull(tenants.credentialData)))
        .returning({ id: tenants.id })
        .all();
      return result.length > 0;
    });
  }
}
