/**
 * Credential Store
 * 
 * Per-tenant cookie jars with a process-wide default. The default file is read
 * on demand so an operator can replace it without a restart.
 */

import { readFile } from 'node:fs/promises';
import { errorMessage, isErrnoException } from '@reelvault/utils';
import type { TenantRepository } from '../db/repositories/tenantRepository.js';
import type { CredentialStatus } from '../types/tenant.js';
import { validateCookieJar } from '../credentials.js';
import { logger } from '../logger.js';

export interface CredentialStoreOptions {
  /** Cookie file used for tenants without their own */
  defaultCookiesPath?: string | null;
}

export class CredentialStore {
  private readonly tenants: TenantRepository;
  private readonly defaultCookiesPath: string | null;

  constructor(tenants: TenantRepository, options: CredentialStoreOptions = {}) {
    this.tenants = tenants;
    this.defaultCookiesPath = options.defaultCookiesPath ?? null;
  }

  /**
   * The credential to acquire with: the tenant's own, else the default, else null
   */
  async get(tenantId: string): Promise<string | null> {
    const own = await this.tenants.getCredential(tenantId);
    if (own !== null) {
      return own;
    }
    return this.loadDefault();
  }

  /**
   * Validate and store a tenant's cookie jar
   */
  async set(tenantId: string, data: string): Promise<void> {
    const normalised = validateCookieJar(data);
    await this.tenants.setCredential(tenantId, normalised);
    logger.info({ tenantId, bytes: Buffer.byteLength(normalised) }, 'Tenant credential stored');
  }

  async clear(tenantId: string): Promise<boolean> {
    const cleared = await this.tenants.clearCredential(tenantId);
    if (cleared) {
      logger.info({ tenantId }, 'Tenant credential cleared');
    }
    return cleared;
  }

  async describe(tenantId: string): Promise<CredentialStatus> {
    const hasOwn = (await this.tenants.getCredential(tenantId)) !== null;
    const usingDefault = !hasOwn && (await this.loadDefault()) !== null;
    return { hasOwn, usingDefault };
  }

  private async loadDefault(): Promise<string | null> {
    if (!this.defaultCookiesPath) {
      return null;
    }

    let content: string;
    try {
      content = await readFile(this.defaultCookiesPath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return validateCookieJar(content);
    } catch (error) {
      logger.warn(
        { path: this.defaultCookiesPath, error: errorMessage(error) },
        'Default cookie file is not usable, acquiring without it'
      );
      return null;
    }
  }
}
