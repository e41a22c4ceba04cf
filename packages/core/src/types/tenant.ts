/**
 * Tenant Types
 */

export interface Tenant {
  id: string;
  /** Cookie jar in the extractor's textual format, if the tenant supplied one */
  credentialData: string | null;
  createdAt: Date;
}

export interface CredentialStatus {
  hasOwn: boolean;
  usingDefault: boolean;
}
