export { TenantLibrary, type LibraryListing } from './tenantLibrary.js';
export { CredentialStore, type CredentialStoreOptions } from './credentialStore.js';
export { JobRegistry, deriveStorageKey, type CreateJobInput } from './jobRegistry.js';
export {
  GarbageCollector,
  type CollectionReport,
  type PurgeFailure,
} from './garbageCollector.js';
