/**
 * @reelvault/core
 * 
 * Core business logic package containing:
 * - Job state machine and in-memory job registry
 * - Shared content registry (drizzle + SQLite)
 * - Tenant libraries and credentials
 * - Garbage collection of unreferenced assets
 * - Error taxonomy and shared types
 */

// State machine
export {
  JobState,
  JobStateMachine,
  isValidTransition,
  isTerminalState,
  getNextStates,
} from './stateMachine.js';

export type { JobStateTransition } from './stateMachine.js';

// Types
export type {
  Asset,
  SourceIdentity,
  RegisterAssetInput,
  LibraryMetadata,
  LibraryEntry,
  LibraryItem,
} from './types/asset.js';

export type { Job, JobStatus, JobUpdate } from './types/job.js';
export type { Tenant, CredentialStatus } from './types/tenant.js';
export type { BlobStore } from './types/blobStore.js';

// Source identity & credentials
export { parseSourceIdentity, type SourceIdentityOptions } from './source.js';
export { validateCookieJar, COOKIE_JAR_HEADERS, MAX_COOKIE_JAR_BYTES } from './credentials.js';

// Database
export {
  openDatabase,
  checkDatabaseHealth,
  runMigrations,
  BaseRepository,
  AssetRepository,
  LibraryRepository,
  TenantRepository,
  toAsset,
  schema,
  type DatabaseHandle,
  type ReelVaultDatabase,
} from './db/index.js';

// Services
export {
  TenantLibrary,
  CredentialStore,
  JobRegistry,
  GarbageCollector,
  deriveStorageKey,
  type LibraryListing,
  type CredentialStoreOptions,
  type CreateJobInput,
  type CollectionReport,
  type PurgeFailure,
} from './services/index.js';

// Errors
export {
  ReelVaultError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  AcquisitionError,
  InvalidSourceError,
  SourceUnavailableError,
  UpstreamBlockedError,
  ToolUnavailableError,
  ArtifactMissingError,
  RegistrationConflictError,
  StorageFailureError,
} from './errors/index.js';
