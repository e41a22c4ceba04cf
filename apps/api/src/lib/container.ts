/**
 * Service Container
 * 
 * Wires the registry, storage and acquisition layers from configuration.
 * Everything is created once per process and handed to the routes.
 */

import {
  AssetRepository,
  CredentialStore,
  GarbageCollector,
  JobRegistry,
  LibraryRepository,
  TenantLibrary,
  TenantRepository,
  openDatabase,
  type BlobStore,
  type DatabaseHandle,
} from '@reelvault/core';
import { LocalBlobStore, MinioBlobStore, StorageRouter } from '@reelvault/storage';
import {
  AcquisitionRunner,
  ExtractorClient,
  JobOrchestrator,
  StrategySelector,
  directRoute,
  parseRoute,
  resolveIdentities,
  type AttemptRunner,
  type RouteDescriptor,
} from '@reelvault/acquisition';
import type { Config } from '../config/index.js';
import { logger } from './logger.js';

export interface AppServices {
  database: DatabaseHandle;
  jobs: JobRegistry;
  library: TenantLibrary;
  credentials: CredentialStore;
  blobs: BlobStore;
  collector: GarbageCollector;
  orchestrator: JobOrchestrator;
  extractor: Pick<ExtractorClient, 'getVersion'>;
  /** Whether the object store answers; true when only local storage is configured */
  checkStorage(): Promise<boolean>;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  /** Replaces the extractor-backed runner, e.g. in tests */
  runner?: AttemptRunner;
}

/**
 * Egress routes in ladder order: configured proxies, then the direct route
 */
export function buildRoutes(egress: Config['egress']): RouteDescriptor[] {
  const routes = egress.routes.map((route) =>
    parseRoute(route.url, { supportsCredentials: route.credentials, label: route.label })
  );
  if (egress.direct) {
    routes.push(directRoute);
  }
  return routes;
}

export async function createServices(config: Config, overrides: ServiceOverrides = {}): Promise<AppServices> {
  const database = openDatabase(config.databasePath);

  const assets = new AssetRepository(database.db);
  const libraryEntries = new LibraryRepository(database.db);
  const tenants = new TenantRepository(database.db);

  const local = new LocalBlobStore(config.storagePath);
  await local.init();

  let remote: MinioBlobStore | null = null;
  if (config.minio) {
    remote = new MinioBlobStore(config.minio);
    await remote.ensureBucket();
  }
  const blobs = new StorageRouter(local, remote);

  const jobs = new JobRegistry();
  const library = new TenantLibrary(libraryEntries, assets, blobs);
  const credentials = new CredentialStore(tenants, { defaultCookiesPath: config.defaultCookiesPath });
  const collector = new GarbageCollector(assets, blobs, jobs);

  const extractor = new ExtractorClient(config.extractor);
  const runner = overrides.runner ?? new AcquisitionRunner(extractor, { tempDir: config.tempPath });

  const routes = buildRoutes(config.egress);
  const selector = new StrategySelector({
    routes,
    identities: resolveIdentities(config.egress.identities),
    maxRungs: config.egress.maxRungs,
  });

  const orchestrator = new JobOrchestrator({
    assets,
    library,
    credentials,
    jobs,
    blobs,
    selector,
    runner,
    videosDir: local.root,
    allowedHosts: config.allowedSourceHosts,
  });

  logger.info(
    {
      storage: blobs.name,
      routes: routes.map((route) => route.label),
      database: config.databasePath,
    },
    'Services initialised'
  );

  return {
    database,
    jobs,
    library,
    credentials,
    blobs,
    collector,
    orchestrator,
    extractor,
    async checkStorage() {
      return remote ? remote.healthCheck() : true;
    },
    async close() {
      await orchestrator.close();
      database.close();
    },
  };
}
