/**
 * Health Routes
 * 
 * Liveness and dependency status.
 */

import type { FastifyPluginAsync } from 'fastify';
import { checkDatabaseHealth, type BlobStore, type DatabaseHandle } from '@reelvault/core';

interface CheckResult {
  status: 'pass' | 'fail';
  latencyMs?: number;
  error?: string;
}

interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  uptime: number;
  timestamp: string;
  extractor: {
    available: boolean;
    version: string | null;
  };
  database: CheckResult;
  storage: CheckResult & { target: string };
}

export interface HealthRoutesOptions {
  database: DatabaseHandle;
  extractor: { getVersion(): Promise<string | null> };
  blobs: BlobStore;
  checkStorage: () => Promise<boolean>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { database, extractor, blobs, checkStorage }) => {
  /**
   * Readiness with dependency status. A missing extractor or an unreachable
   * object store degrades the service; a broken database makes it unhealthy.
   */
  fastify.get('/', async (_request, reply) => {
    const databaseCheck = checkDatabase(database);
    const version = await extractor.getVersion();
    const storageUp = await checkStorage();

    const status: HealthStatus = {
      status: databaseCheck.status === 'fail'
        ? 'unhealthy'
        : version === null || !storageUp ? 'degraded' : 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      extractor: {
        available: version !== null,
        version,
      },
      database: databaseCheck,
      storage: { target: blobs.name, status: storageUp ? 'pass' : 'fail' },
    };

    return reply.status(status.status === 'unhealthy' ? 503 : 200).send(status);
  });

  // Simple live check for k8s
  fastify.get('/live', async (_request, reply) => {
    return reply.status(200).send({ status: 'live' });
  });
};

function checkDatabase(database: DatabaseHandle): CheckResult {
  const start = Date.now();
  if (!checkDatabaseHealth(database)) {
    return { status: 'fail', error: 'Database did not answer' };
  }
  return {
    status: 'pass',
    latencyMs: Date.now() - start,
  };
}
