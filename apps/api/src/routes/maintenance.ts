/**
 * Maintenance Routes
 * 
 * Operator endpoints, guarded by the admin API key.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { GarbageCollector } from '@reelvault/core';

export interface MaintenanceRoutesOptions {
  collector: GarbageCollector;
}

export const maintenanceRoutes: FastifyPluginAsync<MaintenanceRoutesOptions> = async (fastify, { collector }) => {
  fastify.addHook('onRequest', fastify.authenticateApiKey);

  /**
   * Delete unreferenced assets and purge their bytes
   */
  fastify.post('/gc', async () => {
    return collector.collect();
  });
};
