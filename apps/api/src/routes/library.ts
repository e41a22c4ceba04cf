/**
 * Library Routes
 * 
 * A tenant's view of the shared registry: filename → metadata.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError, type TenantLibrary } from '@reelvault/core';

const filenameParamsSchema = z.object({
  filename: z.string().min(1).max(255),
});

const metadataSchema = z
  .object({
    title: z.string().trim().min(1).max(500),
    url: z.string().nullable().default(null),
  })
  .passthrough();

export interface LibraryRoutesOptions {
  library: TenantLibrary;
}

export const libraryRoutes: FastifyPluginAsync<LibraryRoutesOptions> = async (fastify, { library }) => {
  fastify.addHook('onRequest', fastify.authenticate);

  fastify.get('/', async (request) => {
    return library.list(request.tenantId);
  });

  /**
   * Save metadata for a file, attaching it when it is not in the library yet
   */
  fastify.put('/:filename', async (request) => {
    const { filename } = filenameParamsSchema.parse(request.params);
    const metadata = metadataSchema.parse(request.body);

    await library.save(request.tenantId, filename, metadata);

    return { filename, metadata };
  });

  fastify.delete('/:filename', async (request, reply) => {
    const { filename } = filenameParamsSchema.parse(request.params);

    const removed = await library.detach(request.tenantId, filename);
    if (!removed) {
      throw new NotFoundError('Library entry', filename);
    }

    return reply.status(204).send();
  });
};
