/**
 * Credential Routes
 * 
 * Per-tenant cookie jars. The jar is accepted as a plain text body or as
 * `{ cookies }` JSON.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { CredentialStore } from '@reelvault/core';

const credentialBodySchema = z.object({
  cookies: z.string(),
});

export interface CredentialRoutesOptions {
  credentials: CredentialStore;
}

export const credentialRoutes: FastifyPluginAsync<CredentialRoutesOptions> = async (fastify, { credentials }) => {
  fastify.addHook('onRequest', fastify.authenticate);

  fastify.get('/', async (request) => {
    return credentials.describe(request.tenantId);
  });

  fastify.put('/', async (request) => {
    const jar = typeof request.body === 'string'
      ? request.body
      : credentialBodySchema.parse(request.body).cookies;

    await credentials.set(request.tenantId, jar);

    return credentials.describe(request.tenantId);
  });

  fastify.delete('/', async (request) => {
    const cleared = await credentials.clear(request.tenantId);
    return { cleared };
  });
};
