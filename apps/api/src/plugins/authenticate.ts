/**
 * Authentication Plugin
 * 
 * Tenants authenticate with a bearer JWT whose `sub` is their tenant id.
 * Maintenance routes take the admin API key instead.
 */

import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

export interface AuthenticateOptions {
  apiSecretKey: string;
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: { sub: string };
    user: { sub: string };
  }
}

declare module 'fastify' {
  interface FastifyRequest {
    tenantId: string;
  }

  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    authenticateApiKey: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

const tokenSchema = z.object({
  sub: z.string().min(1).max(128),
});

const authenticatePlugin: FastifyPluginAsync<AuthenticateOptions> = async (fastify, options) => {
  fastify.decorateRequest('tenantId', '');

  // JWT authentication; the subject is the tenant
  fastify.decorate('authenticate', async (request: FastifyRequest, reply: FastifyReply) => {
    let payload: unknown;
    try {
      payload = await request.jwtVerify();
    } catch (err) {
      request.log.debug({ err }, 'Token rejected');
      return reply.status(401).send({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'Valid authentication required',
      });
    }

    const token = tokenSchema.safeParse(payload);
    if (!token.success) {
      return reply.status(401).send({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'Token has no tenant subject',
      });
    }

    request.tenantId = token.data.sub;
  });

  // API key only authentication
  fastify.decorate('authenticateApiKey', async (request: FastifyRequest, reply: FastifyReply) => {
    const apiKey = request.headers['x-api-key'];

    if (typeof apiKey !== 'string' || apiKey !== options.apiSecretKey) {
      return reply.status(401).send({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'Valid API key required',
      });
    }
  });
};

export const authenticate = fp(authenticatePlugin, {
  name: 'authenticate',
  dependencies: ['@fastify/jwt'],
});
