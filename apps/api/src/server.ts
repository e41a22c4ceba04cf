/**
 * Fastify Server Factory
 * 
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';

import type { Config } from './config/index.js';
import type { AppServices } from './lib/container.js';
import { logger } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';
import { authenticate } from './plugins/authenticate.js';

// Routes
import { healthRoutes } from './routes/health.js';
import { downloadRoutes } from './routes/downloads.js';
import { libraryRoutes } from './routes/library.js';
import { credentialRoutes } from './routes/credentials.js';
import { videoRoutes } from './routes/videos.js';
import { maintenanceRoutes } from './routes/maintenance.js';

// Request logs go through the shared workspace logger
const requestLogger: FastifyBaseLogger = logger;

export async function createServer(config: Config, services: AppServices): Promise<FastifyInstance> {
  const server = Fastify({
    logger: requestLogger,
    trustProxy: config.trustProxy,
    requestTimeout: 30000,
    bodyLimit: 2 * 1024 * 1024, // 2MB, above the largest accepted cookie jar
  });

  // ============================================
  // Security plugins
  // ============================================
  
  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        mediaSrc: ["'self'", 'https:'],
        imgSrc: ["'self'", 'data:', 'https:'],
        scriptSrc: ["'self'"],
      },
    },
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  });

  // ============================================
  // Rate limiting
  // ============================================
  
  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Retry in ${Math.ceil(context.ttl / 1000)} seconds`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
  });

  // ============================================
  // Authentication
  // ============================================
  
  await server.register(jwt, {
    secret: config.jwtSecret,
  });

  await server.register(authenticate, { apiSecretKey: config.apiSecretKey });

  // ============================================
  // Error handling
  // ============================================
  
  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================
  
  // Root route - API info
  server.get('/', async () => ({
    name: 'reelvault-api',
    version: '0.1.0',
    status: 'running',
    health: '/health',
  }));
  
  // Public routes
  await server.register(healthRoutes, {
    prefix: '/health',
    database: services.database,
    extractor: services.extractor,
    blobs: services.blobs,
    checkStorage: () => services.checkStorage(),
  });
  await server.register(videoRoutes, {
    prefix: '/videos',
    blobs: services.blobs,
    presignedUrlTtlSeconds: config.presignedUrlTtlSeconds,
  });
  
  // Tenant routes
  await server.register(downloadRoutes, {
    prefix: '/api/v1/downloads',
    orchestrator: services.orchestrator,
    jobs: services.jobs,
  });
  await server.register(libraryRoutes, { prefix: '/api/v1/library', library: services.library });
  await server.register(credentialRoutes, { prefix: '/api/v1/credentials', credentials: services.credentials });

  // Admin routes
  await server.register(maintenanceRoutes, { prefix: '/api/v1/maintenance', collector: services.collector });

  return server;
}
