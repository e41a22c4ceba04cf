/**
 * API Configuration
 * 
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { MinioConfig } from '@reelvault/storage';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

/**
 * Load .env from the monorepo root into process.env
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

const egressRouteSchema = z.object({
  url: z.string().min(1),
  credentials: z.boolean().default(false),
  label: z.string().min(1).optional(),
});

export type EgressRouteConfig = z.infer<typeof egressRouteSchema>;

const egressRoutesSchema = z
  .string()
  .transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'EGRESS_ROUTES must be a JSON list' });
      return z.NEVER;
    }
  })
  .pipe(z.array(egressRouteSchema));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.string().transform(v => v === 'true').default('true'),
  CORS_ORIGINS: z.string().default('http://localhost:5173'),

  // Security
  JWT_SECRET: z.string().min(16).default('development-jwt-secret-change-me'),
  API_SECRET_KEY: z.string().min(16).default('development-admin-key-change-me'),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),

  // Paths (relative to monorepo root)
  DATABASE_PATH: z.string().default('./storage/reelvault.db'),
  STORAGE_PATH: z.string().default('./storage/videos'),
  TEMP_PATH: z.string().default('./storage/temp'),

  // Extractor
  EXTRACTOR_PATH: z.string().default('yt-dlp'),
  EXTRACTOR_FORMAT: z.string().optional(),
  FFMPEG_LOCATION: z.string().optional(),
  EXTRACTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  DEFAULT_COOKIES_PATH: z.string().optional(),

  // Egress strategy
  EGRESS_ROUTES: egressRoutesSchema.default('[]'),
  DIRECT_ROUTE: z.string().transform(v => v !== 'false').default('true'),
  CLIENT_IDENTITIES: z.string().optional(),
  MAX_LADDER_RUNGS: z.coerce.number().int().positive().default(6),
  ALLOWED_SOURCE_HOSTS: z.string().optional(),

  // Object storage
  MINIO_ENDPOINT: z.string().optional(),
  MINIO_PORT: z.coerce.number().int().positive().default(9000),
  MINIO_USE_SSL: z.string().transform(v => v === 'true').default('false'),
  MINIO_ACCESS_KEY: z.string().default(''),
  MINIO_SECRET_KEY: z.string().default(''),
  MINIO_BUCKET: z.string().default('reelvault-videos'),
  MINIO_PREFIX: z.string().optional(),
  PRESIGNED_URL_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
});

/**
 * Validate an environment and derive the runtime configuration
 * 
 * @throws ZodError when a variable is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.parse(env);

  const minio: MinioConfig | null = parsed.MINIO_ENDPOINT
    ? {
        endPoint: parsed.MINIO_ENDPOINT,
        port: parsed.MINIO_PORT,
        useSSL: parsed.MINIO_USE_SSL,
        accessKey: parsed.MINIO_ACCESS_KEY,
        secretKey: parsed.MINIO_SECRET_KEY,
        bucket: parsed.MINIO_BUCKET,
        prefix: parsed.MINIO_PREFIX,
      }
    : null;

  const allowedHosts = splitList(parsed.ALLOWED_SOURCE_HOSTS);

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.API_HOST,
    port: parsed.API_PORT,
    logLevel: parsed.LOG_LEVEL,
    trustProxy: parsed.TRUST_PROXY,
    corsOrigins: splitList(parsed.CORS_ORIGINS),

    // Security
    jwtSecret: parsed.JWT_SECRET,
    apiSecretKey: parsed.API_SECRET_KEY,

    // Rate limiting
    rateLimitMax: parsed.RATE_LIMIT_MAX_REQUESTS,
    rateLimitWindow: `${parsed.RATE_LIMIT_WINDOW_MS} milliseconds`,

    // Paths
    databasePath: parsed.DATABASE_PATH === ':memory:' ? ':memory:' : resolvePath(parsed.DATABASE_PATH),
    storagePath: resolvePath(parsed.STORAGE_PATH),
    tempPath: resolvePath(parsed.TEMP_PATH),
    defaultCookiesPath: parsed.DEFAULT_COOKIES_PATH ? resolvePath(parsed.DEFAULT_COOKIES_PATH) : null,

    extractor: {
      binaryPath: parsed.EXTRACTOR_PATH,
      format: parsed.EXTRACTOR_FORMAT,
      ffmpegLocation: parsed.FFMPEG_LOCATION ?? null,
      timeoutMs: parsed.EXTRACTOR_TIMEOUT_MS,
    },

    egress: {
      routes: parsed.EGRESS_ROUTES,
      direct: parsed.DIRECT_ROUTE,
      identities: splitList(parsed.CLIENT_IDENTITIES),
      maxRungs: parsed.MAX_LADDER_RUNGS,
    },

    allowedSourceHosts: allowedHosts.length > 0 ? allowedHosts : undefined,

    minio,
    presignedUrlTtlSeconds: parsed.PRESIGNED_URL_TTL_SECONDS,
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;
