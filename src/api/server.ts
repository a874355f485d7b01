import Fastify, { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import rateLimit from '@fastify/rate-limit';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { createPool, type Database } from '../db.ts';
import { registerAuthHook } from './auth/middleware.ts';
import { registerCors } from './cors.ts';
import { registerErrorHandlers } from './errors.ts';
import { DEFAULT_MAX_FILE_SIZE_BYTES, LocalFileStorage, type FileStorage } from './file-storage/index.ts';
import { DatabaseHealthChecker, HealthCheckRegistry, MediaStorageHealthChecker } from './health.ts';
import { assembleSpec } from './openapi/index.ts';
import { isRateLimitEnabled } from './rate-limit/per-user.ts';
import { recipeRoutesPlugin } from './recipes/routes.ts';
import { userRoutesPlugin } from './users/routes.ts';

export const MEDIA_URL_PREFIX = '/static/media/';

export type RecipeApiOptions = {
  logger?: boolean;
  /** Database to use; when omitted a pool is created and closed with the server. */
  db?: Database;
  /** Directory uploaded images are written to and served from. Defaults to MEDIA_ROOT or ./media. */
  mediaRoot?: string;
  /** Origin prepended to image URLs. Defaults to PUBLIC_BASE_URL or http://localhost:3000. */
  publicBaseUrl?: string;
};

// Routes that skip bearer token authentication
export const AUTH_SKIP_PATHS: ReadonlySet<string> = new Set([
  '/api/health',
  '/api/health/live',
  '/api/health/ready',
  '/api/openapi.json',
  '/api/user/create',
  '/api/user/token',
]);

export const AUTH_SKIP_PREFIXES: readonly string[] = [MEDIA_URL_PREFIX];

export function buildServer(options: RecipeApiOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false, ignoreTrailingSlash: true });

  const ownsDb = options.db === undefined;
  const db: Database = options.db ?? createPool();

  registerCors(app);

  // Multipart support for image uploads; oversized files fail with 413
  const maxFileSize = parseInt(process.env.MAX_FILE_SIZE_BYTES || String(DEFAULT_MAX_FILE_SIZE_BYTES), 10);
  app.register(multipart, {
    limits: {
      fileSize: maxFileSize,
      files: 1,
    },
  });

  // Routes opt in through `config.rateLimit`; skipped entirely under tests
  if (isRateLimitEnabled()) {
    app.register(rateLimit, {
      global: false,
      addHeaders: {
        'x-ratelimit-limit': true,
        'x-ratelimit-remaining': true,
        'x-ratelimit-reset': true,
        'retry-after': true,
      },
      onExceeded: (req, key) => {
        req.log.warn({ key, url: req.url }, 'Rate limit exceeded');
      },
      errorResponseBuilder: (_req, context) => ({
        statusCode: 429,
        error: 'Too Many Requests',
        message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      }),
    });
  }

  const mediaRoot = path.resolve(options.mediaRoot ?? process.env.MEDIA_ROOT ?? 'media');
  mkdirSync(mediaRoot, { recursive: true });
  const storage: FileStorage = new LocalFileStorage({
    root: mediaRoot,
    url_prefix: MEDIA_URL_PREFIX,
    base_url: options.publicBaseUrl ?? process.env.PUBLIC_BASE_URL ?? 'http://localhost:3000',
  });

  app.register(fastifyStatic, {
    root: mediaRoot,
    prefix: MEDIA_URL_PREFIX,
    decorateReply: false,
    index: false,
  });

  registerErrorHandlers(app);
  registerAuthHook(app, { db, publicPaths: AUTH_SKIP_PATHS, publicPrefixes: AUTH_SKIP_PREFIXES });

  // Health check endpoints (Kubernetes-compatible)
  const healthRegistry = new HealthCheckRegistry();
  healthRegistry.register(new DatabaseHealthChecker(db));
  healthRegistry.register(new MediaStorageHealthChecker(() => storage.isWritable()));

  // Liveness probe - instant, no I/O, always 200
  app.get('/api/health/live', async () => ({ status: 'ok' }));

  // Readiness probe - checks critical dependencies
  app.get('/api/health/ready', async (_req, reply) => {
    const ready = await healthRegistry.isReady();
    if (ready) {
      return { status: 'ok' };
    }
    return reply.code(503).send({ status: 'unavailable' });
  });

  // Detailed health status for monitoring
  app.get('/api/health', async (_req, reply) => {
    const health = await healthRegistry.checkAll();
    const statusCode = health.status === 'unhealthy' ? 503 : 200;
    return reply.code(statusCode).send(health);
  });

  app.get('/api/openapi.json', async () => assembleSpec());

  app.register(userRoutesPlugin, { db });
  app.register(recipeRoutesPlugin, { db, storage });

  if (ownsDb) {
    app.addHook('onClose', async () => {
      await db.end();
    });
  }

  return app;
}
