/**
 * CORS configuration for the API server.
 *
 * Origin allowlist is resolved from (first defined wins):
 *   1. CORS_ALLOWED_ORIGINS  (comma-separated)
 *   2. PUBLIC_BASE_URL
 *   3. http://localhost:3000
 *
 * Requests without an Origin header (server-to-server, curl) are always allowed.
 * Set `CORS_HANDLED_BY_PROXY=true` when a reverse proxy already adds the headers.
 */
import cors from '@fastify/cors';
import type { FastifyInstance } from 'fastify';

/** Normalize a URL string to its origin (protocol + host), stripping paths and trailing slashes. */
function toOrigin(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url;
  }
}

/** Build the allowed-origins list from environment variables. */
export function getAllowedOrigins(): string[] {
  return (process.env.CORS_ALLOWED_ORIGINS || process.env.PUBLIC_BASE_URL || 'http://localhost:3000')
    .split(',')
    .map((s) => toOrigin(s.trim()))
    .filter(Boolean);
}

function isHandledByProxy(): boolean {
  const raw = (process.env.CORS_HANDLED_BY_PROXY ?? '').trim().toLowerCase();
  return raw === 'true' || raw === '1';
}

export function registerCors(app: FastifyInstance): void {
  if (isHandledByProxy()) {
    app.log.info('CORS_HANDLED_BY_PROXY is set, skipping @fastify/cors registration');
    return;
  }

  app.register(cors, {
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      // Disallowed origins get no ACAO header
      return callback(null, getAllowedOrigins().includes(origin));
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    // Bearer tokens only; no cookies cross origins
    allowedHeaders: ['Authorization', 'Content-Type', 'Accept'],
    credentials: false,
    maxAge: 86400,
  });
}
