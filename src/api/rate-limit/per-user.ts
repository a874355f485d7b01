/**
 * Rate limiting helpers for @fastify/rate-limit.
 *
 * Authenticated requests are keyed by user id, anonymous ones by client IP.
 * Only credential endpoints carry a route limit.
 */

import type { FastifyRequest } from 'fastify';

/** Rate limit configuration */
export interface RateLimitConfig {
  /** Maximum requests allowed in the time window */
  max: number;
  /** Time window in milliseconds */
  timeWindow: number;
}

const DEFAULT_CREDENTIAL_MAX = 10;
const DEFAULT_WINDOW_MS = 60_000;

function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** True unless running under tests or switched off with RATE_LIMIT_DISABLED=true. */
export function isRateLimitEnabled(): boolean {
  return process.env.NODE_ENV !== 'test' && process.env.RATE_LIMIT_DISABLED !== 'true';
}

/**
 * Limit for the token endpoint. RATE_LIMIT_MAX and RATE_LIMIT_WINDOW_MS
 * override the defaults (10 per minute).
 */
export function getCredentialRateLimit(): RateLimitConfig {
  return {
    max: positiveInt(process.env.RATE_LIMIT_MAX, DEFAULT_CREDENTIAL_MAX),
    timeWindow: positiveInt(process.env.RATE_LIMIT_WINDOW_MS, DEFAULT_WINDOW_MS),
  };
}

/**
 * Returns a prefixed key:
 * - "user:{id}" for authenticated users
 * - "ip:{ip}" for unauthenticated requests
 */
export function rateLimitKey(req: FastifyRequest): string {
  return req.user ? `user:${req.user.id}` : `ip:${req.ip}`;
}
