import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { Queryable } from '../../db.ts';
import { AuthenticationError } from '../errors.ts';
import { getUserById } from '../users/service.ts';
import type { User } from '../users/types.ts';
import { verifyAccessToken } from './jwt.ts';

// Augment Fastify request with the authenticated user (set by the onRequest hook)
declare module 'fastify' {
  interface FastifyRequest {
    user: User | null;
  }
}

/** Represents an authenticated identity extracted from a JWT. */
export interface AuthIdentity {
  user_id: number;
}

/**
 * Extracts an authenticated identity from the `Authorization: Bearer <jwt>` header.
 *
 * @returns The identity, or `null` if no valid credentials are present.
 */
export async function getAuthIdentity(req: FastifyRequest): Promise<AuthIdentity | null> {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }

  const token = authHeader.slice(7).trim();
  if (!token) {
    return null;
  }

  try {
    const payload = await verifyAccessToken(token);
    return { user_id: Number.parseInt(payload.sub, 10) };
  } catch (err) {
    req.log.debug({ err }, 'Rejected bearer token');
    return null;
  }
}

/**
 * Resolves the request's bearer token to an active user row.
 *
 * @returns The user, or `null` for a missing/invalid token, an unknown user
 * or a disabled account.
 */
export async function authenticateRequest(req: FastifyRequest, db: Queryable): Promise<User | null> {
  const identity = await getAuthIdentity(req);
  if (!identity) return null;

  const user = await getUserById(db, identity.user_id);
  if (!user || !user.is_active) return null;
  return user;
}

/**
 * Returns the authenticated user for a route behind the auth hook.
 *
 * @throws AuthenticationError if the hook did not attach a user.
 */
export function currentUser(req: FastifyRequest): User {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
}

/** Strip the query string and any trailing slash so `/a/b/?x=1` and `/a/b` compare equal. */
export function normalizePath(url: string): string {
  const path = url.split('?')[0];
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

export interface AuthHookOptions {
  db: Queryable;
  /** Exact paths (without trailing slash) that do not need a token. */
  publicPaths: ReadonlySet<string>;
  /** Path prefixes that do not need a token. */
  publicPrefixes: readonly string[];
}

/**
 * Bearer token authentication hook for API routes.
 *
 * Attaches `req.user` on success; answers 401 for every non-public path
 * without a valid token.
 */
export function registerAuthHook(app: FastifyInstance, opts: AuthHookOptions): void {
  app.decorateRequest('user', null);

  app.addHook('onRequest', async (req, reply) => {
    // CORS preflights carry no credentials
    if (req.method === 'OPTIONS') return;

    const path = normalizePath(req.url);

    if (opts.publicPaths.has(path) || opts.publicPrefixes.some((prefix) => path.startsWith(prefix))) {
      return;
    }

    const user = await authenticateRequest(req, opts.db);
    if (!user) {
      return reply.code(401).send({ error: 'unauthorized' });
    }
    req.user = user;
  });
}
