/**
 * Fastify routes for the user API: registration, token issue and the
 * caller's own profile.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { Queryable } from '../../db.ts';
import { signAccessToken } from '../auth/jwt.ts';
import { currentUser } from '../auth/middleware.ts';
import { ValidationError } from '../errors.ts';
import { getCredentialRateLimit, isRateLimitEnabled, rateLimitKey } from '../rate-limit/per-user.ts';
import { authenticate, createUser, toProfile, updateUser } from './service.ts';

export const USER_API_PREFIX = '/api/user';

export const MIN_PASSWORD_LENGTH = 5;

const passwordSchema = z
  .string()
  .min(MIN_PASSWORD_LENGTH, `Ensure this field has at least ${MIN_PASSWORD_LENGTH} characters.`);

export const createUserSchema = z.object({
  email: z.string().trim().email().max(255),
  password: passwordSchema,
  name: z.string().trim().min(1).max(255),
});

export const updateMeSchema = createUserSchema.partial();

export const tokenSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

export interface UserRoutesOptions {
  db: Queryable;
}

export async function userRoutesPlugin(app: FastifyInstance, opts: UserRoutesOptions): Promise<void> {
  const { db } = opts;

  app.post(`${USER_API_PREFIX}/create`, async (req, reply) => {
    const body = createUserSchema.parse(req.body ?? {});
    const user = await createUser(db, body);
    req.log.info({ user_id: user.id }, 'User registered');
    return reply.code(201).send(toProfile(user));
  });

  const credentialLimit = getCredentialRateLimit();
  app.post(
    `${USER_API_PREFIX}/token`,
    {
      config: isRateLimitEnabled()
        ? { rateLimit: { ...credentialLimit, keyGenerator: rateLimitKey } }
        : {},
    },
    async (req) => {
      const body = tokenSchema.parse(req.body ?? {});
      const user = await authenticate(db, body.email, body.password);
      if (!user) {
        req.log.warn('Token request with invalid credentials');
        throw new ValidationError({ non_field_errors: ['Unable to authenticate with provided credentials.'] });
      }
      return { token: await signAccessToken(user.id) };
    },
  );

  app.get(`${USER_API_PREFIX}/me`, async (req) => toProfile(currentUser(req)));

  // PUT needs the whole profile, PATCH any subset of it
  app.put(`${USER_API_PREFIX}/me`, async (req) => {
    const user = currentUser(req);
    const body = createUserSchema.parse(req.body ?? {});
    return toProfile(await updateUser(db, user.id, body));
  });

  app.patch(`${USER_API_PREFIX}/me`, async (req) => {
    const user = currentUser(req);
    const body = updateMeSchema.parse(req.body ?? {});
    return toProfile(await updateUser(db, user.id, body));
  });
}
