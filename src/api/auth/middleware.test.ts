import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { SignJWT } from 'jose';

import { AuthenticationError } from '../errors.ts';
import { signAccessToken } from './jwt.ts';
import { currentUser, getAuthIdentity, normalizePath } from './middleware.ts';

const TEST_SECRET = 'middleware-test-secret-0123456789abc'; // 36 bytes

describe('JWT auth middleware', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
    vi.stubEnv('JWT_SECRET', TEST_SECRET);
    vi.stubEnv('JWT_SECRET_PREVIOUS', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  /** Create a minimal fake FastifyRequest with the given headers. */
  function fakeRequest(headers: Record<string, string | undefined> = {}): FastifyRequest {
    return { headers, log: { debug: vi.fn() } } as unknown as FastifyRequest;
  }

  describe('getAuthIdentity', () => {
    it('returns the user id for a valid token', async () => {
      const token = await signAccessToken(17);

      const identity = await getAuthIdentity(fakeRequest({ authorization: `Bearer ${token}` }));

      expect(identity).toEqual({ user_id: 17 });
    });

    it('returns null when no Authorization header is present', async () => {
      expect(await getAuthIdentity(fakeRequest())).toBeNull();
    });

    it('returns null for non-Bearer authorization', async () => {
      expect(await getAuthIdentity(fakeRequest({ authorization: 'Basic dXNlcjpwYXNz' }))).toBeNull();
    });

    it('returns null for an empty Bearer token', async () => {
      expect(await getAuthIdentity(fakeRequest({ authorization: 'Bearer ' }))).toBeNull();
    });

    it('returns null for an invalid JWT and logs the rejection', async () => {
      const req = fakeRequest({ authorization: 'Bearer not-a-valid-jwt' });

      expect(await getAuthIdentity(req)).toBeNull();
      expect(req.log.debug).toHaveBeenCalledTimes(1);
    });

    it('returns null for a JWT signed with the wrong secret', async () => {
      const nowSec = Math.floor(Date.now() / 1000);
      const wrongKeyToken = await new SignJWT({})
        .setProtectedHeader({ alg: 'HS256', kid: 'test' })
        .setSubject('1')
        .setIssuer('recipe-api')
        .setIssuedAt(nowSec)
        .setExpirationTime(nowSec + 900)
        .setJti('wrong-key-jti')
        .sign(new TextEncoder().encode('some-other-secret-0123456789abcdefgh'));

      expect(await getAuthIdentity(fakeRequest({ authorization: `Bearer ${wrongKeyToken}` }))).toBeNull();
    });
  });

  describe('currentUser', () => {
    it('returns the attached user', () => {
      const user = { id: 3, email: 'a@example.com', name: 'A', is_active: true, is_staff: false, is_superuser: false };
      const req = { user } as unknown as FastifyRequest;
      expect(currentUser(req)).toBe(user);
    });

    it('throws AuthenticationError when no user is attached', () => {
      const req = { user: null } as unknown as FastifyRequest;
      expect(() => currentUser(req)).toThrow(AuthenticationError);
    });
  });

  describe('normalizePath', () => {
    it('drops the query string and a trailing slash', () => {
      expect(normalizePath('/api/user/token/?next=1')).toBe('/api/user/token');
      expect(normalizePath('/api/health')).toBe('/api/health');
    });

    it('keeps the root path', () => {
      expect(normalizePath('/')).toBe('/');
    });
  });
});
