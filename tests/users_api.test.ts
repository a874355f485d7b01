import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';

import { verifyPassword } from '../src/api/auth/password.ts';
import { ValidationError } from '../src/api/errors.ts';
import { authenticate, createSuperuser, createUser, normalizeEmail } from '../src/api/users/service.ts';
import { getAuthHeaders, TEST_PASSWORD, createTestUser } from './helpers/auth.ts';
import { truncateAllTables } from './helpers/db.ts';
import { createTestServer, type TestServer } from './helpers/server.ts';

describe('Users', () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await createTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(async () => {
    await truncateAllTables(server.db);
  });

  describe('user service', () => {
    it('creates a user with an email and a hashed password', async () => {
      const user = await createUser(server.db, { email: 'test@example.com', password: TEST_PASSWORD });

      expect(user.email).toBe('test@example.com');
      expect(user.is_staff).toBe(false);
      expect(user.is_superuser).toBe(false);

      const row = await server.db.query<{ password_hash: string }>(
        'SELECT password_hash FROM user_account WHERE id = $1',
        [user.id],
      );
      expect(row.rows[0].password_hash).not.toBe(TEST_PASSWORD);
      expect(await verifyPassword(TEST_PASSWORD, row.rows[0].password_hash)).toBe(true);
    });

    it.each([
      ['test1@EXAMPLE.com', 'test1@example.com'],
      ['Test2@Example.com', 'Test2@example.com'],
      ['TEST3@EXAMPLE.COM', 'TEST3@example.com'],
      ['test4@example.COM', 'test4@example.com'],
    ])('normalizes %s to %s', async (input, expected) => {
      expect(normalizeEmail(input)).toBe(expected);
      const user = await createUser(server.db, { email: input, password: 'sample123' });
      expect(user.email).toBe(expected);
    });

    it('rejects a user without an email', async () => {
      await expect(createUser(server.db, { email: '', password: 'test123' })).rejects.toThrow(ValidationError);
      await expect(createUser(server.db, { email: null, password: 'test123' })).rejects.toThrow(ValidationError);
    });

    it('rejects a duplicate email after normalization', async () => {
      await createUser(server.db, { email: 'dup@example.com', password: 'test123' });
      await expect(createUser(server.db, { email: 'dup@EXAMPLE.com', password: 'test123' })).rejects.toThrow(
        'Validation failed',
      );
    });

    it('creates a superuser', async () => {
      const user = await createSuperuser(server.db, 'admin@example.com', 'test123');

      expect(user.is_superuser).toBe(true);
      expect(user.is_staff).toBe(true);
    });

    it('authenticates active users only', async () => {
      const user = await createTestUser(server.db, 'login@example.com');

      expect((await authenticate(server.db, 'login@EXAMPLE.com', TEST_PASSWORD))?.id).toBe(user.id);
      expect(await authenticate(server.db, 'login@example.com', 'wrong-password')).toBeNull();
      expect(await authenticate(server.db, 'nobody@example.com', TEST_PASSWORD)).toBeNull();

      await server.db.query('UPDATE user_account SET is_active = false WHERE id = $1', [user.id]);
      expect(await authenticate(server.db, 'login@example.com', TEST_PASSWORD)).toBeNull();
    });
  });

  describe('POST /api/user/create', () => {
    it('registers a user without returning the password', async () => {
      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/create/',
        payload: { email: 'test@example.com', password: TEST_PASSWORD, name: 'Test Name' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ email: 'test@example.com', name: 'Test Name' });
    });

    it('rejects an email that is already registered', async () => {
      await createTestUser(server.db, 'test@example.com');

      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/create',
        payload: { email: 'test@example.com', password: TEST_PASSWORD, name: 'Test Name' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Validation failed',
        details: { email: ['user with this email already exists.'] },
      });
    });

    it('rejects an email longer than the column allows', async () => {
      const email = `${'a'.repeat(260)}@example.com`;

      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/create',
        payload: { email, password: TEST_PASSWORD, name: 'Test Name' },
      });

      expect(res.statusCode).toBe(400);
      expect(Object.keys(res.json().details)).toEqual(['email']);
    });

    it('rejects a password shorter than five characters', async () => {
      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/create',
        payload: { email: 'test@example.com', password: 'pw', name: 'Test Name' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().details.password).toEqual(['Ensure this field has at least 5 characters.']);

      const count = await server.db.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM user_account');
      expect(count.rows[0].n).toBe(0);
    });
  });

  describe('POST /api/user/token', () => {
    it('issues a token that authenticates later requests', async () => {
      await createTestUser(server.db, 'test@example.com', 'Test Name');

      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/token/',
        payload: { email: 'test@example.com', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      const { token } = res.json<{ token: string }>();
      expect(typeof token).toBe('string');

      const me = await server.app.inject({
        method: 'GET',
        url: '/api/user/me/',
        headers: { authorization: `Bearer ${token}` },
      });
      expect(me.statusCode).toBe(200);
      expect(me.json()).toEqual({ email: 'test@example.com', name: 'Test Name' });
    });

    it('rejects bad credentials', async () => {
      await createTestUser(server.db, 'test@example.com');

      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/token',
        payload: { email: 'test@example.com', password: 'badpass' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Validation failed',
        details: { non_field_errors: ['Unable to authenticate with provided credentials.'] },
      });
    });

    it('rejects a blank password', async () => {
      const res = await server.app.inject({
        method: 'POST',
        url: '/api/user/token',
        payload: { email: 'test@example.com', password: '' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).not.toHaveProperty('token');
    });
  });

  describe('/api/user/me', () => {
    it('requires authentication', async () => {
      const res = await server.app.inject({ method: 'GET', url: '/api/user/me' });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'unauthorized' });
    });

    it('rejects a token for a deleted user', async () => {
      const user = await createTestUser(server.db);
      const headers = await getAuthHeaders(user);
      await server.db.query('DELETE FROM user_account WHERE id = $1', [user.id]);

      const res = await server.app.inject({ method: 'GET', url: '/api/user/me', headers });

      expect(res.statusCode).toBe(401);
    });

    it('updates name and password with PATCH', async () => {
      const user = await createTestUser(server.db, 'me@example.com', 'Old Name');

      const res = await server.app.inject({
        method: 'PATCH',
        url: '/api/user/me',
        headers: await getAuthHeaders(user),
        payload: { name: 'Updated Name', password: 'newpassword123' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ email: 'me@example.com', name: 'Updated Name' });
      expect(await authenticate(server.db, 'me@example.com', 'newpassword123')).not.toBeNull();
      expect(await authenticate(server.db, 'me@example.com', TEST_PASSWORD)).toBeNull();
    });

    it('requires the whole profile for PUT', async () => {
      const user = await createTestUser(server.db, 'me@example.com');

      const res = await server.app.inject({
        method: 'PUT',
        url: '/api/user/me',
        headers: await getAuthHeaders(user),
        payload: { name: 'Only Name' },
      });

      expect(res.statusCode).toBe(400);
      expect(Object.keys(res.json().details).sort()).toEqual(['email', 'password']);
    });

    it('rejects an over-long email on PATCH', async () => {
      const user = await createTestUser(server.db, 'me@example.com');

      const res = await server.app.inject({
        method: 'PATCH',
        url: '/api/user/me',
        headers: await getAuthHeaders(user),
        payload: { email: `${'b'.repeat(250)}@example.com` },
      });

      expect(res.statusCode).toBe(400);
      expect(Object.keys(res.json().details)).toEqual(['email']);
    });

    it('refuses to take another account email', async () => {
      await createTestUser(server.db, 'taken@example.com');
      const user = await createTestUser(server.db, 'me@example.com');

      const res = await server.app.inject({
        method: 'PATCH',
        url: '/api/user/me',
        headers: await getAuthHeaders(user),
        payload: { email: 'taken@example.com' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual({ email: ['user with this email already exists.'] });
    });
  });
});
