/**
 * Authentication helpers for API tests.
 *
 * Tokens are minted with the server's own signer, using the JWT_SECRET set in
 * tests/setup-api.ts.
 */

import type { Queryable } from '../../src/db.ts';
import { signAccessToken } from '../../src/api/auth/jwt.ts';
import { createUser } from '../../src/api/users/service.ts';
import type { User } from '../../src/api/users/types.ts';

export const TEST_PASSWORD = 'testpass123';

/** Create a user with the shared test password. */
export async function createTestUser(
  db: Queryable,
  email: string = 'user@example.com',
  name: string = 'Test User',
): Promise<User> {
  return createUser(db, { email, password: TEST_PASSWORD, name });
}

/**
 * Build an Authorization header object for use with app.inject().
 *
 * Usage:
 *   const res = await app.inject({
 *     method: 'GET',
 *     url: '/api/recipe/recipes',
 *     headers: await getAuthHeaders(user),
 *   });
 */
export async function getAuthHeaders(user: Pick<User, 'id'>): Promise<Record<string, string>> {
  const token = await signAccessToken(user.id);
  return { authorization: `Bearer ${token}` };
}
