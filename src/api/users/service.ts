/**
 * User account service: creation, credential checks and profile updates.
 */

import type { Queryable } from '../../db.ts';
import { hashPassword, verifyPassword } from '../auth/password.ts';
import { ValidationError } from '../errors.ts';
import type { CreateUserInput, UpdateUserInput, User, UserProfile, UserRow } from './types.ts';

const USER_COLUMNS = 'id, email, name, is_active, is_staff, is_superuser';

function toUser(row: User): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    is_active: row.is_active,
    is_staff: row.is_staff,
    is_superuser: row.is_superuser,
  };
}

/**
 * Lower-cases the domain part of an email address, leaving the local part
 * untouched (`Test2@Example.com` → `Test2@example.com`). Strings without an
 * `@` are returned as-is.
 */
export function normalizeEmail(email: string): string {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf('@');
  if (at < 0) return trimmed;
  return `${trimmed.slice(0, at)}@${trimmed.slice(at + 1).toLowerCase()}`;
}

async function assertEmailAvailable(db: Queryable, email: string, exceptUserId?: number): Promise<void> {
  const existing = await db.query<{ id: number }>(
    'SELECT id FROM user_account WHERE email = $1 AND ($2::int IS NULL OR id <> $2::int)',
    [email, exceptUserId ?? null],
  );
  if (existing.rows.length > 0) {
    throw ValidationError.field('email', 'user with this email already exists.');
  }
}

/**
 * Creates a user with a normalized email and a hashed password.
 *
 * @throws ValidationError when the email is missing or already taken.
 */
export async function createUser(db: Queryable, input: CreateUserInput): Promise<User> {
  if (!input.email || input.email.trim().length === 0) {
    throw ValidationError.field('email', 'User must have an email address');
  }

  const email = normalizeEmail(input.email);
  await assertEmailAvailable(db, email);

  const result = await db.query<User>(
    `INSERT INTO user_account (email, name, password_hash, is_staff, is_superuser)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${USER_COLUMNS}`,
    [email, input.name ?? '', await hashPassword(input.password), input.is_staff ?? false, input.is_superuser ?? false],
  );

  return toUser(result.rows[0]);
}

/** Creates a user with both the staff and superuser flags set. */
export async function createSuperuser(db: Queryable, email: string, password: string, name = ''): Promise<User> {
  return createUser(db, { email, password, name, is_staff: true, is_superuser: true });
}

export async function getUserById(db: Queryable, id: number): Promise<User | null> {
  const result = await db.query<User>(`SELECT ${USER_COLUMNS} FROM user_account WHERE id = $1`, [id]);
  return result.rows.length > 0 ? toUser(result.rows[0]) : null;
}

/**
 * Checks an email/password pair.
 *
 * @returns the active user, or null when the email is unknown, the password
 * is wrong or the account is disabled.
 */
export async function authenticate(db: Queryable, email: string, password: string): Promise<User | null> {
  const result = await db.query<UserRow>(
    `SELECT ${USER_COLUMNS}, password_hash FROM user_account WHERE email = $1`,
    [normalizeEmail(email)],
  );
  const row = result.rows[0];
  if (!row || !row.is_active) return null;

  const ok = await verifyPassword(password, row.password_hash);
  return ok ? toUser(row) : null;
}

/**
 * Applies a partial update to a user's own account. A new password is hashed;
 * a new email is normalized and must not belong to another account.
 */
export async function updateUser(db: Queryable, userId: number, input: UpdateUserInput): Promise<User> {
  const sets: string[] = [];
  const params: unknown[] = [];

  if (input.email !== undefined) {
    const email = normalizeEmail(input.email);
    await assertEmailAvailable(db, email, userId);
    params.push(email);
    sets.push(`email = $${params.length}`);
  }
  if (input.name !== undefined) {
    params.push(input.name);
    sets.push(`name = $${params.length}`);
  }
  if (input.password !== undefined) {
    params.push(await hashPassword(input.password));
    sets.push(`password_hash = $${params.length}`);
  }

  params.push(userId);
  const result = await db.query<User>(
    `UPDATE user_account
     SET ${[...sets, 'updated_at = now()'].join(', ')}
     WHERE id = $${params.length}
     RETURNING ${USER_COLUMNS}`,
    params,
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error(`User ${userId} disappeared during update`);
  }
  return toUser(row);
}

export function toProfile(user: User): UserProfile {
  return { email: user.email, name: user.name };
}
