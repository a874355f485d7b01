/**
 * User account types.
 *
 * All property names use snake_case to match the database columns and the
 * wire format.
 */

/** A user account as the API sees it (never carries the password hash). */
export interface User {
  id: number;
  email: string;
  name: string;
  is_active: boolean;
  is_staff: boolean;
  is_superuser: boolean;
}

/** Row shape of `user_account` including the bcrypt hash. */
export interface UserRow extends User {
  password_hash: string;
}

/** Input for creating a user. `email` is optional here so a missing one can be rejected with a proper error. */
export interface CreateUserInput {
  email?: string | null;
  password: string;
  name?: string;
  is_staff?: boolean;
  is_superuser?: boolean;
}

/** Input for updating the authenticated user's own account */
export interface UpdateUserInput {
  email?: string;
  name?: string;
  password?: string;
}

/** Public profile returned by /api/user endpoints */
export interface UserProfile {
  email: string;
  name: string;
}
