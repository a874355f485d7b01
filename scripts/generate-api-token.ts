#!/usr/bin/env node
/**
 * CLI script to mint a bearer token for an existing user, e.g. for smoke tests.
 *
 * Usage:
 *   JWT_SECRET=<secret> npm run generate-api-token -- <email>
 *
 * Environment:
 *   JWT_SECRET (required): the same HS256 secret used by the API server.
 *   ACCESS_TOKEN_TTL_SECONDS: lifetime of the token (default one day).
 */

import { createPool } from '../src/db.ts';
import { signAccessToken } from '../src/api/auth/jwt.ts';
import { normalizeEmail } from '../src/api/users/service.ts';

async function main(): Promise<void> {
  if (!process.env.JWT_SECRET) {
    console.error('Error: JWT_SECRET environment variable is required.');
    console.error('Set it to the same secret used by your API server.');
    process.exit(1);
  }

  const email = process.argv[2];
  if (!email) {
    console.error('Usage: npm run generate-api-token -- <email>');
    process.exit(1);
  }

  const pool = createPool();
  try {
    const result = await pool.query<{ id: number }>(
      'SELECT id FROM user_account WHERE email = $1 AND is_active',
      [normalizeEmail(email)],
    );
    const row = result.rows[0];
    if (!row) {
      console.error(`No active user with email ${email}`);
      process.exitCode = 1;
      return;
    }
    // Token only on stdout so it can be captured
    console.log(await signAccessToken(row.id));
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
