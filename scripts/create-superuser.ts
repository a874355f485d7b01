/**
 * Create a staff + superuser account.
 *
 * Usage:
 *   npm run create-superuser -- <email> <password> [name]
 *
 * SUPERUSER_PASSWORD may replace the password argument so it stays out of
 * shell history.
 */
import { createPool } from '../src/db.ts';
import { ValidationError } from '../src/api/errors.ts';
import { createSuperuser } from '../src/api/users/service.ts';

async function main(): Promise<void> {
  const [email, passwordArg, name = ''] = process.argv.slice(2);
  const password = passwordArg ?? process.env.SUPERUSER_PASSWORD;
  if (!email || !password) {
    console.error('Usage: npm run create-superuser -- <email> <password> [name]');
    process.exit(1);
  }

  const pool = createPool();
  try {
    const user = await createSuperuser(pool, email, password, name);
    console.log(`Superuser created: ${user.email} (id ${user.id})`);
  } catch (err) {
    if (err instanceof ValidationError) {
      for (const [field, messages] of Object.entries(err.details)) {
        console.error(`${field}: ${messages.join(' ')}`);
      }
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
