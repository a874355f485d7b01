/**
 * Block until Postgres accepts connections, then exit.
 * Usage: npm run wait-for-db
 */
import { createPool } from '../src/db.ts';
import { waitForDatabase } from '../src/wait-for-db.ts';

async function main(): Promise<void> {
  const pool = createPool({ connectionTimeoutMillis: 2000 });
  try {
    await waitForDatabase(pool);
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
