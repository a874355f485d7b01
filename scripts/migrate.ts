/**
 * Apply or roll back SQL migrations.
 *
 * Usage:
 *   npm run migrate             # apply everything pending
 *   npm run migrate -- down     # roll back the latest migration
 *   npm run migrate -- down 2   # roll back the latest two
 */
import { createPool } from '../src/db.ts';
import { runMigrate, type MigrateDirection } from '../src/migrate.ts';

function parseArgs(args: string[]): { direction: MigrateDirection; steps?: number } {
  const [direction = 'up', steps] = args;
  if (direction !== 'up' && direction !== 'down') {
    throw new Error(`Unknown direction "${direction}" (expected up or down)`);
  }
  if (steps === undefined) {
    return { direction, steps: direction === 'down' ? 1 : undefined };
  }
  const parsed = parseInt(steps, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid step count: ${steps}`);
  }
  return { direction, steps: parsed };
}

async function main(): Promise<void> {
  const { direction, steps } = parseArgs(process.argv.slice(2));
  const pool = createPool();
  try {
    const count = await runMigrate(pool, direction, { steps });
    console.log(`${direction === 'up' ? 'Applied' : 'Rolled back'} ${count} migration(s)`);
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
