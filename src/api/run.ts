import { createPool } from '../db.ts';
import { runMigrate } from '../migrate.ts';
import { waitForDatabase } from '../wait-for-db.ts';
import { buildServer } from './server.ts';

const port = parseInt(process.env.PORT || '3000');
const host = process.env.HOST || '::';

const pool = createPool();
const app = buildServer({ logger: true, db: pool });
app.addHook('onClose', async () => {
  await pool.end();
});

await waitForDatabase(pool, { logger: app.log });
const applied = await runMigrate(pool, 'up');
app.log.info({ applied }, 'Migrations up to date');

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  });
}

await app.listen({ port, host });
