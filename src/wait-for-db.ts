import type { Queryable } from './db.ts';

/** Minimal logger surface; Fastify's pino logger and `console` both fit. */
export interface WaitLogger {
  info(msg: string): void;
  warn(msg: string): void;
}

export interface WaitForDatabaseOptions {
  /** Delay between attempts. Defaults to one second. */
  intervalMs?: number;
  logger?: WaitLogger;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_WAIT_INTERVAL_MS = 1000;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Block until the database answers `SELECT 1`.
 *
 * Retries forever at a fixed interval, so the API container can start before
 * Postgres in a compose/orchestrator setup.
 *
 * @returns the number of failed attempts before the database came up.
 */
export async function waitForDatabase(db: Queryable, options: WaitForDatabaseOptions = {}): Promise<number> {
  const intervalMs = options.intervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
  const logger = options.logger ?? console;
  const sleep = options.sleep ?? defaultSleep;

  logger.info('Waiting for database...');
  let failures = 0;
  for (;;) {
    try {
      await db.query('SELECT 1');
      break;
    } catch (err) {
      failures += 1;
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Database unavailable (${reason}), waiting ${intervalMs / 1000} second${intervalMs === 1000 ? '' : 's'}...`);
      await sleep(intervalMs);
    }
  }
  logger.info('Database available!');
  return failures;
}
