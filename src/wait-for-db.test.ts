import { describe, it, expect, vi } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';

import type { Queryable } from './db.ts';
import { waitForDatabase, type WaitLogger } from './wait-for-db.ts';

/** A database that refuses `failures` connections before answering. */
class FlakyDb implements Queryable {
  calls = 0;

  constructor(private failures: number) {}

  async query<R extends QueryResultRow = QueryResultRow>(): Promise<QueryResult<R>> {
    this.calls += 1;
    if (this.calls <= this.failures) {
      throw new Error('connection refused');
    }
    return { rows: [], rowCount: 0, command: 'SELECT', oid: 0, fields: [] };
  }
}

function recordingLogger(): WaitLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (msg) => lines.push(`info: ${msg}`),
    warn: (msg) => lines.push(`warn: ${msg}`),
  };
}

describe('waitForDatabase', () => {
  it('returns immediately when the database is up', async () => {
    const db = new FlakyDb(0);
    const logger = recordingLogger();
    const sleep = vi.fn(async (_ms: number) => undefined);

    const failures = await waitForDatabase(db, { logger, sleep });

    expect(failures).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
    expect(logger.lines).toEqual(['info: Waiting for database...', 'info: Database available!']);
  });

  it('retries once per second until the database answers', async () => {
    const db = new FlakyDb(5);
    const logger = recordingLogger();
    const sleep = vi.fn(async (_ms: number) => undefined);

    const failures = await waitForDatabase(db, { logger, sleep });

    expect(failures).toBe(5);
    expect(db.calls).toBe(6);
    expect(sleep).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(logger.lines).toHaveLength(7);
    expect(logger.lines[1]).toBe('warn: Database unavailable (connection refused), waiting 1 second...');
    expect(logger.lines[6]).toBe('info: Database available!');
  });

  it('reports a custom interval in seconds', async () => {
    const logger = recordingLogger();

    await waitForDatabase(new FlakyDb(1), { logger, intervalMs: 2500, sleep: async () => undefined });

    expect(logger.lines[1]).toBe('warn: Database unavailable (connection refused), waiting 2.5 seconds...');
  });
});
