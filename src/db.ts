import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';
import { existsSync } from 'fs';

/** Anything that can run a parameterised statement: a pool or a checked-out client. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/** A client checked out of the pool for the length of a transaction. */
export interface DbClient extends Queryable {
  release(): void;
}

/**
 * The slice of `pg.Pool` the API depends on.
 *
 * Production code passes a real pool; the test suite passes an in-process
 * PGlite database wrapped to the same shape.
 */
export interface Database extends Queryable {
  connect(): Promise<DbClient>;
  end(): Promise<void>;
}

function defaultHost(): string {
  // When running inside the docker-compose network, Postgres is reachable
  // via the service name. Keep localhost for non-container local dev.
  return existsSync('/.dockerenv') ? 'postgres' : 'localhost';
}

export function createPool(config?: PoolConfig): Pool {
  if (process.env.DATABASE_URL) {
    return new Pool({ connectionString: process.env.DATABASE_URL, ...config });
  }
  return new Pool({
    host: process.env.PGHOST || defaultHost(),
    port: parseInt(process.env.PGPORT || '5432', 10),
    user: process.env.PGUSER || 'recipe',
    password: process.env.PGPASSWORD || 'recipe',
    database: process.env.PGDATABASE || 'recipe',
    ...config,
  });
}

/**
 * Appends `values` to `params` and returns the matching `$n, $m, ...` list
 * for an `IN (...)` clause.
 */
export function bindList(params: unknown[], values: readonly unknown[]): string {
  return values
    .map((value) => {
      params.push(value);
      return `$${params.length}`;
    })
    .join(', ');
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on error.
 */
export async function withTransaction<T>(db: Database, fn: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      // Keep the error that caused the rollback
      console.error('[db] ROLLBACK failed:', rollbackErr);
    }
    throw err;
  } finally {
    client.release();
  }
}
