/**
 * Forward/backward SQL migrations without an external `migrate` binary.
 *
 * Migration files live in `<repo>/migrations` as `NNN_name.up.sql` /
 * `NNN_name.down.sql` pairs. `schema_migrations` is the source of truth for
 * what has been applied.
 */
import { readFileSync, readdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { Database, DbClient } from './db.ts';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const MIGRATIONS_PATH = resolve(__dirname, '..', 'migrations');

// Arbitrary constant lock key for this repo.
const MIGRATION_LOCK_KEY = 52180733;

export interface Migration {
  version: number;
  name: string;
  upPath: string;
  downPath: string;
}

export type MigrateDirection = 'up' | 'down';

function parseVersion(filename: string): number {
  const m = filename.match(/^(\d+)_/);
  if (!m) throw new Error(`Invalid migration filename (missing numeric prefix): ${filename}`);
  return parseInt(m[1], 10);
}

export function listMigrations(migrationsPath: string = MIGRATIONS_PATH): Migration[] {
  const files = readdirSync(migrationsPath).sort((a, b) => a.localeCompare(b));
  const byVersion = new Map<number, { name: string; upPath?: string; downPath?: string }>();

  for (const f of files) {
    if (!f.endsWith('.sql')) continue;
    const version = parseVersion(f);
    const entry = byVersion.get(version) ?? { name: f.replace(/\.(up|down)\.sql$/, '') };
    const full = resolve(migrationsPath, f);
    if (f.endsWith('.up.sql')) entry.upPath = full;
    if (f.endsWith('.down.sql')) entry.downPath = full;
    byVersion.set(version, entry);
  }

  return [...byVersion.entries()]
    .map(([version, m]) => {
      if (!m.upPath || !m.downPath) {
        throw new Error(`Migration ${version} missing up/down pair`);
      }
      return { version, name: m.name, upPath: m.upPath, downPath: m.downPath };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(client: DbClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version bigint PRIMARY KEY,
      dirty boolean NOT NULL DEFAULT false,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}

async function applyInTransaction(client: DbClient, file: string, record: () => Promise<unknown>): Promise<void> {
  const sql = readFileSync(file, 'utf-8');
  await client.query('BEGIN');
  try {
    await client.query(sql);
    await record();
    await client.query('COMMIT');
  } catch (e) {
    await client.query('ROLLBACK');
    throw new Error(`Migration ${file} failed`, { cause: e });
  }
}

/**
 * Apply pending migrations (`up`) or roll back applied ones (`down`).
 *
 * The whole run holds a Postgres advisory lock so concurrent API replicas
 * starting at once do not race each other.
 *
 * @returns the number of migrations applied or rolled back.
 */
export async function runMigrate(
  db: Database,
  direction: MigrateDirection,
  options: { steps?: number; migrationsPath?: string } = {},
): Promise<number> {
  const migrations = listMigrations(options.migrationsPath);
  const client = await db.connect();

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensureMigrationsTable(client);

      if (direction === 'up') {
        const applied = await client.query<{ version: number }>('SELECT version::int AS version FROM schema_migrations');
        const appliedSet = new Set(applied.rows.map((r) => r.version));

        let count = 0;
        for (const m of migrations) {
          if (appliedSet.has(m.version)) continue;
          await applyInTransaction(client, m.upPath, () =>
            client.query('INSERT INTO schema_migrations(version, dirty) VALUES ($1, false) ON CONFLICT (version) DO NOTHING', [m.version]),
          );
          count += 1;
        }
        return count;
      }

      const rows = await client.query<{ version: number }>('SELECT version::int AS version FROM schema_migrations ORDER BY version DESC');
      const toRollback = options.steps ? rows.rows.slice(0, options.steps) : rows.rows;

      let count = 0;
      for (const r of toRollback) {
        const m = migrations.find((x) => x.version === r.version);
        if (!m) {
          // Orphan version (file removed during development): forget it.
          await client.query('DELETE FROM schema_migrations WHERE version = $1', [r.version]);
          continue;
        }
        await applyInTransaction(client, m.downPath, () => client.query('DELETE FROM schema_migrations WHERE version = $1', [r.version]));
        count += 1;
      }
      return count;
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }
}
