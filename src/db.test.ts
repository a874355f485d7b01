import { describe, it, expect, vi, afterEach } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';

import { bindList, withTransaction, type Database, type DbClient } from './db.ts';

function emptyResult<R extends QueryResultRow>(): QueryResult<R> {
  return { rows: [], rowCount: 0, command: '', oid: 0, fields: [] };
}

/** Records statements; fails the ones listed in `failing`. */
class ScriptedDb implements Database {
  readonly statements: string[] = [];
  released = 0;

  constructor(private failing: Record<string, Error> = {}) {}

  async query<R extends QueryResultRow = QueryResultRow>(text: string): Promise<QueryResult<R>> {
    this.statements.push(text);
    const failure = this.failing[text];
    if (failure) throw failure;
    return emptyResult<R>();
  }

  async connect(): Promise<DbClient> {
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string) => this.query<R>(text),
      release: () => {
        this.released += 1;
      },
    };
  }

  async end(): Promise<void> {}
}

describe('withTransaction', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('commits and returns the callback result', async () => {
    const db = new ScriptedDb();

    const result = await withTransaction(db, async (client) => {
      await client.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(db.statements).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(db.released).toBe(1);
  });

  it('rolls back and rethrows the callback error', async () => {
    const db = new ScriptedDb({ 'INSERT x': new Error('insert failed') });

    await expect(withTransaction(db, (client) => client.query('INSERT x'))).rejects.toThrow('insert failed');
    expect(db.statements).toEqual(['BEGIN', 'INSERT x', 'ROLLBACK']);
    expect(db.released).toBe(1);
  });

  it('keeps the original error when the rollback fails too', async () => {
    const rollbackError = new Error('connection terminated');
    const db = new ScriptedDb({ 'INSERT x': new Error('insert failed'), ROLLBACK: rollbackError });
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(withTransaction(db, (client) => client.query('INSERT x'))).rejects.toThrow('insert failed');
    expect(logged).toHaveBeenCalledWith('[db] ROLLBACK failed:', rollbackError);
    expect(db.released).toBe(1);
  });
});

describe('bindList', () => {
  it('numbers placeholders after the existing params', () => {
    const params: unknown[] = [7];

    expect(bindList(params, [3, 4])).toBe('$2, $3');
    expect(params).toEqual([7, 3, 4]);
  });
});
