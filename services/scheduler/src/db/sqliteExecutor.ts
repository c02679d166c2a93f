import type { Database as SqliteDatabase } from 'better-sqlite3';

import { sqliteDialect, type QueryRow, type SqlExecutor, type SqlParam } from './executor';

type SqliteBindValue = string | number | null;

function toBindValues(params: SqlParam[]): SqliteBindValue[] {
  // better-sqlite3 rejects booleans
  return params.map((value) => (typeof value === 'boolean' ? (value ? 1 : 0) : value));
}

export function createSqliteExecutor(db: SqliteDatabase): SqlExecutor {
  const executor: SqlExecutor = {
    dialect: sqliteDialect,
    async query<T extends QueryRow>(sql: string, params: SqlParam[] = []): Promise<T[]> {
      return db.prepare<SqliteBindValue[], T>(sql).all(...toBindValues(params));
    },
    async execute(sql: string, params: SqlParam[] = []): Promise<number> {
      const statement = db.prepare<SqliteBindValue[]>(sql);
      if (statement.reader) {
        return statement.all(...toBindValues(params)).length;
      }
      return statement.run(...toBindValues(params)).changes;
    },
    async transaction<T>(fn: (inner: SqlExecutor) => Promise<T>): Promise<T> {
      if (db.inTransaction) {
        return fn(executor);
      }
      db.exec('BEGIN IMMEDIATE');
      try {
        const result = await fn(executor);
        db.exec('COMMIT');
        return result;
      } catch (err) {
        if (db.inTransaction) {
          db.exec('ROLLBACK');
        }
        throw err;
      }
    }
  };
  return executor;
}
