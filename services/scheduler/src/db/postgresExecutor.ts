import type { PoolClient } from 'pg';
import type { PostgresPool } from '@runplan/shared/postgres';

import { postgresDialect, type QueryRow, type SqlExecutor, type SqlParam } from './executor';

export type PostgresQueryResult<T> = {
  rows: T[];
  rowCount: number | null;
};

/** The slice of a pg client the executor calls into. */
export interface PostgresQueryable {
  query<T extends QueryRow>(text: string, values: SqlParam[]): Promise<PostgresQueryResult<T>>;
}

export interface PostgresConnectionSource {
  withConnection<T>(fn: (client: PostgresQueryable) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: PostgresQueryable) => Promise<T>): Promise<T>;
}

function wrapClient(client: PoolClient): PostgresQueryable {
  return {
    async query<T extends QueryRow>(text: string, values: SqlParam[]): Promise<PostgresQueryResult<T>> {
      const result = await client.query<T>(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    }
  };
}

export function fromPostgresPool(pool: PostgresPool): PostgresConnectionSource {
  return {
    withConnection: (fn) => pool.connect((client) => fn(wrapClient(client))),
    withTransaction: (fn) => pool.transaction((client) => fn(wrapClient(client)))
  };
}

function buildExecutor(source: PostgresConnectionSource, client: PostgresQueryable | null): SqlExecutor {
  async function run<T extends QueryRow>(sql: string, params: SqlParam[]): Promise<PostgresQueryResult<T>> {
    if (client) {
      return client.query<T>(sql, params);
    }
    return source.withConnection((connection) => connection.query<T>(sql, params));
  }

  const executor: SqlExecutor = {
    dialect: postgresDialect,
    async query<T extends QueryRow>(sql: string, params: SqlParam[] = []): Promise<T[]> {
      const { rows } = await run<T>(sql, params);
      return rows;
    },
    async execute(sql: string, params: SqlParam[] = []): Promise<number> {
      const { rowCount } = await run<QueryRow>(sql, params);
      return rowCount ?? 0;
    },
    async transaction<T>(fn: (inner: SqlExecutor) => Promise<T>): Promise<T> {
      if (client) {
        return fn(executor);
      }
      return source.withTransaction((connection) => fn(buildExecutor(source, connection)));
    }
  };
  return executor;
}

export function createPostgresExecutor(source: PostgresConnectionSource): SqlExecutor {
  return buildExecutor(source, null);
}
