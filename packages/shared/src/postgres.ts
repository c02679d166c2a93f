import { Pool, type PoolClient, type PoolConfig } from 'pg';

export type PostgresPoolOptions = PoolConfig & {
  /** Put first on `search_path` for every checked-out client. */
  schema?: string | null;
  /** Errors from idle clients, which the pool would otherwise throw on the process. */
  onIdleError: (err: Error) => void;
};

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export class PostgresPool {
  private readonly pool: Pool;
  private readonly searchPath: string | null;

  constructor({ schema, onIdleError, ...config }: PostgresPoolOptions) {
    this.pool = new Pool(config);
    this.pool.on('error', onIdleError);
    this.searchPath = schema ? `SET search_path TO ${quoteIdentifier(schema)}, public` : null;
  }

  private async checkout(): Promise<PoolClient> {
    const client = await this.pool.connect();
    if (this.searchPath) {
      try {
        await client.query(this.searchPath);
      } catch (err) {
        client.release(true);
        throw err;
      }
    }
    return client;
  }

  async connect<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.checkout();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  /** Runs `fn` inside BEGIN/COMMIT on one client. A failed rollback discards the client. */
  async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.checkout();
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
        });
        throw err;
      }
    } finally {
      client.release(broken);
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}
