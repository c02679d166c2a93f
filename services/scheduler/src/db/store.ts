import { PostgresPool } from '@runplan/shared/postgres';
import { openSqliteDatabase } from '@runplan/shared/sqlite';

import { getSchedulerConfig, type SchedulerRuntimeConfig } from '../config/scheduler';
import { StorageCapabilityError } from '../errors';
import { logger } from '../observability/logger';
import type { SqlExecutor } from './executor';
import { resolveLinkStrategy, type LinkStrategy } from './linkStrategies';
import { runMigrations } from './migrations';
import { createPostgresExecutor, fromPostgresPool } from './postgresExecutor';
import { createSqliteExecutor } from './sqliteExecutor';

const DEFAULT_INSERT_BATCH_SIZE = 500;

/** Everything the scheduling core needs to talk to storage, fixed for the life of the process. */
export interface SchedulerStore {
  readonly executor: SqlExecutor;
  readonly linkStrategy: LinkStrategy;
  readonly insertBatchSize: number;
  close(): Promise<void>;
}

export type SchedulerStoreOptions = {
  linkStrategy?: string | null;
  insertBatchSize?: number;
  onClose?: () => Promise<void> | void;
};

export function createStoreFromExecutor(executor: SqlExecutor, options: SchedulerStoreOptions = {}): SchedulerStore {
  const linkStrategy = resolveLinkStrategy(executor.dialect.name, options.linkStrategy);
  const insertBatchSize = Math.max(1, Math.trunc(options.insertBatchSize ?? DEFAULT_INSERT_BATCH_SIZE));
  let closed = false;

  return {
    executor,
    linkStrategy,
    insertBatchSize,
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await options.onClose?.();
    }
  };
}

export type CreateSchedulerStoreOptions = {
  migrate?: boolean;
};

export async function createSchedulerStore(
  config: SchedulerRuntimeConfig = getSchedulerConfig(),
  { migrate = true }: CreateSchedulerStoreOptions = {}
): Promise<SchedulerStore> {
  let store: SchedulerStore;

  switch (config.database.dialect) {
    case 'postgresql': {
      const { pool } = config.database;
      const postgres = new PostgresPool({
        connectionString: config.database.url,
        schema: config.database.schema ?? undefined,
        max: pool.max,
        idleTimeoutMillis: pool.idleTimeoutMillis,
        connectionTimeoutMillis: pool.connectionTimeoutMillis,
        ...(pool.statementTimeoutMs !== null ? { statement_timeout: pool.statementTimeoutMs } : {}),
        application_name: 'runplan-scheduler',
        onIdleError: (err) => {
          logger.error('Unexpected error on idle postgres client', { error: err.message });
        }
      });
      store = createStoreFromExecutor(createPostgresExecutor(fromPostgresPool(postgres)), {
        linkStrategy: config.linkStrategy,
        insertBatchSize: config.insertBatchSize,
        onClose: () => postgres.end()
      });
      break;
    }
    case 'sqlite': {
      const db = await openSqliteDatabase(config.database.sqlitePath);
      store = createStoreFromExecutor(createSqliteExecutor(db), {
        linkStrategy: config.linkStrategy,
        insertBatchSize: config.insertBatchSize,
        onClose: () => {
          db.close();
        }
      });
      break;
    }
    default:
      throw new StorageCapabilityError(`Unrecognized storage dialect: ${String(config.database.dialect)}`);
  }

  if (migrate) {
    try {
      const applied = await runMigrations(store.executor);
      if (applied.length > 0) {
        logger.info('Applied scheduler migrations', { migrations: applied, dialect: store.executor.dialect.name });
      }
    } catch (err) {
      await store.close();
      throw err;
    }
  }

  return store;
}
