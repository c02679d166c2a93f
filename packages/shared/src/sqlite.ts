import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';

export const IN_MEMORY_SQLITE_PATH = ':memory:';

export class SqliteOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SqliteOpenError';
  }
}

export interface SqliteOpenOptions {
  busyTimeoutMs?: number;
  walAttempts?: number;
  walRetryDelayMs?: number;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function isBusySqliteError(error: unknown): boolean {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return false;
  }
  return error.code === 'SQLITE_BUSY';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function ensureWalJournalMode(db: SqliteDatabase, attempts: number, baseDelayMs: number): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    try {
      const result = db.pragma('journal_mode = WAL', { simple: true });
      if (typeof result === 'string' && result.toLowerCase() === 'wal') {
        return;
      }
      throw new SqliteOpenError(`SQLite returned unexpected journal mode ${String(result)} while enabling WAL`);
    } catch (error) {
      if (!isBusySqliteError(error)) {
        throw error instanceof SqliteOpenError
          ? error
          : new SqliteOpenError(`Failed to enable WAL journal mode: ${describeError(error)}`);
      }
      await sleep(baseDelayMs * (attempt + 1));
    }
  }

  throw new SqliteOpenError('Timed out enabling WAL journal mode');
}

/**
 * Opens a better-sqlite3 handle with foreign keys and a busy timeout. File-backed databases are
 * switched to WAL; `:memory:` databases keep their default journal.
 */
export async function openSqliteDatabase(
  filename: string = IN_MEMORY_SQLITE_PATH,
  options: SqliteOpenOptions = {}
): Promise<SqliteDatabase> {
  const inMemory = filename === IN_MEMORY_SQLITE_PATH;
  if (!inMemory) {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  let db: SqliteDatabase;
  try {
    db = new Database(filename);
  } catch (error) {
    throw new SqliteOpenError(`Failed to open SQLite database at ${filename}: ${describeError(error)}`);
  }

  try {
    db.pragma(`busy_timeout = ${Math.max(0, Math.trunc(options.busyTimeoutMs ?? 5_000))}`);
    if (!inMemory) {
      await ensureWalJournalMode(db, Math.max(1, options.walAttempts ?? 5), options.walRetryDelayMs ?? 100);
    }
    db.pragma('foreign_keys = ON');
  } catch (error) {
    db.close();
    throw error;
  }

  return db;
}
