import { StorageCapabilityError } from '../errors';

export const SQL_DIALECTS = ['postgresql', 'sqlite'] as const;

export type SqlDialectName = (typeof SQL_DIALECTS)[number];

export type SqlParam = string | number | boolean | null;

export type QueryRow = Record<string, unknown>;

export interface SqlDialect {
  readonly name: SqlDialectName;
  /** 1-based positional placeholder. */
  placeholder(index: number): string;
  json(placeholder: string): string;
  /** Most bind values one statement may carry. */
  readonly maxBindParameters: number;
}

/**
 * The only surface the scheduler needs from a database: run a statement and get rows back, or
 * run a statement and get the affected row count. `transaction` runs `fn` against an executor
 * bound to one connection; calling it again inside `fn` joins the open transaction.
 */
export interface SqlExecutor {
  readonly dialect: SqlDialect;
  query<T extends QueryRow>(sql: string, params?: SqlParam[]): Promise<T[]>;
  execute(sql: string, params?: SqlParam[]): Promise<number>;
  transaction<T>(fn: (executor: SqlExecutor) => Promise<T>): Promise<T>;
}

export const postgresDialect: SqlDialect = {
  name: 'postgresql',
  placeholder: (index) => `$${index}`,
  json: (placeholder) => `${placeholder}::jsonb`,
  maxBindParameters: 65_535
};

export const sqliteDialect: SqlDialect = {
  name: 'sqlite',
  placeholder: () => '?',
  json: (placeholder) => placeholder,
  // SQLITE_MAX_VARIABLE_NUMBER since 3.32
  maxBindParameters: 32_766
};

export function resolveSqlDialect(name: string): SqlDialect {
  switch (name) {
    case 'postgresql':
      return postgresDialect;
    case 'sqlite':
      return sqliteDialect;
    default:
      throw new StorageCapabilityError(`Unrecognized storage dialect: ${name}`);
  }
}

/**
 * Collects bind values while a statement is assembled. Placeholders must be requested in the
 * order they appear in the SQL text, since SQLite binds `?` by position.
 */
export class SqlParamList {
  readonly values: SqlParam[] = [];

  constructor(private readonly dialect: SqlDialect) {}

  add(value: SqlParam): string {
    this.values.push(value);
    return this.dialect.placeholder(this.values.length);
  }

  addJson(value: unknown): string {
    return this.dialect.json(this.add(JSON.stringify(value ?? null)));
  }

  addList(values: readonly SqlParam[]): string {
    return values.map((value) => this.add(value)).join(', ');
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const boundedSize = Math.max(1, Math.trunc(size));
  const result: T[][] = [];
  for (let index = 0; index < items.length; index += boundedSize) {
    result.push(items.slice(index, index + boundedSize));
  }
  return result;
}

/** How many rows of `bindsPerRow` values fit in one statement, never more than `batchSize`. */
export function rowsPerStatement(dialect: SqlDialect, bindsPerRow: number, batchSize: number): number {
  const fitting = Math.floor(dialect.maxBindParameters / Math.max(1, bindsPerRow));
  return Math.max(1, Math.min(Math.trunc(batchSize), fitting));
}

/** Unique or primary-key violation, as reported by pg (`23505`) or better-sqlite3. */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) {
    return false;
  }
  const { code } = err;
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}
