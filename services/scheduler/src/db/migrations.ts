import type { SqlDialectName, SqlExecutor } from './executor';

type Migration = {
  id: string;
  statements: Record<SqlDialectName, string[]>;
};

const MIGRATIONS_TABLE = 'scheduler_migrations';

export const FLOW_RUN_IDEMPOTENCY_CONSTRAINT = 'uq_flow_runs_flow_id_idempotency_key';

const migrations: Migration[] = [
  {
    id: '001_deployments_and_flow_runs',
    statements: {
      postgresql: [
        `CREATE TABLE IF NOT EXISTS deployments (
           id TEXT PRIMARY KEY,
           name TEXT NOT NULL UNIQUE,
           flow_id TEXT NOT NULL,
           created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
           updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
         );`,
        `CREATE TABLE IF NOT EXISTS deployment_schedules (
           id TEXT PRIMARY KEY,
           deployment_id TEXT NOT NULL REFERENCES deployments(id) ON DELETE CASCADE,
           clock JSONB NOT NULL,
           parameters JSONB NOT NULL DEFAULT '{}'::jsonb,
           is_active BOOLEAN NOT NULL DEFAULT TRUE,
           created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
         );`,
        `CREATE INDEX IF NOT EXISTS idx_deployment_schedules_deployment
           ON deployment_schedules(deployment_id);`,
        `CREATE TABLE IF NOT EXISTS flow_runs (
           id TEXT PRIMARY KEY,
           flow_id TEXT NOT NULL,
           deployment_id TEXT REFERENCES deployments(id) ON DELETE SET NULL,
           parameters JSONB NOT NULL DEFAULT '{}'::jsonb,
           idempotency_key TEXT,
           tags JSONB NOT NULL DEFAULT '[]'::jsonb,
           flow_run_details JSONB NOT NULL DEFAULT '{}'::jsonb,
           state_id TEXT,
           created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
           updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
           CONSTRAINT ${FLOW_RUN_IDEMPOTENCY_CONSTRAINT} UNIQUE (flow_id, idempotency_key)
         );`,
        `CREATE INDEX IF NOT EXISTS idx_flow_runs_deployment
           ON flow_runs(deployment_id);`,
        `CREATE TABLE IF NOT EXISTS flow_run_states (
           id TEXT PRIMARY KEY,
           flow_run_id TEXT NOT NULL REFERENCES flow_runs(id) ON DELETE CASCADE,
           type TEXT NOT NULL,
           message TEXT,
           state_details JSONB NOT NULL DEFAULT '{}'::jsonb,
           created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
         );`,
        `CREATE INDEX IF NOT EXISTS idx_flow_run_states_flow_run
           ON flow_run_states(flow_run_id);`
      ],
      sqlite: [
        `CREATE TABLE IF NOT EXISTS deployments (
           id TEXT PRIMARY KEY,
           name TEXT NOT NULL UNIQUE,
           flow_id TEXT NOT NULL,
           created_at TEXT NOT NULL,
           updated_at TEXT NOT NULL
         );`,
        `CREATE TABLE IF NOT EXISTS deployment_schedules (
           id TEXT PRIMARY KEY,
           deployment_id TEXT NOT NULL REFERENCES deployments(id) ON DELETE CASCADE,
           clock TEXT NOT NULL,
           parameters TEXT NOT NULL DEFAULT '{}',
           is_active INTEGER NOT NULL DEFAULT 1,
           created_at TEXT NOT NULL
         );`,
        `CREATE INDEX IF NOT EXISTS idx_deployment_schedules_deployment
           ON deployment_schedules(deployment_id);`,
        `CREATE TABLE IF NOT EXISTS flow_runs (
           id TEXT PRIMARY KEY,
           flow_id TEXT NOT NULL,
           deployment_id TEXT REFERENCES deployments(id) ON DELETE SET NULL,
           parameters TEXT NOT NULL DEFAULT '{}',
           idempotency_key TEXT,
           tags TEXT NOT NULL DEFAULT '[]',
           flow_run_details TEXT NOT NULL DEFAULT '{}',
           state_id TEXT,
           created_at TEXT NOT NULL,
           updated_at TEXT NOT NULL,
           CONSTRAINT ${FLOW_RUN_IDEMPOTENCY_CONSTRAINT} UNIQUE (flow_id, idempotency_key)
         );`,
        `CREATE INDEX IF NOT EXISTS idx_flow_runs_deployment
           ON flow_runs(deployment_id);`,
        `CREATE TABLE IF NOT EXISTS flow_run_states (
           id TEXT PRIMARY KEY,
           flow_run_id TEXT NOT NULL REFERENCES flow_runs(id) ON DELETE CASCADE,
           type TEXT NOT NULL,
           message TEXT,
           state_details TEXT NOT NULL DEFAULT '{}',
           created_at TEXT NOT NULL
         );`,
        `CREATE INDEX IF NOT EXISTS idx_flow_run_states_flow_run
           ON flow_run_states(flow_run_id);`
      ]
    }
  }
];

async function ensureMigrationsTable(executor: SqlExecutor): Promise<void> {
  const appliedAtType = executor.dialect.name === 'postgresql' ? 'TIMESTAMPTZ' : 'TEXT';
  await executor.execute(
    `CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
       id TEXT PRIMARY KEY,
       applied_at ${appliedAtType} NOT NULL
     );`
  );
}

/** Applies pending migrations in order and returns the ids that ran. */
export async function runMigrations(executor: SqlExecutor): Promise<string[]> {
  await ensureMigrationsTable(executor);

  const appliedRows = await executor.query<{ id: string }>(`SELECT id FROM ${MIGRATIONS_TABLE}`);
  const applied = new Set(appliedRows.map((row) => row.id));
  const ran: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    for (const statement of migration.statements[executor.dialect.name]) {
      await executor.execute(statement);
    }
    const placeholders = [executor.dialect.placeholder(1), executor.dialect.placeholder(2)];
    await executor.execute(
      `INSERT INTO ${MIGRATIONS_TABLE} (id, applied_at) VALUES (${placeholders.join(', ')})`,
      [migration.id, new Date().toISOString()]
    );
    ran.push(migration.id);
  }

  return ran;
}
