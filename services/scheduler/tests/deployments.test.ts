import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  addDeploymentSchedule,
  createDeployment,
  deleteDeployment,
  readDeployment,
  readDeployments,
  removeDeploymentSchedule,
  setDeploymentScheduleActive
} from '../src/db/deployments';
import { readFlowRun } from '../src/db/flowRuns';
import { DeploymentConflictError, DeploymentNotFoundError, ScheduleValidationError } from '../src/errors';
import { scheduleRuns } from '../src/scheduling/scheduleRuns';
import { countRows, createTestStore } from './helpers/sqliteStore';

const HOURLY = { kind: 'interval', intervalSeconds: 3600 } as const;

test('createDeployment stores the deployment with its schedules', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  const deployment = await createDeployment(store, {
    name: 'nightly-report',
    flowId: 'flow-report',
    schedules: [
      { clock: HOURLY, parameters: { region: 'eu' } },
      { clock: { kind: 'cron', cron: '0 2 * * *', timezone: 'UTC' }, isActive: false }
    ]
  });

  assert.equal(deployment.name, 'nightly-report');
  assert.equal(deployment.flowId, 'flow-report');
  assert.equal(deployment.schedules.length, 2);

  const interval = deployment.schedules.find((schedule) => schedule.clock.kind === 'interval');
  const cron = deployment.schedules.find((schedule) => schedule.clock.kind === 'cron');
  assert.ok(interval);
  assert.ok(cron);
  assert.deepEqual(interval.clock, HOURLY);
  assert.deepEqual(interval.parameters, { region: 'eu' });
  assert.equal(interval.isActive, true);
  assert.deepEqual(cron.clock, { kind: 'cron', cron: '0 2 * * *', timezone: 'UTC' });
  assert.deepEqual(cron.parameters, {});
  assert.equal(cron.isActive, false);

  assert.deepEqual(await readDeployment(store, deployment.id), deployment);
});

test('createDeployment rejects a duplicate name', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  await createDeployment(store, { name: 'etl', flowId: 'flow-a' });
  await assert.rejects(createDeployment(store, { name: 'etl', flowId: 'flow-b' }), (err: unknown) => {
    assert.ok(err instanceof DeploymentConflictError);
    assert.equal(err.code, 'DEPLOYMENT_CONFLICT');
    assert.equal(err.message, 'Deployment "etl" already exists');
    return true;
  });
  assert.equal((await readDeployments(store)).length, 1);
});

test('createDeployment validates schedule definitions', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  await assert.rejects(
    createDeployment(store, {
      name: 'broken-interval',
      flowId: 'flow-a',
      schedules: [{ clock: { kind: 'interval', intervalSeconds: 0 } }]
    }),
    (err: unknown) => {
      assert.ok(err instanceof ScheduleValidationError);
      assert.equal(err.code, 'SCHEDULE_VALIDATION_FAILED');
      return true;
    }
  );
  await assert.rejects(
    createDeployment(store, {
      name: 'broken-cron',
      flowId: 'flow-a',
      schedules: [{ clock: { kind: 'cron', cron: '61 * * * *' } }]
    }),
    ScheduleValidationError
  );
  await assert.rejects(createDeployment(store, { name: '  ', flowId: 'flow-a' }), ScheduleValidationError);
  assert.deepEqual(await readDeployments(store), []);
});

test('readDeployment returns null for an unknown id', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  assert.equal(await readDeployment(store, '00000000-0000-4000-8000-000000000000'), null);
});

test('readDeployments pages in id order', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  const ids = [
    '00000000-0000-4000-8000-000000000003',
    '00000000-0000-4000-8000-000000000001',
    '00000000-0000-4000-8000-000000000002'
  ];
  for (const [index, id] of ids.entries()) {
    await createDeployment(store, { id, name: `deployment-${index}`, flowId: 'flow-a' });
  }

  assert.deepEqual(
    (await readDeployments(store)).map((deployment) => deployment.id),
    [
      '00000000-0000-4000-8000-000000000001',
      '00000000-0000-4000-8000-000000000002',
      '00000000-0000-4000-8000-000000000003'
    ]
  );
  assert.deepEqual(
    (await readDeployments(store, { offset: 1, limit: 1 })).map((deployment) => deployment.id),
    ['00000000-0000-4000-8000-000000000002']
  );
});

test('deleteDeployment removes schedules and detaches existing runs', async (t) => {
  const { store, db } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  const deployment = await createDeployment(store, {
    name: 'hourly',
    flowId: 'flow-a',
    schedules: [{ clock: HOURLY }]
  });
  const [run] = await scheduleRuns(store, deployment.id, {
    startTime: new Date('2024-01-01T00:00:00Z'),
    endTime: new Date('2024-01-01T00:00:00Z')
  });
  assert.ok(run);

  assert.equal(await deleteDeployment(store, deployment.id), true);
  assert.equal(await deleteDeployment(store, deployment.id), false);
  assert.equal(await readDeployment(store, deployment.id), null);
  assert.equal(countRows(db, 'deployment_schedules'), 0);

  const stored = await readFlowRun(store, run.id);
  assert.ok(stored);
  assert.equal(stored.deploymentId, null);
  assert.equal(stored.stateId, run.state.id);
});

test('schedules can be added, paused and removed', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  const deployment = await createDeployment(store, { name: 'manual', flowId: 'flow-a' });
  const schedule = await addDeploymentSchedule(store, deployment.id, {
    clock: { kind: 'cron', cron: '*/5 * * * *' },
    parameters: { batch: 1 }
  });

  assert.equal(schedule.deploymentId, deployment.id);
  assert.deepEqual(schedule.clock, { kind: 'cron', cron: '*/5 * * * *' });
  assert.deepEqual(schedule.parameters, { batch: 1 });
  assert.equal(schedule.isActive, true);

  assert.equal(await setDeploymentScheduleActive(store, deployment.id, schedule.id, false), true);
  const paused = await readDeployment(store, deployment.id);
  assert.equal(paused?.schedules[0]?.isActive, false);

  assert.equal(await removeDeploymentSchedule(store, deployment.id, schedule.id), true);
  assert.equal(await removeDeploymentSchedule(store, deployment.id, schedule.id), false);
  assert.deepEqual((await readDeployment(store, deployment.id))?.schedules, []);
});

test('addDeploymentSchedule requires an existing deployment', async (t) => {
  const { store } = await createTestStore();
  t.after(async () => {
    await store.close();
  });

  await assert.rejects(
    addDeploymentSchedule(store, 'missing-deployment', { clock: HOURLY }),
    (err: unknown) => {
      assert.ok(err instanceof DeploymentNotFoundError);
      assert.equal(err.deploymentId, 'missing-deployment');
      return true;
    }
  );
});
