import assert from 'node:assert/strict';
import { beforeEach, test } from 'node:test';

import { buildLogPayload } from '../src/observability/logger';
import { normalizeMeta } from '../src/observability/meta';
import {
  getSchedulerMetricsSnapshot,
  recordSchedulerEvent,
  resetSchedulerMetrics
} from '../src/observability/metrics';

beforeEach(() => {
  resetSchedulerMetrics();
});

test('normalizeMeta converts values to JSON and drops undefined entries', () => {
  assert.deepEqual(
    normalizeMeta({
      deploymentId: 'deployment-1',
      at: new Date('2024-01-01T00:00:00Z'),
      error: new Error('boom'),
      skipped: undefined,
      nested: { ids: ['a', undefined, 'b'], count: 2 }
    }),
    {
      deploymentId: 'deployment-1',
      at: '2024-01-01T00:00:00.000Z',
      error: 'boom',
      nested: { ids: ['a', 'b'], count: 2 }
    }
  );
  assert.equal(normalizeMeta({ skipped: undefined }), undefined);
  assert.equal(normalizeMeta(), undefined);
});

test('log payloads carry level, source and normalized meta', () => {
  const payload = buildLogPayload('warn', 'Scheduler lagging', { lagMs: 1200 });

  assert.equal(payload.level, 'warn');
  assert.equal(payload.message, 'Scheduler lagging');
  assert.equal(payload.source, process.env.RUNPLAN_LOG_SOURCE?.trim() || 'scheduler-service');
  assert.deepEqual(payload.meta, { lagMs: 1200 });
  assert.ok(!Number.isNaN(Date.parse(payload.timestamp)));
  assert.equal('meta' in buildLogPayload('info', 'no meta'), false);
});

test('scheduler metrics count events and keep a bounded recent list', () => {
  recordSchedulerEvent('tick_started');
  recordSchedulerEvent('deployment_scheduled', { deploymentId: 'd-1', runs: 3 });
  recordSchedulerEvent('deployment_scheduled', { deploymentId: 'd-2', runs: 0 });
  recordSchedulerEvent('deployment_failed', { deploymentId: 'd-3', error: new Error('timeout') });
  recordSchedulerEvent('tick_failed', { error: 'pool exhausted' });

  const snapshot = getSchedulerMetricsSnapshot();
  assert.deepEqual(snapshot.counters, {
    ticks: 1,
    tickFailures: 1,
    deploymentsProcessed: 2,
    deploymentFailures: 1,
    runsCreated: 3
  });
  assert.equal(snapshot.recent.length, 5);
  assert.deepEqual(snapshot.recent[1], {
    event: 'deployment_failed',
    at: snapshot.recent[1]?.at,
    details: { deploymentId: 'd-3', error: 'timeout' }
  });
  assert.equal(snapshot.updatedAt, snapshot.recent[0]?.at);

  for (let index = 0; index < 60; index += 1) {
    recordSchedulerEvent('tick_started');
  }
  const bounded = getSchedulerMetricsSnapshot();
  assert.equal(bounded.recent.length, 50);
  assert.equal(bounded.counters.ticks, 61);
});

test('resetting metrics clears counters and history', () => {
  recordSchedulerEvent('tick_started');
  resetSchedulerMetrics();

  assert.deepEqual(getSchedulerMetricsSnapshot(), {
    counters: { ticks: 0, tickFailures: 0, deploymentsProcessed: 0, deploymentFailures: 0, runsCreated: 0 },
    recent: [],
    updatedAt: null
  });
});
