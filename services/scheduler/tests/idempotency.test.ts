import assert from 'node:assert/strict';
import { test } from 'node:test';
import { validate as isUuid, version as uuidVersion } from 'uuid';

import { buildScheduledFlowRunSpec } from '../src/scheduling/generator';
import {
  AUTO_SCHEDULED_TAG,
  buildScheduledIdempotencyKey,
  deriveFlowRunId,
  deriveInitialStateId
} from '../src/scheduling/identity';

const occurrence = new Date('2024-05-01T12:00:00Z');

test('idempotency keys combine the schedule id and the occurrence instant', () => {
  assert.equal(
    buildScheduledIdempotencyKey('schedule-a', occurrence),
    'scheduled schedule-a 2024-05-01T12:00:00.000Z'
  );
});

test('run ids are name-based uuids that only depend on flow and idempotency key', () => {
  const key = buildScheduledIdempotencyKey('schedule-a', occurrence);
  const first = deriveFlowRunId('flow-1', key);

  assert.ok(isUuid(first));
  assert.equal(uuidVersion(first), 5);
  assert.equal(deriveFlowRunId('flow-1', key), first);
  assert.notEqual(deriveFlowRunId('flow-2', key), first);
  assert.notEqual(deriveFlowRunId('flow-1', buildScheduledIdempotencyKey('schedule-b', occurrence)), first);
});

test('initial state ids are derived from the run id and state type', () => {
  const runId = deriveFlowRunId('flow-1', 'scheduled schedule-a 2024-05-01T12:00:00.000Z');
  const stateId = deriveInitialStateId(runId, 'SCHEDULED');

  assert.equal(deriveInitialStateId(runId, 'SCHEDULED'), stateId);
  assert.notEqual(stateId, runId);
  assert.notEqual(deriveInitialStateId(runId, 'PENDING'), stateId);
});

test('scheduled run specs carry provenance in tags, details and the initial state', () => {
  const spec = buildScheduledFlowRunSpec(
    { id: 'deployment-1', flowId: 'flow-1' },
    { id: 'schedule-a', parameters: { region: 'eu', retries: 2 } },
    occurrence
  );

  const idempotencyKey = 'scheduled schedule-a 2024-05-01T12:00:00.000Z';
  const id = deriveFlowRunId('flow-1', idempotencyKey);
  assert.deepEqual(spec, {
    id,
    flowId: 'flow-1',
    deploymentId: 'deployment-1',
    parameters: { region: 'eu', retries: 2 },
    idempotencyKey,
    tags: [AUTO_SCHEDULED_TAG],
    flowRunDetails: { scheduleId: 'schedule-a', autoScheduled: true },
    state: {
      id: deriveInitialStateId(id, 'SCHEDULED'),
      type: 'SCHEDULED',
      message: 'Flow run scheduled',
      stateDetails: {
        scheduledTime: '2024-05-01T12:00:00.000Z',
        autoScheduled: true,
        scheduleId: 'schedule-a'
      }
    }
  });
});
