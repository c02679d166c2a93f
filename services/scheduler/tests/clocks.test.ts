import assert from 'node:assert/strict';
import { test } from 'node:test';

import { createClock, CronClock, IntervalClock } from '../src/clocks';

function iso(dates: Date[]): string[] {
  return dates.map((date) => date.toISOString());
}

test('interval clock aligns to the default anchor and includes the window end', async () => {
  const clock = new IntervalClock({ intervalSeconds: 3600 });
  const dates = await clock.getDates(10, new Date('2024-01-01T00:30:00Z'), new Date('2024-01-01T03:00:00Z'));
  assert.deepEqual(iso(dates), [
    '2024-01-01T01:00:00.000Z',
    '2024-01-01T02:00:00.000Z',
    '2024-01-01T03:00:00.000Z'
  ]);
});

test('interval clock includes an occurrence that falls exactly on the window start', async () => {
  const clock = new IntervalClock({ intervalSeconds: 3600 });
  const dates = await clock.getDates(2, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-02T00:00:00Z'));
  assert.deepEqual(iso(dates), ['2024-01-01T00:00:00.000Z', '2024-01-01T01:00:00.000Z']);
});

test('interval clock honours a custom anchor before and after the window start', async () => {
  const clock = new IntervalClock({ intervalSeconds: 900, anchorDate: '2024-01-01T00:05:00Z' });
  const dates = await clock.getDates(10, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:40:00Z'));
  assert.deepEqual(iso(dates), [
    '2024-01-01T00:05:00.000Z',
    '2024-01-01T00:20:00.000Z',
    '2024-01-01T00:35:00.000Z'
  ]);
});

test('clocks return nothing for an empty window or a zero count', async () => {
  const clock = new IntervalClock({ intervalSeconds: 60 });
  const start = new Date('2024-01-01T00:00:00Z');
  assert.deepEqual(await clock.getDates(0, start, new Date('2024-01-02T00:00:00Z')), []);
  assert.deepEqual(await clock.getDates(5, start, new Date('2023-12-31T00:00:00Z')), []);
});

test('interval clock rejects a non-positive interval', () => {
  assert.throws(() => new IntervalClock({ intervalSeconds: 0 }), /positive intervalSeconds/);
});

test('cron clock returns matching instants inside the window', async () => {
  const clock = new CronClock({ cron: '0 * * * *', timezone: 'UTC' });
  const dates = await clock.getDates(10, new Date('2024-03-01T10:15:00Z'), new Date('2024-03-01T13:30:00Z'));
  assert.deepEqual(iso(dates), [
    '2024-03-01T11:00:00.000Z',
    '2024-03-01T12:00:00.000Z',
    '2024-03-01T13:00:00.000Z'
  ]);
});

test('cron clock includes a match on the window start and stops at the requested count', async () => {
  const clock = new CronClock({ cron: '*/15 * * * *', timezone: 'UTC' });
  const dates = await clock.getDates(3, new Date('2024-03-01T00:00:00Z'), new Date('2024-03-02T00:00:00Z'));
  assert.deepEqual(iso(dates), [
    '2024-03-01T00:00:00.000Z',
    '2024-03-01T00:15:00.000Z',
    '2024-03-01T00:30:00.000Z'
  ]);
});

test('cron clock evaluates expressions in the schedule timezone', async () => {
  const clock = new CronClock({ cron: '0 9 * * *', timezone: 'America/New_York' });
  const dates = await clock.getDates(10, new Date('2024-07-01T00:00:00Z'), new Date('2024-07-03T00:00:00Z'));
  assert.deepEqual(iso(dates), ['2024-07-01T13:00:00.000Z', '2024-07-02T13:00:00.000Z']);
});

test('cron clock trims the expression and treats a blank timezone as none', async () => {
  const clock = new CronClock({ cron: '  */15 * * * * ', timezone: '   ' });
  const dates = await clock.getDates(10, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:30:00Z'));
  assert.deepEqual(iso(dates), ['2024-01-01T00:00:00.000Z', '2024-01-01T00:15:00.000Z', '2024-01-01T00:30:00.000Z']);
  assert.throws(() => new CronClock({ cron: '   ' }), /Cron expression must be a non-empty string/);
});

test('cron clock rejects an invalid expression when constructed', () => {
  assert.throws(() => new CronClock({ cron: '61 * * * *' }));
});

test('createClock picks the implementation from the definition kind', () => {
  assert.ok(createClock({ kind: 'interval', intervalSeconds: 60 }) instanceof IntervalClock);
  assert.ok(createClock({ kind: 'cron', cron: '0 0 * * *', timezone: null }) instanceof CronClock);
});
