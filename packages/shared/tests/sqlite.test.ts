import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import { IN_MEMORY_SQLITE_PATH, isBusySqliteError, openSqliteDatabase } from '../src/sqlite';

test('opens an in-memory database with foreign keys enabled', async () => {
  const db = await openSqliteDatabase(IN_MEMORY_SQLITE_PATH);
  try {
    assert.equal(db.pragma('foreign_keys', { simple: true }), 1);
    assert.equal(db.pragma('busy_timeout', { simple: true }), 5000);
    assert.equal(db.pragma('journal_mode', { simple: true }), 'memory');
  } finally {
    db.close();
  }
});

test('switches file databases to WAL and creates the parent directory', async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'runplan-sqlite-'));
  t.after(async () => rm(dir, { recursive: true, force: true }));

  const db = await openSqliteDatabase(path.join(dir, 'nested', 'scheduler.db'), { busyTimeoutMs: 250 });
  try {
    assert.equal(db.pragma('journal_mode', { simple: true }), 'wal');
    assert.equal(db.pragma('busy_timeout', { simple: true }), 250);
  } finally {
    db.close();
  }
});

test('isBusySqliteError only matches SQLITE_BUSY codes', () => {
  assert.equal(isBusySqliteError({ code: 'SQLITE_BUSY' }), true);
  assert.equal(isBusySqliteError({ code: 'SQLITE_CONSTRAINT' }), false);
  assert.equal(isBusySqliteError(new Error('busy')), false);
  assert.equal(isBusySqliteError(null), false);
});
