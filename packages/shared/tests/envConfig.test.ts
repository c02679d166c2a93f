import assert from 'node:assert/strict';
import { test } from 'node:test';

import { z } from 'zod';

import { EnvConfigError, enumVar, integerVar, loadEnvConfig, stringVar } from '../src/envConfig';

const schema = z.object({
  LIMIT: integerVar({ min: 1, max: 10 }),
  NAME: stringVar({ defaultValue: 'default-name' }),
  MODE: enumVar(['alpha', 'beta'], { defaultValue: 'alpha' })
});

test('applies defaults for missing variables', () => {
  const config = loadEnvConfig(schema, { env: {} });
  assert.deepEqual(config, { NAME: 'default-name', MODE: 'alpha' });
});

test('parses and normalizes provided values', () => {
  const config = loadEnvConfig(schema, {
    env: { LIMIT: '7', NAME: '  custom  ', MODE: 'BETA' }
  });
  assert.deepEqual(config, { LIMIT: 7, NAME: 'custom', MODE: 'beta' });
});

test('falls back to the default for blank strings', () => {
  const config = loadEnvConfig(schema, { env: { NAME: '   ', MODE: '' } });
  assert.equal(config.NAME, 'default-name');
  assert.equal(config.MODE, 'alpha');
});

test('collects every invalid variable into one error', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { LIMIT: '42', MODE: 'gamma' }, context: 'test:env' }),
    (error: unknown) => {
      assert.ok(error instanceof EnvConfigError);
      assert.match(error.message, /^\[test:env\] Invalid environment configuration/);
      assert.deepEqual(
        error.issues.map((issue) => issue.path.join('.')),
        ['LIMIT', 'MODE']
      );
      assert.equal(error.issues[0]?.message, 'LIMIT must be <= 10');
      assert.equal(error.issues[1]?.message, 'Invalid MODE. Expected one of: alpha, beta');
      return true;
    }
  );
});

test('rejects non-integer values', () => {
  assert.throws(
    () => loadEnvConfig(z.object({ COUNT: integerVar() }), { env: { COUNT: '1.5' } }),
    /COUNT: Expected COUNT to be an integer/
  );
});
