import { test } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from '../config.js';

test('defaults', () => {
  const config = loadConfig({ DATABASE_PATH: ':memory:' });
  assert.strictEqual(config.port, 4000);
  assert.strictEqual(config.baseUrl, 'http://localhost:4000');
  assert.strictEqual(config.publicUrl, 'http://localhost:4000');
  assert.strictEqual(config.corsOrigins, '*');
  assert.strictEqual(config.databasePath, ':memory:');
  assert.deepStrictEqual(config.paging, { defaultLimit: 10, maxLimit: 1000 });
  assert.strictEqual(config.jobs.concurrency, 4);
});

test('prefix, origins and base URL are normalized', () => {
  const config = loadConfig({
    API_BASE_URL: 'https://geo.example.test/',
    API_PREFIX: 'ogc/',
    CORS_ORIGIN: 'https://a.test, https://b.test',
  });
  assert.strictEqual(config.apiPrefix, '/ogc');
  assert.strictEqual(config.publicUrl, 'https://geo.example.test/ogc');
  assert.deepStrictEqual(config.corsOrigins, ['https://a.test', 'https://b.test']);
});

test('invalid numbers name the variable', () => {
  assert.throws(
    () => loadConfig({ JOB_CONCURRENCY: '0' }),
    /JOB_CONCURRENCY must be an integer >= 1 \(got "0"\)/
  );
  assert.throws(() => loadConfig({ PAGE_LIMIT_DEFAULT: '50', PAGE_LIMIT_MAX: '20' }), /cannot exceed/);
});
