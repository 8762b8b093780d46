import test from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError } from '../api/base';
import { DEFAULT_NEO_BASE, DEFAULT_SBDB_URL, loadConfig } from '../config';

test('fills in defaults around the api key', () => {
  assert.deepEqual(loadConfig({ NASA_API_KEY: 'test-key' }), {
    apiKey: 'test-key',
    outputPath: 'data/neo-orbits.json',
    pageSize: 20,
    maxPages: undefined,
    neoBaseUrl: DEFAULT_NEO_BASE,
    sbdbUrl: DEFAULT_SBDB_URL,
    onLookupError: 'skip',
    concurrency: 1,
    throttleMs: 0,
    timeoutMs: 30_000,
    retries: 2,
    logLevel: 'info',
  });
});

test('reads numeric and enum settings from the environment', () => {
  const config = loadConfig({
    NASA_API_KEY: 'test-key',
    NEO_PAGE_SIZE: '10',
    NEO_MAX_PAGES: '3',
    NEO_ON_LOOKUP_ERROR: 'abort',
    NEO_LOOKUP_CONCURRENCY: '4',
    NEO_OUTPUT_PATH: 'out/neos.json',
  });
  assert.equal(config.pageSize, 10);
  assert.equal(config.maxPages, 3);
  assert.equal(config.onLookupError, 'abort');
  assert.equal(config.concurrency, 4);
  assert.equal(config.outputPath, 'out/neos.json');
});

test('overrides win over the environment', () => {
  const config = loadConfig({ NASA_API_KEY: 'test-key', NEO_PAGE_SIZE: '10' }, { pageSize: '5', outputPath: 'x.json' });
  assert.equal(config.pageSize, 5);
  assert.equal(config.outputPath, 'x.json');
});

test('blank values fall back to defaults', () => {
  const config = loadConfig({ NASA_API_KEY: 'test-key', NEO_PAGE_SIZE: '', LOG_LEVEL: ' ' });
  assert.equal(config.pageSize, 20);
  assert.equal(config.logLevel, 'info');
});

test('a missing api key is rejected', () => {
  assert.throws(
    () => loadConfig({ NASA_API_KEY: '   ' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.issues, ['apiKey: NASA_API_KEY is required']);
      return true;
    },
  );
});

test('every invalid field is listed', () => {
  assert.throws(
    () => loadConfig({ NASA_API_KEY: 'test-key', NEO_PAGE_SIZE: '50', NEO_ON_LOOKUP_ERROR: 'retry' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(
        error.issues.map(issue => issue.split(':')[0]),
        ['pageSize', 'onLookupError'],
      );
      return true;
    },
  );
});
