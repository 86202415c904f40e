import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildConfig, DEFAULT_PLAYFAB_BASE_URL, validateConfig } from '../config';

test('buildConfig applies defaults', () => {
  const config = buildConfig({}, '/srv/collector');

  assert.deepEqual(config, {
    playfab: { baseUrl: DEFAULT_PLAYFAB_BASE_URL, sessionToken: '', requestTimeoutMs: 30000 },
    fetcher: { pageSize: 50, requestDelayMs: 100, maxPages: 1000 },
    database: { url: undefined, ssl: false, logQueries: false },
    log: { level: 'info', file: null },
    port: 3000,
  });
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.fetcher));
});

test('buildConfig reads and clamps environment values', () => {
  const config = buildConfig(
    {
      PLAYFAB_BASE_URL: 'https://playfab.test///',
      PLAYFAB_SESSION_TOKEN: ' test-session ',
      API_MAX_RESULTS_PER_PAGE: '500',
      API_REQUEST_DELAY_MS: '-5',
      API_MAX_PAGES: '0',
      DATABASE_URL: 'postgres://collector@localhost/leaderboards',
      DATABASE_SSL: 'true',
      DATABASE_LOG_QUERIES: 'yes',
      LOG_LEVEL: 'debug',
      LOG_PATH: 'logs/collector.log',
      PORT: '8080',
    },
    '/srv/collector',
  );

  assert.equal(config.playfab.baseUrl, 'https://playfab.test');
  assert.equal(config.playfab.sessionToken, 'test-session');
  assert.deepEqual(config.fetcher, { pageSize: 100, requestDelayMs: 0, maxPages: 1 });
  assert.deepEqual(config.database, {
    url: 'postgres://collector@localhost/leaderboards',
    ssl: true,
    logQueries: true,
  });
  assert.deepEqual(config.log, { level: 'debug', file: path.resolve('/srv/collector', 'logs/collector.log') });
  assert.equal(config.port, 8080);
});

test('validateConfig lists every blocking problem', () => {
  const config = buildConfig({}, '/srv/collector');

  assert.deepEqual(validateConfig(config), ['DATABASE_URL is not set']);
  assert.deepEqual(validateConfig(config, { requireSessionToken: true }), [
    'PLAYFAB_SESSION_TOKEN is not set',
    'DATABASE_URL is not set',
  ]);
  assert.deepEqual(validateConfig(config, { requireDatabase: false }), []);
});

test('validateConfig creates the log directory when it can', () => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'collector-config-'));
  try {
    const config = buildConfig(
      { DATABASE_URL: 'postgres://collector@localhost/leaderboards', LOG_PATH: 'nested/app.log' },
      root,
    );

    assert.deepEqual(validateConfig(config), []);
    assert.ok(fs.existsSync(path.join(root, 'nested')));
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});
