import test from 'node:test';
import assert from 'node:assert/strict';

import LoggerService, { normalizeLevel } from '../lib/logger';

test('normalizeLevel maps legacy and unknown names', () => {
  assert.equal(normalizeLevel('WARNING'), 'warn');
  assert.equal(normalizeLevel(' Debug '), 'debug');
  assert.equal(normalizeLevel('silent'), 'silent');
  assert.equal(normalizeLevel('verbose'), 'verbose');
  assert.equal(normalizeLevel('loud'), 'info');
  assert.equal(normalizeLevel(undefined), 'info');
});

test('setLevel toggles silence', () => {
  const service = new LoggerService({ level: 'error', console: false });
  assert.equal(service.getLevel(), 'silent');

  const loud = new LoggerService({ level: 'error' });
  assert.equal(loud.getLevel(), 'error');
  loud.setLevel('silent');
  assert.equal(loud.getLevel(), 'silent');
  loud.setLevel('debug');
  assert.equal(loud.getLevel(), 'debug');
  loud.close();
  service.close();
});

test('forContext children inherit the parent level', () => {
  const service = new LoggerService({ level: 'warn' });
  const child = service.forContext('PeriodAggregator');

  assert.equal(child.isLevelEnabled('warn'), true);
  assert.equal(child.isLevelEnabled('info'), false);
  service.close();
});
