import test from 'node:test';
import assert from 'node:assert/strict';

import PeriodAggregator, { computePeriodAggregates } from '../PeriodAggregator';
import type { DailyScore } from '../ScoreStore';
import MemoryScoreStore from './support/MemoryScoreStore';

const CALCULATED_AT = new Date('2026-01-25T04:00:00Z');
const WEEK = { start: '2026-01-18', end: '2026-01-24' };

function daily(statDate: string, playfabId: string, score: number): DailyScore {
  return { statDate, statisticName: 'DailyPlay_Test', playfabId, position: 0, score };
}

function weekly(store: MemoryScoreStore): PeriodAggregator {
  return new PeriodAggregator({ kind: 'weekly', store, now: () => CALCULATED_AT });
}

test('computePeriodAggregates sums, averages and ranks players', () => {
  const rows = computePeriodAggregates(
    [daily('2026-01-19', 'p1', 10), daily('2026-01-19', 'p2', 5), daily('2026-01-20', 'p1', 20)],
    WEEK,
    CALCULATED_AT,
  );

  assert.deepEqual(rows, [
    {
      periodStart: '2026-01-18',
      periodEnd: '2026-01-24',
      playfabId: 'p1',
      totalScore: 30,
      daysParticipated: 2,
      averageScore: 15,
      bestDailyScore: 20,
      bestDailyDate: '2026-01-20',
      position: 0,
      calculatedAt: CALCULATED_AT,
    },
    {
      periodStart: '2026-01-18',
      periodEnd: '2026-01-24',
      playfabId: 'p2',
      totalScore: 5,
      daysParticipated: 1,
      averageScore: 5,
      bestDailyScore: 5,
      bestDailyDate: '2026-01-19',
      position: 1,
      calculatedAt: CALCULATED_AT,
    },
  ]);
});

test('equal totals are ordered by player id', () => {
  const rows = computePeriodAggregates(
    [daily('2026-01-19', 'zed', 40), daily('2026-01-19', 'amy', 40), daily('2026-01-20', 'bob', 41)],
    WEEK,
    CALCULATED_AT,
  );

  assert.deepEqual(
    rows.map((row) => [row.playfabId, row.position]),
    [
      ['bob', 0],
      ['amy', 1],
      ['zed', 2],
    ],
  );
});

test('the earliest of several best days is kept', () => {
  const [row] = computePeriodAggregates(
    [daily('2026-01-21', 'p1', 20), daily('2026-01-19', 'p1', 20), daily('2026-01-20', 'p1', 3)],
    WEEK,
    CALCULATED_AT,
  );

  assert.equal(row?.bestDailyScore, 20);
  assert.equal(row?.bestDailyDate, '2026-01-19');
});

test('rows outside the period are ignored', () => {
  const rows = computePeriodAggregates(
    [daily('2026-01-17', 'p1', 100), daily('2026-01-18', 'p1', 1), daily('2026-01-25', 'p2', 100)],
    WEEK,
    CALCULATED_AT,
  );

  assert.deepEqual(
    rows.map((row) => [row.playfabId, row.totalScore]),
    [['p1', 1]],
  );
});

test('aggregate writes the week containing the anchor', async () => {
  const store = new MemoryScoreStore();
  store.seedDaily('2026-01-19', 'p1', 10);
  store.seedDaily('2026-01-20', 'p1', 20);
  store.seedDaily('2026-01-19', 'p2', 5);

  const outcome = await weekly(store).aggregate('2026-01-22');

  assert.equal(outcome.status, 'written');
  assert.deepEqual(outcome.period, WEEK);
  assert.equal(outcome.players, 2);
  assert.deepEqual(
    outcome.top.map((row) => [row.playfabId, row.totalScore, row.position]),
    [
      ['p1', 30, 0],
      ['p2', 5, 1],
    ],
  );
  assert.deepEqual(
    store.periods.weekly.get('2026-01-18')?.map((row) => row.playfabId),
    ['p1', 'p2'],
  );
});

test('re-running with unchanged daily data gives identical rows', async () => {
  const store = new MemoryScoreStore();
  store.seedDaily('2026-01-19', 'p1', 10);
  store.seedDaily('2026-01-19', 'p2', 12);
  const aggregator = weekly(store);

  await aggregator.aggregate('2026-01-19');
  const first = store.periods.weekly.get('2026-01-18');
  await aggregator.aggregate('2026-01-24');
  const second = store.periods.weekly.get('2026-01-18');

  assert.deepEqual(second, first);
  assert.equal(store.replaceCalls, 2);
});

test('recalculation replaces the previous rows of the period', async () => {
  const store = new MemoryScoreStore();
  store.seedDaily('2026-01-19', 'p1', 10);
  const aggregator = weekly(store);
  await aggregator.aggregate('2026-01-19');

  store.seedDaily('2026-01-21', 'p2', 50);
  await aggregator.aggregate('2026-01-19');

  assert.deepEqual(
    store.periods.weekly.get('2026-01-18')?.map((row) => [row.playfabId, row.position]),
    [
      ['p2', 0],
      ['p1', 1],
    ],
  );
});

test('a period without daily rows is skipped and left untouched', async () => {
  const store = new MemoryScoreStore();
  const outcome = await weekly(store).aggregate('2026-02-04');

  assert.deepEqual(outcome, {
    kind: 'weekly',
    period: { start: '2026-02-01', end: '2026-02-07' },
    status: 'skipped',
    players: 0,
    top: [],
  });
  assert.equal(store.replaceCalls, 0);
});

test('a failed replace propagates to the caller', async () => {
  const store = new MemoryScoreStore();
  store.seedDaily('2026-01-19', 'p1', 10);
  store.failReplace = new Error('deadlock detected');

  await assert.rejects(weekly(store).aggregate('2026-01-19'), /deadlock detected/);
});

test('aggregateAll walks every week touching the stored range', async () => {
  const store = new MemoryScoreStore();
  store.seedDaily('2026-01-19', 'p1', 10);
  store.seedDaily('2026-02-03', 'p1', 7);

  const outcomes = await weekly(store).aggregateAll();

  assert.deepEqual(
    outcomes.map((outcome) => [outcome.period.start, outcome.period.end, outcome.status]),
    [
      ['2026-01-18', '2026-01-24', 'written'],
      ['2026-01-25', '2026-01-31', 'skipped'],
      ['2026-02-01', '2026-02-07', 'written'],
    ],
  );
});

test('monthly aggregation uses calendar months', async () => {
  const store = new MemoryScoreStore();
  store.seedDaily('2026-01-31', 'p1', 10);
  store.seedDaily('2026-03-01', 'p2', 4);
  const aggregator = new PeriodAggregator({ kind: 'monthly', store, now: () => CALCULATED_AT });

  assert.deepEqual(aggregator.boundsFor('2026-02-10'), { start: '2026-02-01', end: '2026-02-28' });

  const outcomes = await aggregator.aggregateAll();
  assert.deepEqual(
    outcomes.map((outcome) => [outcome.period.start, outcome.period.end, outcome.status, outcome.players]),
    [
      ['2026-01-01', '2026-01-31', 'written', 1],
      ['2026-02-01', '2026-02-28', 'skipped', 0],
      ['2026-03-01', '2026-03-31', 'written', 1],
    ],
  );
});

test('aggregateAll with no daily data does nothing', async () => {
  const store = new MemoryScoreStore();
  assert.deepEqual(await weekly(store).aggregateAll(), []);
  assert.equal(store.replaceCalls, 0);
});
