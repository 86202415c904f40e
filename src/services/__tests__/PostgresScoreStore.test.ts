import test from 'node:test';
import assert from 'node:assert/strict';
import type { Pool } from 'pg';

import PostgresScoreStore from '../PostgresScoreStore';
import type { PeriodAggregate } from '../ScoreStore';
import { normalizeQueryText } from '../utils/PostgresQueryLogger';

interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
}

class FakeClient {
  readonly queries: RecordedQuery[] = [];

  released = 0;

  constructor(private readonly failWhen: (text: string, index: number) => boolean) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    const normalized = normalizeQueryText(text) ?? '';
    this.queries.push({ text: normalized, values });
    if (this.failWhen(normalized, this.queries.length - 1)) {
      throw new Error('insert failed');
    }
    return { rows: [] };
  }

  release(): void {
    this.released += 1;
  }
}

class FakePool {
  readonly queries: RecordedQuery[] = [];

  constructor(
    readonly client: FakeClient = new FakeClient(() => false),
    private readonly rows: unknown[] = [],
  ) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.queries.push({ text: normalizeQueryText(text) ?? '', values });
    return { rows: this.rows };
  }

  async connect(): Promise<FakeClient> {
    return this.client;
  }

  async end(): Promise<void> {}
}

function storeWith(pool: FakePool): PostgresScoreStore {
  return new PostgresScoreStore({ pool: pool as unknown as Pool });
}

const CALCULATED_AT = new Date('2026-01-25T04:00:00Z');

function aggregate(playfabId: string, totalScore: number, position: number): PeriodAggregate {
  return {
    periodStart: '2026-01-18',
    periodEnd: '2026-01-24',
    playfabId,
    totalScore,
    daysParticipated: 2,
    averageScore: totalScore / 2,
    bestDailyScore: totalScore,
    bestDailyDate: '2026-01-19',
    position,
    calculatedAt: CALCULATED_AT,
  };
}

const PERIOD = { start: '2026-01-18', end: '2026-01-24' };

test('replacePeriodAggregates deletes then inserts inside one transaction', async () => {
  const pool = new FakePool();
  await storeWith(pool).replacePeriodAggregates('weekly', PERIOD, [aggregate('p1', 30, 0), aggregate('p2', 5, 1)]);

  const { queries } = pool.client;
  assert.deepEqual(
    queries.map((query) => query.text.split(' (')[0]),
    [
      'BEGIN',
      'DELETE FROM weekly_leaderboards WHERE week_start = $1',
      'INSERT INTO weekly_leaderboards',
      'INSERT INTO weekly_leaderboards',
      'COMMIT',
    ],
  );
  assert.deepEqual(queries[1]?.values, ['2026-01-18']);
  assert.deepEqual(queries[2]?.values, ['2026-01-18', '2026-01-24', 'p1', 30, 2, 15, 30, '2026-01-19', 0, CALCULATED_AT]);
  assert.equal(pool.client.released, 1);
  assert.equal(pool.queries.length, 0);
});

test('a failing insert rolls the transaction back and rethrows', async () => {
  const client = new FakeClient((_text, index) => index === 3);
  const pool = new FakePool(client);

  await assert.rejects(
    storeWith(pool).replacePeriodAggregates('weekly', PERIOD, [aggregate('p1', 30, 0), aggregate('p2', 5, 1)]),
    /insert failed/,
  );

  assert.deepEqual(
    client.queries.map((query) => query.text.split(' (')[0]),
    [
      'BEGIN',
      'DELETE FROM weekly_leaderboards WHERE week_start = $1',
      'INSERT INTO weekly_leaderboards',
      'INSERT INTO weekly_leaderboards',
      'ROLLBACK',
    ],
  );
  assert.equal(client.released, 1);
});

test('monthly rows go to the monthly table keyed by month_start', async () => {
  const pool = new FakePool();
  await storeWith(pool).replacePeriodAggregates('monthly', { start: '2026-01-01', end: '2026-01-31' }, []);

  assert.deepEqual(
    pool.client.queries.map((query) => query.text),
    ['BEGIN', 'DELETE FROM monthly_leaderboards WHERE month_start = $1', 'COMMIT'],
  );
});

test('upsertPlayer sends the identity and observation date', async () => {
  const pool = new FakePool();
  await storeWith(pool).upsertPlayer({
    playfabId: 'AAA',
    displayName: 'Alice',
    platform: 'GOG',
    platformUserId: '12345',
    seenOn: '2026-01-23',
  });

  const [query] = pool.queries;
  assert.ok(query?.text.startsWith('INSERT INTO players'));
  assert.ok(query?.text.includes('ON CONFLICT (playfab_id) DO UPDATE SET'));
  assert.deepEqual(query?.values, ['AAA', 'Alice', 'GOG', '12345', '2026-01-23']);
});

test('all-time rows convert numeric strings and number positions from zero', async () => {
  const pool = new FakePool(undefined, [
    {
      playfab_id: 'p1',
      total_score: '30',
      days_participated: '2',
      average_score: 15,
      best_daily_score: 20,
      display_name: 'One',
      platform: null,
      platform_user_id: null,
    },
    {
      playfab_id: 'p2',
      total_score: '5',
      days_participated: '1',
      average_score: 5,
      best_daily_score: 5,
      display_name: null,
      platform: 'Steam',
      platform_user_id: '765',
    },
  ]);

  const rows = await storeWith(pool).getAllTimeLeaderboard(10);

  assert.deepEqual(pool.queries[0]?.values, [10]);
  assert.match(pool.queries[0]?.text ?? '', /ORDER BY total_score DESC, ds\.playfab_id COLLATE "C" ASC LIMIT \$1$/);
  assert.deepEqual(rows, [
    {
      position: 0,
      playfabId: 'p1',
      totalScore: 30,
      daysParticipated: 2,
      averageScore: 15,
      bestDailyScore: 20,
      player: { playfabId: 'p1', displayName: 'One', platform: null, platformUserId: null },
    },
    {
      position: 1,
      playfabId: 'p2',
      totalScore: 5,
      daysParticipated: 1,
      averageScore: 5,
      bestDailyScore: 5,
      player: { playfabId: 'p2', displayName: null, platform: 'Steam', platformUserId: '765' },
    },
  ]);
});

test('getDailyDateRange is null on an empty table', async () => {
  const pool = new FakePool(undefined, [{ first_date: null, last_date: null }]);
  assert.equal(await storeWith(pool).getDailyDateRange(), null);
});

test('a store without a URL or pool refuses to query', async () => {
  const store = new PostgresScoreStore({});
  await assert.rejects(store.ensureSchema(), /DATABASE_URL is not configured\./);
});
