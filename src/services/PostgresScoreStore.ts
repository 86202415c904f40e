import { Pool, type PoolConfig } from 'pg';
import type { DateRange, IsoDate } from '../lib/dates';
import type { Logger } from '../lib/logger';
import { createSilentLogger } from '../lib/logger';
import type {
  AllTimeLeaderboardRow,
  DailyLeaderboardRow,
  DailyScore,
  PeriodAggregate,
  PeriodKind,
  PeriodLeaderboardRow,
  PeriodSummary,
  PlayerIdentity,
  PlayerUpsert,
  RunAuditInput,
  RunAuditRecord,
  ScoreStore,
} from './ScoreStore';
import { attachPostgresQueryLogger } from './utils/PostgresQueryLogger';

export interface PostgresScoreStoreOptions {
  url?: string;
  ssl?: boolean;
  poolConfig?: Omit<PoolConfig, 'connectionString'>;
  debug?: boolean;
  logger?: Logger;
  /** Pre-built pool; when given, `url`, `ssl` and `poolConfig` are ignored. */
  pool?: Pool;
}

interface PeriodTable {
  table: string;
  startColumn: string;
  endColumn: string;
}

const PERIOD_TABLES: Record<PeriodKind, PeriodTable> = {
  weekly: { table: 'weekly_leaderboards', startColumn: 'week_start', endColumn: 'week_end' },
  monthly: { table: 'monthly_leaderboards', startColumn: 'month_start', endColumn: 'month_end' },
};

// pg hands back BIGINT and NUMERIC as strings
type Numeric = number | string;

interface PlayerColumns {
  playfab_id: string;
  display_name: string | null;
  platform: string | null;
  platform_user_id: string | null;
}

interface DailyScoreRow {
  stat_date: string;
  statistic_name: string;
  playfab_id: string;
  position: number;
  score: Numeric;
}

interface DailyLeaderboardQueryRow extends DailyScoreRow, PlayerColumns {
  first_seen: string | null;
  last_seen: string | null;
}

interface PeriodLeaderboardQueryRow extends PlayerColumns {
  period_start: string;
  period_end: string;
  total_score: Numeric;
  days_participated: Numeric;
  average_score: Numeric;
  best_daily_score: Numeric;
  best_daily_date: string;
  position: number;
  calculated_at: Date;
}

interface PeriodSummaryRow {
  period_start: string;
  period_end: string;
  player_count: Numeric;
  top_score: Numeric;
}

interface AllTimeQueryRow extends PlayerColumns {
  total_score: Numeric;
  days_participated: Numeric;
  average_score: Numeric;
  best_daily_score: Numeric;
}

interface RunRow {
  id: number;
  stat_date: string;
  statistic_name: string;
  fetched_at: Date;
  entry_count: number;
  api_version: string | null;
}

function toPlayerIdentity(row: PlayerColumns): PlayerIdentity {
  return {
    playfabId: row.playfab_id,
    displayName: row.display_name,
    platform: row.platform,
    platformUserId: row.platform_user_id,
  };
}

function toDailyScore(row: DailyScoreRow): DailyScore {
  return {
    statDate: row.stat_date,
    statisticName: row.statistic_name,
    playfabId: row.playfab_id,
    position: row.position,
    score: Number(row.score),
  };
}

export default class PostgresScoreStore implements ScoreStore {
  private readonly connectionString?: string;

  private readonly ssl: boolean;

  private readonly poolConfig?: Omit<PoolConfig, 'connectionString'>;

  private readonly debugQueries: boolean;

  private readonly logger: Logger;

  private pool: Pool | null;

  constructor(options: PostgresScoreStoreOptions) {
    this.connectionString = options.url;
    this.ssl = Boolean(options.ssl);
    this.poolConfig = options.poolConfig;
    this.debugQueries = Boolean(options.debug);
    this.logger = options.logger ?? createSilentLogger();
    this.pool = options.pool ?? null;
  }

  private getPool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    if (!this.connectionString) {
      throw new Error('DATABASE_URL is not configured.');
    }

    const pool = new Pool({
      connectionString: this.connectionString,
      ssl: this.ssl ? { rejectUnauthorized: false } : undefined,
      ...this.poolConfig,
    });

    pool.on('error', (error) => {
      this.logger.error('Unexpected error from PostgreSQL connection pool', { error: error.message });
    });

    attachPostgresQueryLogger(pool, {
      context: 'PostgresScoreStore',
      debug: this.debugQueries,
      logger: this.logger,
    });

    this.pool = pool;
    return pool;
  }

  async close(): Promise<void> {
    if (!this.pool) {
      return;
    }
    try {
      await this.pool.end();
    } finally {
      this.pool = null;
    }
  }

  async ensureSchema(): Promise<void> {
    const pool = this.getPool();

    await pool.query(`
      CREATE TABLE IF NOT EXISTS players (
        playfab_id TEXT PRIMARY KEY,
        display_name TEXT,
        platform TEXT,
        platform_user_id TEXT,
        first_seen DATE,
        last_seen DATE
      )
    `);
    await pool.query('CREATE INDEX IF NOT EXISTS idx_players_display_name ON players (display_name)');

    await pool.query(`
      CREATE TABLE IF NOT EXISTS daily_scores (
        stat_date DATE NOT NULL,
        statistic_name TEXT NOT NULL,
        position INTEGER NOT NULL,
        playfab_id TEXT NOT NULL REFERENCES players (playfab_id) ON DELETE CASCADE,
        score INTEGER NOT NULL,
        PRIMARY KEY (stat_date, playfab_id)
      )
    `);
    await pool.query('CREATE INDEX IF NOT EXISTS idx_daily_scores_date ON daily_scores (stat_date)');
    await pool.query('CREATE INDEX IF NOT EXISTS idx_daily_scores_position ON daily_scores (position)');

    await pool.query(`
      CREATE TABLE IF NOT EXISTS runs (
        id SERIAL PRIMARY KEY,
        stat_date DATE NOT NULL,
        statistic_name TEXT NOT NULL,
        fetched_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        entry_count INTEGER NOT NULL DEFAULT 0,
        api_version TEXT
      )
    `);
    await pool.query('CREATE INDEX IF NOT EXISTS idx_runs_date ON runs (stat_date)');

    for (const { table, startColumn, endColumn } of Object.values(PERIOD_TABLES)) {
      await pool.query(`
        CREATE TABLE IF NOT EXISTS ${table} (
          ${startColumn} DATE NOT NULL,
          ${endColumn} DATE NOT NULL,
          playfab_id TEXT NOT NULL REFERENCES players (playfab_id),
          total_score BIGINT NOT NULL,
          days_participated INTEGER NOT NULL,
          average_score DOUBLE PRECISION NOT NULL,
          best_daily_score INTEGER NOT NULL,
          best_daily_date DATE NOT NULL,
          position INTEGER NOT NULL,
          calculated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          PRIMARY KEY (${startColumn}, playfab_id)
        )
      `);
      await pool.query(
        `CREATE INDEX IF NOT EXISTS idx_${table}_position ON ${table} (${startColumn}, position)`,
      );
      await pool.query(
        `CREATE INDEX IF NOT EXISTS idx_${table}_player ON ${table} (playfab_id)`,
      );
    }
  }

  async upsertPlayer(player: PlayerUpsert): Promise<void> {
    const pool = this.getPool();
    // platform and platform_user_id are replaced together or not at all
    await pool.query(
      `
        INSERT INTO players (playfab_id, display_name, platform, platform_user_id, first_seen, last_seen)
        VALUES ($1, $2, $3, $4, $5, $5)
        ON CONFLICT (playfab_id) DO UPDATE SET
          display_name = COALESCE(EXCLUDED.display_name, players.display_name),
          platform = CASE
            WHEN EXCLUDED.platform IS NULL AND EXCLUDED.platform_user_id IS NULL THEN players.platform
            ELSE EXCLUDED.platform
          END,
          platform_user_id = CASE
            WHEN EXCLUDED.platform IS NULL AND EXCLUDED.platform_user_id IS NULL THEN players.platform_user_id
            ELSE EXCLUDED.platform_user_id
          END,
          first_seen = COALESCE(players.first_seen, EXCLUDED.first_seen),
          last_seen = GREATEST(players.last_seen, EXCLUDED.last_seen)
      `,
      [player.playfabId, player.displayName, player.platform, player.platformUserId, player.seenOn],
    );
  }

  async upsertDailyScore(score: DailyScore): Promise<void> {
    const pool = this.getPool();
    await pool.query(
      `
        INSERT INTO daily_scores (stat_date, statistic_name, position, playfab_id, score)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (stat_date, playfab_id) DO UPDATE SET
          statistic_name = EXCLUDED.statistic_name,
          position = EXCLUDED.position,
          score = EXCLUDED.score
      `,
      [score.statDate, score.statisticName, score.position, score.playfabId, score.score],
    );
  }

  async recordRun(run: RunAuditInput): Promise<number> {
    const pool = this.getPool();
    const { rows } = await pool.query<{ id: number }>(
      `
        INSERT INTO runs (stat_date, statistic_name, entry_count, api_version)
        VALUES ($1, $2, $3, $4)
        RETURNING id
      `,
      [run.statDate, run.statisticName, run.entryCount, run.apiVersion],
    );
    const [row] = rows;
    if (!row) {
      throw new Error('Run audit insert returned no id.');
    }
    return row.id;
  }

  async listDailyScores(range: DateRange): Promise<DailyScore[]> {
    const pool = this.getPool();
    const { rows } = await pool.query<DailyScoreRow>(
      `
        SELECT stat_date::text AS stat_date, statistic_name, playfab_id, position, score
          FROM daily_scores
         WHERE stat_date BETWEEN $1 AND $2
         ORDER BY stat_date ASC, playfab_id ASC
      `,
      [range.start, range.end],
    );
    return rows.map(toDailyScore);
  }

  async getDailyDateRange(): Promise<DateRange | null> {
    const pool = this.getPool();
    const { rows } = await pool.query<{ first_date: string | null; last_date: string | null }>(
      'SELECT MIN(stat_date)::text AS first_date, MAX(stat_date)::text AS last_date FROM daily_scores',
    );
    const [row] = rows;
    if (!row?.first_date || !row.last_date) {
      return null;
    }
    return { start: row.first_date, end: row.last_date };
  }

  async replacePeriodAggregates(kind: PeriodKind, period: DateRange, rows: PeriodAggregate[]): Promise<void> {
    const { table, startColumn, endColumn } = PERIOD_TABLES[kind];
    const client = await this.getPool().connect();
    try {
      await client.query('BEGIN');
      await client.query(`DELETE FROM ${table} WHERE ${startColumn} = $1`, [period.start]);
      for (const row of rows) {
        await client.query(
          `
            INSERT INTO ${table} (
              ${startColumn}, ${endColumn}, playfab_id, total_score, days_participated,
              average_score, best_daily_score, best_daily_date, position, calculated_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          `,
          [
            row.periodStart,
            row.periodEnd,
            row.playfabId,
            row.totalScore,
            row.daysParticipated,
            row.averageScore,
            row.bestDailyScore,
            row.bestDailyDate,
            row.position,
            row.calculatedAt,
          ],
        );
      }
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.error('Failed to roll back period replacement', {
          kind,
          periodStart: period.start,
          error: rollbackError instanceof Error ? rollbackError.message : rollbackError,
        });
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async getDailyLeaderboard(statDate: IsoDate): Promise<DailyLeaderboardRow[]> {
    const pool = this.getPool();
    const { rows } = await pool.query<DailyLeaderboardQueryRow>(
      `
        SELECT ds.stat_date::text AS stat_date,
               ds.statistic_name,
               ds.position,
               ds.score,
               p.playfab_id,
               p.display_name,
               p.platform,
               p.platform_user_id,
               p.first_seen::text AS first_seen,
               p.last_seen::text AS last_seen
          FROM daily_scores ds
          JOIN players p ON p.playfab_id = ds.playfab_id
         WHERE ds.stat_date = $1
         ORDER BY ds.position ASC, ds.playfab_id ASC
      `,
      [statDate],
    );
    return rows.map((row) => ({
      ...toDailyScore(row),
      player: { ...toPlayerIdentity(row), firstSeen: row.first_seen, lastSeen: row.last_seen },
    }));
  }

  async getLatestRun(statDate: IsoDate): Promise<RunAuditRecord | null> {
    const pool = this.getPool();
    const { rows } = await pool.query<RunRow>(
      `
        SELECT id, stat_date::text AS stat_date, statistic_name, fetched_at, entry_count, api_version
          FROM runs
         WHERE stat_date = $1
         ORDER BY fetched_at DESC, id DESC
         LIMIT 1
      `,
      [statDate],
    );
    const [row] = rows;
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      statDate: row.stat_date,
      statisticName: row.statistic_name,
      fetchedAt: row.fetched_at,
      entryCount: row.entry_count,
      apiVersion: row.api_version ?? 'v1',
    };
  }

  async getPeriodLeaderboard(kind: PeriodKind, periodStart: IsoDate): Promise<PeriodLeaderboardRow[]> {
    const { table, startColumn, endColumn } = PERIOD_TABLES[kind];
    const pool = this.getPool();
    const { rows } = await pool.query<PeriodLeaderboardQueryRow>(
      `
        SELECT pl.${startColumn}::text AS period_start,
               pl.${endColumn}::text AS period_end,
               pl.position,
               pl.total_score,
               pl.days_participated,
               pl.average_score,
               pl.best_daily_score,
               pl.best_daily_date::text AS best_daily_date,
               pl.calculated_at,
               p.playfab_id,
               p.display_name,
               p.platform,
               p.platform_user_id
          FROM ${table} pl
          JOIN players p ON p.playfab_id = pl.playfab_id
         WHERE pl.${startColumn} = $1
         ORDER BY pl.position ASC
      `,
      [periodStart],
    );
    return rows.map((row) => ({
      periodStart: row.period_start,
      periodEnd: row.period_end,
      playfabId: row.playfab_id,
      totalScore: Number(row.total_score),
      daysParticipated: Number(row.days_participated),
      averageScore: Number(row.average_score),
      bestDailyScore: Number(row.best_daily_score),
      bestDailyDate: row.best_daily_date,
      position: row.position,
      calculatedAt: row.calculated_at,
      player: toPlayerIdentity(row),
    }));
  }

  async listPeriods(kind: PeriodKind): Promise<PeriodSummary[]> {
    const { table, startColumn, endColumn } = PERIOD_TABLES[kind];
    const pool = this.getPool();
    const { rows } = await pool.query<PeriodSummaryRow>(`
      SELECT ${startColumn}::text AS period_start,
             MAX(${endColumn})::text AS period_end,
             COUNT(*) AS player_count,
             MAX(total_score) AS top_score
        FROM ${table}
       GROUP BY ${startColumn}
       ORDER BY ${startColumn} DESC
    `);
    return rows.map((row) => ({
      periodStart: row.period_start,
      periodEnd: row.period_end,
      playerCount: Number(row.player_count),
      topScore: Number(row.top_score),
    }));
  }

  async getAllTimeLeaderboard(limit: number): Promise<AllTimeLeaderboardRow[]> {
    const pool = this.getPool();
    const { rows } = await pool.query<AllTimeQueryRow>(
      `
        SELECT ds.playfab_id,
               SUM(ds.score) AS total_score,
               COUNT(*) AS days_participated,
               AVG(ds.score)::double precision AS average_score,
               MAX(ds.score) AS best_daily_score,
               p.display_name,
               p.platform,
               p.platform_user_id
          FROM daily_scores ds
          JOIN players p ON p.playfab_id = ds.playfab_id
         GROUP BY ds.playfab_id, p.display_name, p.platform, p.platform_user_id
         ORDER BY total_score DESC, ds.playfab_id COLLATE "C" ASC
         LIMIT $1
      `,
      [limit],
    );
    return rows.map((row, index) => ({
      position: index,
      playfabId: row.playfab_id,
      totalScore: Number(row.total_score),
      daysParticipated: Number(row.days_participated),
      averageScore: Number(row.average_score),
      bestDailyScore: Number(row.best_daily_score),
      player: toPlayerIdentity(row),
    }));
  }
}
