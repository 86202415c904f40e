/**
 * Persistence contract for the collector. `PostgresScoreStore` is the
 * production implementation; tests use an in-memory one.
 */
import type { DateRange, IsoDate } from '../lib/dates';

export type PeriodKind = 'weekly' | 'monthly';

export interface PlayerIdentity {
  playfabId: string;
  displayName: string | null;
  platform: string | null;
  platformUserId: string | null;
}

export interface PlayerUpsert extends PlayerIdentity {
  /** Date of this observation; becomes first_seen for new players and advances last_seen. */
  seenOn: IsoDate;
}

export interface PlayerRecord extends PlayerIdentity {
  firstSeen: IsoDate | null;
  lastSeen: IsoDate | null;
}

export interface DailyScore {
  statDate: IsoDate;
  statisticName: string;
  playfabId: string;
  position: number;
  score: number;
}

export interface RunAuditInput {
  statDate: IsoDate;
  statisticName: string;
  entryCount: number;
  apiVersion: string;
}

export interface RunAuditRecord extends RunAuditInput {
  id: number;
  fetchedAt: Date;
}

export interface PeriodAggregate {
  periodStart: IsoDate;
  periodEnd: IsoDate;
  playfabId: string;
  totalScore: number;
  daysParticipated: number;
  averageScore: number;
  bestDailyScore: number;
  bestDailyDate: IsoDate;
  position: number;
  calculatedAt: Date;
}

export interface DailyLeaderboardRow extends DailyScore {
  player: PlayerRecord;
}

export interface PeriodLeaderboardRow extends PeriodAggregate {
  player: PlayerIdentity;
}

export interface PeriodSummary {
  periodStart: IsoDate;
  periodEnd: IsoDate;
  playerCount: number;
  topScore: number;
}

export interface AllTimeLeaderboardRow {
  position: number;
  playfabId: string;
  totalScore: number;
  daysParticipated: number;
  averageScore: number;
  bestDailyScore: number;
  player: PlayerIdentity;
}

export interface ScoreStore {
  /** Creates tables and indexes when missing. Safe to call repeatedly. */
  ensureSchema(): Promise<void>;

  /** Insert-or-merge keyed by playfabId. */
  upsertPlayer(player: PlayerUpsert): Promise<void>;

  /** Insert-or-replace keyed by (statDate, playfabId). */
  upsertDailyScore(score: DailyScore): Promise<void>;

  /** Appends one audit row and returns its id. */
  recordRun(run: RunAuditInput): Promise<number>;

  /** Daily rows with statDate inside the range, ordered by statDate then playfabId. */
  listDailyScores(range: DateRange): Promise<DailyScore[]>;

  /** Earliest and latest statDate present, or null when no daily rows exist. */
  getDailyDateRange(): Promise<DateRange | null>;

  /** Atomically swaps the stored rows of one period for the given rows. */
  replacePeriodAggregates(kind: PeriodKind, period: DateRange, rows: PeriodAggregate[]): Promise<void>;

  getDailyLeaderboard(statDate: IsoDate): Promise<DailyLeaderboardRow[]>;

  getLatestRun(statDate: IsoDate): Promise<RunAuditRecord | null>;

  getPeriodLeaderboard(kind: PeriodKind, periodStart: IsoDate): Promise<PeriodLeaderboardRow[]>;

  listPeriods(kind: PeriodKind): Promise<PeriodSummary[]>;

  getAllTimeLeaderboard(limit: number): Promise<AllTimeLeaderboardRow[]>;

  close(): Promise<void>;
}
