import type { DateRange, IsoDate } from '../lib/dates';
import { PERIOD_CALENDARS } from './PeriodAggregator';
import type {
  AllTimeLeaderboardRow,
  DailyLeaderboardRow,
  PeriodKind,
  PeriodLeaderboardRow,
  PeriodSummary,
  RunAuditRecord,
  ScoreStore,
} from './ScoreStore';

export interface DailyLeaderboardView {
  statDate: IsoDate;
  rows: DailyLeaderboardRow[];
  latestRun: RunAuditRecord | null;
}

export interface PeriodLeaderboardView {
  kind: PeriodKind;
  period: DateRange;
  rows: PeriodLeaderboardRow[];
}

export const MAX_ALL_TIME_LIMIT = 1000;

export default class LeaderboardQueryService {
  private readonly store: ScoreStore;

  constructor(store: ScoreStore) {
    this.store = store;
  }

  async getDaily(statDate: IsoDate): Promise<DailyLeaderboardView> {
    const [rows, latestRun] = await Promise.all([
      this.store.getDailyLeaderboard(statDate),
      this.store.getLatestRun(statDate),
    ]);
    return { statDate, rows, latestRun };
  }

  getWeekly(anchor: IsoDate): Promise<PeriodLeaderboardView> {
    return this.getPeriod('weekly', anchor);
  }

  getMonthly(anchor: IsoDate): Promise<PeriodLeaderboardView> {
    return this.getPeriod('monthly', anchor);
  }

  listWeeks(): Promise<PeriodSummary[]> {
    return this.store.listPeriods('weekly');
  }

  listMonths(): Promise<PeriodSummary[]> {
    return this.store.listPeriods('monthly');
  }

  getAllTime(limit: number): Promise<AllTimeLeaderboardRow[]> {
    const bounded = Math.min(Math.max(Math.trunc(limit), 1), MAX_ALL_TIME_LIMIT);
    return this.store.getAllTimeLeaderboard(bounded);
  }

  private async getPeriod(kind: PeriodKind, anchor: IsoDate): Promise<PeriodLeaderboardView> {
    const period = PERIOD_CALENDARS[kind].bounds(anchor);
    const rows = await this.store.getPeriodLeaderboard(kind, period.start);
    return { kind, period, rows };
  }
}
