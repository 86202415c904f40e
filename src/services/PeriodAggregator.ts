import {
  addDays,
  addMonths,
  monthBounds,
  weekBounds,
  type DateRange,
  type IsoDate,
} from '../lib/dates';
import type { Logger } from '../lib/logger';
import { createSilentLogger } from '../lib/logger';
import type { DailyScore, PeriodAggregate, PeriodKind, ScoreStore } from './ScoreStore';

export interface PeriodCalendar {
  bounds(anchor: IsoDate): DateRange;
  /** First day of the period following the one starting at `periodStart`. */
  next(periodStart: IsoDate): IsoDate;
}

export const PERIOD_CALENDARS: Record<PeriodKind, PeriodCalendar> = {
  weekly: {
    bounds: weekBounds,
    next: (periodStart) => addDays(periodStart, 7),
  },
  monthly: {
    bounds: monthBounds,
    next: (periodStart) => addMonths(periodStart, 1),
  },
};

export type AggregationStatus = 'written' | 'skipped';

export interface AggregationOutcome {
  kind: PeriodKind;
  period: DateRange;
  status: AggregationStatus;
  players: number;
  /** Up to the first three ranked rows. */
  top: PeriodAggregate[];
}

export interface PeriodAggregatorOptions {
  kind: PeriodKind;
  store: ScoreStore;
  logger?: Logger;
  now?: () => Date;
}

interface PlayerTotals {
  playfabId: string;
  totalScore: number;
  daysParticipated: number;
  bestDailyScore: number;
  bestDailyDate: IsoDate;
}

function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Groups daily rows by player and ranks the groups by total score, highest
 * first. Equal totals are ordered by ascending player id; the best daily date
 * is the earliest date carrying the player's best score.
 */
export function computePeriodAggregates(
  rows: readonly DailyScore[],
  period: DateRange,
  calculatedAt: Date,
): PeriodAggregate[] {
  const totals = new Map<string, PlayerTotals>();

  for (const row of rows) {
    if (row.statDate < period.start || row.statDate > period.end) {
      continue;
    }

    const current = totals.get(row.playfabId);
    if (!current) {
      totals.set(row.playfabId, {
        playfabId: row.playfabId,
        totalScore: row.score,
        daysParticipated: 1,
        bestDailyScore: row.score,
        bestDailyDate: row.statDate,
      });
      continue;
    }

    current.totalScore += row.score;
    current.daysParticipated += 1;
    if (
      row.score > current.bestDailyScore ||
      (row.score === current.bestDailyScore && row.statDate < current.bestDailyDate)
    ) {
      current.bestDailyScore = row.score;
      current.bestDailyDate = row.statDate;
    }
  }

  return Array.from(totals.values())
    .sort((left, right) => right.totalScore - left.totalScore || compareText(left.playfabId, right.playfabId))
    .map((entry, position) => ({
      periodStart: period.start,
      periodEnd: period.end,
      playfabId: entry.playfabId,
      totalScore: entry.totalScore,
      daysParticipated: entry.daysParticipated,
      averageScore: entry.totalScore / entry.daysParticipated,
      bestDailyScore: entry.bestDailyScore,
      bestDailyDate: entry.bestDailyDate,
      position,
      calculatedAt,
    }));
}

/**
 * Rebuilds weekly or monthly leaderboards from daily scores. Each period is
 * recomputed from scratch and swapped in with a single store transaction.
 */
export default class PeriodAggregator {
  public readonly kind: PeriodKind;

  private readonly calendar: PeriodCalendar;

  private readonly store: ScoreStore;

  private readonly logger: Logger;

  private readonly now: () => Date;

  constructor(options: PeriodAggregatorOptions) {
    this.kind = options.kind;
    this.calendar = PERIOD_CALENDARS[options.kind];
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  public boundsFor(anchor: IsoDate): DateRange {
    return this.calendar.bounds(anchor);
  }

  public async aggregate(anchor: IsoDate): Promise<AggregationOutcome> {
    const period = this.boundsFor(anchor);
    this.logger.info(`Calculating ${this.kind} leaderboard`, { periodStart: period.start, periodEnd: period.end });

    const rows = await this.store.listDailyScores(period);
    if (rows.length === 0) {
      this.logger.info(`No daily scores for this ${this.kind} period, leaving stored rows untouched`, {
        periodStart: period.start,
      });
      return { kind: this.kind, period, status: 'skipped', players: 0, top: [] };
    }

    const aggregates = computePeriodAggregates(rows, period, this.now());
    await this.store.replacePeriodAggregates(this.kind, period, aggregates);

    this.logger.info(`${this.kind} leaderboard stored`, {
      periodStart: period.start,
      players: aggregates.length,
    });
    return {
      kind: this.kind,
      period,
      status: 'written',
      players: aggregates.length,
      top: aggregates.slice(0, 3),
    };
  }

  /** Every period touching the stored daily range, oldest first. */
  public async coveredPeriods(): Promise<DateRange[]> {
    const range = await this.store.getDailyDateRange();
    if (!range) {
      return [];
    }

    const periods: DateRange[] = [];
    for (
      let periodStart = this.calendar.bounds(range.start).start;
      periodStart <= range.end;
      periodStart = this.calendar.next(periodStart)
    ) {
      periods.push(this.calendar.bounds(periodStart));
    }
    return periods;
  }

  /** Recomputes every covered period in chronological order. */
  public async aggregateAll(): Promise<AggregationOutcome[]> {
    const periods = await this.coveredPeriods();
    if (periods.length === 0) {
      this.logger.info('No daily scores stored, nothing to aggregate', { kind: this.kind });
      return [];
    }

    this.logger.info(`Recalculating all ${this.kind} periods`, {
      firstPeriod: periods[0]?.start,
      periods: periods.length,
    });

    const outcomes: AggregationOutcome[] = [];
    for (const period of periods) {
      outcomes.push(await this.aggregate(period.start));
    }
    return outcomes;
  }
}
