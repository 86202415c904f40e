import { parseIsoDate, parseMonth, todayUtc, type DateRange, type IsoDate } from '../lib/dates';
import { ok, type Result } from '../lib/result';
import type PeriodAggregator from '../services/PeriodAggregator';
import type { AggregationOutcome } from '../services/PeriodAggregator';
import type { PeriodKind, ScoreStore } from '../services/ScoreStore';

export type PeriodTarget = { all: true } | { all: false; anchor: IsoDate };

export interface CalculatePeriodsOptions {
  all: boolean;
  initDb: boolean;
  quiet: boolean;
}

const PERIOD_LABELS: Record<PeriodKind, string> = {
  weekly: 'Week',
  monthly: 'Month',
};

/**
 * `--all`, else the given anchor (`YYYY-MM-DD` for weeks, `YYYY-MM` for
 * months), else the period containing today.
 */
export function resolvePeriodTarget(
  kind: PeriodKind,
  raw: string | undefined,
  all: boolean,
  now: Date,
): Result<PeriodTarget, string> {
  if (all) {
    return ok<PeriodTarget>({ all: true });
  }
  if (raw === undefined) {
    return ok<PeriodTarget>({ all: false, anchor: todayUtc(now) });
  }

  const anchor = kind === 'monthly' ? parseMonth(raw) : parseIsoDate(raw);
  return anchor.ok ? ok<PeriodTarget>({ all: false, anchor: anchor.value }) : anchor;
}

function formatPeriod(kind: PeriodKind, period: DateRange): string {
  return `${PERIOD_LABELS[kind]} ${period.start} to ${period.end}`;
}

export function formatOutcome(outcome: AggregationOutcome): string {
  const label = formatPeriod(outcome.kind, outcome.period);
  if (outcome.status === 'skipped') {
    return `${label}: skipped, no daily scores`;
  }

  const leaders = outcome.top
    .map((row) => `#${row.position + 1} ${row.playfabId} (${row.totalScore})`)
    .join(', ');
  return `${label}: ${outcome.players} players ranked${leaders ? `; ${leaders}` : ''}`;
}

export interface CalculatePeriodsDeps {
  aggregator: PeriodAggregator;
  store: ScoreStore;
  write: (line: string) => void;
  describeError?: (error: unknown) => string;
}

function defaultDescribeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Aggregates the requested period(s) and returns the process exit code. */
export async function runCalculatePeriods(
  target: PeriodTarget,
  options: Pick<CalculatePeriodsOptions, 'initDb' | 'quiet'>,
  { aggregator, store, write, describeError = defaultDescribeError }: CalculatePeriodsDeps,
): Promise<number> {
  const print = (line: string): void => {
    if (!options.quiet) {
      write(line);
    }
  };

  if (options.initDb) {
    await store.ensureSchema();
    print('Database schema ready.');
  }

  const anchors = target.all
    ? (await aggregator.coveredPeriods()).map((period) => period.start)
    : [target.anchor];

  if (anchors.length === 0) {
    print('No daily scores stored; nothing to calculate.');
    return 0;
  }

  let failed = 0;
  for (const anchor of anchors) {
    try {
      print(formatOutcome(await aggregator.aggregate(anchor)));
    } catch (error) {
      failed += 1;
      // failures are reported even in quiet mode
      write(`${formatPeriod(aggregator.kind, aggregator.boundsFor(anchor))}: FAILED ${describeError(error)}`);
    }
  }

  if (failed > 0) {
    print(`${failed} of ${anchors.length} period(s) failed.`);
    return 1;
  }
  print(`${anchors.length} period(s) processed.`);
  return 0;
}
