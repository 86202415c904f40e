import { enumerateDates, parseIsoDate, todayUtc, type IsoDate } from '../lib/dates';
import { err, ok, type Result } from '../lib/result';
import type LeaderboardFetcher from '../services/LeaderboardFetcher';
import type { DatedFetchSummary } from '../services/LeaderboardFetcher';
import type { ScoreStore } from '../services/ScoreStore';

export interface FetchDailyOptions {
  date?: string;
  from?: string;
  to?: string;
  execute: boolean;
  initDb: boolean;
  quiet: boolean;
}

/** Longest range accepted by `--from/--to`. */
export const MAX_FETCH_RANGE_DAYS = 366;

/**
 * Resolves the dates to fetch: `--from` (through `--to` or today), else
 * `--date`, else today. All dates are UTC.
 */
export function resolveFetchDates(options: Pick<FetchDailyOptions, 'date' | 'from' | 'to'>, now: Date): Result<IsoDate[], string> {
  if (options.from !== undefined) {
    if (options.date !== undefined) {
      return err('Use either --date or --from/--to, not both.');
    }
    const from = parseIsoDate(options.from);
    if (!from.ok) {
      return from;
    }
    const to = options.to === undefined ? ok(todayUtc(now)) : parseIsoDate(options.to);
    if (!to.ok) {
      return to;
    }
    if (to.value < from.value) {
      return err(`--to (${to.value}) is before --from (${from.value}).`);
    }
    const dates = enumerateDates(from.value, to.value);
    if (dates.length > MAX_FETCH_RANGE_DAYS) {
      return err(`Date range covers ${dates.length} days; the limit is ${MAX_FETCH_RANGE_DAYS}.`);
    }
    return ok(dates);
  }

  if (options.to !== undefined) {
    return err('--to requires --from.');
  }

  if (options.date !== undefined) {
    const date = parseIsoDate(options.date);
    return date.ok ? ok([date.value]) : date;
  }

  return ok([todayUtc(now)]);
}

export function formatFetchSummary(summary: DatedFetchSummary): string {
  const label = `${summary.statDate} ${summary.statisticName}`;
  if (summary.dryRun) {
    return `${label}: dry-run, no requests sent`;
  }

  const counts =
    `${summary.totalEntries} entries, ${summary.playersUpdated} players, ` +
    `${summary.scoresUpdated} scores, ${summary.pagesFetched} pages`;
  if (summary.success) {
    return `${label}: ok (${counts})`;
  }
  if (summary.truncated && summary.failure === null) {
    return `${label}: TRUNCATED at the page limit (${counts})`;
  }
  const reason = summary.failure ?? 'storage errors';
  return `${label}: FAILED ${reason} (${counts})`;
}

export interface FetchDailyDeps {
  fetcher: LeaderboardFetcher;
  store: ScoreStore;
  write: (line: string) => void;
}

/** Runs the fetch for every date and returns the process exit code. */
export async function runFetchDaily(
  dates: readonly IsoDate[],
  options: Pick<FetchDailyOptions, 'execute' | 'initDb' | 'quiet'>,
  { fetcher, store, write }: FetchDailyDeps,
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

  if (!options.execute) {
    print('DRY-RUN MODE: no HTTP requests will be sent. Use --execute to run.');
  }

  const summaries = await fetcher.fetchRange(dates);
  for (const summary of summaries) {
    // failures are reported even in quiet mode
    (summary.success ? print : write)(formatFetchSummary(summary));
  }

  const failed = summaries.filter((summary) => !summary.success).length;
  if (failed === 0) {
    print(`All ${summaries.length} fetch(es) completed successfully.`);
    return 0;
  }
  print(`${failed} of ${summaries.length} fetch(es) failed. Check logs for details.`);
  return 1;
}
