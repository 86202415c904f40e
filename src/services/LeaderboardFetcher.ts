import { setTimeout as delay } from 'node:timers/promises';
import { todayUtc, type IsoDate } from '../lib/dates';
import type { Logger } from '../lib/logger';
import { createSilentLogger } from '../lib/logger';
import { normalizeIdentity, normalizeScore } from './IdentityNormalizer';
import type { LeaderboardEntry, LeaderboardFailureKind, LeaderboardSource } from './LeaderboardSource';
import type { ScoreStore } from './ScoreStore';
import { statisticNameFor } from './utils/statisticNames';

export interface LeaderboardFetcherOptions {
  source: LeaderboardSource;
  store: ScoreStore;
  logger?: Logger;
  pageSize?: number;
  requestDelayMs?: number;
  /** Upper bound on page requests for one statistic/date. */
  maxPages?: number;
  apiVersion?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface FetchSummary {
  success: boolean;
  dryRun: boolean;
  totalEntries: number;
  playersUpdated: number;
  scoresUpdated: number;
  pagesFetched: number;
  failure: LeaderboardFailureKind | null;
  /** The page limit stopped the fetch while full pages were still coming. */
  truncated: boolean;
  runId: number | null;
}

export interface DatedFetchSummary extends FetchSummary {
  statDate: IsoDate;
  statisticName: string;
}

interface PaginationResult {
  entries: LeaderboardEntry[];
  pagesFetched: number;
  dryRun: boolean;
  failure: LeaderboardFailureKind | null;
  truncated: boolean;
}

const DEFAULT_PAGE_SIZE = 50;
const DEFAULT_REQUEST_DELAY_MS = 100;
const DEFAULT_MAX_PAGES = 1000;
const API_VERSION = 'v1';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default class LeaderboardFetcher {
  private readonly source: LeaderboardSource;

  private readonly store: ScoreStore;

  private readonly logger: Logger;

  private readonly pageSize: number;

  private readonly requestDelayMs: number;

  private readonly maxPages: number;

  private readonly apiVersion: string;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly now: () => Date;

  constructor(options: LeaderboardFetcherOptions) {
    this.source = options.source;
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
    this.requestDelayMs = Math.max(0, options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS);
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    this.apiVersion = options.apiVersion ?? API_VERSION;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Pulls every page of one statistic, stores what was received and appends a
   * run audit row. Dry runs return before touching the store.
   */
  public async fetch(statisticName: string, statDate: IsoDate): Promise<FetchSummary> {
    this.logger.info('Starting leaderboard fetch', { statisticName, statDate });

    const pagination = await this.paginate(statisticName);

    if (pagination.dryRun) {
      this.logger.info('Dry-run mode: no data fetched', { statisticName, statDate });
      return {
        success: true,
        dryRun: true,
        totalEntries: 0,
        playersUpdated: 0,
        scoresUpdated: 0,
        pagesFetched: 0,
        failure: null,
        truncated: false,
        runId: null,
      };
    }

    const { entries } = pagination;
    this.logger.info('Fetch completed', {
      statisticName,
      statDate,
      totalEntries: entries.length,
      pagesFetched: pagination.pagesFetched,
      failure: pagination.failure,
      truncated: pagination.truncated,
    });

    const { playersUpdated, scoresUpdated } = await this.storeEntries(entries, statisticName, statDate);
    const runId = await this.recordRun(statisticName, statDate, entries.length);

    const rowFailures = entries.length * 2 - playersUpdated - scoresUpdated;
    return {
      success: pagination.failure === null && !pagination.truncated && rowFailures === 0,
      dryRun: false,
      totalEntries: entries.length,
      playersUpdated,
      scoresUpdated,
      pagesFetched: pagination.pagesFetched,
      failure: pagination.failure,
      truncated: pagination.truncated,
      runId,
    };
  }

  /** Fetches each date in order, deriving the statistic name from the weekday. */
  public async fetchRange(statDates: readonly IsoDate[]): Promise<DatedFetchSummary[]> {
    const summaries: DatedFetchSummary[] = [];
    for (const statDate of statDates) {
      const statisticName = statisticNameFor(statDate);
      const summary = await this.fetch(statisticName, statDate);
      summaries.push({ statDate, statisticName, ...summary });
    }
    return summaries;
  }

  private async paginate(statisticName: string): Promise<PaginationResult> {
    const entries: LeaderboardEntry[] = [];
    let startPosition = 0;
    let pagesFetched = 0;

    while (pagesFetched < this.maxPages) {
      this.logger.debug('Fetching page', { statisticName, startPosition, maxResults: this.pageSize });
      const result = await this.source.fetchPage(statisticName, startPosition, this.pageSize);

      if (!result.ok) {
        this.logger.error('Failed to fetch leaderboard page', {
          statisticName,
          startPosition,
          kind: result.error.kind,
          message: result.error.message,
        });
        return { entries, pagesFetched, dryRun: false, failure: result.error.kind, truncated: false };
      }

      if (result.value.dryRun) {
        return { entries: [], pagesFetched, dryRun: true, failure: null, truncated: false };
      }

      pagesFetched += 1;
      const page = result.value.entries;
      this.logger.debug('Page fetched', { statisticName, startPosition, entries: page.length });

      if (page.length === 0) {
        break;
      }

      entries.push(...page);
      startPosition += page.length;

      if (page.length !== this.pageSize) {
        break;
      }

      if (pagesFetched >= this.maxPages) {
        this.logger.warn('Page limit reached before the leaderboard was exhausted', {
          statisticName,
          maxPages: this.maxPages,
          entries: entries.length,
        });
        return { entries, pagesFetched, dryRun: false, failure: null, truncated: true };
      }

      if (this.requestDelayMs > 0) {
        await this.sleep(this.requestDelayMs);
      }
    }

    return { entries, pagesFetched, dryRun: false, failure: null, truncated: false };
  }

  private async storeEntries(
    entries: readonly LeaderboardEntry[],
    statisticName: string,
    statDate: IsoDate,
  ): Promise<{ playersUpdated: number; scoresUpdated: number }> {
    const seenOn = todayUtc(this.now());
    let playersUpdated = 0;
    let scoresUpdated = 0;

    for (const entry of entries) {
      try {
        await this.store.upsertPlayer({ ...normalizeIdentity(entry), seenOn });
        playersUpdated += 1;
      } catch (error) {
        this.logger.error('Failed to upsert player', { playfabId: entry.playfabId, error: describeError(error) });
      }

      try {
        await this.store.upsertDailyScore(normalizeScore(entry, statisticName, statDate));
        scoresUpdated += 1;
      } catch (error) {
        this.logger.error('Failed to upsert daily score', {
          statDate,
          playfabId: entry.playfabId,
          error: describeError(error),
        });
      }
    }

    this.logger.info('Data stored', { statisticName, statDate, playersUpdated, scoresUpdated });
    return { playersUpdated, scoresUpdated };
  }

  private async recordRun(statisticName: string, statDate: IsoDate, entryCount: number): Promise<number | null> {
    try {
      return await this.store.recordRun({ statDate, statisticName, entryCount, apiVersion: this.apiVersion });
    } catch (error) {
      this.logger.error('Failed to record run', { statisticName, statDate, error: describeError(error) });
      return null;
    }
  }
}
