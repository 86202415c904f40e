import { parseIsoDate, todayUtc } from '../lib/dates';
import { err, ok, type Result } from '../lib/result';
import { normalizeIdentity } from '../services/IdentityNormalizer';
import type { LeaderboardEntry, LeaderboardSource, PageResult } from '../services/LeaderboardSource';
import { statisticNameFor } from '../services/utils/statisticNames';

export interface InspectOptions {
  date?: string;
  statistic?: string;
  player?: string;
  start: number;
  count: number;
}

export interface InspectRequest {
  statisticName: string;
  playfabId: string | null;
  start: number;
  count: number;
}

export const MAX_INSPECT_COUNT = 100;

export function resolveInspectRequest(options: InspectOptions, now: Date): Result<InspectRequest, string> {
  if (!Number.isInteger(options.count) || options.count < 1 || options.count > MAX_INSPECT_COUNT) {
    return err(`--count must be a whole number between 1 and ${MAX_INSPECT_COUNT}.`);
  }
  if (!Number.isInteger(options.start) || options.start < 0) {
    return err('--start must be a whole number of at least 0.');
  }

  let statisticName: string;
  if (options.statistic !== undefined) {
    if (options.date !== undefined) {
      return err('Use either --date or --statistic, not both.');
    }
    statisticName = options.statistic.trim();
    if (!statisticName) {
      return err('--statistic must not be empty.');
    }
  } else {
    const date = options.date === undefined ? ok(todayUtc(now)) : parseIsoDate(options.date);
    if (!date.ok) {
      return date;
    }
    statisticName = statisticNameFor(date.value);
  }

  const playfabId = options.player?.trim() || null;
  return ok({ statisticName, playfabId, start: options.start, count: options.count });
}

export function formatEntry(entry: LeaderboardEntry): string {
  const identity = normalizeIdentity(entry);
  const platform = identity.platform ? ` [${identity.platform}${identity.platformUserId ? ` ${identity.platformUserId}` : ''}]` : '';
  return `#${entry.position} ${entry.playfabId} ${identity.displayName ?? '<no name>'}${platform}: ${entry.statValue}`;
}

/** Fetches one page (or the page around a player) and prints it without storing anything. */
export async function runInspect(
  request: InspectRequest,
  source: LeaderboardSource,
  write: (line: string) => void,
): Promise<number> {
  const result: PageResult = request.playfabId
    ? await source.fetchAroundPlayer(request.statisticName, request.playfabId, request.count)
    : await source.fetchPage(request.statisticName, request.start, request.count);

  if (!result.ok) {
    write(`${request.statisticName}: FAILED ${result.error.kind}: ${result.error.message}`);
    return 1;
  }

  const page = result.value;
  if (page.dryRun) {
    write(`${request.statisticName}: dry-run, no request sent. Use --execute to run.`);
    return 0;
  }

  write(`${request.statisticName}: ${page.entries.length} entries (version ${page.version ?? 'unknown'})`);
  for (const entry of page.entries) {
    write(`  ${formatEntry(entry)}`);
  }
  return 0;
}
