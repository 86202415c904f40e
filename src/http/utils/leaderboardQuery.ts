import type { Request } from 'express';
import { parseIsoDate, parseMonth, todayUtc, type IsoDate } from '../../lib/dates';
import { err, ok, type Result } from '../../lib/result';
import { MAX_ALL_TIME_LIMIT } from '../../services/LeaderboardQueryService';

export const DEFAULT_ALL_TIME_LIMIT = 100;

type QuerySource = Record<string, unknown>;

function toSource(query: Request['query']): QuerySource {
  return query && typeof query === 'object' ? query : {};
}

export function extractString(value: unknown): string | null {
  if (Array.isArray(value)) {
    for (const entry of value) {
      const candidate = extractString(entry);
      if (candidate) {
        return candidate;
      }
    }
    return null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/** `?date=YYYY-MM-DD` (also used for `?week=`); today's UTC date when absent. */
export function parseDateParam(query: Request['query'], key: string, now: Date): Result<IsoDate, string> {
  const raw = extractString(toSource(query)[key]);
  return raw === null ? ok(todayUtc(now)) : parseIsoDate(raw);
}

/** `?month=YYYY-MM`, resolved to the month's first day; the current UTC month when absent. */
export function parseMonthParam(query: Request['query'], now: Date): Result<IsoDate, string> {
  const raw = extractString(toSource(query).month);
  return raw === null ? ok(`${todayUtc(now).slice(0, 7)}-01`) : parseMonth(raw);
}

export function parseLimitParam(query: Request['query']): Result<number, string> {
  const raw = extractString(toSource(query).limit);
  if (raw === null) {
    return ok(DEFAULT_ALL_TIME_LIMIT);
  }
  if (!/^\d+$/.test(raw)) {
    return err(`Invalid limit "${raw}". Use a whole number between 1 and ${MAX_ALL_TIME_LIMIT}.`);
  }
  const limit = Number(raw);
  if (limit < 1 || limit > MAX_ALL_TIME_LIMIT) {
    return err(`Invalid limit "${raw}". Use a whole number between 1 and ${MAX_ALL_TIME_LIMIT}.`);
  }
  return ok(limit);
}

/** `?list`, `?list=1` and `?list=true` all ask for the period index. */
export function wantsList(query: Request['query']): boolean {
  const source = toSource(query);
  if (!('list' in source)) {
    return false;
  }
  const raw = extractString(source.list);
  if (raw === null) {
    return true;
  }
  return !['0', 'false', 'no', 'off'].includes(raw.toLowerCase());
}
