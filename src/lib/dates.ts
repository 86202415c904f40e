import { err, ok, type Result } from './result';

/** Calendar date written `YYYY-MM-DD`, always interpreted in UTC. */
export type IsoDate = string;

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatIsoDate(date: Date): IsoDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function todayUtc(now: Date = new Date()): IsoDate {
  return formatIsoDate(now);
}

function toUtcDate(value: IsoDate): Date {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    throw new RangeError(`Not an ISO date: ${value}`);
  }
  return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

/** Parses a strict `YYYY-MM-DD` string and rejects impossible dates such as 2026-02-30. */
export function parseIsoDate(raw: string): Result<IsoDate, string> {
  const trimmed = raw.trim();
  const match = ISO_DATE_PATTERN.exec(trimmed);
  if (!match) {
    return err(`Invalid date format "${raw}". Use YYYY-MM-DD.`);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (formatIsoDate(date) !== trimmed) {
    return err(`Invalid calendar date "${raw}".`);
  }

  return ok(trimmed);
}

/** Parses `YYYY-MM` into the first day of that month. */
export function parseMonth(raw: string): Result<IsoDate, string> {
  const trimmed = raw.trim();
  const match = MONTH_PATTERN.exec(trimmed);
  if (!match) {
    return err(`Invalid month format "${raw}". Use YYYY-MM.`);
  }

  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    return err(`Invalid month "${raw}".`);
  }

  return ok(`${match[1]}-${match[2]}-01`);
}

export function addDays(value: IsoDate, days: number): IsoDate {
  return formatIsoDate(new Date(toUtcDate(value).getTime() + days * DAY_MS));
}

export function addMonths(value: IsoDate, months: number): IsoDate {
  const date = toUtcDate(value);
  return formatIsoDate(new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1)));
}

/** 0 = Sunday … 6 = Saturday. */
export function dayOfWeek(value: IsoDate): number {
  return toUtcDate(value).getUTCDay();
}

/** Sunday on or before the date through the Saturday six days later. */
export function weekBounds(anchor: IsoDate): DateRange {
  const start = addDays(anchor, -dayOfWeek(anchor));
  return { start, end: addDays(start, 6) };
}

export function monthBounds(anchor: IsoDate): DateRange {
  const date = toUtcDate(anchor);
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  return {
    start: formatIsoDate(new Date(Date.UTC(year, month, 1))),
    end: formatIsoDate(new Date(Date.UTC(year, month + 1, 0))),
  };
}

export function daysInRange(range: DateRange): number {
  return Math.round((toUtcDate(range.end).getTime() - toUtcDate(range.start).getTime()) / DAY_MS) + 1;
}

/** Every date from start to end inclusive; empty when end precedes start. */
export function enumerateDates(start: IsoDate, end: IsoDate): IsoDate[] {
  const dates: IsoDate[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}
