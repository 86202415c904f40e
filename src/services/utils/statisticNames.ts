import { dayOfWeek, type IsoDate } from '../../lib/dates';

// Upstream day tokens, indexed from Sunday; Tuesday and Thursday are not three letters.
const DAY_TOKENS = ['Sun', 'Mon', 'Tues', 'Wed', 'Thurs', 'Fri', 'Sat'] as const;

export const STATISTIC_PREFIX = 'DailyPlay_';

/** `DailyPlay_Mon` … `DailyPlay_Sun` for the weekday of the given date. */
export function statisticNameFor(date: IsoDate): string {
  return `${STATISTIC_PREFIX}${DAY_TOKENS[dayOfWeek(date)]}`;
}
