import { eachDayOfInterval, format, parseISO, startOfDay } from 'date-fns';

/** Calendar day key, `yyyy-MM-dd` in server local time. */
export type DayKey = string;

const DAY_KEY_FORMAT = 'yyyy-MM-dd';

export function toDayKey(date: Date): DayKey {
  return format(date, DAY_KEY_FORMAT);
}

/** Calendar day of a UTC-stamped instant, ignoring the server's zone. */
export function toUtcDayKey(date: Date): DayKey {
  return date.toISOString().slice(0, 10);
}

/** Local midnight of the given day key. */
export function dayKeyToDate(day: DayKey): Date {
  return startOfDay(parseISO(day));
}

/**
 * Every calendar day from `from` to `to`, both inclusive.
 * Returns an empty list when `to` precedes `from`.
 */
export function eachDayKey(from: Date, to: Date): DayKey[] {
  const start = startOfDay(from);
  const end = startOfDay(to);
  if (end.getTime() < start.getTime()) {
    return [];
  }
  return eachDayOfInterval({ start, end }).map(toDayKey);
}

export function earliest(dates: Date[]): Date | undefined {
  return dates.reduce<Date | undefined>(
    (min, d) => (min === undefined || d.getTime() < min.getTime() ? d : min),
    undefined,
  );
}
