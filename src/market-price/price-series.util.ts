import Decimal from 'decimal.js';
import { DayKey } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { DailyClose } from './providers/market-data.provider';

/** Close price for every calendar day of a range. */
export type DailySeries = Map<DayKey, Decimal>;

/**
 * Aligns trading-day closes to the full calendar range.
 *
 * Days without a print take the previous close (forward fill); days before
 * the first print in range take the first close (backward fill). An empty
 * input yields an empty series.
 */
export function fillDailySeries(days: DayKey[], closes: DailyClose[]): DailySeries {
  if (days.length === 0) {
    return new Map();
  }
  const rangeStart = days[0];

  const byDay = new Map<DayKey, Decimal>();
  // a print before the range seeds the forward fill
  let last: Decimal | undefined;
  let lastBeforeRange: DayKey | undefined;
  for (const { day, close } of closes) {
    if (day < rangeStart) {
      if (lastBeforeRange === undefined || day > lastBeforeRange) {
        lastBeforeRange = day;
        last = toDecimal(close);
      }
      continue;
    }
    byDay.set(day, toDecimal(close));
  }

  const filled: Array<Decimal | undefined> = [];
  let firstClose: Decimal | undefined = last;
  for (const day of days) {
    const close = byDay.get(day);
    if (close !== undefined) {
      last = close;
      firstClose = firstClose ?? close;
    }
    filled.push(last);
  }

  if (firstClose === undefined) {
    return new Map();
  }

  const backfill = firstClose;
  const series: DailySeries = new Map();
  days.forEach((day, i) => {
    series.set(day, filled[i] ?? backfill);
  });
  return series;
}
