import { InsufficientDataError, err, ok, type Outcome } from '../errors.js';
import type { HourDelta, TrendChange, TrendMetrics, TrendSeries } from '../types.js';
import { offsetClock, type ISODate } from '../utils/date.js';
import { percentChange } from '../utils/normalize.js';
import type { TradingCalendar } from './tradingCalendar.js';

export interface TrendCorrelatorOptions {
  calendar: TradingCalendar;
  /** Minutes behind UTC of the provider's analysis timezone (480 = UTC-8). */
  tzOffsetMinutes: number;
}

type HourValues = Map<number, number>;

function sum(values: HourValues, hours: number[]): number {
  return hours.reduce((acc, h) => acc + (values.get(h) ?? 0), 0);
}

/**
 * Cumulative change between the matching hours of two days.
 * previous 0 -> unbounded when current grew, nothing when both are flat.
 */
export function cumulativeChange(previousTotal: number, currentTotal: number): TrendChange | undefined {
  if (previousTotal === 0) {
    return currentTotal > 0 ? { kind: 'unbounded' } : undefined;
  }
  return { kind: 'numeric', pct: ((currentTotal - previousTotal) / previousTotal) * 100 };
}

/**
 * Hour-over-hour deltas for consecutive buckets of one day.
 */
export function hourDeltas(values: HourValues, hourBuckets: readonly number[]): HourDelta[] {
  const hours = [...new Set(hourBuckets)].sort((a, b) => a - b);
  const deltas: HourDelta[] = [];
  for (let i = 0; i + 1 < hours.length; i++) {
    const fromHour = hours[i];
    const toHour = hours[i + 1];
    if (toHour !== fromHour + 1) continue;
    const from = values.get(fromHour);
    const to = values.get(toHour);
    const pct = from !== undefined && to !== undefined ? percentChange(from, to) : undefined;
    deltas.push({ fromHour, toHour, pct: pct ?? null });
  }
  return deltas;
}

/**
 * Aligns an hourly search-interest series with the trading calendar and
 * compares a trading day's early hours with the previous trading day's.
 */
export class TrendCorrelator {
  private readonly calendar: TradingCalendar;
  private readonly tzOffsetMinutes: number;

  constructor(opts: TrendCorrelatorOptions) {
    this.calendar = opts.calendar;
    this.tzOffsetMinutes = opts.tzOffsetMinutes;
  }

  /**
   * hour -> value for samples on `date` whose hour is one of `hourBuckets`.
   * Later samples for the same hour replace earlier ones.
   */
  extractDay(series: TrendSeries, date: ISODate, hourBuckets: readonly number[]): HourValues {
    const wanted = new Set(hourBuckets);
    const values: HourValues = new Map();
    for (const sample of series.samples) {
      const clock = offsetClock(sample.timestamp, this.tzOffsetMinutes);
      if (clock.date === date && wanted.has(clock.hour)) {
        values.set(clock.hour, sample.value);
      }
    }
    return values;
  }

  correlate(
    series: TrendSeries,
    targetDate: ISODate,
    hourBuckets: readonly number[],
  ): Outcome<TrendMetrics, InsufficientDataError> {
    const previousDay = this.calendar.previousTradingDay(targetDate);
    const current = this.extractDay(series, targetDate, hourBuckets);
    const previous = this.extractDay(series, previousDay, hourBuckets);

    const matchingHours = [...current.keys()].filter((h) => previous.has(h)).sort((a, b) => a - b);
    if (!matchingHours.length) {
      return err(
        new InsufficientDataError(
          `No matching hours between ${targetDate} and ${previousDay} for "${series.keyword}"`,
          series.keyword,
          targetDate,
          'no-matching-hours',
        ),
      );
    }

    const previousTotal = sum(previous, matchingHours);
    const currentTotal = sum(current, matchingHours);
    const change = cumulativeChange(previousTotal, currentTotal);
    if (!change) {
      return err(
        new InsufficientDataError(
          `No search interest on ${targetDate} or ${previousDay} for "${series.keyword}"`,
          series.keyword,
          targetDate,
          'no-interest',
        ),
      );
    }

    return ok({
      keyword: series.keyword,
      date: targetDate,
      previousTradingDay: previousDay,
      matchingHours,
      previousTotal,
      currentTotal,
      change,
      hourDeltas: hourDeltas(current, hourBuckets),
      currentValues: Object.fromEntries(current),
      previousValues: Object.fromEntries(previous),
    });
  }
}
