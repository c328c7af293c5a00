import type { TrendSeries, TrendWindow } from '../types.js';
import type { ISODate } from '../utils/date.js';
import type { TrendProvider } from './serpTrends.js';

export const DEFAULT_CACHE_ENTRIES = 1000;

/**
 * Memoizes trend series per fetch window. Interest values are relative to the
 * window they were fetched in, so each entry is the whole series of exactly one
 * query and entries are never merged. Holds at most `maxEntries`; the oldest goes first.
 */
export class TrendSeriesCache implements TrendProvider {
  private readonly entries = new Map<string, Promise<TrendSeries | undefined>>();

  constructor(
    private readonly inner: TrendProvider,
    private readonly windowFor: (targetDate: ISODate) => TrendWindow,
    private readonly maxEntries = DEFAULT_CACHE_ENTRIES,
  ) {}

  static key(keyword: string, window: TrendWindow): string {
    return [keyword.toLowerCase(), window.start, window.end, window.tzOffsetMinutes].join('|');
  }

  fetchSeries(keyword: string, targetDate: ISODate): Promise<TrendSeries | undefined> {
    const key = TrendSeriesCache.key(keyword, this.windowFor(targetDate));
    const hit = this.entries.get(key);
    if (hit) return hit;

    const forget = () => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    };
    const pending: Promise<TrendSeries | undefined> = this.inner.fetchSeries(keyword, targetDate).then(
      (series) => {
        if (!series) forget();
        return series;
      },
      (error: unknown) => {
        forget();
        throw error;
      },
    );
    this.entries.set(key, pending);
    while (this.entries.size > Math.max(1, this.maxEntries)) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
