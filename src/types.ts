/**
 * Shared types for Premarket Pulse.
 */

import type { ISODate } from './utils/date.js';

export type { ISODate };

export type MarketStatus = 'Closed' | 'Early Close';

export interface HolidayRow {
  date: ISODate;
  status: MarketStatus;
  description?: string;
}

export type HolidayTable = ReadonlyMap<ISODate, HolidayRow>;

export interface TradingDay {
  date: ISODate;
  isOpen: boolean;
  isEarlyClose: boolean;
}

export interface MinuteBar {
  timestamp: number; // epoch ms, UTC, start of the minute
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  transactions?: number;
}

export interface TickerSnapshot {
  ticker: string;
  name: string;
  market: string; // stocks | otc | ...
  active: boolean;
  sharesOutstanding?: number;
  primaryExchange?: string;
}

export interface DailySession {
  date: ISODate;
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

export interface MarketMetrics {
  ticker: string;
  companyName: string;
  date: ISODate;
  previousTradingDay: ISODate;
  referenceOpenPrice: number;
  previousClose: number;
  premarketVolume: number;
  gapUpPct: number;
  marketCap?: number;
  dayHigh: number;
  dayClose: number;
  openToHighPct: number;
  openToClosePct: number;
  active: boolean;
}

export interface TrendWindow {
  start: string; // YYYY-MM-DDTHH in the provider's timezone
  end: string;
  tzOffsetMinutes: number;
}

/**
 * One hour-bucketed search-interest value. Values are on a provider-relative
 * scale that resets per query: only compare samples from the same TrendSeries.
 */
export interface TrendSample {
  timestamp: number; // epoch ms, start of the hour
  value: number;
}

export interface TrendSeries {
  keyword: string;
  window: TrendWindow;
  samples: readonly TrendSample[];
}

export type TrendChange = { kind: 'numeric'; pct: number } | { kind: 'unbounded' };

export interface HourDelta {
  fromHour: number;
  toHour: number;
  pct: number | null; // null = not applicable
}

export interface TrendMetrics {
  keyword: string;
  date: ISODate;
  previousTradingDay: ISODate;
  matchingHours: number[];
  previousTotal: number;
  currentTotal: number;
  change: TrendChange;
  hourDeltas: HourDelta[];
  currentValues: Record<number, number>;
  previousValues: Record<number, number>;
}

export type AnalysisMode = 'market' | 'trends' | 'combined';

export interface FilterCriteria {
  minPremarketVolume?: number;
  minPrice?: number;
  minGapUpPct?: number;
  minMarketCap?: number;
  minTrendChangePct?: number;
}

export interface MarketFields {
  companyName: string;
  price: number;
  previousClose: number;
  premarketVolume: number;
  gapUpPct: number;
  marketCap: number | null;
  dayHigh: number;
  dayClose: number;
  openToHighPct: number;
  openToClosePct: number;
}

export interface TrendFields {
  keyword: string;
  change: TrendChange;
  previousTotal: number;
  currentTotal: number;
  matchingHours: number[];
  hourDeltas: HourDelta[];
}

export type RankValue = { kind: 'numeric'; value: number } | { kind: 'unbounded' } | { kind: 'none' };

export interface AnalysisResult {
  ticker: string;
  date: ISODate;
  selected: boolean;
  rejections: string[];
  market: MarketFields | null;
  trend: TrendFields | null;
  rank: RankValue;
}
