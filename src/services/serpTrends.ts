import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { ProviderError } from '../errors.js';
import { logger } from '../logger.js';
import type { TrendSample, TrendSeries, TrendWindow } from '../types.js';
import { addDays, type ISODate } from '../utils/date.js';
import { acquireSlot, type RequestBudget } from './requestBudget.js';

/**
 * Raw types matching the SerpApi Google Trends TIMESERIES response.
 * Points are validated one at a time so a single malformed point is skipped, not fatal.
 */
const RawPoint = z.object({
  timestamp: z.coerce.number().int(),
  values: z
    .array(
      z.object({
        extracted_value: z.number().nonnegative().optional(),
      }),
    )
    .min(1),
});

const RawResponse = z.object({
  error: z.string().optional(),
  interest_over_time: z
    .object({
      timeline_data: z.array(z.unknown()),
    })
    .optional(),
});

export interface TrendProvider {
  fetchSeries(keyword: string, targetDate: ISODate): Promise<TrendSeries | undefined>;
}

export function tickerKeyword(ticker: string): string {
  return `${ticker.trim().toUpperCase()} Stock`;
}

/**
 * Hourly query window ending at 23:00 on the target date and starting at 00:00
 * `windowDays - 1` days earlier, in the provider's timezone.
 */
export function trendWindow(targetDate: ISODate, windowDays: number, tzOffsetMinutes: number): TrendWindow {
  return {
    start: `${addDays(targetDate, -(windowDays - 1))}T00`,
    end: `${targetDate}T23`,
    tzOffsetMinutes,
  };
}

export function parseTimeline(points: readonly unknown[]): TrendSample[] {
  const samples: TrendSample[] = [];
  for (const point of points) {
    const parsed = RawPoint.safeParse(point);
    const value = parsed.success ? parsed.data.values[0].extracted_value : undefined;
    if (!parsed.success || value === undefined) {
      logger.debug({ point }, 'Skipping malformed trends point');
      continue;
    }
    samples.push({ timestamp: parsed.data.timestamp * 1000, value });
  }
  return samples.sort((a, b) => a.timestamp - b.timestamp);
}

export interface SerpTrendsClientOptions {
  apiKey?: string;
  baseUrl?: string;
  http?: AxiosInstance;
  budget?: RequestBudget;
  windowDays?: number;
  tzOffsetMinutes?: number;
}

export class SerpTrendsClient implements TrendProvider {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly budget?: RequestBudget;
  readonly windowDays: number;
  readonly tzOffsetMinutes: number;

  constructor(opts: SerpTrendsClientOptions = {}) {
    const cfg = getConfig();
    this.apiKey = opts.apiKey ?? cfg.serpApi.apiKey;
    if (!this.apiKey) {
      throw new Error('SERPAPI_KEY is required to initialize SerpTrendsClient');
    }
    this.http =
      opts.http ??
      axios.create({
        baseURL: opts.baseUrl ?? cfg.serpApi.baseUrl,
        timeout: 30000,
      });
    this.budget = opts.budget;
    this.windowDays = opts.windowDays ?? cfg.trends.windowDays;
    this.tzOffsetMinutes = opts.tzOffsetMinutes ?? cfg.trends.tzOffsetMinutes;
  }

  window(targetDate: ISODate): TrendWindow {
    return trendWindow(targetDate, this.windowDays, this.tzOffsetMinutes);
  }

  /**
   * Fetch the hourly interest series for a keyword over the window ending on `targetDate`.
   * Returns undefined when the provider has no series for the keyword.
   */
  async fetchSeries(keyword: string, targetDate: ISODate): Promise<TrendSeries | undefined> {
    const window = this.window(targetDate);
    const params = {
      engine: 'google_trends',
      q: keyword,
      data_type: 'TIMESERIES',
      date: `${window.start} ${window.end}`,
      tz: String(window.tzOffsetMinutes),
      granular: 'hourly',
    };

    await acquireSlot(this.budget, 'serpapi');
    let data: unknown;
    try {
      logger.debug({ params }, 'SerpApi trends request');
      ({ data } = await this.http.get<unknown>('/search', { params: { ...params, api_key: this.apiKey } }));
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        logger.error({ keyword, status, message: error.message }, 'SerpApi request failed');
        throw new ProviderError(`SerpApi request failed for "${keyword}": ${status ?? error.message}`, 'serpapi', status);
      }
      throw error;
    }

    const parsed = RawResponse.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected SerpApi payload for "${keyword}"`, 'serpapi');
    }
    if (parsed.data.error) {
      logger.warn({ keyword, error: parsed.data.error }, 'SerpApi returned an error');
      return undefined;
    }
    if (!parsed.data.interest_over_time) {
      logger.warn({ keyword }, 'No time series data found');
      return undefined;
    }

    return {
      keyword,
      window,
      samples: parseTimeline(parsed.data.interest_over_time.timeline_data),
    };
  }
}

export default SerpTrendsClient;
