import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { ProviderError } from '../errors.js';
import { logger } from '../logger.js';
import type { DailySession, MinuteBar, TickerSnapshot } from '../types.js';
import type { ISODate } from '../utils/date.js';
import { normalizeTicker } from '../utils/normalize.js';
import { acquireSlot, type RequestBudget } from './requestBudget.js';

/**
 * Raw shapes of the Polygon.io REST responses we consume.
 */
const RawTickerDetails = z.object({
  status: z.string(),
  results: z
    .object({
      ticker: z.string(),
      name: z.string().default(''),
      market: z.string().default('stocks'),
      active: z.boolean().default(true),
      primary_exchange: z.string().optional(),
      weighted_shares_outstanding: z.number().optional(),
      share_class_shares_outstanding: z.number().optional(),
    })
    .optional(),
});

const RawOpenClose = z.object({
  status: z.string(),
  from: z.string(),
  symbol: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().optional(),
});

const RawAggregate = z.object({
  t: z.number(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number(),
  n: z.number().optional(),
});

const RawAggregates = z.object({
  status: z.string(),
  results: z.array(RawAggregate).optional(),
});

const OK_STATUSES = new Set(['OK', 'DELAYED']);

/**
 * What the analysis needs from a market-data source.
 */
export interface MarketDataProvider {
  getTickerSnapshot(ticker: string, date: ISODate): Promise<TickerSnapshot | undefined>;
  getDailySession(ticker: string, date: ISODate): Promise<DailySession | undefined>;
  getMinuteBars(ticker: string, from: ISODate, to: ISODate): Promise<MinuteBar[]>;
}

export interface PolygonClientOptions {
  apiKey?: string;
  baseUrl?: string;
  http?: AxiosInstance;
  budget?: RequestBudget;
}

export class PolygonClient implements MarketDataProvider {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly budget?: RequestBudget;

  constructor(opts: PolygonClientOptions = {}) {
    const cfg = getConfig();
    this.apiKey = opts.apiKey ?? cfg.polygon.apiKey;
    if (!this.apiKey) {
      throw new Error('POLYGON_API_KEY is required to initialize PolygonClient');
    }
    this.http =
      opts.http ??
      axios.create({
        baseURL: opts.baseUrl ?? cfg.polygon.baseUrl,
        timeout: 30000,
      });
    this.budget = opts.budget;
  }

  /**
   * Reference data for a ticker as of `date`.
   */
  async getTickerSnapshot(ticker: string, date: ISODate): Promise<TickerSnapshot | undefined> {
    const symbol = normalizeTicker(ticker);
    const raw = await this.get(`/v3/reference/tickers/${encodeURIComponent(symbol)}`, { date });
    const parsed = RawTickerDetails.safeParse(raw);
    if (!parsed.success || !OK_STATUSES.has(parsed.data.status) || !parsed.data.results) {
      if (raw !== undefined) logger.warn({ ticker: symbol, date }, 'Unexpected ticker details payload');
      return undefined;
    }
    const r = parsed.data.results;
    return {
      ticker: r.ticker,
      name: r.name,
      market: r.market,
      active: r.active,
      primaryExchange: r.primary_exchange,
      sharesOutstanding: r.weighted_shares_outstanding ?? r.share_class_shares_outstanding,
    };
  }

  /**
   * Daily open/high/low/close for one session.
   */
  async getDailySession(ticker: string, date: ISODate): Promise<DailySession | undefined> {
    const symbol = normalizeTicker(ticker);
    const raw = await this.get(`/v1/open-close/${encodeURIComponent(symbol)}/${date}`, { adjusted: true });
    const parsed = RawOpenClose.safeParse(raw);
    if (!parsed.success || !OK_STATUSES.has(parsed.data.status)) {
      if (raw !== undefined) logger.warn({ ticker: symbol, date }, 'Unexpected open/close payload');
      return undefined;
    }
    const { open, high, low, close, volume } = parsed.data;
    return { date, open, high, low, close, volume };
  }

  /**
   * One-minute bars between two dates (inclusive), ascending with duplicate timestamps dropped.
   */
  async getMinuteBars(ticker: string, from: ISODate, to: ISODate): Promise<MinuteBar[]> {
    const symbol = normalizeTicker(ticker);
    const raw = await this.get(`/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/minute/${from}/${to}`, {
      adjusted: true,
      sort: 'asc',
      limit: 50000,
    });
    const parsed = RawAggregates.safeParse(raw);
    if (!parsed.success || !OK_STATUSES.has(parsed.data.status)) {
      if (raw !== undefined) logger.warn({ ticker: symbol, from, to }, 'Unexpected aggregates payload');
      return [];
    }
    const bars = (parsed.data.results ?? [])
      .map(
        (a): MinuteBar => ({
          timestamp: a.t,
          open: a.o,
          high: a.h,
          low: a.l,
          close: a.c,
          volume: a.v,
          transactions: a.n,
        }),
      )
      .sort((a, b) => a.timestamp - b.timestamp);
    return bars.filter((bar, i) => i === 0 || bar.timestamp !== bars[i - 1].timestamp);
  }

  /**
   * GET with the API key attached. 404 is "no data"; other failures raise ProviderError.
   */
  private async get(path: string, params: Record<string, string | number | boolean>): Promise<unknown> {
    await acquireSlot(this.budget, 'polygon');
    try {
      logger.debug({ path, params }, 'Polygon request');
      const { data } = await this.http.get<unknown>(path, { params: { ...params, apiKey: this.apiKey } });
      return data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 404) return undefined;
        logger.error({ path, status, message: error.message }, 'Polygon request failed');
        throw new ProviderError(`Polygon request failed for ${path}: ${status ?? error.message}`, 'polygon', status);
      }
      throw error;
    }
  }
}

export default PolygonClient;
