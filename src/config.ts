/**
 * Centralized configuration loader for Premarket Pulse.
 * Reads environment variables, parses types, and exposes a typed, frozen config object.
 *
 * Environment variables:
 * - POLYGON_API_KEY (required unless running trends-only)
 * - SERPAPI_KEY (required unless running market-only)
 * - TRANSPORT=stdio|http (default: stdio)
 * - PORT (default: 3000 for http transport)
 * - LOG_LEVEL (default: info)
 * - HOLIDAYS_PATH (default: data/holidays.csv, relative to the working directory)
 * - EXCHANGE_TIMEZONE (default: America/New_York)
 * - TRENDS_TZ_OFFSET_MINUTES (default: 480, i.e. UTC-8)
 * - TRENDS_HOUR_BUCKETS (default: 4,5,6)
 * - TRENDS_WINDOW_DAYS (default: 7)
 * - TRENDS_CACHE_ENTRIES (default: 1000)
 * - MIN_PREMARKET_VOLUME / MIN_PRICE / MIN_GAP_UP_PCT / MIN_MARKET_CAP / MIN_TRENDS_CHANGE_PCT
 * - BATCH_SIZE (default: 5), MAX_PARALLEL_DATES (default: 5)
 * - RATE_LIMIT_DAILY_REQUESTS, RATE_LIMIT_PER_SECOND (optional)
 */

import { config } from 'dotenv';
import path from 'node:path';
import { parseMarketCap } from './utils/normalize.js';

// Load environment variables from .env file
config();

export type Transport = 'stdio' | 'http';

export interface FilterDefaults {
  minPremarketVolume: number;
  minPrice: number;
  minGapUpPct: number;
  minMarketCap: number;
  minTrendChangePct: number;
}

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  polygon: {
    apiKey: string;
    baseUrl: string;
  };
  serpApi: {
    apiKey: string;
    baseUrl: string;
  };
  holidaysPath: string;
  exchangeTimeZone: string;
  trends: {
    tzOffsetMinutes: number;
    hourBuckets: number[];
    windowDays: number;
    cacheEntries: number;
  };
  filters: FilterDefaults;
  concurrency: {
    batchSize: number;
    maxParallelDates: number;
  };
  rateLimits: {
    dailyRequestsCap?: number;
    perSecondCap?: number;
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function parseHourBuckets(value: string | undefined): number[] {
  const hours = parseList(value)
    .map(Number)
    .filter((h) => Number.isInteger(h) && h >= 0 && h <= 23);
  return hours.length ? hours : [4, 5, 6];
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const transport: Transport = env.TRANSPORT === 'http' ? 'http' : 'stdio';

  const filters: FilterDefaults = {
    minPremarketVolume: parseNumber(env.MIN_PREMARKET_VOLUME) ?? 50_000,
    minPrice: parseNumber(env.MIN_PRICE) ?? 3,
    minGapUpPct: parseNumber(env.MIN_GAP_UP_PCT) ?? 2,
    minMarketCap: (env.MIN_MARKET_CAP ? parseMarketCap(env.MIN_MARKET_CAP) : undefined) ?? 100_000_000,
    minTrendChangePct: parseNumber(env.MIN_TRENDS_CHANGE_PCT) ?? 50,
  };

  return Object.freeze({
    transport,
    port: Number(env.PORT || 3000),
    httpHost: env.HOST?.trim() || '0.0.0.0',
    allowedHosts: parseList(env.ALLOWED_HOSTS),
    allowedOrigins: parseList(env.ALLOWED_ORIGINS),
    logLevel: env.LOG_LEVEL?.trim() || 'info',
    polygon: {
      apiKey: env.POLYGON_API_KEY || '',
      baseUrl: env.POLYGON_BASE_URL?.trim() || 'https://api.polygon.io',
    },
    serpApi: {
      apiKey: env.SERPAPI_KEY || '',
      baseUrl: env.SERPAPI_BASE_URL?.trim() || 'https://serpapi.com',
    },
    holidaysPath: path.resolve(env.HOLIDAYS_PATH?.trim() || path.join('data', 'holidays.csv')),
    exchangeTimeZone: env.EXCHANGE_TIMEZONE?.trim() || 'America/New_York',
    trends: {
      tzOffsetMinutes: parseNumber(env.TRENDS_TZ_OFFSET_MINUTES) ?? 480,
      hourBuckets: parseHourBuckets(env.TRENDS_HOUR_BUCKETS),
      windowDays: Math.max(2, parseNumber(env.TRENDS_WINDOW_DAYS) ?? 7),
      cacheEntries: Math.max(1, parseNumber(env.TRENDS_CACHE_ENTRIES) ?? 1000),
    },
    filters,
    concurrency: {
      batchSize: Math.max(1, parseNumber(env.BATCH_SIZE) ?? 5),
      maxParallelDates: Math.max(1, parseNumber(env.MAX_PARALLEL_DATES) ?? 5),
    },
    rateLimits: {
      dailyRequestsCap: parseNumber(env.RATE_LIMIT_DAILY_REQUESTS),
      perSecondCap: parseNumber(env.RATE_LIMIT_PER_SECOND),
    },
  });
}

/**
 * Assert the API keys needed for the requested analysis mode.
 * Market-only runs never touch SerpApi and trends-only runs never touch Polygon.
 */
export function assertRequiredConfig(cfg: AppConfig, mode: 'market' | 'trends' | 'combined' = 'combined') {
  if (mode !== 'trends' && !cfg.polygon.apiKey) {
    throw new Error('POLYGON_API_KEY environment variable is required');
  }
  if (mode !== 'market' && !cfg.serpApi.apiKey) {
    throw new Error('SERPAPI_KEY environment variable is required');
  }
}
