#!/usr/bin/env node
import { getConfig } from '../config.js';
import { PolygonClient } from '../services/polygon.js';
import { SerpTrendsClient, tickerKeyword } from '../services/serpTrends.js';
import { TradingCalendar } from '../services/tradingCalendar.js';
import { isIsoDate, normalizeDate } from '../utils/date.js';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function main() {
  const ticker = (process.argv[2] ?? 'AAPL').toUpperCase();
  const arg = process.argv[3];
  const cfg = getConfig();
  const calendar = await TradingCalendar.fromFile(cfg.holidaysPath);

  let date: string;
  if (arg && isIsoDate(arg)) {
    date = arg;
  } else {
    // last completed trading day
    date = calendar.previousTradingDay(normalizeDate(new Date()));
  }
  const previous = calendar.previousTradingDay(date);
  console.log('[SMOKE] Ticker:', ticker, 'date:', date, 'previous trading day:', previous);

  if (cfg.polygon.apiKey) {
    const polygon = new PolygonClient();
    const [snapshot, session, bars] = await Promise.all([
      polygon.getTickerSnapshot(ticker, date),
      polygon.getDailySession(ticker, date),
      polygon.getMinuteBars(ticker, date, date),
    ]);
    console.log('[SMOKE] Snapshot:', snapshot);
    console.log('[SMOKE] Session:', session);
    console.log('[SMOKE] Minute bars:', bars.length);
  } else {
    console.log('[SMOKE] POLYGON_API_KEY not set, skipping market data');
  }

  if (cfg.serpApi.apiKey) {
    const trends = new SerpTrendsClient();
    const series = await trends.fetchSeries(tickerKeyword(ticker), date);
    console.log('[SMOKE] Trend window:', series?.window ?? 'none');
    console.log('[SMOKE] Trend samples:', series?.samples.length ?? 0);
    console.log('[SMOKE] Sample:', series?.samples.slice(-3) ?? []);
  } else {
    console.log('[SMOKE] SERPAPI_KEY not set, skipping search trends');
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error('[SMOKE] Error:', describeError(err));
    process.exit(1);
  },
);
