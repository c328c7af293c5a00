import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { getConfig } from '../config.js';
import { AnalysisError, MissingDataError, ProviderError, err } from '../errors.js';
import type { CriteriaInput } from '../schemas/analysis.js';
import { logger } from '../logger.js';
import type { AnalysisMode, AnalysisResult, FilterCriteria, TradingDay } from '../types.js';
import type { ISODate } from '../utils/date.js';
import { normalizeTicker, parseMarketCap } from '../utils/normalize.js';
import { mapWithConcurrency } from './concurrency.js';
import { filterAndRank, type MarketOutcome, type TrendOutcome } from './filterRanker.js';
import { MarketAggregateProcessor } from './marketAggregates.js';
import type { MarketDataProvider } from './polygon.js';
import type { RequestBudget } from './requestBudget.js';
import { tickerKeyword, type TrendProvider } from './serpTrends.js';
import type { TradingCalendar } from './tradingCalendar.js';
import { TrendCorrelator } from './trendCorrelator.js';

// snapshot, two sessions, minute bars
const MARKET_REQUESTS_PER_TICKER = 4;
const TREND_REQUESTS_PER_TICKER = 1;

export interface ProviderBudgets {
  polygon?: RequestBudget;
  serpapi?: RequestBudget;
}

export interface AnalysisDeps {
  calendar: TradingCalendar;
  market?: MarketDataProvider;
  trends?: TrendProvider;
  budgets?: ProviderBudgets;
  exchangeTimeZone?: string;
  tzOffsetMinutes?: number;
}

export interface ScanOptions {
  tickers: string[];
  mode?: AnalysisMode;
  criteria?: FilterCriteria;
  hourBuckets?: number[];
  batchSize?: number;
  includeInactive?: boolean;
}

export interface ScanResult {
  date: ISODate;
  mode: AnalysisMode;
  trading_day: TradingDay;
  criteria: FilterCriteria;
  results: AnalysisResult[];
  diagnostics: {
    tickers_requested: number;
    selected: number;
    market_errors: Record<string, string>;
    trend_errors: Record<string, string>;
    inactive_excluded: string[];
  };
}

export interface RangeResult {
  start: ISODate;
  end: ISODate;
  mode: AnalysisMode;
  trading_days: number;
  days: Array<{ date: ISODate; selected: number; error?: string }>;
  results: AnalysisResult[];
}

export function defaultCriteria(): FilterCriteria {
  const { filters } = getConfig();
  return {
    minPremarketVolume: filters.minPremarketVolume,
    minPrice: filters.minPrice,
    minGapUpPct: filters.minGapUpPct,
    minMarketCap: filters.minMarketCap,
    minTrendChangePct: filters.minTrendChangePct,
  };
}

function orDefault<T>(value: T | null | undefined, fallback: T | undefined): T | undefined {
  if (value === null) return undefined;
  return value ?? fallback;
}

/**
 * Tool criteria over the configured defaults: an omitted field keeps its default,
 * `null` turns the criterion off.
 */
export function resolveCriteria(
  input: CriteriaInput | undefined,
  defaults: FilterCriteria = defaultCriteria(),
): FilterCriteria {
  if (!input) return { ...defaults };
  const { minMarketCap } = input;
  return {
    minPremarketVolume: orDefault(input.minPremarketVolume, defaults.minPremarketVolume),
    minPrice: orDefault(input.minPrice, defaults.minPrice),
    minGapUpPct: orDefault(input.minGapUpPct, defaults.minGapUpPct),
    minMarketCap:
      minMarketCap === null ? undefined : minMarketCap === undefined ? defaults.minMarketCap : parseMarketCap(minMarketCap),
    minTrendChangePct: orDefault(input.minTrendChangePct, defaults.minTrendChangePct),
  };
}

function uniqueTickers(tickers: readonly string[]): string[] {
  return [...new Set(tickers.map(normalizeTicker).filter(Boolean))];
}

/**
 * Refuse a scan whose request estimate exceeds the daily cap of any provider it uses.
 */
function assertWithinBudgets(budgets: ProviderBudgets | undefined, mode: AnalysisMode, tickers: number, days: number) {
  const planned: Array<[ProviderError['provider'], RequestBudget | undefined, number]> = [];
  if (mode !== 'trends') planned.push(['polygon', budgets?.polygon, MARKET_REQUESTS_PER_TICKER]);
  if (mode !== 'market') planned.push(['serpapi', budgets?.serpapi, TREND_REQUESTS_PER_TICKER]);
  for (const [provider, budget, perTicker] of planned) {
    if (!budget) continue;
    const estimate = budget.estimateScanCost(tickers, days, perTicker);
    if (!estimate.feasible) {
      throw new AnalysisError(`${provider}: ${estimate.reason ?? 'request budget exceeded'}`, ErrorCode.InvalidRequest, {
        provider,
        ...estimate,
      });
    }
  }
}

function requireProviders(mode: AnalysisMode, deps: AnalysisDeps) {
  if (mode !== 'trends' && !deps.market) {
    throw new AnalysisError(`Mode "${mode}" needs a market data provider.`, ErrorCode.InvalidRequest);
  }
  if (mode !== 'market' && !deps.trends) {
    throw new AnalysisError(`Mode "${mode}" needs a search trends provider.`, ErrorCode.InvalidRequest);
  }
}

function fetchFailure(error: unknown, ticker: string, date: ISODate): MissingDataError {
  if (error instanceof ProviderError) {
    return new MissingDataError(`Fetch failed: ${error.message}`, ticker, date);
  }
  throw error;
}

async function loadMarket(
  ticker: string,
  date: ISODate,
  deps: AnalysisDeps & { market: MarketDataProvider },
  processor: MarketAggregateProcessor,
  includeInactive: boolean,
): Promise<MarketOutcome | 'inactive'> {
  const previousDay = deps.calendar.previousTradingDay(date);
  try {
    const [snapshot, session, previousSession, minuteBars] = await Promise.all([
      deps.market.getTickerSnapshot(ticker, date),
      deps.market.getDailySession(ticker, date),
      deps.market.getDailySession(ticker, previousDay),
      deps.market.getMinuteBars(ticker, date, date),
    ]);
    if (!snapshot) {
      return err(new MissingDataError(`No ticker details for ${ticker}`, ticker, date));
    }
    if (!snapshot.active && !includeInactive) return 'inactive';

    const sessions = new Map([session, previousSession].flatMap((s) => (s ? [[s.date, s] as const] : [])));
    return processor.process({ ticker, date, minuteBars, snapshot, sessions });
  } catch (error) {
    return err(fetchFailure(error, ticker, date));
  }
}

async function loadTrend(
  ticker: string,
  date: ISODate,
  trends: TrendProvider,
  correlator: TrendCorrelator,
  hourBuckets: number[],
): Promise<TrendOutcome> {
  const keyword = tickerKeyword(ticker);
  try {
    const series = await trends.fetchSeries(keyword, date);
    if (!series) {
      return err(new MissingDataError(`No trend series for "${keyword}"`, ticker, date));
    }
    return correlator.correlate(series, date, hourBuckets);
  } catch (error) {
    return err(fetchFailure(error, ticker, date));
  }
}

/**
 * Scan one trading day: fetch both sources per ticker with bounded fan-out,
 * run the processors, then filter and rank.
 */
export async function analyzeTradingDay(date: ISODate, opts: ScanOptions, deps: AnalysisDeps): Promise<ScanResult> {
  const cfg = getConfig();
  const mode = opts.mode ?? 'combined';
  requireProviders(mode, deps);

  const tradingDay = deps.calendar.tradingDay(date);
  if (!tradingDay.isOpen) {
    throw new AnalysisError(`${date} is not a trading day.`, ErrorCode.InvalidParams, tradingDay);
  }

  const tickers = uniqueTickers(opts.tickers);
  const criteria = opts.criteria ?? defaultCriteria();
  const hourBuckets = opts.hourBuckets ?? cfg.trends.hourBuckets;
  const batchSize = opts.batchSize ?? cfg.concurrency.batchSize;

  const processor = new MarketAggregateProcessor({
    calendar: deps.calendar,
    exchangeTimeZone: deps.exchangeTimeZone ?? cfg.exchangeTimeZone,
  });
  const correlator = new TrendCorrelator({
    calendar: deps.calendar,
    tzOffsetMinutes: deps.tzOffsetMinutes ?? cfg.trends.tzOffsetMinutes,
  });

  logger.info({ date, mode, tickers: tickers.length, earlyClose: tradingDay.isEarlyClose }, 'Starting scan');

  const marketByTicker = new Map<string, MarketOutcome>();
  const trendByTicker = new Map<string, TrendOutcome>();
  const inactive: string[] = [];

  await mapWithConcurrency(tickers, batchSize, async (ticker) => {
    const { market, trends } = deps;
    const [marketOutcome, trendOutcome] = await Promise.all([
      mode !== 'trends' && market
        ? loadMarket(ticker, date, { ...deps, market }, processor, opts.includeInactive ?? false)
        : undefined,
      mode !== 'market' && trends ? loadTrend(ticker, date, trends, correlator, hourBuckets) : undefined,
    ]);
    if (marketOutcome === 'inactive') {
      inactive.push(ticker);
      return;
    }
    if (marketOutcome) marketByTicker.set(ticker, marketOutcome);
    if (trendOutcome) trendByTicker.set(ticker, trendOutcome);
  });

  const results = filterAndRank(marketByTicker, trendByTicker, criteria, mode, date);
  const selected = results.filter((r) => r.selected).length;

  const errorsOf = (outcomes: Map<string, MarketOutcome | TrendOutcome>) =>
    Object.fromEntries(
      [...outcomes].flatMap(([ticker, o]) => (o.ok ? [] : [[ticker, `${o.error.kind}: ${o.error.message}`] as const])),
    );

  logger.info({ date, mode, selected, scanned: results.length }, 'Scan complete');

  return {
    date,
    mode,
    trading_day: tradingDay,
    criteria,
    results,
    diagnostics: {
      tickers_requested: tickers.length,
      selected,
      market_errors: errorsOf(marketByTicker),
      trend_errors: errorsOf(trendByTicker),
      inactive_excluded: inactive.sort(),
    },
  };
}

/**
 * Backtest every trading day in [start, end]. A failed day is recorded and skipped.
 */
export async function analyzeDateRange(
  start: ISODate,
  end: ISODate,
  opts: ScanOptions & { maxParallelDates?: number },
  deps: AnalysisDeps,
): Promise<RangeResult> {
  const cfg = getConfig();
  const mode = opts.mode ?? 'combined';
  if (start > end) {
    throw new AnalysisError('start date must not be after end date.', ErrorCode.InvalidParams);
  }
  requireProviders(mode, deps);

  const days = deps.calendar.tradingDaysBetween(start, end);
  assertWithinBudgets(deps.budgets, mode, uniqueTickers(opts.tickers).length, days.length);

  const perDay = await mapWithConcurrency(days, opts.maxParallelDates ?? cfg.concurrency.maxParallelDates, async (date) => {
    try {
      return { date, scan: await analyzeTradingDay(date, { ...opts, mode }, deps) };
    } catch (error) {
      if (!(error instanceof AnalysisError)) throw error;
      logger.warn({ date, err: error }, 'Skipping day after analysis failure');
      return { date, error: error.message };
    }
  });

  const results: AnalysisResult[] = [];
  const summary: RangeResult['days'] = [];
  for (const day of perDay) {
    if ('scan' in day && day.scan) {
      const selected = day.scan.results.filter((r) => r.selected);
      results.push(...selected);
      summary.push({ date: day.date, selected: selected.length });
    } else {
      summary.push({ date: day.date, selected: 0, error: 'error' in day ? day.error : undefined });
    }
  }

  logger.info({ start, end, tradingDays: days.length, selected: results.length }, 'Backtest complete');

  return { start, end, mode, trading_days: days.length, days: summary, results };
}
