import { describe, expect, it } from 'vitest';
import { InsufficientDataError, MissingDataError, err, ok } from '../src/errors.js';
import { filterAndRank, type MarketOutcome, type TrendOutcome } from '../src/services/filterRanker.js';
import type { FilterCriteria, MarketMetrics, TrendChange, TrendMetrics } from '../src/types.js';

const DATE = '2024-01-08';

function market(ticker: string, overrides: Partial<MarketMetrics> = {}): MarketOutcome {
  return ok({
    ticker,
    companyName: `${ticker} Inc`,
    date: DATE,
    previousTradingDay: '2024-01-05',
    referenceOpenPrice: 10,
    previousClose: 9.5,
    premarketVolume: 100_000,
    gapUpPct: 5,
    marketCap: 500_000_000,
    dayHigh: 11,
    dayClose: 10.5,
    openToHighPct: 10,
    openToClosePct: 5,
    active: true,
    ...overrides,
  });
}

function trend(ticker: string, change: TrendChange): TrendOutcome {
  const metrics: TrendMetrics = {
    keyword: `${ticker} Stock`,
    date: DATE,
    previousTradingDay: '2024-01-05',
    matchingHours: [4, 5, 6],
    previousTotal: 100,
    currentTotal: 200,
    change,
    hourDeltas: [],
    currentValues: {},
    previousValues: {},
  };
  return ok(metrics);
}

const pct = (value: number): TrendChange => ({ kind: 'numeric', pct: value });

const criteria: FilterCriteria = {
  minPremarketVolume: 50_000,
  minPrice: 3,
  minGapUpPct: 2,
  minMarketCap: 100_000_000,
  minTrendChangePct: 50,
};

describe('filterAndRank (market mode)', () => {
  it('applies inclusive thresholds', () => {
    const results = filterAndRank(
      new Map([
        ['AAA', market('AAA', { gapUpPct: 1.5, marketCap: 200_000_000 })],
        ['BBB', market('BBB', { gapUpPct: 2, marketCap: 100_000_000 })],
      ]),
      new Map(),
      criteria,
      'market',
      DATE,
    );
    expect(results.map((r) => [r.ticker, r.selected])).toEqual([
      ['BBB', true],
      ['AAA', false],
    ]);
    expect(results[1].rejections).toEqual(['gap-up below minimum']);
    expect(results[0].rank).toEqual({ kind: 'numeric', value: 2 });
    expect(results[0].trend).toBeNull();
  });

  it('ranks by gap descending and breaks ties by symbol', () => {
    const results = filterAndRank(
      new Map([
        ['ZZZ', market('ZZZ', { gapUpPct: 3 })],
        ['CCC', market('CCC', { gapUpPct: 3 })],
        ['AAA', market('AAA', { gapUpPct: 9 })],
      ]),
      new Map(),
      criteria,
      'market',
      DATE,
    );
    expect(results.map((r) => r.ticker)).toEqual(['AAA', 'CCC', 'ZZZ']);
  });

  it('lists every failed criterion', () => {
    const [result] = filterAndRank(
      new Map([['LOW', market('LOW', { premarketVolume: 10, referenceOpenPrice: 1, gapUpPct: 0, marketCap: 5 })]]),
      new Map(),
      criteria,
      'market',
      DATE,
    );
    expect(result.rejections).toEqual([
      'premarket volume below minimum',
      'price below minimum',
      'gap-up below minimum',
      'market cap below minimum',
    ]);
    expect(result.market?.price).toBe(1);
  });

  it('rejects an unknown market cap only when a minimum is set', () => {
    const markets = new Map([['NOC', market('NOC', { marketCap: undefined })]]);
    expect(filterAndRank(markets, new Map(), criteria, 'market', DATE)[0].rejections).toEqual(['market cap unavailable']);
    const [relaxed] = filterAndRank(markets, new Map(), { ...criteria, minMarketCap: undefined }, 'market', DATE);
    expect(relaxed.selected).toBe(true);
    expect(relaxed.market?.marketCap).toBeNull();
  });

  it('carries market failures as rejections', () => {
    const [result] = filterAndRank(
      new Map([['GONE', err(new MissingDataError('No session data for GONE on 2024-01-08', 'GONE', DATE))]]),
      new Map(),
      criteria,
      'market',
      DATE,
    );
    expect(result.selected).toBe(false);
    expect(result.rejections).toEqual(['market: No session data for GONE on 2024-01-08']);
    expect(result.rank).toEqual({ kind: 'none' });
  });
});

describe('filterAndRank (trends mode)', () => {
  it('ignores market criteria and ranks unbounded first', () => {
    const results = filterAndRank(
      new Map(),
      new Map([
        ['AAA', trend('AAA', pct(500))],
        ['BBB', trend('BBB', { kind: 'unbounded' })],
        ['CCC', trend('CCC', pct(50))],
        ['DDD', trend('DDD', pct(49.9))],
      ]),
      criteria,
      'trends',
      DATE,
    );
    expect(results.map((r) => [r.ticker, r.selected])).toEqual([
      ['BBB', true],
      ['AAA', true],
      ['CCC', true],
      ['DDD', false],
    ]);
    expect(results[3].rejections).toEqual(['trend change below minimum']);
    expect(results[0].market).toBeNull();
  });

  it('lets unbounded growth pass any threshold', () => {
    const [result] = filterAndRank(
      new Map(),
      new Map([['UNB', trend('UNB', { kind: 'unbounded' })]]),
      { minTrendChangePct: 1e9 },
      'trends',
      DATE,
    );
    expect(result.selected).toBe(true);
  });
});

describe('filterAndRank (combined mode)', () => {
  it('requires both sources and ranks by trend change', () => {
    const results = filterAndRank(
      new Map([
        ['AAA', market('AAA', { gapUpPct: 20 })],
        ['BBB', market('BBB', { gapUpPct: 3 })],
        ['MKT', market('MKT')],
      ]),
      new Map([
        ['AAA', trend('AAA', pct(80))],
        ['BBB', trend('BBB', pct(300))],
        ['TRD', trend('TRD', pct(300))],
        [
          'FLT',
          err(new InsufficientDataError('No search interest on 2024-01-08 or 2024-01-05 for "FLT Stock"', 'FLT Stock', DATE, 'no-interest')),
        ],
      ]),
      criteria,
      'combined',
      DATE,
    );
    expect(results.map((r) => r.ticker)).toEqual(['BBB', 'AAA', 'FLT', 'MKT', 'TRD']);
    expect(results[0].rank).toEqual({ kind: 'numeric', value: 300 });
    const byTicker = new Map(results.map((r) => [r.ticker, r]));
    expect(byTicker.get('MKT')?.rejections).toEqual(['trend data missing']);
    expect(byTicker.get('TRD')?.rejections).toEqual(['market data missing']);
    expect(byTicker.get('FLT')?.rejections).toEqual([
      'market data missing',
      'trends: No search interest on 2024-01-08 or 2024-01-05 for "FLT Stock"',
    ]);
  });

  it('selects nothing from empty inputs', () => {
    expect(filterAndRank(new Map(), new Map(), criteria, 'combined', DATE)).toEqual([]);
  });
});
