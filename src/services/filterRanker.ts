import type { MarketFailure, Outcome, TrendFailure } from '../errors.js';
import type {
  AnalysisMode,
  AnalysisResult,
  FilterCriteria,
  MarketFields,
  MarketMetrics,
  RankValue,
  TrendChange,
  TrendFields,
  TrendMetrics,
} from '../types.js';
import type { ISODate } from '../utils/date.js';

export type MarketOutcome = Outcome<MarketMetrics, MarketFailure>;
export type TrendOutcome = Outcome<TrendMetrics, TrendFailure>;

/**
 * `>=` against a threshold; an unset threshold is no constraint.
 */
function meets(value: number | undefined, threshold: number | undefined): boolean {
  if (threshold == null) return true;
  return value != null && value >= threshold;
}

function trendMeets(change: TrendChange, threshold: number | undefined): boolean {
  if (threshold == null) return true;
  return change.kind === 'unbounded' || change.pct >= threshold;
}

function toMarketFields(m: MarketMetrics): MarketFields {
  return {
    companyName: m.companyName,
    price: m.referenceOpenPrice,
    previousClose: m.previousClose,
    premarketVolume: m.premarketVolume,
    gapUpPct: m.gapUpPct,
    marketCap: m.marketCap ?? null,
    dayHigh: m.dayHigh,
    dayClose: m.dayClose,
    openToHighPct: m.openToHighPct,
    openToClosePct: m.openToClosePct,
  };
}

function toTrendFields(t: TrendMetrics): TrendFields {
  return {
    keyword: t.keyword,
    change: t.change,
    previousTotal: t.previousTotal,
    currentTotal: t.currentTotal,
    matchingHours: t.matchingHours,
    hourDeltas: t.hourDeltas,
  };
}

function marketRejections(m: MarketMetrics, criteria: FilterCriteria): string[] {
  const out: string[] = [];
  if (!meets(m.premarketVolume, criteria.minPremarketVolume)) out.push('premarket volume below minimum');
  if (!meets(m.referenceOpenPrice, criteria.minPrice)) out.push('price below minimum');
  if (!meets(m.gapUpPct, criteria.minGapUpPct)) out.push('gap-up below minimum');
  if (criteria.minMarketCap != null && m.marketCap == null) out.push('market cap unavailable');
  else if (!meets(m.marketCap, criteria.minMarketCap)) out.push('market cap below minimum');
  return out;
}

function rankOf(trend: TrendFields | null, market: MarketFields | null): RankValue {
  if (trend) {
    return trend.change.kind === 'unbounded'
      ? { kind: 'unbounded' }
      : { kind: 'numeric', value: trend.change.pct };
  }
  if (market) return { kind: 'numeric', value: market.gapUpPct };
  return { kind: 'none' };
}

function rankWeight(rank: RankValue): number {
  switch (rank.kind) {
    case 'unbounded':
      return 2;
    case 'numeric':
      return 1;
    case 'none':
      return 0;
  }
}

/**
 * Descending rank; unbounded above every number; ties by symbol ascending.
 */
export function compareResults(a: AnalysisResult, b: AnalysisResult): number {
  if (a.selected !== b.selected) return a.selected ? -1 : 1;
  if (a.selected) {
    const byKind = rankWeight(b.rank) - rankWeight(a.rank);
    if (byKind !== 0) return byKind;
    if (a.rank.kind === 'numeric' && b.rank.kind === 'numeric' && a.rank.value !== b.rank.value) {
      return b.rank.value - a.rank.value;
    }
  }
  return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
}

function universe(
  mode: AnalysisMode,
  market: ReadonlyMap<string, MarketOutcome>,
  trends: ReadonlyMap<string, TrendOutcome>,
): string[] {
  const keys =
    mode === 'market'
      ? [...market.keys()]
      : mode === 'trends'
        ? [...trends.keys()]
        : [...market.keys(), ...trends.keys()];
  return [...new Set(keys)];
}

/**
 * Join per-ticker market and trend outcomes, apply the active criteria for
 * the mode, and order the results: selected first by rank, then the rest by symbol.
 */
export function filterAndRank(
  marketByTicker: ReadonlyMap<string, MarketOutcome>,
  trendByTicker: ReadonlyMap<string, TrendOutcome>,
  criteria: FilterCriteria,
  mode: AnalysisMode,
  date: ISODate,
): AnalysisResult[] {
  const useMarket = mode !== 'trends';
  const useTrends = mode !== 'market';

  const results = universe(mode, marketByTicker, trendByTicker).map((ticker): AnalysisResult => {
    const rejections: string[] = [];
    let market: MarketFields | null = null;
    let trend: TrendFields | null = null;

    if (useMarket) {
      const outcome = marketByTicker.get(ticker);
      if (!outcome) {
        rejections.push('market data missing');
      } else if (!outcome.ok) {
        rejections.push(`market: ${outcome.error.message}`);
      } else {
        market = toMarketFields(outcome.value);
        rejections.push(...marketRejections(outcome.value, criteria));
      }
    }

    if (useTrends) {
      const outcome = trendByTicker.get(ticker);
      if (!outcome) {
        rejections.push('trend data missing');
      } else if (!outcome.ok) {
        rejections.push(`trends: ${outcome.error.message}`);
      } else {
        trend = toTrendFields(outcome.value);
        if (!trendMeets(outcome.value.change, criteria.minTrendChangePct)) {
          rejections.push('trend change below minimum');
        }
      }
    }

    return {
      ticker,
      date,
      selected: rejections.length === 0,
      rejections,
      market,
      trend,
      rank: rankOf(trend, market),
    };
  });

  return results.sort(compareResults);
}
