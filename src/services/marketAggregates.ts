import {
  InvalidPriceError,
  MissingDataError,
  err,
  ok,
  type MarketFailure,
  type Outcome,
  type PriceField,
} from '../errors.js';
import type { DailySession, MarketMetrics, MinuteBar, TickerSnapshot } from '../types.js';
import { zonedClock, type ISODate } from '../utils/date.js';
import { percentChange } from '../utils/normalize.js';
import type { TradingCalendar } from './tradingCalendar.js';

export interface PremarketWindow {
  // minutes after local midnight; [start, end)
  startMinute: number;
  endMinute: number;
}

export const DEFAULT_PREMARKET_WINDOW: PremarketWindow = {
  startMinute: 4 * 60,
  endMinute: 9 * 60 + 30,
};

export interface MarketAggregateInput {
  ticker: string;
  date: ISODate;
  minuteBars: readonly MinuteBar[];
  snapshot: TickerSnapshot;
  /** Keyed by session date; must hold `date` and its previous trading day. */
  sessions: ReadonlyMap<ISODate, DailySession>;
  /** Defaults to the open of the `date` session. */
  referenceOpenPrice?: number;
}

const PRICE_LABELS: Record<PriceField, string> = {
  previousClose: 'Previous close',
  open: 'Open price',
  high: 'High price',
  close: 'Close price',
};

function unusableBase(price: number): boolean {
  return price === 0 || !Number.isFinite(price);
}

function invalidPrice(ticker: string, date: ISODate, field: PriceField, price: number, day: ISODate = date) {
  const problem = price === 0 ? 'zero' : `not a finite number (${price})`;
  return new InvalidPriceError(`${PRICE_LABELS[field]} is ${problem} for ${ticker} on ${day}`, ticker, date, field);
}

export interface MarketAggregateOptions {
  calendar: TradingCalendar;
  exchangeTimeZone: string;
  premarketWindow?: PremarketWindow;
}

/**
 * Turns one ticker/date's raw aggregates into gap, volume and intraday metrics.
 */
export class MarketAggregateProcessor {
  private readonly calendar: TradingCalendar;
  private readonly timeZone: string;
  private readonly window: PremarketWindow;

  constructor(opts: MarketAggregateOptions) {
    this.calendar = opts.calendar;
    this.timeZone = opts.exchangeTimeZone;
    this.window = opts.premarketWindow ?? DEFAULT_PREMARKET_WINDOW;
  }

  premarketVolume(bars: readonly MinuteBar[], date: ISODate): number {
    let total = 0;
    for (const bar of bars) {
      const clock = zonedClock(bar.timestamp, this.timeZone);
      if (clock.date !== date) continue;
      const minuteOfDay = clock.hour * 60 + clock.minute;
      if (minuteOfDay >= this.window.startMinute && minuteOfDay < this.window.endMinute) {
        total += bar.volume;
      }
    }
    return total;
  }

  process(input: MarketAggregateInput): Outcome<MarketMetrics, MarketFailure> {
    const { ticker, date, sessions, snapshot } = input;

    const session = sessions.get(date);
    if (!session) {
      return err(new MissingDataError(`No session data for ${ticker} on ${date}`, ticker, date));
    }

    const previousDay = this.calendar.previousTradingDay(date);
    const previousSession = sessions.get(previousDay);
    if (!previousSession) {
      return err(
        new MissingDataError(`No close for ${ticker} on previous trading day ${previousDay}`, ticker, date),
      );
    }

    const referenceOpenPrice = input.referenceOpenPrice ?? session.open;
    const gapUpPct = percentChange(previousSession.close, referenceOpenPrice);
    if (gapUpPct === undefined) {
      return err(
        unusableBase(previousSession.close)
          ? invalidPrice(ticker, date, 'previousClose', previousSession.close, previousDay)
          : invalidPrice(ticker, date, 'open', referenceOpenPrice),
      );
    }

    const openToHighPct = percentChange(session.open, session.high);
    const openToClosePct = percentChange(session.open, session.close);
    if (openToHighPct === undefined || openToClosePct === undefined) {
      if (unusableBase(session.open)) return err(invalidPrice(ticker, date, 'open', session.open));
      return err(
        Number.isFinite(session.high)
          ? invalidPrice(ticker, date, 'close', session.close)
          : invalidPrice(ticker, date, 'high', session.high),
      );
    }

    const marketCap =
      snapshot.sharesOutstanding != null ? snapshot.sharesOutstanding * referenceOpenPrice : undefined;

    return ok({
      ticker,
      companyName: snapshot.name,
      date,
      previousTradingDay: previousDay,
      referenceOpenPrice,
      previousClose: previousSession.close,
      premarketVolume: this.premarketVolume(input.minuteBars, date),
      gapUpPct,
      marketCap,
      dayHigh: session.high,
      dayClose: session.close,
      openToHighPct,
      openToClosePct,
      active: snapshot.active,
    });
  }
}
