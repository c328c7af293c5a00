import { promises as fs } from 'node:fs';
import { CalendarConfigError } from '../errors.js';
import type { HolidayRow, HolidayTable, MarketStatus, TradingDay } from '../types.js';
import { addDays, dateRange, isIsoDate, isWeekend, type ISODate } from '../utils/date.js';

const REQUIRED_COLUMNS = ['Date', 'Market Status'] as const;
const MARKET_STATUSES: readonly MarketStatus[] = ['Closed', 'Early Close'];

export const MAX_LOOKBACK_DAYS = 30;

function isMarketStatus(value: string): value is MarketStatus {
  return MARKET_STATUSES.some((s) => s === value);
}

/**
 * Parse the holiday table CSV (`Date,Market Status,Description`).
 * Description may contain commas; everything after the second column is kept as-is.
 */
export function parseHolidayCsv(text: string): HolidayTable {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  if (!lines.length) {
    throw new CalendarConfigError('Holiday table is empty');
  }

  const header = lines[0].split(',').map((h) => h.trim());
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length) {
    throw new CalendarConfigError(`Holiday table is missing required columns: ${missing.join(', ')}`, { header });
  }
  const dateIdx = header.indexOf('Date');
  const statusIdx = header.indexOf('Market Status');
  const descIdx = header.indexOf('Description');

  const table = new Map<ISODate, HolidayRow>();
  for (const [i, line] of lines.slice(1).entries()) {
    const cells = line.split(',');
    // trailing description keeps its commas
    if (descIdx === header.length - 1 && cells.length > header.length) {
      cells.splice(descIdx, cells.length - descIdx, cells.slice(descIdx).join(','));
    }
    const date = cells[dateIdx]?.trim() ?? '';
    const status = cells[statusIdx]?.trim() ?? '';
    if (!isIsoDate(date)) {
      throw new CalendarConfigError(`Invalid date in holiday table row ${i + 2}: "${date}"`);
    }
    if (!isMarketStatus(status)) {
      throw new CalendarConfigError(`Invalid market status in holiday table row ${i + 2}: "${status}"`);
    }
    const description = descIdx >= 0 ? cells[descIdx]?.trim() : undefined;
    table.set(date, description ? { date, status, description } : { date, status });
  }
  return table;
}

export async function loadHolidayTable(filePath: string): Promise<HolidayTable> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    throw new CalendarConfigError(`Could not read holiday table at ${filePath}`, e);
  }
  return parseHolidayCsv(raw);
}

/**
 * Exchange trading calendar: weekends plus the holiday table.
 * Immutable once constructed; every query is a pure function of the table.
 */
export class TradingCalendar {
  private readonly holidays: HolidayTable;

  constructor(holidays: HolidayTable) {
    this.holidays = new Map(holidays);
  }

  static async fromFile(filePath: string): Promise<TradingCalendar> {
    return new TradingCalendar(await loadHolidayTable(filePath));
  }

  status(date: ISODate): MarketStatus | undefined {
    return this.holidays.get(date)?.status;
  }

  isTradingDay(date: ISODate): boolean {
    if (isWeekend(date)) return false;
    return this.status(date) !== 'Closed';
  }

  tradingDay(date: ISODate): TradingDay {
    const isOpen = this.isTradingDay(date);
    return {
      date,
      isOpen,
      isEarlyClose: isOpen && this.status(date) === 'Early Close',
    };
  }

  /**
   * Closest trading day strictly before `date`.
   * A table that closes a whole month of weekdays is treated as corrupt.
   */
  previousTradingDay(date: ISODate): ISODate {
    let candidate = date;
    for (let i = 0; i < MAX_LOOKBACK_DAYS; i++) {
      candidate = addDays(candidate, -1);
      if (this.isTradingDay(candidate)) return candidate;
    }
    throw new CalendarConfigError(
      `No trading day found within ${MAX_LOOKBACK_DAYS} days before ${date}`,
      { date },
    );
  }

  tradingDaysBetween(start: ISODate, end: ISODate): ISODate[] {
    return dateRange(start, end).filter((d) => this.isTradingDay(d));
  }

  get size(): number {
    return this.holidays.size;
  }

  earlyCloseCount(): number {
    let n = 0;
    for (const row of this.holidays.values()) {
      if (row.status === 'Early Close') n++;
    }
    return n;
  }
}
