import { fileURLToPath } from 'node:url';
import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { CalendarConfigError } from '../src/errors.js';
import { MAX_LOOKBACK_DAYS, parseHolidayCsv, TradingCalendar } from '../src/services/tradingCalendar.js';
import type { HolidayRow } from '../src/types.js';
import { addDays, isWeekend } from '../src/utils/date.js';
import { testCalendar } from './fixtures.js';

const anyDate = fc.integer({ min: 0, max: 4000 }).map((n) => addDays('2020-01-01', n));

function tableOf(rows: HolidayRow[]): TradingCalendar {
  return new TradingCalendar(new Map(rows.map((r) => [r.date, r])));
}

describe('parseHolidayCsv', () => {
  it('reads dates, statuses and descriptions containing commas', () => {
    const table = parseHolidayCsv(
      ['Date,Market Status,Description', '2024-11-29,Early Close,Day after Thanksgiving, 1pm close', ''].join('\r\n'),
    );
    expect(table.get('2024-11-29')).toEqual({
      date: '2024-11-29',
      status: 'Early Close',
      description: 'Day after Thanksgiving, 1pm close',
    });
  });

  it('accepts a header-only table', () => {
    expect(parseHolidayCsv('Date,Market Status\n').size).toBe(0);
  });

  it('rejects malformed tables', () => {
    expect(() => parseHolidayCsv('')).toThrow(CalendarConfigError);
    expect(() => parseHolidayCsv('Day,Status\n2024-01-01,Closed')).toThrow(/missing required columns: Date, Market Status/);
    expect(() => parseHolidayCsv('Date,Market Status\n2024-02-30,Closed')).toThrow(/Invalid date in holiday table row 2/);
    expect(() => parseHolidayCsv('Date,Market Status\n2024-01-01,Half Day')).toThrow(
      'Invalid market status in holiday table row 2: "Half Day"',
    );
  });
});

describe('TradingCalendar', () => {
  const calendar = testCalendar();

  it('classifies weekends, holidays and early closes', () => {
    expect(calendar.tradingDay('2024-01-06')).toEqual({ date: '2024-01-06', isOpen: false, isEarlyClose: false });
    expect(calendar.tradingDay('2024-01-15')).toEqual({ date: '2024-01-15', isOpen: false, isEarlyClose: false });
    expect(calendar.tradingDay('2024-07-03')).toEqual({ date: '2024-07-03', isOpen: true, isEarlyClose: true });
    expect(calendar.tradingDay('2024-01-16')).toEqual({ date: '2024-01-16', isOpen: true, isEarlyClose: false });
    expect(calendar.earlyCloseCount()).toBe(1);
    expect(calendar.size).toBe(5);
  });

  it('steps back over weekends and holidays', () => {
    expect(calendar.previousTradingDay('2024-01-08')).toBe('2024-01-05');
    expect(calendar.previousTradingDay('2024-01-16')).toBe('2024-01-12');
    expect(calendar.previousTradingDay('2024-04-01')).toBe('2024-03-28');
    // early close still counts as a session
    expect(calendar.previousTradingDay('2024-07-05')).toBe('2024-07-03');
  });

  it('works from non-trading days too', () => {
    expect(calendar.previousTradingDay('2024-01-07')).toBe('2024-01-05');
  });

  it('lists trading days in a range', () => {
    expect(calendar.tradingDaysBetween('2024-01-12', '2024-01-17')).toEqual(['2024-01-12', '2024-01-16', '2024-01-17']);
    expect(calendar.tradingDaysBetween('2024-01-17', '2024-01-12')).toEqual([]);
  });

  it('gives up on a month of closures', () => {
    const rows: HolidayRow[] = Array.from({ length: MAX_LOOKBACK_DAYS }, (_, i) => ({
      date: addDays('2024-06-01', i),
      status: 'Closed' as const,
    }));
    expect(() => tableOf(rows).previousTradingDay('2024-07-01')).toThrow(CalendarConfigError);
  });

  it('never opens on a weekend, whatever the table says', () => {
    fc.assert(
      fc.property(anyDate, fc.constantFrom('Closed' as const, 'Early Close' as const), (date, status) => {
        const cal = tableOf([{ date, status }]);
        return !isWeekend(date) || !cal.isTradingDay(date);
      }),
    );
  });

  it('opens on every weekday that is not closed', () => {
    fc.assert(
      fc.property(fc.array(anyDate, { maxLength: 20 }), anyDate, (closed, date) => {
        const cal = tableOf(closed.map((d) => ({ date: d, status: 'Closed' as const })));
        const expected = !isWeekend(date) && !closed.includes(date);
        return cal.isTradingDay(date) === expected;
      }),
    );
  });

  it('returns an earlier trading day with nothing open in between', () => {
    fc.assert(
      fc.property(fc.array(anyDate, { maxLength: 40 }), anyDate, (closed, date) => {
        const cal = tableOf(closed.map((d) => ({ date: d, status: 'Closed' as const })));
        const prev = cal.previousTradingDay(date);
        expect(prev < date).toBe(true);
        expect(cal.isTradingDay(prev)).toBe(true);
        for (let d = addDays(prev, 1); d < date; d = addDays(d, 1)) {
          expect(cal.isTradingDay(d)).toBe(false);
        }
      }),
    );
  });
});

describe('TradingCalendar.fromFile', () => {
  it('loads the bundled NYSE table', async () => {
    const cal = await TradingCalendar.fromFile(fileURLToPath(new URL('../data/holidays.csv', import.meta.url)));
    expect(cal.previousTradingDay('2024-04-01')).toBe('2024-03-28');
    expect(cal.previousTradingDay('2025-01-10')).toBe('2025-01-08');
    expect(cal.tradingDay('2024-11-29').isEarlyClose).toBe(true);
    expect(cal.isTradingDay('2024-12-25')).toBe(false);
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(TradingCalendar.fromFile('/nonexistent/holidays.csv')).rejects.toBeInstanceOf(CalendarConfigError);
  });
});
