import { describe, expect, it } from 'vitest';
import {
  addDays,
  dateRange,
  dayOfWeek,
  isIsoDate,
  normalizeDate,
  offsetClock,
  parseDateNL,
  zonedClock,
} from '../src/utils/date.js';
import { parseMarketCap, percentChange, round2 } from '../src/utils/normalize.js';

describe('date utils', () => {
  it('validates calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-1-5')).toBe(false);
  });

  it('does day arithmetic across months and leap days', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(addDays('2023-12-31', 1)).toBe('2024-01-01');
    expect(dayOfWeek('2024-01-07')).toBe(0);
    expect(dayOfWeek('2024-01-08')).toBe(1);
    expect(dateRange('2024-02-27', '2024-03-01')).toEqual(['2024-02-27', '2024-02-28', '2024-02-29', '2024-03-01']);
    expect(normalizeDate(new Date('2024-01-08T23:30:00Z'))).toBe('2024-01-08');
  });

  it('passes ISO input through and rejects gibberish', () => {
    expect(parseDateNL('2025-02-11')).toBe('2025-02-11');
    expect(() => parseDateNL('xyzzy')).toThrow(/Could not understand the date input/);
  });

  it('reads exchange wall-clock time with daylight saving', () => {
    expect(zonedClock(Date.parse('2024-01-08T14:30:00Z'), 'America/New_York')).toEqual({
      date: '2024-01-08',
      hour: 9,
      minute: 30,
      second: 0,
    });
    expect(zonedClock(Date.parse('2024-07-08T13:30:00Z'), 'America/New_York').hour).toBe(9);
    expect(zonedClock(Date.parse('2024-01-08T03:00:00Z'), 'America/New_York').date).toBe('2024-01-07');
  });

  it('reads fixed-offset time', () => {
    expect(offsetClock(Date.parse('2024-01-08T12:00:00Z'), 480)).toEqual({
      date: '2024-01-08',
      hour: 4,
      minute: 0,
      second: 0,
    });
    expect(offsetClock(Date.parse('2024-01-08T07:59:00Z'), 480).date).toBe('2024-01-07');
  });
});

describe('normalize utils', () => {
  it('computes percent change except from zero', () => {
    expect(percentChange(100, 150)).toBe(50);
    expect(percentChange(0, 5)).toBeUndefined();
    expect(percentChange(10, Number.NaN)).toBeUndefined();
    expect(round2(92.30769)).toBe(92.31);
  });

  it('parses market cap notation', () => {
    expect(parseMarketCap('100M')).toBe(100_000_000);
    expect(parseMarketCap('1.5b')).toBe(1_500_000_000);
    expect(parseMarketCap('2,500,000')).toBe(2_500_000);
    expect(parseMarketCap(250_000_000)).toBe(250_000_000);
    expect(parseMarketCap('abc')).toBeUndefined();
    expect(parseMarketCap('0M')).toBeUndefined();
    expect(parseMarketCap(-5)).toBeUndefined();
  });
});
