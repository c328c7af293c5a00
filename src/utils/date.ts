import * as chrono from 'chrono-node';

/**
 * Calendar date in YYYY-MM-DD form. All day arithmetic happens on these strings
 * via UTC midnight so host timezone never leaks into the result.
 */
export type ISODate = string;

const ISO_DATE_RE = /^\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function isIsoDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;
  // rejects 2024-02-30 and friends
  const t = Date.parse(`${input}T00:00:00.000Z`);
  return !Number.isNaN(t) && normalizeDate(new Date(t)) === input;
}

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): ISODate {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a natural language input into YYYY-MM-DD (UTC) using chrono-node.
 * Examples: "yesterday", "last Friday", "2025-02-11"
 */
export function parseDateNL(input: string, now: Date = new Date()): ISODate {
  if (ISO_DATE_RE.test(input)) {
    return input;
  }
  const parsed = chrono.parseDate(input, now, { forwardDate: false });
  if (!parsed) {
    throw new Error(
      'Could not understand the date input. Try "yesterday", "last Friday", or a specific date like 2025-02-11.'
    );
  }
  return normalizeDate(parsed);
}

function toUtcMidnight(date: ISODate): number {
  if (!isIsoDate(date)) {
    throw new Error(`Invalid ISO date: ${date}`);
  }
  return Date.parse(`${date}T00:00:00.000Z`);
}

export function addDays(date: ISODate, days: number): ISODate {
  return normalizeDate(new Date(toUtcMidnight(date) + days * MS_PER_DAY));
}

/**
 * 0 = Sunday ... 6 = Saturday
 */
export function dayOfWeek(date: ISODate): number {
  return new Date(toUtcMidnight(date)).getUTCDay();
}

export function isWeekend(date: ISODate): boolean {
  const dow = dayOfWeek(date);
  return dow === 0 || dow === 6;
}

/**
 * Inclusive list of calendar dates between start and end.
 * Returns an empty list when start is after end.
 */
export function dateRange(start: ISODate, end: ISODate): ISODate[] {
  const days: ISODate[] = [];
  const last = toUtcMidnight(end);
  for (let t = toUtcMidnight(start); t <= last; t += MS_PER_DAY) {
    days.push(normalizeDate(new Date(t)));
  }
  return days;
}

/**
 * Wall-clock reading of an instant in some timezone.
 */
export interface WallClock {
  date: ISODate;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/**
 * Read an epoch-ms instant on the wall clock of an IANA timezone (DST aware).
 */
export function zonedClock(epochMs: number, timeZone: string): WallClock {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    parts[part.type] = part.value;
  }
  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    hour: Number(parts.hour),
    minute: Number(parts.minute),
    second: Number(parts.second),
  };
}

/**
 * Read an epoch-ms instant on a fixed-offset clock.
 * `offsetMinutes` counts minutes behind UTC (480 = UTC-8), matching the trends provider's `tz` parameter.
 */
export function offsetClock(epochMs: number, offsetMinutes: number): WallClock {
  const shifted = new Date(epochMs - offsetMinutes * 60 * 1000);
  return {
    date: normalizeDate(shifted),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
  };
}
