import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { parseHolidayCsv, TradingCalendar } from '../src/services/tradingCalendar.js';
import type { TrendSample } from '../src/types.js';

export const HOLIDAYS_CSV = [
  'Date,Market Status,Description',
  "2024-01-01,Closed,New Year's Day",
  '2024-01-15,Closed,Martin Luther King Jr. Day',
  '2024-03-29,Closed,Good Friday',
  '2024-07-03,Early Close,Independence Day eve',
  '2024-07-04,Closed,Independence Day',
].join('\n');

export function testCalendar(csv: string = HOLIDAYS_CSV): TradingCalendar {
  return new TradingCalendar(parseHolidayCsv(csv));
}

export const TRENDS_OFFSET = 480;

/**
 * Trend sample at `hour` o'clock on `date` in UTC-8.
 */
export function sampleAt(date: string, hour: number, value: number): TrendSample {
  const hh = String(hour).padStart(2, '0');
  return { timestamp: Date.parse(`${date}T${hh}:00:00.000Z`) + TRENDS_OFFSET * 60 * 1000, value };
}

export function samplesFor(date: string, values: Record<number, number>): TrendSample[] {
  return Object.entries(values).map(([hour, value]) => sampleAt(date, Number(hour), value));
}

export interface RecordedRequest {
  url?: string;
  params: Record<string, unknown>;
}

type Route = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

/**
 * In-process axios adapter: routes each request to a handler and records it.
 */
export function fakeAdapter(route: Route, log: RecordedRequest[] = []): AxiosAdapter {
  return async (config) => {
    const params: Record<string, unknown> = { ...config.params };
    log.push({ url: config.url, params });
    const { status, data } = route(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, response);
    }
    return response;
  };
}
