import axios from 'axios';
import { describe, expect, it } from 'vitest';
import { ProviderError } from '../src/errors.js';
import { parseTimeline, SerpTrendsClient, tickerKeyword, trendWindow } from '../src/services/serpTrends.js';
import { fakeAdapter, type RecordedRequest } from './fixtures.js';

function client(route: Parameters<typeof fakeAdapter>[0], log: RecordedRequest[] = []) {
  const http = axios.create({ baseURL: 'https://serpapi.test', adapter: fakeAdapter(route, log) });
  return new SerpTrendsClient({ apiKey: 'test-secret', http, windowDays: 7, tzOffsetMinutes: 480 });
}

const point = (timestamp: string, value: number) => ({
  date: 'ignored',
  timestamp,
  values: [{ query: 'ACME Stock', value: String(value), extracted_value: value }],
});

describe('helpers', () => {
  it('builds the search keyword from a ticker', () => {
    expect(tickerKeyword(' acme ')).toBe('ACME Stock');
  });

  it('spans whole days ending on the target date', () => {
    expect(trendWindow('2024-01-08', 7, 480)).toEqual({
      start: '2024-01-02T00',
      end: '2024-01-08T23',
      tzOffsetMinutes: 480,
    });
    expect(trendWindow('2024-03-01', 2, 480).start).toBe('2024-02-29T00');
  });

  it('skips malformed points and sorts by time', () => {
    const samples = parseTimeline([
      point('1704700800', 40),
      { timestamp: 'bad', values: [{ extracted_value: 1 }] },
      { timestamp: '1704697300', values: [] },
      point('1704697200', 30),
      null,
    ]);
    expect(samples).toEqual([
      { timestamp: 1704697200000, value: 30 },
      { timestamp: 1704700800000, value: 40 },
    ]);
  });
});

describe('SerpTrendsClient.fetchSeries', () => {
  it('queries an hourly window and parses the timeline', async () => {
    const log: RecordedRequest[] = [];
    const trends = client(
      () => ({
        status: 200,
        data: { interest_over_time: { timeline_data: [point('1704700800', 55), point('1704697200', 12)] } },
      }),
      log,
    );
    const series = await trends.fetchSeries('ACME Stock', '2024-01-08');
    expect(series).toEqual({
      keyword: 'ACME Stock',
      window: { start: '2024-01-02T00', end: '2024-01-08T23', tzOffsetMinutes: 480 },
      samples: [
        { timestamp: 1704697200000, value: 12 },
        { timestamp: 1704700800000, value: 55 },
      ],
    });
    expect(log).toEqual([
      {
        url: '/search',
        params: {
          engine: 'google_trends',
          q: 'ACME Stock',
          data_type: 'TIMESERIES',
          date: '2024-01-02T00 2024-01-08T23',
          tz: '480',
          granular: 'hourly',
          api_key: 'test-secret',
        },
      },
    ]);
  });

  it('returns nothing when the provider has no series', async () => {
    expect(await client(() => ({ status: 200, data: { error: 'No results' } })).fetchSeries('X Stock', '2024-01-08')).toBeUndefined();
    expect(await client(() => ({ status: 200, data: {} })).fetchSeries('X Stock', '2024-01-08')).toBeUndefined();
  });

  it('raises ProviderError on HTTP failures and unreadable payloads', async () => {
    await expect(client(() => ({ status: 503, data: {} })).fetchSeries('X Stock', '2024-01-08')).rejects.toMatchObject({
      provider: 'serpapi',
      status: 503,
    });
    await expect(client(() => ({ status: 200, data: 'oops' })).fetchSeries('X Stock', '2024-01-08')).rejects.toBeInstanceOf(
      ProviderError,
    );
  });
});
