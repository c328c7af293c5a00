import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { logger } from '../logger.js';
import { normalizeTicker } from '../utils/normalize.js';

export const DEFAULT_TICKERS = ['AAPL', 'MSFT', 'GOOGL', 'AMZN', 'META'] as const;

const TICKER_RE = /^[A-Z][A-Z0-9.\-]{0,9}$/;

/**
 * Screener export: `[{ json: { tickers: [{ ticker: "AAPL" }, ...] } }]`
 */
const ScreenerExport = z
  .array(
    z.object({
      json: z.object({
        tickers: z.array(z.object({ ticker: z.string() }).passthrough()).default([]),
      }),
    }),
  )
  .min(1);

const PlainList = z.array(z.string());

function clean(symbols: readonly string[]): string[] {
  const out = new Set<string>();
  for (const s of symbols) {
    const t = normalizeTicker(s);
    if (TICKER_RE.test(t)) out.add(t);
  }
  return [...out];
}

export function parseTickerList(input: string): string[] {
  return clean(input.split(','));
}

/**
 * Accepts a plain JSON array of symbols or a screener export.
 */
export function parseTickerJson(text: string): string[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return [];
  }
  const plain = PlainList.safeParse(data);
  if (plain.success) return clean(plain.data);
  const exported = ScreenerExport.safeParse(data);
  if (exported.success) return clean(exported.data[0].json.tickers.map((t) => t.ticker));
  return [];
}

/**
 * Resolve the tickers to scan: explicit list first, then file, then the default list.
 */
export async function resolveTickers(opts: { tickers?: string[] | string; file?: string }): Promise<string[]> {
  if (opts.tickers) {
    const list = Array.isArray(opts.tickers) ? clean(opts.tickers) : parseTickerList(opts.tickers);
    if (list.length) return list;
  }
  if (opts.file) {
    try {
      const list = parseTickerJson(await fs.readFile(opts.file, 'utf-8'));
      if (list.length) return list;
      logger.warn({ file: opts.file }, 'No tickers found in file, using default list');
    } catch (e) {
      logger.warn({ file: opts.file, err: e }, 'Ticker file not readable, using default list');
    }
  }
  return [...DEFAULT_TICKERS];
}
