import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { parseMarketCap } from '../utils/normalize.js';

const ModeSchema = z.enum(['market', 'trends', 'combined']);

const MarketCapInput = z.union([
  z.number().positive(),
  z
    .string()
    .regex(/^\s*\d+(?:\.\d+)?\s*[mMbB]?\s*$/, 'Use a plain amount or an M/B suffix, e.g. "100M".')
    .refine((s) => parseMarketCap(s) !== undefined, 'Market cap must be positive; use null for no minimum.'),
]);

// omitted: configured default; null: no constraint
export const CriteriaInputSchema = z
  .object({
    minPremarketVolume: z.number().int().nonnegative().nullable().optional(),
    minPrice: z.number().nonnegative().nullable().optional(),
    minGapUpPct: z.number().nullable().optional(),
    minMarketCap: MarketCapInput.nullable().optional(),
    minTrendChangePct: z.number().nullable().optional(),
  })
  .strict();

export type CriteriaInput = z.infer<typeof CriteriaInputSchema>;

const ScanInputBase = z.object({
  tickers: z.union([z.array(z.string()).min(1), z.string().min(1)]).optional(),
  tickerFile: z.string().optional(),
  mode: ModeSchema.default('combined'),
  criteria: CriteriaInputSchema.optional(),
  hourBuckets: z.array(z.number().int().min(0).max(23)).min(1).optional(),
  includeInactive: z.boolean().default(false),
});

export const ScanPremarketInputSchema = ScanInputBase.extend({
  input: z.string().min(1, 'Provide a date input (natural language or YYYY-MM-DD).'),
});

export const BacktestInputSchema = ScanInputBase.extend({
  startDate: z.string().min(1),
  endDate: z.string().min(1),
});

export const CalendarInputSchema = z.object({
  input: z.string().min(1),
});

const TrendChangeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('numeric'), pct: z.number() }),
  z.object({ kind: z.literal('unbounded') }),
]);

const AnalysisResultSchema = z.object({
  ticker: z.string(),
  date: z.string(),
  selected: z.boolean(),
  rejections: z.array(z.string()),
  market: z
    .object({
      companyName: z.string(),
      price: z.number(),
      previousClose: z.number(),
      premarketVolume: z.number(),
      gapUpPct: z.number(),
      marketCap: z.number().nullable(),
      dayHigh: z.number(),
      dayClose: z.number(),
      openToHighPct: z.number(),
      openToClosePct: z.number(),
    })
    .nullable(),
  trend: z
    .object({
      keyword: z.string(),
      change: TrendChangeSchema,
      previousTotal: z.number(),
      currentTotal: z.number(),
      matchingHours: z.array(z.number()),
      hourDeltas: z.array(
        z.object({
          fromHour: z.number(),
          toHour: z.number(),
          pct: z.number().nullable(),
        }),
      ),
    })
    .nullable(),
  rank: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('numeric'), value: z.number() }),
    z.object({ kind: z.literal('unbounded') }),
    z.object({ kind: z.literal('none') }),
  ]),
});

const CriteriaSchema = z.object({
  minPremarketVolume: z.number().optional(),
  minPrice: z.number().optional(),
  minGapUpPct: z.number().optional(),
  minMarketCap: z.number().optional(),
  minTrendChangePct: z.number().optional(),
});

export const ScanResultSchema = z.object({
  date: z.string(),
  mode: ModeSchema,
  trading_day: z.object({
    date: z.string(),
    isOpen: z.boolean(),
    isEarlyClose: z.boolean(),
  }),
  criteria: CriteriaSchema,
  results: z.array(AnalysisResultSchema),
  diagnostics: z.object({
    tickers_requested: z.number(),
    selected: z.number(),
    market_errors: z.record(z.string()),
    trend_errors: z.record(z.string()),
    inactive_excluded: z.array(z.string()),
  }),
});

export const RangeResultSchema = z.object({
  start: z.string(),
  end: z.string(),
  mode: ModeSchema,
  trading_days: z.number(),
  days: z.array(
    z.object({
      date: z.string(),
      selected: z.number(),
      error: z.string().optional(),
    }),
  ),
  results: z.array(AnalysisResultSchema),
});

export const CalendarResultSchema = z.object({
  date: z.string(),
  isOpen: z.boolean(),
  isEarlyClose: z.boolean(),
  previousTradingDay: z.string(),
});

function toToolSchema(schema: z.ZodTypeAny) {
  return { ...zodToJsonSchema(schema, { $refStrategy: 'none' }), type: 'object' as const };
}

export const scanResultJsonSchema = toToolSchema(ScanResultSchema);
export const rangeResultJsonSchema = toToolSchema(RangeResultSchema);
export const calendarResultJsonSchema = toToolSchema(CalendarResultSchema);
export const scanInputJsonSchema = toToolSchema(ScanPremarketInputSchema);
export const backtestInputJsonSchema = toToolSchema(BacktestInputSchema);
export const calendarInputJsonSchema = toToolSchema(CalendarInputSchema);
