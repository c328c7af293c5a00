#!/usr/bin/env node
import { createServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { analyzeDateRange, analyzeTradingDay, resolveCriteria, type AnalysisDeps, type ScanResult, type RangeResult } from './services/analysis.js';
import { PolygonClient } from './services/polygon.js';
import { RequestBudget } from './services/requestBudget.js';
import { SerpTrendsClient } from './services/serpTrends.js';
import { resolveTickers } from './services/tickerSource.js';
import { TradingCalendar } from './services/tradingCalendar.js';
import { TrendSeriesCache } from './services/trendCache.js';
import {
  BacktestInputSchema,
  CalendarInputSchema,
  CalendarResultSchema,
  RangeResultSchema,
  ScanPremarketInputSchema,
  ScanResultSchema,
  backtestInputJsonSchema,
  calendarInputJsonSchema,
  calendarResultJsonSchema,
  rangeResultJsonSchema,
  scanInputJsonSchema,
  scanResultJsonSchema,
} from './schemas/analysis.js';
import { AnalysisError, CalendarConfigError } from './errors.js';
import type { AnalysisMode } from './types.js';
import { isIsoDate, parseDateNL } from './utils/date.js';
import { round2 } from './utils/normalize.js';
import { getConfig, assertRequiredConfig } from './config.js';
import { logger } from './logger.js';

const config = getConfig();
const calendar = await TradingCalendar.fromFile(config.holidaysPath);
logger.info(
  { path: config.holidaysPath, holidays: calendar.size, earlyCloses: calendar.earlyCloseCount() },
  'Loaded trading calendar',
);

const budgetOptions = {
  dailyRequestsCap: config.rateLimits.dailyRequestsCap,
  perSecondCap: config.rateLimits.perSecondCap,
};
const polygonBudget = new RequestBudget(budgetOptions);
const serpBudget = new RequestBudget(budgetOptions);

let polygonClient: PolygonClient | undefined;
let trendsProvider: TrendSeriesCache | undefined;

function depsFor(mode: AnalysisMode): AnalysisDeps {
  assertRequiredConfig(config, mode);
  if (mode !== 'trends' && !polygonClient) {
    polygonClient = new PolygonClient({ budget: polygonBudget });
  }
  if (mode !== 'market' && !trendsProvider) {
    const client = new SerpTrendsClient({ budget: serpBudget });
    trendsProvider = new TrendSeriesCache(client, (d) => client.window(d), config.trends.cacheEntries);
  }
  return {
    calendar,
    market: mode !== 'trends' ? polygonClient : undefined,
    trends: mode !== 'market' ? trendsProvider : undefined,
    budgets: { polygon: polygonBudget, serpapi: serpBudget },
  };
}

function toDate(input: string): string {
  let date: string;
  try {
    date = parseDateNL(input.trim());
  } catch (error: unknown) {
    throw new AnalysisError(error instanceof Error ? error.message : String(error), ErrorCode.InvalidParams);
  }
  if (!isIsoDate(date)) {
    throw new AnalysisError(`Invalid date: ${input}`, ErrorCode.InvalidParams);
  }
  return date;
}

const server = new Server(
  {
    name: 'premarket-pulse',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

process.on('SIGINT', () => {
  logger.info('SIGINT received, closing server');
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, 'Error while closing server');
      process.exit(1);
    },
  );
});

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'scan_premarket',
      description:
        'Scan tickers for pre-market gap-ups with a matching spike in search interest on one trading day.',
      inputSchema: scanInputJsonSchema,
      outputSchema: scanResultJsonSchema,
    },
    {
      name: 'backtest_premarket',
      description: 'Run the pre-market scan over every trading day of a date range and list the selected tickers.',
      inputSchema: backtestInputJsonSchema,
      outputSchema: rangeResultJsonSchema,
    },
    {
      name: 'trading_calendar',
      description: 'Report whether a date is a trading day, whether it closes early, and the previous trading day.',
      inputSchema: calendarInputJsonSchema,
      outputSchema: calendarResultJsonSchema,
    },
  ],
}));

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  const args = request.params.arguments ?? {};
  try {
    switch (request.params.name) {
      case 'scan_premarket': {
        const parsed = ScanPremarketInputSchema.parse(args);
        const date = toDate(parsed.input);
        const tickers = await resolveTickers({ tickers: parsed.tickers, file: parsed.tickerFile });
        const result = ScanResultSchema.parse(
          await analyzeTradingDay(
            date,
            {
              tickers,
              mode: parsed.mode,
              criteria: resolveCriteria(parsed.criteria),
              hourBuckets: parsed.hourBuckets,
              includeInactive: parsed.includeInactive,
            },
            depsFor(parsed.mode),
          ),
        );
        return {
          content: [{ type: 'text', text: formatScanSummary(result) }],
          structuredContent: result,
        };
      }
      case 'backtest_premarket': {
        const parsed = BacktestInputSchema.parse(args);
        const tickers = await resolveTickers({ tickers: parsed.tickers, file: parsed.tickerFile });
        const result = RangeResultSchema.parse(
          await analyzeDateRange(
            toDate(parsed.startDate),
            toDate(parsed.endDate),
            {
              tickers,
              mode: parsed.mode,
              criteria: resolveCriteria(parsed.criteria),
              hourBuckets: parsed.hourBuckets,
              includeInactive: parsed.includeInactive,
            },
            depsFor(parsed.mode),
          ),
        );
        return {
          content: [{ type: 'text', text: formatRangeSummary(result) }],
          structuredContent: result,
        };
      }
      case 'trading_calendar': {
        const { input } = CalendarInputSchema.parse(args);
        const day = calendar.tradingDay(toDate(input));
        const result = CalendarResultSchema.parse({
          ...day,
          previousTradingDay: calendar.previousTradingDay(day.date),
        });
        return {
          content: [
            {
              type: 'text',
              text: `${result.date}: ${result.isOpen ? (result.isEarlyClose ? 'early close' : 'open') : 'closed'}; previous trading day ${result.previousTradingDay}`,
            },
          ],
          structuredContent: result,
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
    }
  } catch (error: unknown) {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof ZodError) {
      throw new McpError(ErrorCode.InvalidParams, error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    if (error instanceof AnalysisError) {
      throw new McpError(error.code, error.message);
    }
    if (error instanceof CalendarConfigError) {
      logger.error({ err: error }, 'Trading calendar misconfigured');
      throw new McpError(ErrorCode.InternalError, error.message);
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, 'Unexpected tool invocation failure');
    throw new McpError(ErrorCode.InternalError, message || 'Unexpected error');
  }
});

async function start() {
  if (config.transport === 'http') {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const allowedHosts = new Set(config.allowedHosts);
    const allowedOrigins = new Set(config.allowedOrigins);

    const httpServer = createServer((req, res) => {
      if (req.method === 'GET' && req.url === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      if (!isHostAllowed(req.headers.host, allowedHosts)) {
        res.statusCode = 403;
        res.end('Forbidden host');
        return;
      }
      if (!isOriginAllowed(req.headers.origin, allowedOrigins)) {
        res.statusCode = 403;
        res.end('Forbidden origin');
        return;
      }

      transport.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end('Internal Server Error');
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Premarket Pulse server listening');
    });
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ transport: 'stdio' }, 'Premarket Pulse server listening');
  }
}

function isHostAllowed(hostHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !hostHeader) return true;
  const host = hostHeader.split(':')[0];
  return whitelist.has(host);
}

function isOriginAllowed(originHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !originHeader) return true;
  return whitelist.has(originHeader);
}

function formatChange(result: ScanResult['results'][number]): string {
  if (result.trend) {
    return result.trend.change.kind === 'unbounded'
      ? 'trends +∞ (no prior interest)'
      : `trends ${round2(result.trend.change.pct)}%`;
  }
  return result.market ? `gap ${round2(result.market.gapUpPct)}%` : 'n/a';
}

function formatScanSummary(result: ScanResult): string {
  const selected = result.results.filter((r) => r.selected);
  const header = [
    `Premarket Pulse: ${result.date} (${result.mode})`,
    `Selected ${selected.length} of ${result.diagnostics.tickers_requested} tickers`,
  ];
  const lines = selected.map((r) => {
    const parts = [r.ticker, formatChange(r)];
    if (r.market) {
      parts.push(`gap ${round2(r.market.gapUpPct)}%`, `pm vol ${r.market.premarketVolume.toLocaleString('en-US')}`);
    }
    return parts.join(' | ');
  });
  return [...header, ...lines].join('\n');
}

function formatRangeSummary(result: RangeResult): string {
  const lines = result.days.map((d) => `${d.date}: ${d.error ? `error (${d.error})` : `${d.selected} selected`}`);
  return [
    `Premarket Pulse backtest: ${result.start} to ${result.end} (${result.trading_days} trading days)`,
    ...lines,
  ].join('\n');
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start Premarket Pulse server');
  process.exit(1);
});
