import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/**
 * Malformed or insufficient holiday data. Fatal: the calendar cannot be trusted.
 */
export class CalendarConfigError extends Error {
  readonly kind = 'calendar-config' as const;

  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'CalendarConfigError';
  }
}

/**
 * A required input (session, close, snapshot) is absent for one ticker/date.
 */
export class MissingDataError extends Error {
  readonly kind = 'missing-data' as const;

  constructor(
    message: string,
    public readonly ticker: string,
    public readonly date: string,
  ) {
    super(message);
    this.name = 'MissingDataError';
  }
}

export type InsufficientDataReason = 'no-matching-hours' | 'no-interest';

/**
 * The trend series cannot support a comparison for the requested day.
 */
export class InsufficientDataError extends Error {
  readonly kind = 'insufficient-data' as const;

  constructor(
    message: string,
    public readonly keyword: string,
    public readonly date: string,
    public readonly reason: InsufficientDataReason,
  ) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

export type PriceField = 'previousClose' | 'open' | 'high' | 'close';

/**
 * A price needed for a percentage is zero or not a finite number.
 */
export class InvalidPriceError extends Error {
  readonly kind = 'invalid-price' as const;

  constructor(
    message: string,
    public readonly ticker: string,
    public readonly date: string,
    public readonly field: PriceField,
  ) {
    super(message);
    this.name = 'InvalidPriceError';
  }
}

/**
 * HTTP or provider-level failure in one of the API clients.
 */
export class ProviderError extends Error {
  readonly kind = 'provider' as const;

  constructor(
    message: string,
    public readonly provider: 'polygon' | 'serpapi',
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

export type MarketFailure = MissingDataError | InvalidPriceError;
export type TrendFailure = InsufficientDataError | MissingDataError;

/**
 * Per-ticker computations report failures as values; only configuration errors are thrown.
 */
export type Outcome<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
