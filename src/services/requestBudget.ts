import { setTimeout as sleep } from 'node:timers/promises';
import { ProviderError } from '../errors.js';

/**
 * Request budget for the provider APIs.
 * Tracks request counts in-memory (per-process) and answers whether the next request should wait.
 */

export interface Estimate {
  requests: number;
  feasible: boolean;
  reason?: string;
}

export interface BudgetOptions {
  // caps are hints; if omitted, we don't block but still count
  dailyRequestsCap?: number;
  perSecondCap?: number;
  // time provider for testing
  now?: () => number; // ms epoch
}

export class RequestBudget {
  private readonly dailyRequestsCap?: number;
  private readonly perSecondCap?: number;

  private readonly now: () => number;

  private dayKey?: string;
  private dayCount = 0;

  private windowStart = 0;
  private windowCount = 0;

  constructor(opts: BudgetOptions = {}) {
    this.dailyRequestsCap = opts.dailyRequestsCap;
    this.perSecondCap = opts.perSecondCap;
    this.now = opts.now ?? (() => Date.now());
  }

  /**
   * Estimate cost of a scan. Each ticker costs `requestsPerTicker` calls per trading day.
   */
  estimateScanCost(tickers: number, days: number, requestsPerTicker: number): Estimate {
    const requests = Math.max(0, tickers) * Math.max(0, days) * Math.max(0, requestsPerTicker);
    if (requests === 0) {
      return { requests: 0, feasible: true, reason: 'No work required' };
    }
    if (this.dailyRequestsCap != null && requests > this.dailyRequestsCap) {
      return {
        requests,
        feasible: false,
        reason: `Estimated requests (${requests}) exceed daily cap (${this.dailyRequestsCap})`,
      };
    }
    return { requests, feasible: true };
  }

  /**
   * Whether a new request should be throttled right now given per-second and daily caps.
   * Does not mutate counters (use recordRequest for that).
   */
  shouldThrottle(): boolean {
    const now = this.now();

    if (this.perSecondCap != null && now - this.windowStart < 1000 && this.windowCount >= this.perSecondCap) {
      return true;
    }

    if (this.dailyRequestsCap != null) {
      const todayCount = this.dayKey === this.formatDayKey(now) ? this.dayCount : 0;
      if (todayCount >= this.dailyRequestsCap) {
        return true;
      }
    }

    return false;
  }

  /**
   * Milliseconds until the per-second window rolls over; 0 when not throttled by it.
   */
  msUntilWindowReset(): number {
    if (this.perSecondCap == null || this.windowCount < this.perSecondCap) return 0;
    return Math.max(0, 1000 - (this.now() - this.windowStart));
  }

  /**
   * True when only the daily cap is exhausted, which waiting a second will not fix.
   */
  dailyCapReached(): boolean {
    if (this.dailyRequestsCap == null) return false;
    const now = this.now();
    return this.dayKey === this.formatDayKey(now) && this.dayCount >= this.dailyRequestsCap;
  }

  /**
   * Record N requests just made (default 1). Updates per-second and daily windows.
   */
  recordRequest(count = 1): void {
    const now = this.now();

    if (now - this.windowStart >= 1000) {
      this.windowStart = now;
      this.windowCount = 0;
    }
    this.windowCount += count;

    const todayKey = this.formatDayKey(now);
    if (this.dayKey !== todayKey) {
      this.dayKey = todayKey;
      this.dayCount = 0;
    }
    this.dayCount += count;
  }

  getState() {
    return {
      perSecond: {
        cap: this.perSecondCap,
        windowStart: this.windowStart,
        windowCount: this.windowCount,
      },
      daily: {
        cap: this.dailyRequestsCap,
        dayKey: this.dayKey,
        dayCount: this.dayCount,
      },
    };
  }

  private formatDayKey(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
  }
}

/**
 * Wait out the per-second window if needed, then count one request.
 * A spent daily cap fails immediately.
 */
export async function acquireSlot(budget: RequestBudget | undefined, provider: ProviderError['provider']): Promise<void> {
  if (!budget) return;
  if (budget.dailyCapReached()) {
    throw new ProviderError(`Daily request cap reached for ${provider}`, provider, 429);
  }
  while (budget.shouldThrottle()) {
    await sleep(Math.max(1, budget.msUntilWindowReset()));
    if (budget.dailyCapReached()) {
      throw new ProviderError(`Daily request cap reached for ${provider}`, provider, 429);
    }
  }
  budget.recordRequest();
}
