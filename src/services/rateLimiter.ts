/**
 * @file src/services/rateLimiter.ts
 * @description Per-caller admission control: rolling one-minute cap + calendar-day cap
 * @context Constructed once in src/index.ts and injected into the Express app.
 *          Windows live for the process lifetime; the daily counter resets by date comparison.
 */

import { AdmissionDenialReason } from '../types/research';
import { logger } from '../utils/logger';

const WINDOW_MS = 60 * 1000;

export interface RateLimiterOptions {
  requestsPerMinute: number;
  dailyLimit: number;
}

export type AdmissionDecision =
  | { allowed: true }
  | { allowed: false; reason: AdmissionDenialReason; message: string };

export interface RateWindow {
  timestamps: number[];
  day: string;
  count: number;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatDay(ms: number): string {
  const date = new Date(ms);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export class RateLimiter {
  private readonly requestsPerMinute: number;
  private readonly dailyLimit: number;
  private readonly now: () => number;
  private windows = new Map<string, RateWindow>();

  constructor(options: RateLimiterOptions, now: () => number = Date.now) {
    this.requestsPerMinute = options.requestsPerMinute;
    this.dailyLimit = options.dailyLimit;
    this.now = now;
  }

  /**
   * Checks and, when allowed, records one request for the identifier.
   * Synchronous on purpose: the check and the increment cannot interleave
   * with another admit() call on the event loop.
   */
  admit(id: string): AdmissionDecision {
    const now = this.now();
    const window = this.getWindow(id);

    window.timestamps = window.timestamps.filter(ts => now - ts < WINDOW_MS);

    if (window.timestamps.length >= this.requestsPerMinute) {
      logger.info('Admission denied', { caller_id: id, reason: 'per_minute_limit_exceeded' });
      return {
        allowed: false,
        reason: 'per_minute_limit_exceeded',
        message: `Rate limit exceeded: Max ${this.requestsPerMinute} requests per minute.`,
      };
    }

    const today = formatDay(now);
    if (window.day !== today) {
      window.day = today;
      window.count = 0;
    }

    if (window.count >= this.dailyLimit) {
      logger.info('Admission denied', { caller_id: id, reason: 'daily_limit_exceeded' });
      return {
        allowed: false,
        reason: 'daily_limit_exceeded',
        message: `Daily limit exceeded: Max ${this.dailyLimit} requests per day.`,
      };
    }

    window.timestamps.push(now);
    window.count++;

    return { allowed: true };
  }

  /**
   * Copy of the identifier's window, undefined if it has never been seen
   */
  snapshot(id: string): RateWindow | undefined {
    const window = this.windows.get(id);
    if (!window) return undefined;
    return { timestamps: [...window.timestamps], day: window.day, count: window.count };
  }

  reset(id?: string): void {
    if (id === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(id);
    }
  }

  private getWindow(id: string): RateWindow {
    let window = this.windows.get(id);
    if (!window) {
      window = { timestamps: [], day: '', count: 0 };
      this.windows.set(id, window);
    }
    return window;
  }
}

export default RateLimiter;
