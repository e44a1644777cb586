import type { Ttl } from './layeredCache.js';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const TTL = {
  quote: MINUTE,
  snapshot: MINUTE,
  marketStatus: MINUTE,
  companyInfo: 'forever',
  financials: 24 * HOUR,
  news: 15 * MINUTE,
  sentiment: 30 * MINUTE,
  forecast: HOUR,
  dividends: 24 * HOUR,
  splits: 24 * HOUR,
  closedRange: HOUR,
  openRange: 5 * MINUTE,
} as const satisfies Record<string, Ttl>;

/** A range that reaches today can still gain bars. */
export function priceHistoryTtl(to: string, now: number = Date.now()): Ttl {
  const today = new Date(now).toISOString().slice(0, 10);
  return to >= today ? TTL.openRange : TTL.closedRange;
}
