import { isRecord } from '../shared/errors.js';

/**
 * Read-only view of the snapshot the dashboard already holds for one ticker.
 * Only keys for that ticker resolve; anything else is a miss.
 */
export interface ClientTier {
  resolve(key: string): unknown;
}

type FieldPath = readonly string[];

// cache key kind -> path inside the dashboard's context blob
const CLIENT_FIELDS: Record<string, FieldPath> = {
  quote: ['overview', 'previousClose'],
  company_info: ['overview', 'details'],
  financials: ['financials'],
  news: ['news'],
  dividends: ['dividends'],
  splits: ['splits'],
  sentiment: ['sentiment'],
};

export const EMPTY_CLIENT_TIER: ClientTier = { resolve: () => undefined };

/** `null`, missing values and provider payloads with an empty `results` list count as absent. */
export function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (isRecord(value) && Array.isArray(value.results) && value.results.length === 0) return false;
  return true;
}

function pluck(root: unknown, path: FieldPath): unknown {
  let cur: unknown = root;
  for (const part of path) {
    if (!isRecord(cur)) return undefined;
    cur = cur[part];
  }
  return cur;
}

export function buildClientTier(ticker: string, context: unknown): ClientTier {
  if (!isRecord(context)) return EMPTY_CLIENT_TIER;
  const symbol = ticker.toUpperCase();
  return {
    resolve(key: string) {
      const [kind, keyTicker] = key.split(':');
      if (!kind || keyTicker !== symbol) return undefined;
      const path = CLIENT_FIELDS[kind];
      if (!path) return undefined;
      const value = pluck(context, path);
      return isPresent(value) ? value : undefined;
    },
  };
}
