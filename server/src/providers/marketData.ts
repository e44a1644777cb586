export type ResourceKind =
  | 'details'
  | 'previous_close'
  | 'aggregates'
  | 'news'
  | 'financials'
  | 'snapshot'
  | 'dividends'
  | 'splits'
  | 'market_status';

export type MarketParams = Record<string, string | number | undefined>;

/** Raw provider JSON; the dashboard caches the same shape client-side. */
export type MarketPayload = Record<string, unknown>;

/**
 * Market-data collaborator. Implementations own their retry and rate-limit
 * policy; callers only see a payload or a thrown UpstreamError.
 */
export interface MarketDataSource {
  fetch(kind: ResourceKind, ticker: string, params?: MarketParams): Promise<MarketPayload>;
}
