// Polygon.io REST client (free tier: ~5 requests/minute)
import { fetchWithRetry } from '../utils/fetchRetry.js';
import { logger } from '../utils/logger.js';
import { UpstreamError, isRecord } from '../shared/errors.js';
import { RateLimiter } from './RateLimiter.js';
import type { MarketDataSource, MarketParams, MarketPayload, ResourceKind } from './marketData.js';

export interface PolygonConfig {
  apiKey: string;
  baseUrl: string;
  rateLimitRpm: number;
  timeoutMs: number;
}

type Query = Record<string, string>;

function str(v: string | number | undefined, def: string) {
  return v === undefined || v === '' ? def : String(v);
}

export function buildPolygonPath(kind: ResourceKind, ticker: string, params: MarketParams = {}): { path: string; query: Query } {
  const t = encodeURIComponent(ticker.toUpperCase());
  switch (kind) {
    case 'details':
      return { path: `/v3/reference/tickers/${t}`, query: {} };
    case 'previous_close':
      return { path: `/v2/aggs/ticker/${t}/prev`, query: { adjusted: 'true' } };
    case 'aggregates': {
      const timespan = encodeURIComponent(str(params.timespan, 'day'));
      const from = encodeURIComponent(str(params.from, ''));
      const to = encodeURIComponent(str(params.to, ''));
      return { path: `/v2/aggs/ticker/${t}/range/1/${timespan}/${from}/${to}`, query: { adjusted: 'true', sort: 'asc' } };
    }
    case 'news':
      return { path: '/v2/reference/news', query: { ticker: ticker.toUpperCase(), limit: str(params.limit, '10') } };
    case 'financials':
      return { path: '/vX/reference/financials', query: { ticker: ticker.toUpperCase(), limit: str(params.limit, '4') } };
    case 'snapshot':
      return { path: `/v2/snapshot/locale/us/markets/stocks/tickers/${t}`, query: {} };
    case 'dividends':
      return { path: '/v3/reference/dividends', query: { ticker: ticker.toUpperCase(), limit: str(params.limit, '10'), order: 'desc' } };
    case 'splits':
      return { path: '/v3/reference/splits', query: { ticker: ticker.toUpperCase(), limit: str(params.limit, '10'), order: 'desc' } };
    case 'market_status':
      return { path: '/v1/marketstatus/now', query: {} };
  }
}

export function buildPolygonUrl(baseUrl: string, apiKey: string, kind: ResourceKind, ticker: string, params?: MarketParams): string {
  const { path, query } = buildPolygonPath(kind, ticker, params);
  const search = new URLSearchParams({ ...query, apiKey });
  return `${baseUrl}${path}?${search.toString()}`;
}

export class PolygonClient implements MarketDataSource {
  private log = logger.child({ upstream: 'polygon' });

  constructor(
    private readonly config: PolygonConfig,
    private readonly limiter: RateLimiter = new RateLimiter(config.rateLimitRpm)
  ) {}

  async fetch(kind: ResourceKind, ticker: string, params?: MarketParams): Promise<MarketPayload> {
    if (!this.config.apiKey) throw new UpstreamError('polygon', 'POLYGON_API_KEY is not configured');
    const url = buildPolygonUrl(this.config.baseUrl, this.config.apiKey, kind, ticker, params);
    const started = Date.now();
    const res = await fetchWithRetry(url, { headers: { Accept: 'application/json' } }, {
      retries: 2,
      backoffMs: 1000,
      timeoutMs: this.config.timeoutMs,
      label: 'polygon',
      // retries spend the same per-minute budget as first attempts
      beforeAttempt: () => this.limiter.waitFor()
    }).catch((err: unknown) => {
      throw new UpstreamError('polygon', `request failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    const body: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      const detail = isRecord(body) && typeof body.error === 'string' ? body.error : res.statusText;
      throw new UpstreamError('polygon', `${kind} returned ${res.status}: ${detail}`, res.status);
    }
    if (!isRecord(body)) throw new UpstreamError('polygon', `${kind} returned a malformed payload`);
    if (body.status === 'ERROR' || body.status === 'NOT_AUTHORIZED') {
      const detail = typeof body.error === 'string' ? body.error : String(body.message ?? body.status);
      throw new UpstreamError('polygon', `${kind}: ${detail}`);
    }
    this.log.debug({ kind, ticker, ms: Date.now() - started }, 'polygon_fetch_ok');
    return body;
  }
}
