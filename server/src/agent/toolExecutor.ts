// Resolves one tool call into a result: validate, consult the layered cache, then the live collaborator
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../shared/errors.js';
import { cacheKey, type LayeredCache, type Ttl } from '../cache/layeredCache.js';
import { EMPTY_CLIENT_TIER, type ClientTier } from '../cache/clientContext.js';
import { TTL, priceHistoryTtl } from '../cache/ttlPolicy.js';
import type { MarketDataSource } from '../providers/marketData.js';
import type { KnowledgeRetriever } from '../rag/knowledgeBase.js';
import type { SentimentReport } from '../analytics/sentiment.js';
import type { Forecast } from '../analytics/forecast.js';
import { ToolError } from './errors.js';
import {
  FinancialsArgs,
  ForecastArgs,
  ListArgs,
  PriceHistoryArgs,
  SearchArgs,
  TickerArgs,
  isToolName,
} from './tools.js';
import type { ToolCall, ToolResult, ResultSource } from './types.js';

export interface ToolContext {
  client?: ClientTier;
}

/** What the agent loop needs from an executor. Implementations must resolve, never reject. */
export interface ToolDispatcher {
  execute(call: ToolCall, ctx?: ToolContext): Promise<ToolResult>;
}

export interface ToolExecutorDeps {
  cache: LayeredCache;
  market: MarketDataSource;
  knowledge: KnowledgeRetriever;
  sentiment: { analyze(ticker: string): Promise<SentimentReport> };
  forecast: { forecast(ticker: string, horizonDays: number): Promise<Forecast> };
  now?: () => number;
}

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ToolError('INVALID_ARGUMENT', detail);
  }
  return parsed.data;
}

type Outcome = { payload: unknown; source: ResultSource };

export class ToolExecutor implements ToolDispatcher {
  private readonly now: () => number;

  constructor(private readonly deps: ToolExecutorDeps) {
    this.now = deps.now ?? Date.now;
  }

  async execute(call: ToolCall, ctx: ToolContext = {}): Promise<ToolResult> {
    const started = Date.now();
    try {
      const { payload, source } = await this.dispatch(call, ctx.client ?? EMPTY_CLIENT_TIER);
      logger.info({ tool: call.name, callId: call.id, source, ms: Date.now() - started }, 'tool_executed');
      return { callId: call.id, tool: call.name, status: 'success', payload, source };
    } catch (err) {
      const code = err instanceof ToolError ? err.code : 'UPSTREAM_ERROR';
      const message = errorMessage(err);
      logger.warn({ tool: call.name, callId: call.id, code, err: message, ms: Date.now() - started }, 'tool_failed');
      return { callId: call.id, tool: call.name, status: 'failure', code, message };
    }
  }

  private cached(key: string, ttl: Ttl, client: ClientTier, load: () => Promise<unknown>): Promise<Outcome> {
    return this.deps.cache.getOrLoad(key, ttl, load, client).then(({ value, source }) => ({ payload: value, source }));
  }

  private async dispatch(call: ToolCall, client: ClientTier): Promise<Outcome> {
    const { market } = this.deps;
    const name = call.name;
    if (!isToolName(name)) throw new ToolError('INVALID_ARGUMENT', `unknown tool: ${name}`);
    switch (name) {
      case 'get_stock_quote': {
        const { ticker } = validate(TickerArgs, call.args);
        return this.cached(cacheKey('quote', ticker), TTL.quote, client, () => market.fetch('previous_close', ticker));
      }
      case 'get_company_info': {
        const { ticker } = validate(TickerArgs, call.args);
        return this.cached(cacheKey('company_info', ticker), TTL.companyInfo, client, () => market.fetch('details', ticker));
      }
      case 'get_financials': {
        const { ticker, limit } = validate(FinancialsArgs, call.args);
        return this.cached(cacheKey('financials', ticker, limit), TTL.financials, client, () => market.fetch('financials', ticker, { limit }));
      }
      case 'get_news': {
        const { ticker, limit } = validate(ListArgs, call.args);
        return this.cached(cacheKey('news', ticker, limit), TTL.news, client, () => market.fetch('news', ticker, { limit }));
      }
      case 'search_knowledge_base': {
        const { query, ticker, namespace, top_k } = validate(SearchArgs, call.args);
        const results = await this.deps.knowledge.semanticSearch(query, namespace, top_k, ticker);
        return { payload: { query, namespace, ticker: ticker ?? null, results }, source: 'live' };
      }
      case 'analyze_sentiment': {
        const { ticker } = validate(TickerArgs, call.args);
        return this.cached(cacheKey('sentiment', ticker), TTL.sentiment, client, () => this.deps.sentiment.analyze(ticker));
      }
      case 'get_price_forecast': {
        const { ticker, horizon_days } = validate(ForecastArgs, call.args);
        return this.cached(cacheKey('forecast', ticker, horizon_days), TTL.forecast, client, () => this.deps.forecast.forecast(ticker, horizon_days));
      }
      case 'get_dividends': {
        const { ticker, limit } = validate(ListArgs, call.args);
        return this.cached(cacheKey('dividends', ticker, limit), TTL.dividends, client, () => market.fetch('dividends', ticker, { limit }));
      }
      case 'get_stock_splits': {
        const { ticker, limit } = validate(ListArgs, call.args);
        return this.cached(cacheKey('splits', ticker, limit), TTL.splits, client, () => market.fetch('splits', ticker, { limit }));
      }
      case 'get_price_history': {
        const { ticker, from, to, timespan } = validate(PriceHistoryArgs, call.args);
        const key = cacheKey('price_history', ticker, timespan, from, to);
        return this.cached(key, priceHistoryTtl(to, this.now()), client, () => market.fetch('aggregates', ticker, { timespan, from, to }));
      }
    }
  }
}
