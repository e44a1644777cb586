import { describe, it } from 'node:test';
import assert from 'node:assert';
import { LayeredCache } from '../src/cache/layeredCache.js';
import { buildClientTier } from '../src/cache/clientContext.js';
import { ToolExecutor } from '../src/agent/toolExecutor.js';
import type { Namespace, SearchHit } from '../src/rag/knowledgeBase.js';
import type { SentimentReport } from '../src/analytics/sentiment.js';
import type { Forecast } from '../src/analytics/forecast.js';
import { Clock, FakeMarket } from './helpers.js';

function setup() {
  const clock = new Clock();
  const cache = new LayeredCache({ now: clock.now });
  const market = new FakeMarket();
  const searches: Array<{ query: string; namespace: Namespace; topK: number; ticker?: string }> = [];
  const knowledge = {
    async semanticSearch(query: string, namespace: Namespace, topK: number, ticker?: string): Promise<SearchHit[]> {
      searches.push({ query, namespace, topK, ticker });
      return [{ text: 'Apple beat estimates', score: 0.91, metadata: { ticker: 'AAPL' } }];
    },
  };
  let sentimentRuns = 0;
  const sentiment = {
    async analyze(ticker: string): Promise<SentimentReport> {
      sentimentRuns++;
      return {
        ticker,
        aggregate: {
          score: 0.4,
          label: 'bullish',
          confidence: 0.8,
          postCount: 0,
          includedCount: 0,
          distribution: { positive: 0, negative: 0, neutral: 0 },
          sources: { stocktwits: 0, reddit: 0 },
        },
        posts: [],
        scraped: 0,
        embedded: 0,
        failed: 0,
        analyzedAt: '2024-06-10T12:00:00.000Z',
      };
    },
  };
  const forecasts: Array<{ ticker: string; horizon: number }> = [];
  const forecast = {
    async forecast(ticker: string, horizon: number): Promise<Forecast> {
      forecasts.push({ ticker, horizon });
      return { ticker, lastClose: 100, lastDate: '2024-06-07', horizonDays: horizon, method: 'test', points: [] };
    },
  };
  const executor = new ToolExecutor({ cache, market, knowledge, sentiment, forecast, now: clock.now });
  return { clock, cache, market, executor, searches, forecasts, sentimentRuns: () => sentimentRuns };
}

describe('ToolExecutor', () => {
  it('fetches live on a miss, then serves from the server cache', async () => {
    const { executor, market } = setup();
    const first = await executor.execute({ id: 'c1', name: 'get_stock_quote', args: { ticker: 'aapl' } });
    assert.strictEqual(first.status, 'success');
    assert.strictEqual(first.status === 'success' && first.source, 'live');
    assert.deepStrictEqual(market.calls, [{ kind: 'previous_close', ticker: 'AAPL', params: undefined }]);

    const second = await executor.execute({ id: 'c2', name: 'get_stock_quote', args: { ticker: 'AAPL' } });
    assert.strictEqual(second.status === 'success' && second.source, 'server-cache');
    assert.strictEqual(second.callId, 'c2');
    assert.strictEqual(market.calls.length, 1);
  });

  it('refetches after the quote ttl elapses', async () => {
    const { executor, market, clock } = setup();
    await executor.execute({ id: 'c1', name: 'get_stock_quote', args: { ticker: 'AAPL' } });
    clock.advance(60_000);
    const again = await executor.execute({ id: 'c2', name: 'get_stock_quote', args: { ticker: 'AAPL' } });
    assert.strictEqual(again.status === 'success' && again.source, 'live');
    assert.strictEqual(market.calls.length, 2);
  });

  it('answers from the client snapshot without touching the provider', async () => {
    const { executor, market } = setup();
    const client = buildClientTier('AAPL', { overview: { details: { results: { name: 'Apple Inc.' } } } });
    const result = await executor.execute({ id: 'c1', name: 'get_company_info', args: { ticker: 'AAPL' } }, { client });
    assert.deepStrictEqual(result, {
      callId: 'c1',
      tool: 'get_company_info',
      status: 'success',
      payload: { results: { name: 'Apple Inc.' } },
      source: 'client',
    });
    assert.strictEqual(market.calls.length, 0);
  });

  it('rejects invalid arguments before any fetch', async () => {
    const { executor, market } = setup();
    const result = await executor.execute({ id: 'c1', name: 'get_news', args: { ticker: 'AAPL', limit: 500 } });
    assert.strictEqual(result.status, 'failure');
    assert.strictEqual(result.status === 'failure' && result.code, 'INVALID_ARGUMENT');
    assert.match(result.status === 'failure' ? result.message : '', /^limit: /);
    assert.strictEqual(market.calls.length, 0);
  });

  it('reports an unknown tool as an invalid argument', async () => {
    const { executor } = setup();
    const result = await executor.execute({ id: 'c9', name: 'get_weather', args: {} });
    assert.deepStrictEqual(result, {
      callId: 'c9',
      tool: 'get_weather',
      status: 'failure',
      code: 'INVALID_ARGUMENT',
      message: 'unknown tool: get_weather',
    });
  });

  it('turns provider failures into UPSTREAM_ERROR results and does not cache them', async () => {
    const { executor, market } = setup();
    market.failWith('previous_close', 'previous_close returned 500: boom');
    const failed = await executor.execute({ id: 'c1', name: 'get_stock_quote', args: { ticker: 'AAPL' } });
    assert.deepStrictEqual(failed, {
      callId: 'c1',
      tool: 'get_stock_quote',
      status: 'failure',
      code: 'UPSTREAM_ERROR',
      message: 'previous_close returned 500: boom',
    });

    market.failures.clear();
    const retried = await executor.execute({ id: 'c2', name: 'get_stock_quote', args: { ticker: 'AAPL' } });
    assert.strictEqual(retried.status === 'success' && retried.source, 'live');
    assert.strictEqual(market.calls.length, 2);
  });

  it('shares one provider fetch between concurrent identical calls', async () => {
    const { executor, market } = setup();
    market.delayMs = 10;
    const [a, b] = await Promise.all([
      executor.execute({ id: 'a', name: 'get_financials', args: { ticker: 'AAPL' } }),
      executor.execute({ id: 'b', name: 'get_financials', args: { ticker: 'AAPL', limit: 4 } }),
    ]);
    assert.strictEqual(a.status, 'success');
    assert.strictEqual(b.status, 'success');
    assert.deepStrictEqual(market.calls, [{ kind: 'financials', ticker: 'AAPL', params: { limit: 4 } }]);
  });

  it('searches the knowledge base live with defaults applied', async () => {
    const { executor, searches } = setup();
    const result = await executor.execute({ id: 'k1', name: 'search_knowledge_base', args: { query: 'earnings' } });
    assert.deepStrictEqual(searches, [{ query: 'earnings', namespace: 'news', topK: 5, ticker: undefined }]);
    assert.deepStrictEqual(result.status === 'success' && result.payload, {
      query: 'earnings',
      namespace: 'news',
      ticker: null,
      results: [{ text: 'Apple beat estimates', score: 0.91, metadata: { ticker: 'AAPL' } }],
    });

    await executor.execute({ id: 'k2', name: 'search_knowledge_base', args: { query: 'earnings' } });
    assert.strictEqual(searches.length, 2);
  });

  it('passes range and bar size through for price history', async () => {
    const { executor, market } = setup();
    await executor.execute({
      id: 'p1',
      name: 'get_price_history',
      args: { ticker: 'msft', from: '2024-01-02', to: '2024-01-31', timespan: 'week' },
    });
    assert.deepStrictEqual(market.calls, [
      { kind: 'aggregates', ticker: 'MSFT', params: { timespan: 'week', from: '2024-01-02', to: '2024-01-31' } },
    ]);
  });

  it('caches forecasts per horizon and sentiment per ticker', async () => {
    const { executor, forecasts, sentimentRuns } = setup();
    await executor.execute({ id: 'f1', name: 'get_price_forecast', args: { ticker: 'AAPL' } });
    await executor.execute({ id: 'f2', name: 'get_price_forecast', args: { ticker: 'AAPL', horizon_days: 7 } });
    await executor.execute({ id: 'f3', name: 'get_price_forecast', args: { ticker: 'AAPL', horizon_days: 3 } });
    assert.deepStrictEqual(forecasts, [
      { ticker: 'AAPL', horizon: 7 },
      { ticker: 'AAPL', horizon: 3 },
    ]);

    await executor.execute({ id: 's1', name: 'analyze_sentiment', args: { ticker: 'AAPL' } });
    await executor.execute({ id: 's2', name: 'analyze_sentiment', args: { ticker: 'aapl' } });
    assert.strictEqual(sentimentRuns(), 1);
  });
});
