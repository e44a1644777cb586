import { describe, it } from 'node:test';
import assert from 'node:assert';
import { LayeredCache, cacheKey } from '../src/cache/layeredCache.js';
import { buildClientTier, isPresent } from '../src/cache/clientContext.js';
import { TTL, priceHistoryTtl } from '../src/cache/ttlPolicy.js';
import { Clock } from './helpers.js';

describe('cacheKey', () => {
  it('joins kind, upper-cased ticker and discriminators', () => {
    assert.strictEqual(cacheKey('price_history', 'aapl', 'day', '2024-01-01', '2024-02-01'), 'price_history:AAPL:day:2024-01-01:2024-02-01');
    assert.strictEqual(cacheKey('quote', 'msft'), 'quote:MSFT');
    assert.strictEqual(cacheKey('news', 'brk.b', 10), 'news:BRK.B:10');
  });
});

describe('LayeredCache server tier', () => {
  it('serves a stored value until its ttl elapses, then misses', () => {
    const clock = new Clock();
    const cache = new LayeredCache({ now: clock.now });
    cache.store('quote:AAPL', { price: 1 }, 60_000);

    clock.advance(59_999);
    assert.deepStrictEqual(cache.lookup('quote:AAPL'), { hit: true, value: { price: 1 }, source: 'server-cache' });

    clock.advance(1);
    assert.deepStrictEqual(cache.lookup('quote:AAPL'), { hit: false });
    assert.strictEqual(cache.stats().entries, 0);
  });

  it('never serves an entry stored with ttl 0', () => {
    const cache = new LayeredCache({ now: new Clock().now });
    cache.store('quote:AAPL', 1, 0);
    assert.deepStrictEqual(cache.lookup('quote:AAPL'), { hit: false });
  });

  it('keeps forever entries regardless of elapsed time', () => {
    const clock = new Clock();
    const cache = new LayeredCache({ now: clock.now });
    cache.store('company_info:AAPL', { name: 'Apple' }, 'forever');
    clock.advance(365 * 24 * 60 * 60 * 1000);
    assert.strictEqual(cache.lookup('company_info:AAPL').hit, true);
  });

  it('replaces an entry wholesale on store', () => {
    const clock = new Clock();
    const cache = new LayeredCache({ now: clock.now });
    cache.store('quote:AAPL', { a: 1 }, 1000);
    clock.advance(900);
    cache.store('quote:AAPL', { b: 2 }, 1000);
    clock.advance(900);
    assert.deepStrictEqual(cache.lookup('quote:AAPL'), { hit: true, value: { b: 2 }, source: 'server-cache' });
  });

  it('sweeps expired entries only', () => {
    const clock = new Clock();
    const cache = new LayeredCache({ now: clock.now });
    cache.store('quote:AAPL', 1, 1000);
    cache.store('company_info:AAPL', 2, 'forever');
    clock.advance(1000);
    assert.strictEqual(cache.sweep(), 1);
    assert.strictEqual(cache.stats().entries, 1);
    assert.strictEqual(cache.stats().expired, 1);
  });
});

describe('LayeredCache client tier', () => {
  const context = {
    overview: { previousClose: { results: [{ c: 150 }] }, details: { results: { name: 'Apple Inc.' } } },
    financials: { results: [] },
    news: null,
    sentiment: { aggregate: { label: 'neutral' } },
  };

  it('takes precedence over a server-cache value for the same key', () => {
    const cache = new LayeredCache({ now: new Clock().now });
    cache.store('quote:AAPL', { results: [{ c: 1 }] }, 60_000);
    const found = cache.lookup('quote:AAPL', buildClientTier('aapl', context));
    assert.deepStrictEqual(found, { hit: true, value: { results: [{ c: 150 }] }, source: 'client' });
    assert.strictEqual(cache.stats().hits.client, 1);
  });

  it('maps key kinds onto snapshot fields', () => {
    const tier = buildClientTier('AAPL', context);
    assert.deepStrictEqual(tier.resolve('company_info:AAPL'), { results: { name: 'Apple Inc.' } });
    assert.deepStrictEqual(tier.resolve('sentiment:AAPL'), { aggregate: { label: 'neutral' } });
  });

  it('treats null, missing and empty results as absent', () => {
    const tier = buildClientTier('AAPL', context);
    assert.strictEqual(tier.resolve('financials:AAPL:4'), undefined);
    assert.strictEqual(tier.resolve('news:AAPL:10'), undefined);
    assert.strictEqual(tier.resolve('dividends:AAPL:10'), undefined);
    assert.strictEqual(isPresent({ results: [1] }), true);
    assert.strictEqual(isPresent({ results: [] }), false);
  });

  it('only resolves keys for the request ticker and known kinds', () => {
    const tier = buildClientTier('AAPL', context);
    assert.strictEqual(tier.resolve('quote:MSFT'), undefined);
    assert.strictEqual(tier.resolve('price_history:AAPL:day:2024-01-01:2024-02-01'), undefined);
    assert.strictEqual(buildClientTier('AAPL', 'not-an-object').resolve('quote:AAPL'), undefined);
  });
});

describe('LayeredCache.getOrLoad', () => {
  it('shares one load between concurrent misses and caches the value', async () => {
    const cache = new LayeredCache({ now: new Clock().now });
    let loads = 0;
    const load = async () => {
      loads++;
      await new Promise((r) => setTimeout(r, 5));
      return { price: 42 };
    };
    const [a, b] = await Promise.all([
      cache.getOrLoad('quote:AAPL', TTL.quote, load),
      cache.getOrLoad('quote:AAPL', TTL.quote, load),
    ]);
    assert.strictEqual(loads, 1);
    assert.deepStrictEqual(a, { value: { price: 42 }, source: 'live' });
    assert.deepStrictEqual(b, { value: { price: 42 }, source: 'live' });
    assert.strictEqual(cache.stats().joined, 1);

    const c = await cache.getOrLoad('quote:AAPL', TTL.quote, load);
    assert.strictEqual(c.source, 'server-cache');
    assert.strictEqual(loads, 1);
  });

  it('does not cache a failed load', async () => {
    const cache = new LayeredCache({ now: new Clock().now });
    let loads = 0;
    const failing = async () => {
      loads++;
      throw new Error('upstream down');
    };
    await assert.rejects(cache.getOrLoad('news:AAPL:10', TTL.news, failing), /upstream down/);
    await assert.rejects(cache.getOrLoad('news:AAPL:10', TTL.news, failing), /upstream down/);
    assert.strictEqual(loads, 2);
    assert.strictEqual(cache.stats().inflight, 0);
  });
});

describe('priceHistoryTtl', () => {
  const now = Date.parse('2024-06-10T12:00:00Z');

  it('uses the short ttl when the range reaches today', () => {
    assert.strictEqual(priceHistoryTtl('2024-06-10', now), TTL.openRange);
    assert.strictEqual(priceHistoryTtl('2024-06-30', now), TTL.openRange);
  });

  it('uses the long ttl for closed ranges', () => {
    assert.strictEqual(priceHistoryTtl('2024-06-09', now), TTL.closedRange);
  });
});
