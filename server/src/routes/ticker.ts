// Market-data proxy for the dashboard. Provider JSON passes through untouched; the
// server cache tier sits in front with the same keys the agent's tools use.
import express, { type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../utils/asyncHandler.js';
import { ValidationUtils } from '../shared/utils/validation.utils.js';
import { cacheKey, type Ttl } from '../cache/layeredCache.js';
import { TTL, priceHistoryTtl } from '../cache/ttlPolicy.js';
import type { MarketParams, ResourceKind } from '../providers/marketData.js';
import type { AppServices } from '../services.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const LimitQuery = (def: number, max: number) =>
  z.object({ limit: z.coerce.number().int().min(1).max(max).default(def) });

const AggregatesQuery = z
  .object({
    from: isoDate,
    to: isoDate,
    timespan: z.enum(['minute', 'hour', 'day', 'week', 'month']).default('day'),
  })
  .refine((q) => q.from <= q.to, { message: 'from must not be after to', path: ['from'] });

export function createTickerRouter(services: AppServices) {
  const router = express.Router();
  const { cache, market } = services;

  const proxy = async (res: Response, key: string, ttl: Ttl, kind: ResourceKind, ticker: string, params?: MarketParams) => {
    const { value, source } = await cache.getOrLoad(key, ttl, () => market.fetch(kind, ticker, params));
    res.setHeader('X-Cache-Source', source);
    res.json(value);
  };

  router.get('/ticker/:ticker/details', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    await proxy(res, cacheKey('company_info', t), TTL.companyInfo, 'details', t);
  }));

  router.get('/ticker/:ticker/previous-close', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    await proxy(res, cacheKey('quote', t), TTL.quote, 'previous_close', t);
  }));

  router.get('/ticker/:ticker/aggregates', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { from, to, timespan } = ValidationUtils.parse(AggregatesQuery, req.query);
    await proxy(res, cacheKey('price_history', t, timespan, from, to), priceHistoryTtl(to), 'aggregates', t, { from, to, timespan });
  }));

  router.get('/ticker/:ticker/news', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { limit } = ValidationUtils.parse(LimitQuery(10, 50), req.query);
    await proxy(res, cacheKey('news', t, limit), TTL.news, 'news', t, { limit });
  }));

  router.get('/ticker/:ticker/financials', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { limit } = ValidationUtils.parse(LimitQuery(4, 8), req.query);
    await proxy(res, cacheKey('financials', t, limit), TTL.financials, 'financials', t, { limit });
  }));

  router.get('/ticker/:ticker/snapshot', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    await proxy(res, cacheKey('snapshot', t), TTL.snapshot, 'snapshot', t);
  }));

  router.get('/ticker/:ticker/dividends', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { limit } = ValidationUtils.parse(LimitQuery(10, 50), req.query);
    await proxy(res, cacheKey('dividends', t, limit), TTL.dividends, 'dividends', t, { limit });
  }));

  router.get('/ticker/:ticker/splits', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { limit } = ValidationUtils.parse(LimitQuery(10, 50), req.query);
    await proxy(res, cacheKey('splits', t, limit), TTL.splits, 'splits', t, { limit });
  }));

  router.get('/market-status', asyncHandler(async (_req, res) => {
    await proxy(res, cacheKey('market_status', 'us'), TTL.marketStatus, 'market_status', '');
  }));

  return router;
}
