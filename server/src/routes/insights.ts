import express from 'express';
import { z } from 'zod';
import { asyncHandler } from '../utils/asyncHandler.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { cacheKey } from '../cache/layeredCache.js';
import { TTL } from '../cache/ttlPolicy.js';
import type { AppServices } from '../services.js';
import { ValidationUtils } from '../shared/utils/validation.utils.js';
import { dashboardSentiment } from '../analytics/sentiment.js';
import { barsFromAggregates } from '../analytics/forecast.js';

const ForecastQuery = z.object({ horizon: z.coerce.number().int().min(1).max(30).default(7) });

const AnalyzeBody = z.object({
  ticker: z.string({ required_error: 'Ticker symbol required' }),
  force_refresh: z.boolean().optional(),
});

const PostsQuery = z.object({
  platform: z.enum(['all', 'stocktwits', 'reddit', 'twitter']).default('all'),
  sentiment: z.enum(['all', 'positive', 'negative', 'neutral']).default('all'),
  limit: z.coerce.number().int().min(1).default(50).transform((n) => Math.min(n, 100)),
  offset: z.coerce.number().int().min(0).default(0),
});

const PredictBody = z.object({
  historical_data: z.array(z.unknown()).optional(),
  force_retrain: z.boolean().optional(),
});

export function createInsightsRouter(services: AppServices) {
  const router = express.Router();
  const { cache } = services;

  // Sentiment: dashboard routes answer in the dashboard's own field layout

  router.get('/sentiment/health', (_req, res) => {
    const platforms = services.sentiment.platforms();
    res.json({
      status: 'healthy',
      model: 'afinn+finance-lexicon',
      model_loaded: services.components().sentiment_lexicon === 'ready',
      platforms: {
        stocktwits: platforms.includes('stocktwits'),
        reddit: platforms.includes('reddit'),
        twitter: false,
      },
    });
  });

  router.post('/sentiment/analyze', asyncHandler(async (req, res) => {
    const { ticker } = ValidationUtils.parse(AnalyzeBody, req.body);
    const t = ValidationUtils.requireSymbol(ticker);
    const report = await services.sentiment.analyze(t);
    // the agent's sentiment tool reads the same entry
    cache.store(cacheKey('sentiment', t), report, TTL.sentiment);
    res.json(dashboardSentiment(report));
  }));

  router.get('/sentiment/summary/:ticker', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    res.json(await services.sentiment.summary(t));
  }));

  router.get('/sentiment/posts/:ticker', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { platform, sentiment, limit, offset } = ValidationUtils.parse(PostsQuery, req.query);
    const indexed = await services.sentiment.indexedPosts(t, limit + offset + 50);
    const matching = indexed.filter(
      (p) => (platform === 'all' || p.platform === platform) && (sentiment === 'all' || p.sentiment.label === sentiment)
    );
    res.json({
      posts: matching.slice(offset, offset + limit).map((p) => ({
        id: p.id,
        platform: p.platform,
        content: p.content,
        author: p.author,
        timestamp: p.timestamp,
        sentiment: { label: p.sentiment.label, score: p.sentiment.score },
        engagement: { likes: p.likes, comments: p.comments, score: p.engagement },
        url: p.url,
      })),
      total: matching.length,
      limit,
      offset,
      filters: { platform, sentiment },
    });
  }));

  router.get('/sentiment/:ticker', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { value, source } = await cache.getOrLoad(cacheKey('sentiment', t), TTL.sentiment, () => services.sentiment.analyze(t));
    res.json(ResponseUtils.success(value, undefined, { source }));
  }));

  // Forecast

  router.get('/forecast/health', (_req, res) => {
    res.json({ status: 'healthy', service: 'forecast', method: 'statistical', requires_training: false });
  });

  router.post('/forecast/predict/:ticker', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { historical_data } = ValidationUtils.parse(PredictBody, req.body);
    const bars = barsFromAggregates({ results: historical_data ?? [] });
    res.json(await services.forecast.predict(t, bars));
  }));

  router.get('/forecast/status/:ticker', (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    res.json(services.forecast.status(t));
  });

  router.get('/forecast/:ticker', asyncHandler(async (req, res) => {
    const t = ValidationUtils.requireSymbol(req.params.ticker);
    const { horizon } = ValidationUtils.parse(ForecastQuery, req.query);
    const { value, source } = await cache.getOrLoad(cacheKey('forecast', t, horizon), TTL.forecast, () => services.forecast.forecast(t, horizon));
    res.json(ResponseUtils.success(value, undefined, { source }));
  }));

  return router;
}
