import express from 'express';
import { z } from 'zod';
import { asyncHandler } from '../utils/asyncHandler.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { HttpError } from '../shared/errors.js';
import { TICKER_RE, ValidationUtils } from '../shared/utils/validation.utils.js';
import { getMetricsSnapshot } from '../utils/metrics.js';
import { buildClientTier } from '../cache/clientContext.js';
import { openEventStream, pipeEvents } from '../chat/sse.js';
import { ArticleSchema, scrapeAndEmbed } from '../rag/articles.js';
import type { AppServices } from '../services.js';

const ChatBody = z.object({
  ticker: z.string().trim().regex(TICKER_RE, 'ticker must be 1-10 letters, digits, "." or "-"'),
  message: z.string().trim().min(1, 'message is required').max(4000),
  context: z.unknown().optional(),
  conversation_id: z.string().trim().min(1).max(200).default('default'),
});

const ScrapeBody = z.object({
  ticker: z.string().trim().regex(TICKER_RE, 'ticker must be 1-10 letters, digits, "." or "-"'),
  articles: z.array(ArticleSchema).default([]),
});

export function createChatRouter(services: AppServices) {
  const router = express.Router();

  // Streamed agent answer: tool_call / text / done / error event blocks
  router.post('/chat/message', asyncHandler(async (req, res) => {
    const body = ValidationUtils.parse(ChatBody, req.body);
    const { agent } = services;
    if (!agent) throw new HttpError(503, 'Chat agent unavailable: no language model configured');
    const ticker = body.ticker.toUpperCase();
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });
    openEventStream(res);
    await pipeEvents(agent.run({
      conversationId: body.conversation_id,
      ticker,
      message: body.message,
      client: buildClientTier(ticker, body.context),
      signal: controller.signal,
    }), res);
  }));

  router.get('/chat/conversations/:id', (req, res) => {
    const messages = services.conversations
      .get(req.params.id)
      .flatMap((t) => (t.role !== 'tool' && t.content ? [{ role: t.role, content: t.content }] : []));
    res.json(ResponseUtils.success({ conversation_id: req.params.id, messages }));
  });

  router.delete('/chat/clear/:id', (req, res) => {
    const cleared = services.conversations.clear(req.params.id);
    res.json(ResponseUtils.success({ conversation_id: req.params.id, cleared }));
  });

  router.post('/chat/scrape-articles', asyncHandler(async (req, res) => {
    const { ticker, articles } = ValidationUtils.parse(ScrapeBody, req.body);
    if (!articles.length) {
      return res.json(ResponseUtils.success({ scraped: 0, embedded: 0, failed: 0, skipped: 0 }, 'No articles provided'));
    }
    const report = await scrapeAndEmbed(services.knowledge, services.scraper, ticker, articles);
    res.json(ResponseUtils.success(report));
  }));

  router.get('/chat/health', (_req, res) => {
    res.json(ResponseUtils.success({
      status: 'healthy',
      components: services.components(),
      knowledge_base: services.knowledge.stats(),
      cache: services.cache.stats(),
      conversations: services.conversations.size(),
      upstreams: getMetricsSnapshot(),
    }));
  });

  return router;
}
