import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import { logger } from './utils/logger.js';
import { notFoundHandler, errorHandler } from './middleware/errorHandler.js';
import { ResponseUtils } from './shared/utils/response.utils.js';
import { createChatRouter } from './routes/chat.js';
import { createTickerRouter } from './routes/ticker.js';
import { createInsightsRouter } from './routes/insights.js';
import type { AppServices } from './services.js';

export interface AppOptions {
  /** Per-IP request budget for /api. */
  rateLimit?: { windowMs: number; max: number };
}

export function createApp(services: AppServices, opts: AppOptions = {}) {
  const { windowMs, max } = opts.rateLimit ?? { windowMs: 15 * 60 * 1000, max: 1000 };
  const app = express();
  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false
  }));
  app.use(compression({
    filter: (req, res) => {
      // event streams must reach the client unbuffered
      if (String(res.getHeader('Content-Type') ?? '').startsWith('text/event-stream')) return false;
      return compression.filter(req, res);
    },
    threshold: 1024
  }));
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({ method: req.method, url: req.originalUrl, status: res.statusCode, ms: Date.now() - start }, 'http_request');
    });
    next();
  });

  app.get('/health', (_req, res) => res.json(ResponseUtils.success(true)));

  app.use('/api', rateLimit({
    windowMs,
    max,
    message: ResponseUtils.rateLimited('Too many requests from this IP, please try again later'),
    standardHeaders: true,
    legacyHeaders: false
  }));
  app.use('/api', createChatRouter(services));
  app.use('/api', createTickerRouter(services));
  app.use('/api', createInsightsRouter(services));

  // 404 handler
  app.use(notFoundHandler);

  // Central error handler (must be last)
  app.use(errorHandler);

  return app;
}
