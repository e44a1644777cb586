// Process-wide service graph: built once at start-up, handed to the routes, disposed on shutdown
import type { AppConfig } from './config/env.js';
import { LayeredCache } from './cache/layeredCache.js';
import { ConversationStore } from './chat/conversationStore.js';
import { PolygonClient } from './providers/polygon.js';
import type { MarketDataSource } from './providers/marketData.js';
import { RedditSource, SocialFeed, StocktwitsSource } from './providers/social.js';
import { KnowledgeBase } from './rag/knowledgeBase.js';
import { createEmbeddings } from './rag/embeddings.js';
import { CheerioArticleScraper, type ArticleScraper } from './rag/articles.js';
import { LexiconClassifier, SentimentService } from './analytics/sentiment.js';
import { ForecastService } from './analytics/forecast.js';
import { OpenAIChatModel } from './agent/llm.js';
import { ToolExecutor } from './agent/toolExecutor.js';
import { AgentLoop } from './agent/agentLoop.js';
import { logger } from './utils/logger.js';

export interface AppServices {
  cache: LayeredCache;
  conversations: ConversationStore;
  market: MarketDataSource;
  knowledge: KnowledgeBase;
  scraper: ArticleScraper;
  sentiment: Pick<SentimentService, 'analyze' | 'summary' | 'indexedPosts' | 'platforms'>;
  forecast: Pick<ForecastService, 'forecast' | 'predict' | 'status'>;
  /** null when no language model is configured; chat then answers 503. */
  agent: AgentLoop | null;
  /** Component readiness for the chat health route. */
  components(): Record<string, string>;
}

export function createServices(config: AppConfig): AppServices {
  const cache = new LayeredCache({ sweepMs: config.cache.sweepMs });
  const conversations = new ConversationStore({ ttlMs: config.conversations.ttlMs, sweepMs: config.conversations.sweepMs });
  const market = new PolygonClient(config.polygon);
  const knowledge = new KnowledgeBase(createEmbeddings({
    embeddings: config.rag.embeddings,
    embedDim: config.rag.embedDim,
    openaiApiKey: config.openai.apiKey,
    openaiModel: config.openai.embeddingModel,
  }));
  const classifier = new LexiconClassifier();
  const sentiment = new SentimentService(
    new SocialFeed([new StocktwitsSource(), new RedditSource()], config.social.postsPerPlatform),
    classifier,
    knowledge
  );
  const forecast = new ForecastService(market);
  const executor = new ToolExecutor({ cache, market, knowledge, sentiment, forecast });

  let agent: AgentLoop | null = null;
  if (config.openai.apiKey) {
    agent = new AgentLoop({
      model: new OpenAIChatModel({ apiKey: config.openai.apiKey, model: config.openai.model }),
      tools: executor,
      store: conversations,
      maxIterations: config.agent.maxIterations,
      historyTurns: config.agent.historyTurns,
    });
  } else {
    logger.warn('chat_agent_disabled_missing_openai_key');
  }
  if (!config.polygon.apiKey) logger.warn('polygon_api_key_missing');

  return {
    cache,
    conversations,
    market,
    knowledge,
    scraper: new CheerioArticleScraper(),
    sentiment,
    forecast,
    agent,
    components: () => ({
      llm: agent ? 'configured' : 'not_configured',
      market_data: config.polygon.apiKey ? 'configured' : 'not_configured',
      embeddings: config.rag.embeddings,
      sentiment_lexicon: classifier.status,
    }),
  };
}

export function disposeServices(services: AppServices): void {
  services.cache.dispose();
  services.conversations.dispose();
}
