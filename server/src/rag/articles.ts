// Scrape news articles the dashboard already listed and embed them into the `news` namespace
import crypto from 'crypto';
import { z } from 'zod';
import { CheerioWebBaseLoader } from '@langchain/community/document_loaders/web/cheerio';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { KnowledgeBase } from './knowledgeBase.js';

export const MAX_ARTICLES = 20;
export const SCRAPE_CONCURRENCY = 5;
const MIN_FALLBACK_CHARS = 50;

export const ArticleSchema = z
  .object({
    article_url: z.string().default(''),
    title: z.string().default(''),
    description: z.string().nullable().default(''),
    published_utc: z.string().default(''),
    publisher: z.object({ name: z.string().default('Unknown') }).passthrough().nullable().optional(),
  })
  .passthrough();

export type Article = z.infer<typeof ArticleSchema>;

export interface ScrapeReport {
  scraped: number;
  embedded: number;
  failed: number;
  skipped: number;
}

export interface ArticleScraper {
  scrape(url: string): Promise<string>;
}

/** Full-page text via LangChain's cheerio loader (paragraph text only). */
export class CheerioArticleScraper implements ArticleScraper {
  async scrape(url: string): Promise<string> {
    const docs = await new CheerioWebBaseLoader(url, { selector: 'p', timeout: 10000 }).load();
    return docs
      .map((d) => d.pageContent)
      .join('\n')
      .replace(/[ \t]+/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}

export function articleDocId(ticker: string, url: string): string {
  const hash = crypto.createHash('md5').update(url).digest('hex').slice(0, 12);
  return `${ticker.toUpperCase()}_news_${hash}`;
}

/** What an article is deduplicated on: its url, or its title and description when it has none. */
export function articleKey(article: Article): string {
  return article.article_url || `${article.title}\n${article.description ?? ''}`;
}

async function mapPool<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const out = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const i = next++;
      const item = items[i];
      if (item !== undefined) out[i] = await fn(item);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return out;
}

type Outcome = 'embedded' | 'skipped' | 'failed';

export async function scrapeAndEmbed(
  kb: KnowledgeBase,
  scraper: ArticleScraper,
  ticker: string,
  articles: Article[]
): Promise<ScrapeReport> {
  const symbol = ticker.toUpperCase();
  const ingestOne = async (article: Article): Promise<Outcome> => {
    const url = article.article_url;
    const id = articleDocId(symbol, articleKey(article));
    if (kb.has('news', id)) return 'skipped';
    let content = '';
    if (url) {
      try {
        content = await scraper.scrape(url);
      } catch (err) {
        logger.warn({ url, err: errorMessage(err) }, 'article_scrape_failed');
      }
    }
    if (!content) {
      content = (article.description ?? '').trim();
      if (content.length < MIN_FALLBACK_CHARS) return 'failed';
    }
    try {
      const { added } = await kb.upsert('news', [{
        id,
        ticker: symbol,
        text: article.title ? `${article.title}\n\n${content}` : content,
        metadata: {
          type: 'news_article',
          title: article.title,
          url,
          published_date: article.published_utc,
          source: article.publisher?.name ?? 'Unknown',
        },
      }]);
      return added ? 'embedded' : 'skipped';
    } catch (err) {
      logger.error({ url, err }, 'article_embed_failed');
      return 'failed';
    }
  };

  const outcomes = await mapPool(articles.slice(0, MAX_ARTICLES), SCRAPE_CONCURRENCY, ingestOne);
  const report: ScrapeReport = { scraped: 0, embedded: 0, failed: 0, skipped: 0 };
  for (const o of outcomes) {
    if (o === 'embedded') { report.embedded++; report.scraped++; }
    else if (o === 'skipped') report.skipped++;
    else report.failed++;
  }
  logger.info({ ticker: symbol, ...report }, 'articles_ingested');
  return report;
}
