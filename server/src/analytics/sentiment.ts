import fs from 'fs/promises';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import Sentiment from 'sentiment';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../shared/errors.js';
import { LazyResource } from '../shared/lazyResource.js';
import type { KnowledgeBase, SearchHit } from '../rag/knowledgeBase.js';
import type { Platform, SocialPost } from '../providers/social.js';

export type PostLabel = 'positive' | 'negative' | 'neutral';
export type AggregateLabel = 'bullish' | 'bearish' | 'neutral';

export interface Classification {
  label: PostLabel;
  /** -1..1 */
  score: number;
  /** 0..1 */
  confidence: number;
}

export interface ClassifiedPost extends SocialPost {
  sentiment: Classification;
}

export interface SentimentPolicy {
  minConfidence: number;
  neutralBias: number;
  bullishAbove: number;
  bearishBelow: number;
  recencyWeight(hoursOld: number): number;
  engagementWeight(engagement: number): number;
}

// Social chatter skews bullish; neutral posts pull slightly negative and the bullish bar is higher.
export const DEFAULT_POLICY: SentimentPolicy = {
  minConfidence: 0.6,
  neutralBias: -0.05,
  bullishAbove: 0.3,
  bearishBelow: -0.15,
  recencyWeight: (h) => (h < 24 ? 2 : h < 72 ? 1.5 : 1),
  engagementWeight: (e) => Math.log(2 + Math.max(0, e)),
};

export interface SentimentAggregate {
  score: number;
  label: AggregateLabel;
  confidence: number;
  postCount: number;
  includedCount: number;
  distribution: Record<PostLabel, number>;
  sources: Record<Platform, number>;
}

export interface ReportPost {
  id: string;
  platform: Platform;
  content: string;
  author: string;
  timestamp: string;
  engagement: number;
  likes: number;
  comments: number;
  url: string;
  sentiment: Classification;
}

export interface SentimentReport {
  ticker: string;
  aggregate: SentimentAggregate;
  posts: ReportPost[];
  scraped: number;
  embedded: number;
  /** Posts that could not be indexed. */
  failed: number;
  analyzedAt: string;
}

/** Aggregate over already indexed posts, without fetching the feeds again. */
export interface SentimentSummary {
  ticker: string;
  aggregate_score: number;
  label: AggregateLabel;
  confidence: number;
  post_count: number;
  last_updated: string | null;
}

/** Report in the field layout the dashboard's sentiment tab reads. */
export interface DashboardSentiment {
  ticker: string;
  aggregate: {
    score: number;
    label: AggregateLabel;
    confidence: number;
    post_count: number;
    sources: Record<Platform, number>;
  };
  posts: Array<{
    id: string;
    platform: Platform;
    content: string;
    author: string;
    timestamp: string;
    sentiment: { label: PostLabel; score: number };
    engagement: { likes: number; comments: number; score: number };
    url: string;
  }>;
  scraped: number;
  embedded: number;
  failed: number;
  analyzed_at: string;
}

export function dashboardSentiment(report: SentimentReport): DashboardSentiment {
  const { aggregate } = report;
  return {
    ticker: report.ticker,
    aggregate: {
      score: aggregate.score,
      label: aggregate.label,
      confidence: aggregate.confidence,
      post_count: aggregate.postCount,
      sources: aggregate.sources,
    },
    posts: report.posts.map((p) => ({
      id: p.id,
      platform: p.platform,
      content: p.content,
      author: p.author,
      timestamp: p.timestamp,
      sentiment: { label: p.sentiment.label, score: p.sentiment.score },
      engagement: { likes: p.likes, comments: p.comments, score: p.engagement },
      url: p.url,
    })),
    scraped: report.scraped,
    embedded: report.embedded,
    failed: report.failed,
    analyzed_at: report.analyzedAt,
  };
}

const round3 = (n: number) => Math.round(n * 1000) / 1000;

function hoursSince(timestamp: string, now: number): number | null {
  const t = Date.parse(timestamp);
  return Number.isFinite(t) ? (now - t) / 3_600_000 : null;
}

export function aggregateSentiment(
  posts: ClassifiedPost[],
  now: number = Date.now(),
  policy: SentimentPolicy = DEFAULT_POLICY
): SentimentAggregate {
  const distribution: Record<PostLabel, number> = { positive: 0, negative: 0, neutral: 0 };
  const sources: Record<Platform, number> = { stocktwits: 0, reddit: 0 };
  let weightedSum = 0;
  let totalWeight = 0;
  let included = 0;
  for (const post of posts) {
    const { label, confidence } = post.sentiment;
    distribution[label]++;
    sources[post.platform]++;
    if (confidence < policy.minConfidence) continue;
    included++;
    const base = label === 'positive' ? 1 : label === 'negative' ? -1 : policy.neutralBias;
    const hours = hoursSince(post.timestamp, now);
    const recency = hours === null ? 1 : policy.recencyWeight(hours);
    const weight = confidence * recency * policy.engagementWeight(post.engagement);
    weightedSum += base * weight;
    totalWeight += weight;
  }
  const score = totalWeight > 0 ? weightedSum / totalWeight : 0;
  const label: AggregateLabel = score < policy.bearishBelow ? 'bearish' : score > policy.bullishAbove ? 'bullish' : 'neutral';
  return {
    score: round3(score),
    label,
    confidence: round3(Math.min(1, totalWeight / Math.max(1, included) / 2)),
    postCount: posts.length,
    includedCount: included,
    distribution,
    sources,
  };
}

export interface PostClassifier {
  classifyPost(post: SocialPost): Promise<Classification>;
}

function lexiconPath(): string {
  // sources run from server/src/analytics, the build from dist/analytics
  const candidates = ['../../data/finance-lexicon.json', '../../server/data/finance-lexicon.json']
    .map((rel) => fileURLToPath(new URL(rel, import.meta.url)));
  return candidates.find((p) => existsSync(p)) ?? candidates[0] ?? '';
}

async function readLexicon(file: string): Promise<Record<string, number>> {
  const raw: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
  const out: Record<string, number> = {};
  if (typeof raw === 'object' && raw !== null) {
    for (const [word, value] of Object.entries(raw)) {
      if (typeof value === 'number') out[word.toLowerCase()] = value;
    }
  }
  return out;
}

/** Polarity from AFINN (`sentiment`) extended with a finance lexicon; tanh keeps it in -1..1. */
export function classifyWith(analyzer: Sentiment, extras: Record<string, number>, text: string, platformLabel?: string): Classification {
  const result = analyzer.analyze(text, { extras });
  const polarity = Math.tanh(result.score / 4);
  const hits = result.positive.length + result.negative.length;
  if (platformLabel === 'Bullish' || platformLabel === 'Bearish') {
    // the author tagged it themselves
    return { label: platformLabel === 'Bullish' ? 'positive' : 'negative', score: round3(platformLabel === 'Bullish' ? Math.max(polarity, 0.5) : Math.min(polarity, -0.5)), confidence: 0.9 };
  }
  if (Math.abs(polarity) >= 0.2) {
    return { label: polarity > 0 ? 'positive' : 'negative', score: round3(polarity), confidence: round3(0.5 + Math.abs(polarity) / 2) };
  }
  return { label: 'neutral', score: round3(polarity), confidence: hits === 0 ? 0.6 : round3(0.8 - Math.abs(polarity)) };
}

export class LexiconClassifier implements PostClassifier {
  private analyzer = new Sentiment();
  private lexicon: LazyResource<Record<string, number>>;

  constructor(file: string = lexiconPath()) {
    this.lexicon = new LazyResource('finance-lexicon', () => readLexicon(file));
  }

  get status() {
    return this.lexicon.status;
  }

  async classifyPost(post: SocialPost): Promise<Classification> {
    const extras = await this.lexicon.get();
    return classifyWith(this.analyzer, extras, post.content, post.platformLabel);
  }
}

export interface PostFeed {
  fetchPosts(ticker: string): Promise<SocialPost[]>;
  platforms(): Platform[];
}

function postFromHit(hit: SearchHit, ticker: string): ClassifiedPost | null {
  const m = hit.metadata;
  const text = (key: string) => {
    const v = m[key];
    return typeof v === 'string' ? v : '';
  };
  const num = (key: string) => {
    const v = m[key];
    return typeof v === 'number' ? v : 0;
  };
  const platform = text('platform');
  const label = text('sentiment_label');
  if (platform !== 'stocktwits' && platform !== 'reddit') return null;
  if (label !== 'positive' && label !== 'negative' && label !== 'neutral') return null;
  return {
    id: text('docId'),
    platform,
    ticker,
    content: text('content') || hit.text,
    author: text('author'),
    timestamp: text('timestamp'),
    engagement: num('engagement'),
    likes: num('likes'),
    comments: num('comments'),
    url: text('url'),
    sentiment: { label, score: num('sentiment_score'), confidence: num('sentiment_confidence') },
  };
}

const newestFirst = (a: { timestamp: string }, b: { timestamp: string }) =>
  (Date.parse(b.timestamp) || 0) - (Date.parse(a.timestamp) || 0);

export class SentimentService {
  constructor(
    private readonly feed: PostFeed,
    private readonly classifier: PostClassifier,
    private readonly kb?: KnowledgeBase,
    private readonly policy: SentimentPolicy = DEFAULT_POLICY,
    private readonly now: () => number = Date.now
  ) {}

  platforms(): Platform[] {
    return this.feed.platforms();
  }

  async analyze(ticker: string): Promise<SentimentReport> {
    const symbol = ticker.toUpperCase();
    const raw = await this.feed.fetchPosts(symbol);
    const posts: ClassifiedPost[] = [];
    for (const post of raw) posts.push({ ...post, sentiment: await this.classifier.classifyPost(post) });

    let embedded = 0;
    let failed = 0;
    if (this.kb && posts.length) {
      try {
        const res = await this.kb.upsert('sentiment', posts.map((p) => ({
          id: p.id,
          ticker: symbol,
          text: p.content,
          metadata: {
            type: 'social_post',
            platform: p.platform,
            content: p.content.slice(0, 500),
            author: p.author,
            timestamp: p.timestamp,
            engagement: p.engagement,
            likes: p.likes,
            comments: p.comments,
            sentiment_label: p.sentiment.label,
            sentiment_score: p.sentiment.score,
            sentiment_confidence: p.sentiment.confidence,
            url: p.url,
          },
        })));
        embedded = res.added;
      } catch (err) {
        failed = posts.length;
        logger.warn({ ticker: symbol, err: errorMessage(err) }, 'sentiment_index_failed');
      }
    }

    const aggregate = aggregateSentiment(posts, this.now(), this.policy);
    const ranked = [...posts].sort((a, b) => b.engagement - a.engagement || b.timestamp.localeCompare(a.timestamp));
    logger.info({ ticker: symbol, label: aggregate.label, score: aggregate.score, posts: posts.length }, 'sentiment_analyzed');
    return {
      ticker: symbol,
      aggregate,
      posts: ranked.slice(0, 50).map((p) => ({
        id: p.id,
        platform: p.platform,
        content: p.content.slice(0, 500),
        author: p.author,
        timestamp: p.timestamp,
        engagement: p.engagement,
        likes: p.likes,
        comments: p.comments,
        url: p.url,
        sentiment: p.sentiment,
      })),
      scraped: posts.length,
      embedded,
      failed,
      analyzedAt: new Date(this.now()).toISOString(),
    };
  }

  /** Posts already in the index for a ticker, one per post, newest first. */
  async indexedPosts(ticker: string, topK: number): Promise<ClassifiedPost[]> {
    if (!this.kb) return [];
    const symbol = ticker.toUpperCase();
    const hits = await this.kb.semanticSearch(`${symbol} stock social media`, 'sentiment', topK, symbol);
    const seen = new Set<string>();
    const posts: ClassifiedPost[] = [];
    for (const hit of hits) {
      const post = postFromHit(hit, symbol);
      if (!post || seen.has(post.id)) continue;
      seen.add(post.id);
      posts.push(post);
    }
    return posts.sort(newestFirst);
  }

  async summary(ticker: string): Promise<SentimentSummary> {
    const symbol = ticker.toUpperCase();
    const posts = await this.indexedPosts(symbol, 100);
    const aggregate = aggregateSentiment(posts, this.now(), this.policy);
    return {
      ticker: symbol,
      aggregate_score: aggregate.score,
      label: aggregate.label,
      confidence: aggregate.confidence,
      post_count: posts.length,
      last_updated: posts[0]?.timestamp ?? null,
    };
  }
}
