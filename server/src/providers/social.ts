// Public social feeds (no credentials): StockTwits symbol stream + Reddit search JSON
import { z } from 'zod';
import { fetchWithRetry } from '../utils/fetchRetry.js';
import { logger } from '../utils/logger.js';
import { UpstreamError, errorMessage } from '../shared/errors.js';

export type Platform = 'stocktwits' | 'reddit';

export interface SocialPost {
  id: string;
  platform: Platform;
  ticker: string;
  content: string;
  author: string;
  timestamp: string;
  /** Likes plus comments; weights the post in the aggregate. */
  engagement: number;
  likes: number;
  comments: number;
  url: string;
  /** Label the platform itself attached, when it has one (StockTwits "Bullish"/"Bearish"). */
  platformLabel?: string;
}

export interface SocialSource {
  readonly platform: Platform;
  fetchPosts(ticker: string, limit: number): Promise<SocialPost[]>;
}

const USER_AGENT = 'ticker-chat-agent/1.0';
const MAX_CONTENT = 2000;

const StocktwitsBody = z.object({
  response: z.object({ status: z.number() }).passthrough().optional(),
  messages: z
    .array(
      z
        .object({
          id: z.union([z.number(), z.string()]),
          body: z.string().default(''),
          created_at: z.string().default(''),
          user: z.object({ username: z.string().default('unknown') }).passthrough().optional(),
          likes: z.object({ total: z.number().default(0) }).passthrough().optional(),
          entities: z
            .object({ sentiment: z.object({ basic: z.string() }).passthrough().nullable().optional() })
            .passthrough()
            .optional(),
        })
        .passthrough()
    )
    .default([]),
});

export function parseStocktwits(body: unknown, ticker: string): SocialPost[] {
  const parsed = StocktwitsBody.safeParse(body);
  if (!parsed.success) throw new UpstreamError('stocktwits', 'malformed stream payload');
  if (parsed.data.response && parsed.data.response.status !== 200) {
    throw new UpstreamError('stocktwits', `stream status ${parsed.data.response.status}`);
  }
  const symbol = ticker.toUpperCase();
  const posts: SocialPost[] = [];
  for (const msg of parsed.data.messages) {
    const content = msg.body.trim();
    if (!content) continue;
    const username = msg.user?.username ?? 'unknown';
    const post: SocialPost = {
      id: `stocktwits_${msg.id}`,
      platform: 'stocktwits',
      ticker: symbol,
      content: content.slice(0, MAX_CONTENT),
      author: username,
      timestamp: msg.created_at,
      engagement: msg.likes?.total ?? 0,
      likes: msg.likes?.total ?? 0,
      comments: 0,
      url: `https://stocktwits.com/${username}/message/${msg.id}`,
    };
    const label = msg.entities?.sentiment?.basic;
    if (label) post.platformLabel = label;
    posts.push(post);
  }
  return posts;
}

const RedditBody = z.object({
  data: z.object({
    children: z.array(
      z.object({
        data: z
          .object({
            id: z.string(),
            title: z.string().default(''),
            selftext: z.string().default(''),
            author: z.string().nullable().default(null),
            created_utc: z.number(),
            score: z.number().default(0),
            num_comments: z.number().default(0),
            permalink: z.string().default(''),
          })
          .passthrough(),
      })
    ),
  }),
});

export function parseReddit(body: unknown, ticker: string): SocialPost[] {
  const parsed = RedditBody.safeParse(body);
  if (!parsed.success) throw new UpstreamError('reddit', 'malformed search payload');
  const posts: SocialPost[] = [];
  for (const { data: sub } of parsed.data.data.children) {
    let content = sub.selftext ? `${sub.title}\n\n${sub.selftext}` : sub.title;
    content = content.trim();
    if (!content) continue;
    if (content.length > MAX_CONTENT) content = `${content.slice(0, MAX_CONTENT)}...`;
    posts.push({
      id: `reddit_${sub.id}`,
      platform: 'reddit',
      ticker: ticker.toUpperCase(),
      content,
      author: sub.author ?? '[deleted]',
      timestamp: new Date(sub.created_utc * 1000).toISOString(),
      engagement: sub.score + sub.num_comments,
      likes: sub.score,
      comments: sub.num_comments,
      url: `https://reddit.com${sub.permalink}`,
    });
  }
  return posts;
}

async function getJson(url: string, label: string): Promise<unknown> {
  const res = await fetchWithRetry(url, { headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' } }, {
    retries: 2,
    timeoutMs: 10000,
    label,
  });
  if (!res.ok) throw new UpstreamError(label, `HTTP ${res.status}`, res.status);
  return res.json();
}

export class StocktwitsSource implements SocialSource {
  readonly platform = 'stocktwits' as const;

  async fetchPosts(ticker: string, limit: number): Promise<SocialPost[]> {
    const url = `https://api.stocktwits.com/api/2/streams/symbol/${encodeURIComponent(ticker.toUpperCase())}.json`;
    return parseStocktwits(await getJson(url, 'stocktwits'), ticker).slice(0, limit);
  }
}

export class RedditSource implements SocialSource {
  readonly platform = 'reddit' as const;

  constructor(private readonly subreddits: string[] = ['wallstreetbets', 'stocks', 'investing']) {}

  async fetchPosts(ticker: string, limit: number): Promise<SocialPost[]> {
    const perSub = Math.max(1, Math.ceil(limit / this.subreddits.length));
    const seen = new Set<string>();
    const posts: SocialPost[] = [];
    for (const sub of this.subreddits) {
      if (posts.length >= limit) break;
      const q = new URLSearchParams({ q: `$${ticker.toUpperCase()} OR ${ticker.toUpperCase()}`, restrict_sr: '1', sort: 'relevance', t: 'week', limit: String(perSub) });
      try {
        const batch = parseReddit(await getJson(`https://www.reddit.com/r/${sub}/search.json?${q.toString()}`, 'reddit'), ticker);
        for (const post of batch) {
          if (seen.has(post.id)) continue;
          seen.add(post.id);
          posts.push(post);
        }
      } catch (err) {
        logger.warn({ subreddit: sub, ticker, err: errorMessage(err) }, 'reddit_subreddit_failed');
      }
    }
    return posts.slice(0, limit);
  }
}

/** Sentiment-source collaborator: every platform, failures logged and skipped. */
export class SocialFeed {
  constructor(private readonly sources: SocialSource[], private readonly perPlatform = 30) {}

  async fetchPosts(ticker: string): Promise<SocialPost[]> {
    const settled = await Promise.allSettled(this.sources.map((s) => s.fetchPosts(ticker, this.perPlatform)));
    const posts: SocialPost[] = [];
    settled.forEach((outcome, i) => {
      const platform = this.sources[i]?.platform;
      if (outcome.status === 'fulfilled') {
        posts.push(...outcome.value);
      } else {
        logger.warn({ platform, ticker, err: errorMessage(outcome.reason) }, 'social_platform_failed');
      }
    });
    return posts;
  }

  platforms(): Platform[] {
    return this.sources.map((s) => s.platform);
  }
}
