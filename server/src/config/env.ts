import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  POLYGON_API_KEY: z.string().default(''),
  POLYGON_BASE_URL: z.string().url().default('https://api.polygon.io'),
  POLYGON_RATE_LIMIT_RPM: z.coerce.number().int().positive().default(5),
  POLYGON_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60000).default(10000),

  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  RAG_EMBEDDINGS: z.enum(['openai', 'local']).optional(),
  RAG_EMBED_DIM: z.coerce.number().int().min(16).max(4096).default(512),

  AGENT_MAX_ITERATIONS: z.coerce.number().int().min(1).max(20).default(5),
  AGENT_HISTORY_TURNS: z.coerce.number().int().min(2).max(500).default(40),
  CONVERSATION_TTL_HOURS: z.coerce.number().positive().default(24),
  CACHE_SWEEP_MS: z.coerce.number().int().min(1000).default(300000),
  SOCIAL_POSTS_PER_PLATFORM: z.coerce.number().int().min(1).max(100).default(30),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(15 * 60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(1000),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  port: number;
  env: string;
  polygon: { apiKey: string; baseUrl: string; rateLimitRpm: number; timeoutMs: number };
  openai: { apiKey: string; model: string; embeddingModel: string };
  rag: { embeddings: 'openai' | 'local'; embedDim: number };
  agent: { maxIterations: number; historyTurns: number };
  conversations: { ttlMs: number; sweepMs: number };
  cache: { sweepMs: number };
  social: { postsPerPlatform: number };
  rateLimit: { windowMs: number; max: number };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings in .env files mean "unset"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const env = parsed.data;
  return {
    port: env.PORT,
    env: env.NODE_ENV,
    polygon: {
      apiKey: env.POLYGON_API_KEY,
      baseUrl: env.POLYGON_BASE_URL.replace(/\/+$/, ''),
      rateLimitRpm: env.POLYGON_RATE_LIMIT_RPM,
      timeoutMs: env.POLYGON_TIMEOUT_MS,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL,
    },
    rag: {
      embeddings: env.RAG_EMBEDDINGS ?? (env.OPENAI_API_KEY ? 'openai' : 'local'),
      embedDim: env.RAG_EMBED_DIM,
    },
    agent: { maxIterations: env.AGENT_MAX_ITERATIONS, historyTurns: env.AGENT_HISTORY_TURNS },
    conversations: { ttlMs: env.CONVERSATION_TTL_HOURS * 60 * 60 * 1000, sweepMs: env.CACHE_SWEEP_MS },
    cache: { sweepMs: env.CACHE_SWEEP_MS },
    social: { postsPerPlatform: env.SOCIAL_POSTS_PER_PLATFORM },
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX },
  };
}
