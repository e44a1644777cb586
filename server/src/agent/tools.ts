// Tool catalog exposed to the model's function-calling interface
import { z } from 'zod';

export type ToolName =
  | 'get_stock_quote'
  | 'get_company_info'
  | 'get_financials'
  | 'get_news'
  | 'search_knowledge_base'
  | 'analyze_sentiment'
  | 'get_price_forecast'
  | 'get_dividends'
  | 'get_stock_splits'
  | 'get_price_history';

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  pattern?: string;
  default?: string | number;
}

export interface ToolDeclaration {
  name: ToolName;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

const TICKER_PATTERN = '^[A-Za-z0-9.-]{1,10}$';
const DATE_PATTERN = '^\\d{4}-\\d{2}-\\d{2}$';

const tickerProp: JsonSchemaProperty = {
  type: 'string',
  description: 'Stock ticker symbol (e.g., AAPL, BRK.B)',
  pattern: TICKER_PATTERN,
};

function limitProp(max: number, def: number, what: string): JsonSchemaProperty {
  return { type: 'integer', description: `Number of ${what} to return (default: ${def})`, minimum: 1, maximum: max, default: def };
}

export const TOOL_DECLARATIONS: readonly ToolDeclaration[] = [
  {
    name: 'get_stock_quote',
    description: 'Get the latest daily quote for a stock: previous close, open, high, low and volume',
    parameters: { type: 'object', properties: { ticker: tickerProp }, required: ['ticker'] },
  },
  {
    name: 'get_company_info',
    description: 'Get company reference data: name, description, sector, market cap, employees, homepage',
    parameters: { type: 'object', properties: { ticker: tickerProp }, required: ['ticker'] },
  },
  {
    name: 'get_financials',
    description: 'Get recent financial statements (income statement, balance sheet, cash flow) from filings',
    parameters: {
      type: 'object',
      properties: { ticker: tickerProp, limit: limitProp(8, 4, 'filing periods') },
      required: ['ticker'],
    },
  },
  {
    name: 'get_news',
    description: 'Get recent news articles about a stock with titles, publishers, links and summaries',
    parameters: {
      type: 'object',
      properties: { ticker: tickerProp, limit: limitProp(50, 10, 'articles') },
      required: ['ticker'],
    },
  },
  {
    name: 'search_knowledge_base',
    description: 'Semantic search over scraped news articles and classified social posts. Use for questions about what articles or investors are saying',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Natural-language search query' },
        ticker: { ...tickerProp, description: 'Restrict results to this ticker' },
        namespace: { type: 'string', description: 'Index partition to search (default: news)', enum: ['news', 'sentiment'], default: 'news' },
        top_k: { type: 'integer', description: 'Number of chunks to return (default: 5)', minimum: 1, maximum: 20, default: 5 },
      },
      required: ['query'],
    },
  },
  {
    name: 'analyze_sentiment',
    description: 'Analyze social-media sentiment (StockTwits, Reddit) for a stock: overall label, score, confidence and sample posts',
    parameters: { type: 'object', properties: { ticker: tickerProp }, required: ['ticker'] },
  },
  {
    name: 'get_price_forecast',
    description: 'Statistical price forecast (trend + moving average) with a 95% band for the next business days',
    parameters: {
      type: 'object',
      properties: {
        ticker: tickerProp,
        horizon_days: { type: 'integer', description: 'Business days to forecast (default: 7)', minimum: 1, maximum: 30, default: 7 },
      },
      required: ['ticker'],
    },
  },
  {
    name: 'get_dividends',
    description: 'Get dividend history: cash amount, ex-dividend, record and pay dates',
    parameters: {
      type: 'object',
      properties: { ticker: tickerProp, limit: limitProp(50, 10, 'dividends') },
      required: ['ticker'],
    },
  },
  {
    name: 'get_stock_splits',
    description: 'Get stock split history with execution dates and split ratios',
    parameters: {
      type: 'object',
      properties: { ticker: tickerProp, limit: limitProp(50, 10, 'splits') },
      required: ['ticker'],
    },
  },
  {
    name: 'get_price_history',
    description: 'Get OHLCV price bars for a date range',
    parameters: {
      type: 'object',
      properties: {
        ticker: tickerProp,
        from: { type: 'string', description: 'Start date (YYYY-MM-DD)', pattern: DATE_PATTERN },
        to: { type: 'string', description: 'End date (YYYY-MM-DD), not before from', pattern: DATE_PATTERN },
        timespan: { type: 'string', description: 'Bar size (default: day)', enum: ['minute', 'hour', 'day', 'week', 'month'], default: 'day' },
      },
      required: ['ticker', 'from', 'to'],
    },
  },
];

export const TOOL_NAMES: ReadonlySet<string> = new Set(TOOL_DECLARATIONS.map((t) => t.name));

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.has(name);
}

// Argument schemas. Kept beside the declarations so the two cannot drift apart unnoticed.

const ticker = z
  .string()
  .regex(new RegExp(TICKER_PATTERN), 'ticker must be 1-10 letters, digits, "." or "-"')
  .transform((t) => t.toUpperCase());

const isoDate = z
  .string()
  .regex(new RegExp(DATE_PATTERN), 'expected YYYY-MM-DD')
  .refine((d) => {
    const parsed = new Date(`${d}T00:00:00Z`);
    // Date rolls 2024-02-31 over to March, so the day must survive the round trip
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === d;
  }, 'not a calendar date');

const limit = (max: number, def: number) => z.number().int().min(1).max(max).default(def);

export const TickerArgs = z.object({ ticker }).strict();
export const FinancialsArgs = z.object({ ticker, limit: limit(8, 4) }).strict();
export const ListArgs = z.object({ ticker, limit: limit(50, 10) }).strict();
export const SearchArgs = z
  .object({
    query: z.string().trim().min(1).max(500),
    ticker: ticker.optional(),
    namespace: z.enum(['news', 'sentiment']).default('news'),
    top_k: z.number().int().min(1).max(20).default(5),
  })
  .strict();
export const ForecastArgs = z.object({ ticker, horizon_days: z.number().int().min(1).max(30).default(7) }).strict();
export const PriceHistoryArgs = z
  .object({
    ticker,
    from: isoDate,
    to: isoDate,
    timespan: z.enum(['minute', 'hour', 'day', 'week', 'month']).default('day'),
  })
  .strict()
  .refine((a) => a.from <= a.to, { message: 'from must not be after to', path: ['from'] });

export const TOOL_ARG_SCHEMAS: Record<ToolName, z.ZodTypeAny> = {
  get_stock_quote: TickerArgs,
  get_company_info: TickerArgs,
  get_financials: FinancialsArgs,
  get_news: ListArgs,
  search_knowledge_base: SearchArgs,
  analyze_sentiment: TickerArgs,
  get_price_forecast: ForecastArgs,
  get_dividends: ListArgs,
  get_stock_splits: ListArgs,
  get_price_history: PriceHistoryArgs,
};

export type SearchArgsT = z.infer<typeof SearchArgs>;
export type PriceHistoryArgsT = z.infer<typeof PriceHistoryArgs>;
