// In-process stand-ins shared by the test files
import { UpstreamError } from '../src/shared/errors.js';
import type { MarketDataSource, MarketParams, MarketPayload, ResourceKind } from '../src/providers/marketData.js';
import type { LanguageModel, ModelTurn, ModelTurnRequest } from '../src/agent/llm.js';
import type { AgentEvent, ToolCall } from '../src/agent/types.js';

export class FakeMarket implements MarketDataSource {
  calls: Array<{ kind: ResourceKind; ticker: string; params?: MarketParams }> = [];
  failures = new Map<ResourceKind, Error>();
  delayMs = 0;

  async fetch(kind: ResourceKind, ticker: string, params?: MarketParams): Promise<MarketPayload> {
    this.calls.push({ kind, ticker, params });
    if (this.delayMs) await new Promise((r) => setTimeout(r, this.delayMs));
    const failure = this.failures.get(kind);
    if (failure) throw failure;
    return { status: 'OK', ticker, kind, results: [{ c: 190.5, o: 188, h: 191, l: 187.2, v: 1000 }] };
  }

  failWith(kind: ResourceKind, message = 'previous_close returned 500: boom') {
    this.failures.set(kind, new UpstreamError('polygon', message, 500));
  }
}

export type ScriptStep =
  | { calls: ToolCall[]; content?: string }
  | { text: string[] }
  | { fail: Error }
  | ((req: ModelTurnRequest) => ModelTurn | Promise<ModelTurn>);

export async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

/** Replays a fixed list of model turns and records what it was asked. */
export class ScriptedModel implements LanguageModel {
  requests: ModelTurnRequest[] = [];

  constructor(private readonly script: ScriptStep[]) {}

  async requestTurn(req: ModelTurnRequest): Promise<ModelTurn> {
    this.requests.push({ ...req, history: [...req.history] });
    const step = this.script.shift();
    if (!step) throw new Error('script exhausted');
    if (typeof step === 'function') return step(req);
    if ('fail' in step) throw step.fail;
    if ('text' in step) return { type: 'text', fragments: fromArray(step.text) };
    return { type: 'tool_calls', calls: step.calls, content: step.content ?? '' };
  }
}

export async function collect(events: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const out: AgentEvent[] = [];
  for await (const e of events) out.push(e);
  return out;
}

/** Wire-visible part of each event, for order assertions. */
export function brief(events: AgentEvent[]): string[] {
  return events.map((e) => {
    switch (e.type) {
      case 'tool_call': return `tool_call:${e.tool}:${e.status}`;
      case 'text': return `text:${e.text}`;
      case 'done': return `done:${e.state}`;
      case 'error': return `error:${e.code}`;
    }
  });
}

export function quoteCall(id: string, ticker = 'AAPL'): ToolCall {
  return { id, name: 'get_stock_quote', args: { ticker } };
}

export class Clock {
  constructor(public t = Date.parse('2024-06-10T12:00:00Z')) {}
  now = () => this.t;
  advance(ms: number) {
    this.t += ms;
  }
}
