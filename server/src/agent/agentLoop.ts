// Bounded model-turn / tool-batch loop producing ordered progress events
import { logger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../shared/errors.js';
import { EMPTY_CLIENT_TIER, type ClientTier } from '../cache/clientContext.js';
import type { ConversationStore } from '../chat/conversationStore.js';
import { AgentLoopError } from './errors.js';
import type { LanguageModel } from './llm.js';
import { TOOL_DECLARATIONS, type ToolDeclaration } from './tools.js';
import type { ToolDispatcher } from './toolExecutor.js';
import type { AgentEvent, AgentLoopState, ConversationTurn, ToolCall, ToolResult } from './types.js';

export interface AgentLoopOptions {
  model: LanguageModel;
  tools: ToolDispatcher;
  store: ConversationStore;
  declarations?: readonly ToolDeclaration[];
  maxIterations?: number;
  historyTurns?: number;
}

export interface ChatRequest {
  conversationId: string;
  ticker: string;
  message: string;
  client?: ClientTier;
  signal?: AbortSignal;
}

export function systemPrompt(ticker: string): string {
  return [
    `You are a stock research assistant. The user is currently looking at ${ticker.toUpperCase()}.`,
    'Use the available tools to fetch quotes, company data, financials, news, dividends, splits, price history, sentiment and forecasts instead of guessing numbers.',
    'Call several tools in one turn when they are independent. When a tool fails, say what is missing and answer with what you have.',
    'Answer concisely in Markdown, cite figures with their dates, and never present a forecast as financial advice.',
  ].join('\n');
}

/**
 * Last `maxTurns` turns, moved forward to a user turn so the window never
 * starts on a tool result whose call was cut off. Only whole earlier exchanges
 * are dropped: the latest user turn and everything after it always stay.
 */
export function windowHistory(turns: ConversationTurn[], maxTurns: number): ConversationTurn[] {
  let current = turns.length - 1;
  while (current > 0 && turns[current]?.role !== 'user') current--;
  let start = Math.min(Math.max(0, turns.length - maxTurns), Math.max(0, current));
  while (start < current && turns[start]?.role !== 'user') start++;
  return turns.slice(start);
}

export function truncationNotice(toolNames: string[]): string {
  const ran = toolNames.length
    ? ` I gathered data with ${toolNames.join(', ')} but did not get to a final answer.`
    : ' I did not get to a final answer.';
  return `I reached the limit of research steps for one message before finishing.${ran} Ask a narrower follow-up and I will continue from here.`;
}

type Settled = { call: ToolCall; result: ToolResult } | { call: ToolCall; error: unknown };

export class AgentLoop {
  private readonly declarations: readonly ToolDeclaration[];
  private readonly maxIterations: number;
  private readonly historyTurns: number;

  constructor(private readonly opts: AgentLoopOptions) {
    this.declarations = opts.declarations ?? TOOL_DECLARATIONS;
    this.maxIterations = Math.max(1, opts.maxIterations ?? 5);
    this.historyTurns = Math.max(2, opts.historyTurns ?? 40);
  }

  async *run(req: ChatRequest): AsyncGenerator<AgentEvent, AgentLoopState> {
    const state: AgentLoopState = { conversationId: req.conversationId, iteration: 0, toolStatuses: [], state: 'AWAITING_MODEL_TURN' };
    const log = logger.child({ conversationId: req.conversationId, ticker: req.ticker });
    const { store } = this.opts;
    const aborted = () => req.signal?.aborted === true;
    const started = Date.now();

    store.append(req.conversationId, { role: 'user', content: req.message });
    try {
      while (!aborted()) {
        state.iteration++;
        state.state = 'AWAITING_MODEL_TURN';
        const history = windowHistory(store.get(req.conversationId), this.historyTurns);
        const turn = await this.opts.model
          .requestTurn({ system: systemPrompt(req.ticker), history, tools: this.declarations, signal: req.signal })
          .catch((err: unknown) => { throw asLoopError(err); });
        if (aborted()) break;

        if (turn.type === 'text') {
          let answer = '';
          try {
            for await (const fragment of turn.fragments) {
              if (aborted()) break;
              answer += fragment;
              yield { type: 'text', text: fragment };
            }
          } catch (err) {
            throw asLoopError(err);
          }
          if (aborted()) break;
          if (!answer) throw new AgentLoopError('PROTOCOL_VIOLATION', 'model returned an empty turn');
          store.append(req.conversationId, { role: 'assistant', content: answer });
          state.state = 'DONE';
          yield { type: 'done', state: 'DONE' };
          return state;
        }

        const ids = new Set(turn.calls.map((c) => c.id));
        if (ids.size !== turn.calls.length) throw new AgentLoopError('PROTOCOL_VIOLATION', 'model reused a tool call id within one turn');
        state.state = 'EXECUTING_TOOLS';
        const results = yield* this.executeBatch(turn.calls, req.client ?? EMPTY_CLIENT_TIER, state, log, aborted);
        if (!results) break;
        store.append(
          req.conversationId,
          { role: 'assistant', content: turn.content, toolCalls: turn.calls },
          ...results.map((r): ConversationTurn => ({ role: 'tool', content: r }))
        );

        if (state.iteration >= this.maxIterations) {
          const notice = truncationNotice([...new Set(state.toolStatuses.map((s) => s.tool))]);
          store.append(req.conversationId, { role: 'assistant', content: notice });
          state.state = 'DONE_TRUNCATED';
          yield { type: 'text', text: notice };
          yield { type: 'done', state: 'DONE_TRUNCATED' };
          return state;
        }
      }
      log.info({ iteration: state.iteration }, 'agent_loop_cancelled');
      return state;
    } catch (err) {
      if (aborted()) {
        log.info({ iteration: state.iteration }, 'agent_loop_cancelled');
        return state;
      }
      const loopErr = asLoopError(err);
      state.state = 'FAILED';
      log.error({ code: loopErr.code, err: loopErr.message, iteration: state.iteration }, 'agent_loop_failed');
      yield { type: 'error', message: loopErr.message, code: loopErr.code };
      return state;
    } finally {
      log.info({ state: state.state, iteration: state.iteration, tools: state.toolStatuses, ms: Date.now() - started }, 'agent_loop_finished');
    }
  }

  /**
   * Dispatches every call of one turn concurrently and reports terminal events
   * in completion order. Returns results in call order, or fails when any call
   * is left without exactly one matching result. Returns null once cancelled;
   * calls already dispatched run to completion on their own.
   */
  private async *executeBatch(
    calls: ToolCall[],
    client: ClientTier,
    state: AgentLoopState,
    log: Logger,
    aborted: () => boolean
  ): AsyncGenerator<AgentEvent, ToolResult[] | null> {
    const pending = new Map<string, Promise<Settled>>();
    for (const call of calls) {
      pending.set(
        call.id,
        this.opts.tools.execute(call, { client }).then(
          (result): Settled => ({ call, result }),
          (error: unknown): Settled => ({ call, error })
        )
      );
    }
    for (const call of calls) yield { type: 'tool_call', tool: call.name, status: 'calling', callId: call.id };
    if (aborted()) return null;

    const results = new Map<string, ToolResult>();
    const violations: string[] = [];
    while (pending.size) {
      const settled = await Promise.race(pending.values());
      if (aborted()) return null;
      const { call } = settled;
      pending.delete(call.id);
      let result: ToolResult | undefined;
      if ('error' in settled) {
        violations.push(`${call.name} produced no result (${errorMessage(settled.error)})`);
      } else if (settled.result.callId !== call.id) {
        violations.push(`${call.name} returned a result for call ${settled.result.callId}`);
      } else {
        result = settled.result;
        results.set(call.id, result);
      }
      const status = result?.status === 'success' ? 'complete' : 'error';
      state.toolStatuses.push({ callId: call.id, tool: call.name, status });
      if (result?.status === 'failure') log.warn({ tool: call.name, code: result.code }, 'agent_tool_failure');
      yield {
        type: 'tool_call',
        tool: call.name,
        status,
        callId: call.id,
        ...(result?.status === 'success' ? { source: result.source } : {}),
      };
    }

    if (violations.length) {
      throw new AgentLoopError(
        'PROTOCOL_VIOLATION',
        `tool results do not match tool calls (${results.size} of ${calls.length}): ${violations.join('; ')}`
      );
    }
    return calls.map((c) => results.get(c.id)).filter((r): r is ToolResult => r !== undefined);
  }
}

function asLoopError(err: unknown): AgentLoopError {
  if (err instanceof AgentLoopError) return err;
  return new AgentLoopError('UPSTREAM_ERROR', `language model request failed: ${errorMessage(err)}`);
}
