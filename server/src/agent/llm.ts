// Language-model collaborator: one streamed turn per request, either tool calls or answer text
import { randomUUID } from 'crypto';
import { ChatOpenAI } from '@langchain/openai';
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type AIMessageChunk,
  type BaseMessage,
} from '@langchain/core/messages';
import { UpstreamError, errorMessage, isRecord } from '../shared/errors.js';
import { AgentLoopError } from './errors.js';
import type { ToolDeclaration } from './tools.js';
import type { ConversationTurn, ToolCall } from './types.js';

export interface ModelTurnRequest {
  system: string;
  history: ConversationTurn[];
  tools: readonly ToolDeclaration[];
  signal?: AbortSignal;
}

export type ModelTurn =
  | { type: 'tool_calls'; calls: ToolCall[]; content: string }
  | { type: 'text'; fragments: AsyncIterable<string> };

export interface LanguageModel {
  requestTurn(req: ModelTurnRequest): Promise<ModelTurn>;
}

export function contentText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  return content.map((part) => (isRecord(part) && typeof part.text === 'string' ? part.text : '')).join('');
}

/** Tool results go back as JSON; failures keep their code so the model can react to it. */
export function toMessages(system: string, history: ConversationTurn[]): BaseMessage[] {
  const out: BaseMessage[] = [new SystemMessage(system)];
  for (const turn of history) {
    if (turn.role === 'user') {
      out.push(new HumanMessage(turn.content));
    } else if (turn.role === 'assistant') {
      out.push(new AIMessage({
        content: turn.content,
        tool_calls: (turn.toolCalls ?? []).map((c) => ({ id: c.id, name: c.name, args: c.args, type: 'tool_call' as const })),
      }));
    } else {
      const r = turn.content;
      const body = r.status === 'success' ? { ok: true, data: r.payload } : { ok: false, error: r.code, message: r.message };
      out.push(new ToolMessage({ tool_call_id: r.callId, name: r.tool, content: JSON.stringify(body) }));
    }
  }
  return out;
}

async function pull(it: AsyncIterator<AIMessageChunk>): Promise<IteratorResult<AIMessageChunk>> {
  try {
    return await it.next();
  } catch (err) {
    if (err instanceof AgentLoopError) throw err;
    throw new UpstreamError('llm', `model stream failed: ${errorMessage(err)}`);
  }
}

function toolTurn(acc: AIMessageChunk): ModelTurn {
  if (acc.invalid_tool_calls?.length) {
    const names = acc.invalid_tool_calls.map((c) => c.name ?? '?').join(', ');
    throw new AgentLoopError('PROTOCOL_VIOLATION', `model sent unparseable tool arguments (${names})`);
  }
  const calls: ToolCall[] = (acc.tool_calls ?? []).map((c) => ({ id: c.id || randomUUID(), name: c.name, args: c.args }));
  if (!calls.length) throw new AgentLoopError('PROTOCOL_VIOLATION', 'model started a tool call without naming one');
  return { type: 'tool_calls', calls, content: contentText(acc.content) };
}

async function* replay(fragments: string[]): AsyncGenerator<string> {
  for (const fragment of fragments) yield fragment;
}

/**
 * Reads the whole turn before classifying it. Any tool-call chunk makes it a
 * tool turn whose text is only the lead-in to the calls; a turn without tool
 * calls is the answer, replayed fragment by fragment.
 */
export async function interpretStream(stream: AsyncIterable<AIMessageChunk>): Promise<ModelTurn> {
  const it = stream[Symbol.asyncIterator]();
  const fragments: string[] = [];
  let acc: AIMessageChunk | undefined;
  let wantsTools = false;
  for (let next = await pull(it); !next.done; next = await pull(it)) {
    const chunk = next.value;
    acc = acc ? acc.concat(chunk) : chunk;
    if (chunk.tool_call_chunks?.length) wantsTools = true;
    const text = contentText(chunk.content);
    if (text) fragments.push(text);
  }
  if (acc && wantsTools) return toolTurn(acc);
  return { type: 'text', fragments: replay(fragments) };
}

export interface OpenAIModelConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class OpenAIChatModel implements LanguageModel {
  private llm: ChatOpenAI;

  constructor(cfg: OpenAIModelConfig) {
    this.llm = new ChatOpenAI({ model: cfg.model, apiKey: cfg.apiKey, temperature: cfg.temperature ?? 0.2, streaming: true });
  }

  async requestTurn(req: ModelTurnRequest): Promise<ModelTurn> {
    const bound = this.llm.bindTools(req.tools.map((t) => ({
      type: 'function' as const,
      function: { name: t.name, description: t.description, parameters: t.parameters },
    })));
    let stream: AsyncIterable<AIMessageChunk>;
    try {
      stream = await bound.stream(toMessages(req.system, req.history), { signal: req.signal });
    } catch (err) {
      throw new UpstreamError('llm', `model request failed: ${errorMessage(err)}`);
    }
    return interpretStream(stream);
  }
}
