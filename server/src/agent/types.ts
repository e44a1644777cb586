import type { CacheSource } from '../cache/layeredCache.js';

export type ToolErrorCode = 'INVALID_ARGUMENT' | 'UPSTREAM_ERROR';
export type LoopErrorCode = 'PROTOCOL_VIOLATION' | 'UPSTREAM_ERROR';

export interface ToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export type ResultSource = CacheSource | 'live';

export type ToolResult =
  | { callId: string; tool: string; status: 'success'; payload: unknown; source: ResultSource }
  | { callId: string; tool: string; status: 'failure'; code: ToolErrorCode; message: string };

export type ConversationTurn =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; content: ToolResult };

export type LoopState = 'AWAITING_MODEL_TURN' | 'EXECUTING_TOOLS' | 'DONE' | 'DONE_TRUNCATED' | 'FAILED';

export interface AgentLoopState {
  conversationId: string;
  iteration: number;
  toolStatuses: Array<{ callId: string; tool: string; status: 'complete' | 'error' }>;
  state: LoopState;
}

export type ToolCallStatus = 'calling' | 'complete' | 'error';

/** Events produced by the loop, in wire order. */
export type AgentEvent =
  | { type: 'tool_call'; tool: string; status: ToolCallStatus; callId: string; source?: ResultSource }
  | { type: 'text'; text: string }
  | { type: 'done'; state: 'DONE' | 'DONE_TRUNCATED' }
  | { type: 'error'; message: string; code: LoopErrorCode };
