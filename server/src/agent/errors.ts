import type { LoopErrorCode, ToolErrorCode } from './types.js';

/** Raised inside the executor; never crosses its boundary. */
export class ToolError extends Error {
  constructor(public readonly code: ToolErrorCode, message: string) {
    super(message);
    this.name = 'ToolError';
  }
}

/** Terminal for one chat request. */
export class AgentLoopError extends Error {
  constructor(public readonly code: LoopErrorCode, message: string) {
    super(message);
    this.name = 'AgentLoopError';
  }
}
