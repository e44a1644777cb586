// Event-stream serializer for agent progress
import type { Response } from 'express';
import type { AgentEvent } from '../agent/types.js';

function block(event: string, lines: string[]): string {
  return `event: ${event}\n${lines.map((l) => `data: ${l}`).join('\n')}\n\n`;
}

/**
 * One event block per loop event, except text: every line of a fragment goes
 * out as its own text event with a single `data:` line, since the dashboard
 * reader keeps only the last `data:` line of a block. Internal fields (call id,
 * cache source) stay server-side.
 */
export function encodeEvent(event: AgentEvent): string {
  switch (event.type) {
    case 'tool_call':
      return block('tool_call', [JSON.stringify({ tool: event.tool, status: event.status })]);
    case 'text':
      return event.text.split(/\r\n|\r|\n/).map((line) => block('text', [line])).join('');
    case 'done':
      return block('done', ['']);
    case 'error':
      return block('error', [JSON.stringify({ message: event.message })]);
  }
}

export function openEventStream(res: Response): void {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders?.();
}

/**
 * Writes events as the loop yields them. Stops pulling once the client is gone,
 * which in turn stops the generator at its next suspension point.
 */
export async function pipeEvents(events: AsyncIterable<AgentEvent>, res: Response): Promise<number> {
  let written = 0;
  for await (const event of events) {
    if (res.writableEnded || res.destroyed) break;
    res.write(encodeEvent(event));
    written++;
  }
  if (!res.writableEnded) res.end();
  return written;
}
