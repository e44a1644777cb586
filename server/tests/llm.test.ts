import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AIMessage, AIMessageChunk, HumanMessage, SystemMessage, ToolMessage } from '@langchain/core/messages';
import { contentText, interpretStream, toMessages, type ModelTurn } from '../src/agent/llm.js';
import { UpstreamError } from '../src/shared/errors.js';
import type { ConversationTurn } from '../src/agent/types.js';

async function* stream(chunks: AIMessageChunk[], failAfter?: Error): AsyncGenerator<AIMessageChunk> {
  for (const c of chunks) yield c;
  if (failAfter) throw failAfter;
}

async function texts(turn: ModelTurn): Promise<string[]> {
  assert.strictEqual(turn.type, 'text');
  const out: string[] = [];
  if (turn.type === 'text') for await (const t of turn.fragments) out.push(t);
  return out;
}

describe('interpretStream', () => {
  it('merges tool-call arguments split across chunks', async () => {
    const turn = await interpretStream(stream([
      new AIMessageChunk({ content: '', tool_call_chunks: [{ name: 'get_stock_quote', args: '{"ticker":', id: 'call_1', index: 0 }] }),
      new AIMessageChunk({ content: '', tool_call_chunks: [{ args: '"AAPL"}', index: 0 }] }),
      new AIMessageChunk({ content: '', tool_call_chunks: [{ name: 'get_news', args: '{"ticker":"AAPL","limit":3}', id: 'call_2', index: 1 }] }),
    ]));
    assert.deepStrictEqual(turn, {
      type: 'tool_calls',
      content: '',
      calls: [
        { id: 'call_1', name: 'get_stock_quote', args: { ticker: 'AAPL' } },
        { id: 'call_2', name: 'get_news', args: { ticker: 'AAPL', limit: 3 } },
      ],
    });
  });

  it('replays answer fragments after skipping empty chunks', async () => {
    const turn = await interpretStream(stream([
      new AIMessageChunk({ content: '' }),
      new AIMessageChunk({ content: 'Apple ' }),
      new AIMessageChunk({ content: '' }),
      new AIMessageChunk({ content: 'closed higher.' }),
    ]));
    assert.deepStrictEqual(await texts(turn), ['Apple ', 'closed higher.']);
  });

  it('yields no fragments for an empty stream', async () => {
    assert.deepStrictEqual(await texts(await interpretStream(stream([]))), []);
  });

  it('keeps a lead-in written before tool calls as the tool turn content', async () => {
    const turn = await interpretStream(stream([
      new AIMessageChunk({ content: 'Let me look ' }),
      new AIMessageChunk({ content: 'that up.' }),
      new AIMessageChunk({ content: '', tool_call_chunks: [{ name: 'get_stock_quote', args: '{"ticker":"AAPL"}', id: 'call_1', index: 0 }] }),
    ]));
    assert.deepStrictEqual(turn, {
      type: 'tool_calls',
      content: 'Let me look that up.',
      calls: [{ id: 'call_1', name: 'get_stock_quote', args: { ticker: 'AAPL' } }],
    });
  });

  it('wraps stream failures as upstream errors', async () => {
    await assert.rejects(
      interpretStream(stream([new AIMessageChunk({ content: 'Partial' })], new Error('socket hang up'))),
      (err: unknown) => {
        assert.ok(err instanceof UpstreamError);
        assert.strictEqual(err.message, 'model stream failed: socket hang up');
        return true;
      }
    );
  });
});

describe('contentText', () => {
  it('flattens content parts to their text', () => {
    assert.strictEqual(contentText('plain'), 'plain');
    assert.strictEqual(contentText([{ type: 'text', text: 'a' }, { type: 'image_url' }, { type: 'text', text: 'b' }]), 'ab');
    assert.strictEqual(contentText(undefined), '');
  });
});

describe('toMessages', () => {
  it('maps conversation turns onto chat messages', () => {
    const history: ConversationTurn[] = [
      { role: 'user', content: 'quote and news?' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [
          { id: 'c1', name: 'get_stock_quote', args: { ticker: 'AAPL' } },
          { id: 'c2', name: 'get_news', args: { ticker: 'AAPL' } },
        ],
      },
      { role: 'tool', content: { callId: 'c1', tool: 'get_stock_quote', status: 'success', payload: { c: 190.5 }, source: 'live' } },
      { role: 'tool', content: { callId: 'c2', tool: 'get_news', status: 'failure', code: 'UPSTREAM_ERROR', message: 'HTTP 503' } },
    ];
    const msgs = toMessages('system prompt', history);
    assert.strictEqual(msgs.length, 5);
    assert.ok(msgs[0] instanceof SystemMessage);
    assert.ok(msgs[1] instanceof HumanMessage);
    assert.strictEqual(msgs[1].content, 'quote and news?');

    const ai = msgs[2];
    assert.ok(ai instanceof AIMessage);
    assert.deepStrictEqual(ai.tool_calls, [
      { id: 'c1', name: 'get_stock_quote', args: { ticker: 'AAPL' }, type: 'tool_call' },
      { id: 'c2', name: 'get_news', args: { ticker: 'AAPL' }, type: 'tool_call' },
    ]);

    const ok = msgs[3];
    assert.ok(ok instanceof ToolMessage);
    assert.strictEqual(ok.tool_call_id, 'c1');
    assert.strictEqual(ok.content, '{"ok":true,"data":{"c":190.5}}');

    const failed = msgs[4];
    assert.ok(failed instanceof ToolMessage);
    assert.strictEqual(failed.content, '{"ok":false,"error":"UPSTREAM_ERROR","message":"HTTP 503"}');
  });
});
