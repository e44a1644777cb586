import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConversationStore } from '../src/chat/conversationStore.js';
import { Clock } from './helpers.js';

describe('ConversationStore', () => {
  it('keeps turns in insertion order per conversation', () => {
    const store = new ConversationStore({ ttlMs: 1000 });
    store.append('a', { role: 'user', content: 'hi' });
    store.append('b', { role: 'user', content: 'other' });
    store.append('a', { role: 'assistant', content: 'hello' }, { role: 'user', content: 'quote?' });
    assert.deepStrictEqual(store.get('a').map((t) => t.content), ['hi', 'hello', 'quote?']);
    assert.strictEqual(store.size(), 2);
  });

  it('returns a copy that callers cannot mutate', () => {
    const store = new ConversationStore({ ttlMs: 1000 });
    store.append('a', { role: 'user', content: 'hi' });
    store.get('a').push({ role: 'user', content: 'sneaky' });
    assert.strictEqual(store.get('a').length, 1);
  });

  it('expires a conversation once the ttl passes since the last append', () => {
    const clock = new Clock();
    const store = new ConversationStore({ ttlMs: 1000, now: clock.now });
    store.append('a', { role: 'user', content: 'hi' });
    clock.advance(800);
    store.append('a', { role: 'assistant', content: 'hello' });
    clock.advance(1000);
    assert.strictEqual(store.get('a').length, 2);
    clock.advance(1);
    assert.deepStrictEqual(store.get('a'), []);
    assert.strictEqual(store.size(), 0);
  });

  it('starts fresh when appending to an expired conversation', () => {
    const clock = new Clock();
    const store = new ConversationStore({ ttlMs: 1000, now: clock.now });
    store.append('a', { role: 'user', content: 'old' });
    clock.advance(5000);
    store.append('a', { role: 'user', content: 'new' });
    assert.deepStrictEqual(store.get('a'), [{ role: 'user', content: 'new' }]);
  });

  it('clears and sweeps', () => {
    const clock = new Clock();
    const store = new ConversationStore({ ttlMs: 1000, now: clock.now });
    store.append('a', { role: 'user', content: 'hi' });
    store.append('b', { role: 'user', content: 'hi' });
    assert.strictEqual(store.clear('a'), true);
    assert.strictEqual(store.clear('a'), false);
    clock.advance(1001);
    assert.strictEqual(store.sweep(), 1);
    assert.strictEqual(store.size(), 0);
  });
});
